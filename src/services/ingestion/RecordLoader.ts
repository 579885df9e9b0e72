import fs from 'fs';
import readline from 'readline';
import { DatasetLoadError } from './errors';

export interface RecordReadResult {
  records: unknown[];
  unparsable: number;
}

/**
 * Read the normalized interaction stream: one JSON object per line.
 * Lines that are not valid JSON are reported and skipped; field validation happens later.
 */
export async function readRecords(filePath: string): Promise<RecordReadResult> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    throw new DatasetLoadError(`Records file is not readable: ${filePath}`, filePath, error);
  }

  const lines = readline.createInterface({
    input: fs.createReadStream(filePath, { encoding: 'utf-8' }),
    crlfDelay: Infinity
  });

  const records: unknown[] = [];
  let unparsable = 0;
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      records.push(JSON.parse(trimmed));
    } catch (error) {
      unparsable++;
      console.warn(`⚠️ Skipping line ${lineNumber} of ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return { records, unparsable };
}
