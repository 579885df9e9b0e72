import fs from 'fs';
import { CatalogEntry } from '../../types/models';
import { validateCatalogEntry } from '../../models/validation';
import { DatasetLoadError } from './errors';

/**
 * Read the classified catalog: a JSON array of { item_name, categories | genre }
 */
export async function readCatalog(filePath: string): Promise<CatalogEntry[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DatasetLoadError(`Catalog file is not readable: ${filePath}`, filePath, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new DatasetLoadError(`Catalog file is not valid JSON: ${filePath}`, filePath, error);
  }

  if (!Array.isArray(parsed)) {
    throw new DatasetLoadError(`Catalog file must contain a JSON array: ${filePath}`, filePath);
  }

  return parseCatalogEntries(parsed);
}

export function parseCatalogEntries(rawEntries: readonly unknown[]): CatalogEntry[] {
  const entries: CatalogEntry[] = [];
  rawEntries.forEach((raw, index) => {
    const { value, error } = validateCatalogEntry(raw);
    if (!value) {
      console.warn(`⚠️ Skipping catalog entry ${index}: ${error?.message ?? 'invalid entry'}`);
      return;
    }
    entries.push(value);
  });
  return entries;
}
