/**
 * Raised when a dataset file is missing, unreadable or has the wrong overall shape
 */
export class DatasetLoadError extends Error {
  constructor(message: string, public readonly filePath: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DatasetLoadError';
  }
}
