/**
 * Error thrown when an input table cannot be mapped to records at all
 * (a required identity column is missing).
 */
export class RecordMappingError extends Error {
  constructor(message: string) {
    super(`Record mapping failed: ${message}`);
    this.name = "RecordMappingError";
  }
}
