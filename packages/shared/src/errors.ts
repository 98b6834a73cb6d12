/**
 * Custom error types for programming errors surfaced by the extraction layer.
 * Data defects never throw; they become record warnings.
 */

export class BookInParseError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = 'BookInParseError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateExtractorError extends BookInParseError {
  constructor(name: string) {
    super(`Extractor already registered: ${name}`, 'DUPLICATE_EXTRACTOR');
    this.name = 'DuplicateExtractorError';
  }
}

export class ExtractorNotFoundError extends BookInParseError {
  constructor(name: string) {
    super(`No extractor registered with name: ${name}`, 'EXTRACTOR_NOT_FOUND');
    this.name = 'ExtractorNotFoundError';
  }
}
