/**
 * Error Type Tests
 */

import { BookInParseError, DuplicateExtractorError, ExtractorNotFoundError } from '@bookin/shared';

describe('BookInParseError subclasses', () => {
  it('should keep the subclass prototype', () => {
    const duplicate = new DuplicateExtractorError('text_state_machine');

    expect(duplicate).toBeInstanceOf(DuplicateExtractorError);
    expect(duplicate).toBeInstanceOf(BookInParseError);
    expect(duplicate).toBeInstanceOf(Error);
    expect(duplicate.name).toBe('DuplicateExtractorError');
    expect(duplicate.code).toBe('DUPLICATE_EXTRACTOR');
    expect(duplicate.message).toBe('Extractor already registered: text_state_machine');
  });

  it('should not confuse sibling error types', () => {
    const missing = new ExtractorNotFoundError('missing');

    expect(missing).toBeInstanceOf(ExtractorNotFoundError);
    expect(missing).not.toBeInstanceOf(DuplicateExtractorError);
    expect(missing.code).toBe('EXTRACTOR_NOT_FOUND');
  });
});
