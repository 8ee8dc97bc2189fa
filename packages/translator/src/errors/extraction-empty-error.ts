import { PipelineError } from '@pdf-lingo/shared';

/**
 * The document has no extractable text on any page, even after OCR.
 * Means "nothing to translate" rather than a processing failure.
 */
export class ExtractionEmptyError extends PipelineError {
  public readonly name = 'ExtractionEmptyError';
  public readonly code = 'EXTRACTION_EMPTY' as const;

  constructor(public readonly totalPages: number) {
    super(
      totalPages === 0
        ? 'The document has no pages'
        : `No text could be extracted from any of ${totalPages} pages`,
    );
  }
}
