import { PipelineError } from '@pdf-lingo/shared';

/**
 * A page failed while the document runs under the `abort` page failure
 * policy.
 */
export class PageExtractionError extends PipelineError {
  public readonly name = 'PageExtractionError';
  public readonly code = 'PAGE_EXTRACTION_ERROR' as const;

  constructor(
    public readonly pageNo: number,
    public readonly reason: string,
  ) {
    super(`Failed to extract page ${pageNo}: ${reason}`);
  }
}
