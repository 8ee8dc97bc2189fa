import { PipelineError } from '@pdf-lingo/shared';

/**
 * The source document cannot be opened as a PDF.
 * Fatal to the whole extraction; no partial output exists.
 */
export class InputError extends PipelineError {
  public readonly name = 'InputError';
  public readonly code = 'INPUT_ERROR' as const;

  constructor(
    public readonly pdfPath: string,
    reason: string,
  ) {
    super(`Cannot open PDF document: ${reason}`);
  }
}
