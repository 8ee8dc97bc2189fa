import type { PipelineErrorCode } from '@pdf-lingo/model';

/**
 * Base class of every error the extraction/translation pipeline raises on
 * purpose. `code` identifies the kind without `instanceof` checks across
 * package boundaries.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
