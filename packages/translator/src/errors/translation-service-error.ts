import { PipelineError } from '@pdf-lingo/shared';

/**
 * The translator failed on a chunk. The whole translation is abandoned;
 * no partial output is returned.
 */
export class TranslationServiceError extends PipelineError {
  public readonly name = 'TranslationServiceError';
  public readonly code = 'TRANSLATION_SERVICE_ERROR' as const;

  constructor(
    public readonly chunkIndex: number,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Chunk ${chunkIndex + 1} could not be translated: ${reason}`, {
      cause,
    });
  }
}
