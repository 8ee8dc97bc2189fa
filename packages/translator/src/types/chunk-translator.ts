export interface ChunkTranslationOptions {
  /** Language code of the chunk, or 'auto' to let the translator detect it */
  sourceLanguage: string;
  targetLanguage: string;
  abortSignal?: AbortSignal;
}

/**
 * Translation capability used by TranslationOrchestrator.
 *
 * Implementations must be safe to call concurrently and may reject on any
 * transport or service failure.
 */
export interface ChunkTranslator {
  translate(chunk: string, options: ChunkTranslationOptions): Promise<string>;
}
