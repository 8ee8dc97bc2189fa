import type { LoggerMethods } from '@pdf-lingo/logger';

import type { ChunkTranslator } from '../types/chunk-translator';

import { ConcurrentPool, ConfigurationError } from '@pdf-lingo/shared';

import { TextChunker } from '../chunker/text-chunker';
import { TEXT_CHUNKER, TRANSLATION_ORCHESTRATOR } from '../config/constants';
import { TranslationServiceError } from '../errors/translation-service-error';

export interface TranslationOrchestratorOptions {
  /** Maximum chunk length in characters (default: 4500) */
  maxChunkLength?: number;
  /** Chunks translated at the same time (default: 1) */
  concurrency?: number;
}

export interface TranslateTextOptions {
  targetLanguage: string;
  /** Defaults to 'auto' */
  sourceLanguage?: string;
  abortSignal?: AbortSignal;
}

export interface TextTranslation {
  text: string;
  chunkCount: number;
}

/**
 * Translates long text by chunking it and sending each chunk to a
 * ChunkTranslator. Output chunks are joined in source order.
 */
export class TranslationOrchestrator {
  private readonly maxChunkLength: number;
  private readonly concurrency: number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly translator: ChunkTranslator,
    options: TranslationOrchestratorOptions = {},
  ) {
    this.maxChunkLength =
      options.maxChunkLength ?? TEXT_CHUNKER.DEFAULT_MAX_LENGTH;
    this.concurrency =
      options.concurrency ?? TRANSLATION_ORCHESTRATOR.DEFAULT_CONCURRENCY;

    if (!Number.isInteger(this.maxChunkLength) || this.maxChunkLength < 1) {
      throw new ConfigurationError(
        'maxChunkLength',
        `must be a positive integer, got ${this.maxChunkLength}`,
      );
    }
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new ConfigurationError(
        'concurrency',
        `must be a positive integer, got ${this.concurrency}`,
      );
    }
  }

  async translate(text: string, options: TranslateTextOptions): Promise<string> {
    return (await this.translateWithStats(text, options)).text;
  }

  /**
   * Same as translate(), also reporting how many chunks were sent.
   *
   * @throws TranslationServiceError for the first chunk that failed
   */
  async translateWithStats(
    text: string,
    options: TranslateTextOptions,
  ): Promise<TextTranslation> {
    if (text.length === 0) {
      return { text: '', chunkCount: 0 };
    }

    const {
      targetLanguage,
      abortSignal,
      sourceLanguage = TRANSLATION_ORCHESTRATOR.AUTO_SOURCE_LANGUAGE,
    } = options;
    const chunks = TextChunker.chunk(text, this.maxChunkLength);

    this.logger.info(
      `[TranslationOrchestrator] Translating ${chunks.length} chunks (${sourceLanguage} → ${targetLanguage}, concurrency ${this.concurrency})`,
    );

    // Aborted on the first failed chunk so siblings still in flight stop too
    const pool = new AbortController();
    const chunkSignal = abortSignal
      ? AbortSignal.any([abortSignal, pool.signal])
      : pool.signal;

    const translated = await ConcurrentPool.run(
      chunks,
      this.concurrency,
      async (chunk, index) => {
        chunkSignal.throwIfAborted();
        try {
          return await this.translator.translate(chunk, {
            sourceLanguage,
            targetLanguage,
            abortSignal: chunkSignal,
          });
        } catch (error) {
          if (chunkSignal.aborted) {
            throw error;
          }
          this.logger.error(
            `[TranslationOrchestrator] Chunk ${index + 1}/${chunks.length} failed:`,
            error,
          );
          pool.abort();
          throw new TranslationServiceError(index, error);
        }
      },
      (_, index) =>
        this.logger.debug(
          `[TranslationOrchestrator] Chunk ${index + 1}/${chunks.length} translated`,
        ),
    );

    return {
      text: translated.join(TEXT_CHUNKER.PARAGRAPH_SEPARATOR),
      chunkCount: chunks.length,
    };
  }
}
