import type { LoggerMethods } from '@pdf-lingo/logger';
import type { LanguageModel } from 'ai';

import type {
  ChunkTranslationOptions,
  ChunkTranslator,
} from '../types/chunk-translator';

import {
  LLM_CHUNK_TRANSLATOR,
  TRANSLATION_ORCHESTRATOR,
} from '../config/constants';
import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '../core/text-llm-component';

/**
 * ChunkTranslator backed by a language model.
 *
 * Stateless between calls; one instance serves concurrent requests.
 */
export class LlmChunkTranslator
  extends TextLLMComponent
  implements ChunkTranslator
{
  private readonly languageNames = new Intl.DisplayNames(
    [LLM_CHUNK_TRANSLATOR.DISPLAY_LOCALE],
    { type: 'language' },
  );

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
  ) {
    super(
      logger,
      model,
      'LlmChunkTranslator',
      {
        ...options,
        maxRetries: options?.maxRetries ?? LLM_CHUNK_TRANSLATOR.DEFAULT_MAX_RETRIES,
      },
      fallbackModel,
    );
  }

  async translate(
    chunk: string,
    options: ChunkTranslationOptions,
  ): Promise<string> {
    const { text } = await this.callTextLLM(
      this.buildSystemPrompt(options.sourceLanguage, options.targetLanguage),
      this.buildUserPrompt(chunk),
      'translation',
      options.abortSignal,
    );
    return text.trim();
  }

  /**
   * Human-readable language name with its code, e.g. `Chinese (China) [zh-CN]`.
   * Falls back to the bare code for tags Intl does not know.
   */
  describeLanguage(code: string): string {
    let name: string | undefined;
    try {
      name = this.languageNames.of(code);
    } catch (error) {
      if (!(error instanceof RangeError)) {
        throw error;
      }
    }
    return name && name !== code ? `${name} [${code}]` : code;
  }

  protected buildSystemPrompt(
    sourceLanguage: string,
    targetLanguage: string,
  ): string {
    const source =
      sourceLanguage === TRANSLATION_ORCHESTRATOR.AUTO_SOURCE_LANGUAGE
        ? 'the language it is written in (detect it)'
        : this.describeLanguage(sourceLanguage);

    return [
      `You are a professional translator. Translate the text from ${source} into ${this.describeLanguage(targetLanguage)}.`,
      '',
      'Rules:',
      '- Output only the translation, with no preface, notes or quotes.',
      '- Keep every blank line between paragraphs exactly where it is.',
      '- Copy lines of the form "===== Page N =====" unchanged.',
      '- Leave numbers, URLs, code and proper names untranslated when they have no established translation.',
      '- Text that is already in the target language is copied as is.',
    ].join('\n');
  }

  protected buildUserPrompt(chunk: string): string {
    return chunk;
  }
}
