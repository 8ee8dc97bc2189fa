import type { LoggerMethods } from '@pdf-lingo/logger';
import type { ExtendedTokenUsage } from '@pdf-lingo/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@pdf-lingo/shared';

import {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';

export type { BaseLLMComponentOptions } from './base-llm-component';

/**
 * Abstract base class for text-in, text-out LLM components
 *
 * Extends BaseLLMComponent with a helper for plain-text LLM calls using
 * LLMCaller.call().
 *
 * Subclasses: LlmChunkTranslator
 */
export abstract class TextLLMComponent extends BaseLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
  ) {
    super(logger, model, componentName, options, fallbackModel);
  }

  /**
   * Call LLM with text prompts using LLMCaller.call()
   *
   * @param phase - Phase name for tracking (e.g., 'translation')
   * @returns Generated text and usage information
   */
  protected async callTextLLM(
    systemPrompt: string,
    userPrompt: string,
    phase: string,
    abortSignal?: AbortSignal,
  ): Promise<{ text: string; usage: ExtendedTokenUsage }> {
    const result = await LLMCaller.call({
      systemPrompt,
      userPrompt,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      abortSignal,
      component: this.componentName,
      phase,
    });

    if (result.usedFallback) {
      this.log(
        'warn',
        `${phase}: primary model failed, answered by fallback ${result.usage.modelName}`,
      );
    }
    this.trackUsage(result.usage);

    return { text: result.text, usage: result.usage };
  }
}
