import { type LanguageModel, generateText } from 'ai';

/**
 * Configuration for a text LLM call with retry and fallback support
 */
export interface LLMCallConfig {
  /**
   * System prompt for LLM
   */
  systemPrompt: string;

  /**
   * User prompt for LLM
   */
  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model for retry after primary model exhausts maxRetries (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model, handed to the AI SDK
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'LlmChunkTranslator')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'translation')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult {
  text: string;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface GenerationResponse {
  text: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
  };
}

/**
 * LLMCaller - Centralized LLM API caller with retry and fallback support
 *
 * Wraps AI SDK's generateText:
 * 1. Try primary model (the SDK retries up to maxRetries times)
 * 2. If it still fails and fallbackModel is provided, try fallback the same way
 * 3. Return the text with usage data and a model type indicator
 *
 * An aborted call is never retried on the fallback model.
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   systemPrompt: 'You are a professional translator.',
 *   userPrompt: chunk,
 *   primaryModel: openai('gpt-4o-mini'),
 *   fallbackModel: anthropic('claude-3-5-haiku-latest'),
 *   maxRetries: 3,
 *   component: 'LlmChunkTranslator',
 *   phase: 'translation',
 * });
 *
 * console.log(result.text);
 * console.log(result.usedFallback);
 * ```
 */
export class LLMCaller {
  /**
   * Model identifier for logs and usage records
   */
  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static buildUsage(
    config: LLMCallConfig,
    modelName: string,
    response: GenerationResponse,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: response.usage?.inputTokens ?? 0,
      outputTokens: response.usage?.outputTokens ?? 0,
      totalTokens: response.usage?.totalTokens ?? 0,
    };
  }

  private static generate(
    config: LLMCallConfig,
    model: LanguageModel,
  ): Promise<GenerationResponse> {
    return generateText({
      model,
      system: config.systemPrompt,
      prompt: config.userPrompt,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    });
  }

  /**
   * Call LLM with retry and fallback support
   *
   * @param config - LLM call configuration
   * @returns Generated text with usage information
   * @throws The primary model's error when no fallback applies, otherwise the fallback's error
   */
  static async call(config: LLMCallConfig): Promise<LLMCallResult> {
    const primaryModelName = this.extractModelName(config.primaryModel);

    try {
      const response = await this.generate(config, config.primaryModel);

      return {
        text: response.text,
        usage: this.buildUsage(config, primaryModelName, response, false),
        usedFallback: false,
      };
    } catch (primaryError) {
      // If aborted, don't try fallback - re-throw immediately
      if (config.abortSignal?.aborted) {
        throw primaryError;
      }

      if (!config.fallbackModel) {
        throw primaryError;
      }

      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await this.generate(config, config.fallbackModel);

      return {
        text: response.text,
        usage: this.buildUsage(config, fallbackModelName, response, true),
        usedFallback: true,
      };
    }
  }
}
