import type { LoggerMethods } from '@pdf-lingo/logger';
import type { ExtendedTokenUsage } from '@pdf-lingo/shared';
import type { LanguageModel } from 'ai';

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Maximum retry count for LLM API (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0)
   */
  temperature?: number;

  /**
   * Receives the token usage of every LLM call
   */
  onUsage?: (usage: ExtendedTokenUsage) => void;
}

/**
 * Abstract base class for all LLM-based components
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Token usage reporting via optional callback
 * - Standard configuration (model, fallback, retries, temperature)
 *
 * Subclasses must implement buildSystemPrompt() and buildUserPrompt().
 * Components are shared across requests, so cancellation is passed per call
 * rather than held here.
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly model: LanguageModel;
  protected readonly fallbackModel?: LanguageModel;
  protected readonly maxRetries: number;
  protected readonly temperature: number;
  protected readonly componentName: string;
  private readonly onUsage?: (usage: ExtendedTokenUsage) => void;

  /**
   * @param logger - Logger instance for logging
   * @param model - Primary language model for LLM calls
   * @param componentName - Name of the component for logging (e.g., "LlmChunkTranslator")
   * @param options - Optional configuration (maxRetries, temperature, onUsage)
   * @param fallbackModel - Optional fallback model for retry on failure
   */
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
  ) {
    this.logger = logger;
    this.model = model;
    this.componentName = componentName;
    this.maxRetries = options?.maxRetries ?? 3;
    this.temperature = options?.temperature ?? 0;
    this.fallbackModel = fallbackModel;
    this.onUsage = options?.onUsage;
  }

  /**
   * Log a message with consistent component name prefix
   *
   * @param level - Log level
   * @param message - Message to log (without prefix)
   * @param args - Additional arguments to pass to logger
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  /**
   * Report token usage of one call
   */
  protected trackUsage(usage: ExtendedTokenUsage): void {
    this.log(
      'debug',
      `${usage.phase}: ${usage.totalTokens} tokens (${usage.model} ${usage.modelName})`,
    );
    this.onUsage?.(usage);
  }

  /**
   * Build system prompt for LLM call
   */
  protected abstract buildSystemPrompt(...args: unknown[]): string;

  /**
   * Build user prompt for LLM call
   */
  protected abstract buildUserPrompt(...args: unknown[]): string;
}
