import type { LanguageModel } from 'ai';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { ConfigurationError } from '@pdf-lingo/shared';

// Lazy provider instances
let openaiProvider: ReturnType<typeof createOpenAI> | null = null;
let anthropicProvider: ReturnType<typeof createAnthropic> | null = null;
let googleProvider: ReturnType<typeof createGoogleGenerativeAI> | null = null;

function getOpenAI() {
  if (!openaiProvider) {
    openaiProvider = createOpenAI({ apiKey: process.env.OPENAI_API_KEY });
  }
  return openaiProvider;
}

function getAnthropic() {
  if (!anthropicProvider) {
    anthropicProvider = createAnthropic({
      apiKey: process.env.ANTHROPIC_API_KEY,
    });
  }
  return anthropicProvider;
}

function getGoogle() {
  if (!googleProvider) {
    googleProvider = createGoogleGenerativeAI({
      apiKey: process.env.GOOGLE_GENERATIVE_AI_API_KEY,
    });
  }
  return googleProvider;
}

/**
 * Converts model ID string to LanguageModel instance
 *
 * Model ID format: "provider/model-name"
 * Examples:
 *   - "openai/gpt-4o-mini"
 *   - "anthropic/claude-3-5-haiku-latest"
 *   - "google/gemini-2.0-flash"
 *
 * @throws ConfigurationError for an unknown provider or a missing model name
 */
export function createModel(modelId: string): LanguageModel {
  const [provider, ...rest] = modelId.split('/');
  const modelName = rest.join('/');

  if (modelName.length === 0) {
    throw new ConfigurationError(
      'model',
      `expected "provider/model-name", got "${modelId}"`,
    );
  }

  switch (provider) {
    case 'openai':
      return getOpenAI()(modelName);
    case 'anthropic':
      return getAnthropic()(modelName);
    case 'google':
      return getGoogle()(modelName);
    default:
      throw new ConfigurationError('model', `unknown provider "${provider}"`);
  }
}
