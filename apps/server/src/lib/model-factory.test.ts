import { describe, expect, test, vi } from 'vitest';

import { createModel } from './model-factory';

vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: vi.fn(() => (modelName: string) => `openai:${modelName}`),
}));
vi.mock('@ai-sdk/anthropic', () => ({
  createAnthropic: vi.fn(() => (modelName: string) => `anthropic:${modelName}`),
}));
vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: vi.fn(
    () => (modelName: string) => `google:${modelName}`,
  ),
}));

describe('createModel', () => {
  test('routes each provider prefix to its SDK', () => {
    expect(createModel('openai/gpt-4o-mini')).toBe('openai:gpt-4o-mini');
    expect(createModel('anthropic/claude-3-5-haiku-latest')).toBe(
      'anthropic:claude-3-5-haiku-latest',
    );
    expect(createModel('google/gemini-2.0-flash')).toBe(
      'google:gemini-2.0-flash',
    );
  });

  test('keeps slashes inside the model name', () => {
    expect(createModel('openai/ft/custom-model')).toBe(
      'openai:ft/custom-model',
    );
  });

  test('rejects an unknown provider', () => {
    expect(() => createModel('mistral/large')).toThrow(
      'Invalid model: unknown provider "mistral"',
    );
  });

  test('rejects an id without a model name', () => {
    expect(() => createModel('openai')).toThrow(
      'Invalid model: expected "provider/model-name", got "openai"',
    );
  });
});
