import type { LanguageModel } from 'ai';

import { generateText } from 'ai';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { LLMCaller } from './llm-caller';

vi.mock('ai', () => ({
  generateText: vi.fn(),
}));

const mockGenerateText = vi.mocked(generateText);

type GenerateTextResult = Awaited<ReturnType<typeof generateText>>;

function createMockResult(
  text: string,
  usage = { inputTokens: 120, outputTokens: 80, totalTokens: 200 },
): GenerateTextResult {
  return { text, usage } as unknown as GenerateTextResult;
}

const primaryModel = { modelId: 'primary-model' } as unknown as LanguageModel;
const fallbackModel = { modelId: 'fallback-model' } as unknown as LanguageModel;

const baseConfig = {
  systemPrompt: 'Translate into French.',
  userPrompt: 'Good morning',
  primaryModel,
  maxRetries: 3,
  temperature: 0,
  component: 'LlmChunkTranslator',
  phase: 'translation',
};

describe('LLMCaller', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('extractModelName', () => {
    test('returns string model ids unchanged', () => {
      expect(LLMCaller.extractModelName('openai/gpt-4o-mini')).toBe(
        'openai/gpt-4o-mini',
      );
    });

    test('reads modelId from model objects', () => {
      expect(LLMCaller.extractModelName(primaryModel)).toBe('primary-model');
    });
  });

  describe('call', () => {
    test('passes prompts and settings to generateText', async () => {
      mockGenerateText.mockResolvedValueOnce(createMockResult('Bonjour'));
      const controller = new AbortController();

      await LLMCaller.call({ ...baseConfig, abortSignal: controller.signal });

      expect(mockGenerateText).toHaveBeenCalledWith({
        model: primaryModel,
        system: 'Translate into French.',
        prompt: 'Good morning',
        temperature: 0,
        maxRetries: 3,
        abortSignal: controller.signal,
      });
    });

    test('returns text and primary usage', async () => {
      mockGenerateText.mockResolvedValueOnce(createMockResult('Bonjour'));

      const result = await LLMCaller.call(baseConfig);

      expect(result).toEqual({
        text: 'Bonjour',
        usedFallback: false,
        usage: {
          component: 'LlmChunkTranslator',
          phase: 'translation',
          model: 'primary',
          modelName: 'primary-model',
          inputTokens: 120,
          outputTokens: 80,
          totalTokens: 200,
        },
      });
    });

    test('defaults missing usage counts to zero', async () => {
      mockGenerateText.mockResolvedValueOnce({
        text: 'Bonjour',
      } as unknown as GenerateTextResult);

      const result = await LLMCaller.call(baseConfig);

      expect(result.usage.inputTokens).toBe(0);
      expect(result.usage.outputTokens).toBe(0);
      expect(result.usage.totalTokens).toBe(0);
    });

    test('rethrows primary error when no fallback model is set', async () => {
      mockGenerateText.mockRejectedValueOnce(new Error('quota exceeded'));

      await expect(LLMCaller.call(baseConfig)).rejects.toThrow(
        'quota exceeded',
      );
      expect(mockGenerateText).toHaveBeenCalledTimes(1);
    });

    test('retries on the fallback model after primary failure', async () => {
      mockGenerateText
        .mockRejectedValueOnce(new Error('primary down'))
        .mockResolvedValueOnce(createMockResult('Bonjour'));

      const result = await LLMCaller.call({ ...baseConfig, fallbackModel });

      expect(result.usedFallback).toBe(true);
      expect(result.text).toBe('Bonjour');
      expect(result.usage.model).toBe('fallback');
      expect(result.usage.modelName).toBe('fallback-model');
      expect(mockGenerateText).toHaveBeenNthCalledWith(
        2,
        expect.objectContaining({ model: fallbackModel }),
      );
    });

    test('does not use the fallback model when aborted', async () => {
      const controller = new AbortController();
      mockGenerateText.mockImplementationOnce(async () => {
        controller.abort();
        throw new Error('aborted');
      });

      await expect(
        LLMCaller.call({
          ...baseConfig,
          fallbackModel,
          abortSignal: controller.signal,
        }),
      ).rejects.toThrow('aborted');
      expect(mockGenerateText).toHaveBeenCalledTimes(1);
    });

    test('propagates fallback failure', async () => {
      mockGenerateText
        .mockRejectedValueOnce(new Error('primary down'))
        .mockRejectedValueOnce(new Error('fallback down'));

      await expect(
        LLMCaller.call({ ...baseConfig, fallbackModel }),
      ).rejects.toThrow('fallback down');
    });
  });
});
