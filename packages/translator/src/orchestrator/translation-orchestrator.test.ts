import type { LoggerMethods } from '@pdf-lingo/logger';
import type { Mock } from 'vitest';

import type { ChunkTranslator } from '../types/chunk-translator';

import { ConfigurationError } from '@pdf-lingo/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { TranslationServiceError } from '../errors/translation-service-error';
import { TranslationOrchestrator } from './translation-orchestrator';

describe('TranslationOrchestrator', () => {
  let logger: LoggerMethods;
  let translate: Mock<ChunkTranslator['translate']>;

  beforeEach(() => {
    logger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    translate = vi.fn<ChunkTranslator['translate']>(
      async (chunk) => `<${chunk}>`,
    );
  });

  test('returns empty text without calling the translator', async () => {
    const orchestrator = new TranslationOrchestrator(logger, { translate });

    await expect(
      orchestrator.translateWithStats('', { targetLanguage: 'zh-CN' }),
    ).resolves.toEqual({ text: '', chunkCount: 0 });
    expect(translate).not.toHaveBeenCalled();
  });

  test('translates each chunk and joins with a blank line', async () => {
    const orchestrator = new TranslationOrchestrator(
      logger,
      { translate },
      { maxChunkLength: 5 },
    );

    const result = await orchestrator.translate('alpha\n\nbeta\n\ngamma', {
      targetLanguage: 'de',
    });

    expect(result).toBe('<alpha>\n\n<beta>\n\n<gamma>');
    expect(translate.mock.calls.map(([chunk]) => chunk)).toEqual([
      'alpha',
      'beta',
      'gamma',
    ]);
  });

  test('defaults the source language to auto', async () => {
    const orchestrator = new TranslationOrchestrator(logger, { translate });
    const controller = new AbortController();

    await orchestrator.translate('Hello', {
      targetLanguage: 'zh-CN',
      abortSignal: controller.signal,
    });

    expect(translate).toHaveBeenCalledWith('Hello', {
      sourceLanguage: 'auto',
      targetLanguage: 'zh-CN',
      abortSignal: expect.any(AbortSignal),
    });
  });

  test('hands chunks a signal that follows the caller signal', async () => {
    const controller = new AbortController();
    const orchestrator = new TranslationOrchestrator(logger, { translate });

    await orchestrator.translate('Hello', {
      targetLanguage: 'zh-CN',
      abortSignal: controller.signal,
    });
    const chunkSignal = translate.mock.calls[0][1].abortSignal;
    expect(chunkSignal?.aborted).toBe(false);

    controller.abort();

    expect(chunkSignal?.aborted).toBe(true);
  });

  test('passes an explicit source language', async () => {
    const orchestrator = new TranslationOrchestrator(logger, { translate });

    await orchestrator.translate('Hallo', {
      targetLanguage: 'en',
      sourceLanguage: 'de',
    });

    expect(translate).toHaveBeenCalledWith('Hallo', {
      sourceLanguage: 'de',
      targetLanguage: 'en',
      abortSignal: expect.any(AbortSignal),
    });
  });

  test('keeps source order when chunks finish out of order', async () => {
    const delays: Record<string, number> = { A: 30, B: 0, C: 10 };
    translate.mockImplementation(async (chunk) => {
      await new Promise((resolve) => setTimeout(resolve, delays[chunk]));
      return chunk.toLowerCase();
    });
    const orchestrator = new TranslationOrchestrator(
      logger,
      { translate },
      { maxChunkLength: 1, concurrency: 3 },
    );

    const result = await orchestrator.translateWithStats('A\n\nB\n\nC', {
      targetLanguage: 'en',
    });

    expect(result).toEqual({ text: 'a\n\nb\n\nc', chunkCount: 3 });
  });

  test('bounds the number of chunks in flight', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    translate.mockImplementation(async (chunk) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return chunk;
    });
    const orchestrator = new TranslationOrchestrator(
      logger,
      { translate },
      { maxChunkLength: 1, concurrency: 2 },
    );

    await orchestrator.translate('a\n\nb\n\nc\n\nd\n\ne', {
      targetLanguage: 'en',
    });

    expect(maxInFlight).toBe(2);
  });

  test('aborts the whole translation when a chunk fails', async () => {
    const cause = new Error('503 Service Unavailable');
    translate
      .mockResolvedValueOnce('eins')
      .mockRejectedValueOnce(cause)
      .mockResolvedValueOnce('drei');
    const orchestrator = new TranslationOrchestrator(
      logger,
      { translate },
      { maxChunkLength: 5 },
    );

    const promise = orchestrator.translate('one\n\ntwo\n\nthree', {
      targetLanguage: 'de',
    });

    await expect(promise).rejects.toBeInstanceOf(TranslationServiceError);
    await expect(promise).rejects.toMatchObject({ chunkIndex: 1, cause });
    expect(translate).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith(
      '[TranslationOrchestrator] Chunk 2/3 failed:',
      cause,
    );
  });

  test('cancels chunks still in flight when another chunk fails', async () => {
    const cause = new Error('429 Too Many Requests');
    const seen: AbortSignal[] = [];
    translate.mockImplementation(async (chunk, options) => {
      if (options.abortSignal) seen.push(options.abortSignal);
      if (chunk === 'b') throw cause;
      await new Promise((resolve) => setTimeout(resolve, 20));
      return chunk;
    });
    const orchestrator = new TranslationOrchestrator(
      logger,
      { translate },
      { maxChunkLength: 1, concurrency: 2 },
    );

    const promise = orchestrator.translate('a\n\nb\n\nc', {
      targetLanguage: 'de',
    });

    await expect(promise).rejects.toMatchObject({ chunkIndex: 1, cause });
    expect(translate).toHaveBeenCalledTimes(2);
    expect(seen).toHaveLength(2);
    expect(seen[0].aborted).toBe(true);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  test('rethrows cancellation without wrapping it', async () => {
    const controller = new AbortController();
    translate.mockImplementationOnce(async () => {
      controller.abort();
      throw new Error('request aborted');
    });
    const orchestrator = new TranslationOrchestrator(logger, { translate });

    const promise = orchestrator.translate('Hello', {
      targetLanguage: 'de',
      abortSignal: controller.signal,
    });

    await expect(promise).rejects.toThrow('request aborted');
    await expect(promise).rejects.not.toBeInstanceOf(TranslationServiceError);
  });

  test('does not start chunks once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const orchestrator = new TranslationOrchestrator(logger, { translate });

    await expect(
      orchestrator.translate('Hello', {
        targetLanguage: 'de',
        abortSignal: controller.signal,
      }),
    ).rejects.toThrow();
    expect(translate).not.toHaveBeenCalled();
  });

  test.each([
    [
      { maxChunkLength: 0 },
      'Invalid maxChunkLength: must be a positive integer, got 0',
    ],
    [
      { concurrency: 1.5 },
      'Invalid concurrency: must be a positive integer, got 1.5',
    ],
  ])('rejects invalid options %o', (options, message) => {
    expect(
      () => new TranslationOrchestrator(logger, { translate }, options),
    ).toThrow(ConfigurationError);
    expect(
      () => new TranslationOrchestrator(logger, { translate }, options),
    ).toThrow(message);
  });
});
