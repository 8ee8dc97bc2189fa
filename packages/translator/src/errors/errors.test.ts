import { PipelineError } from '@pdf-lingo/shared';
import { describe, expect, test } from 'vitest';

import { ExtractionEmptyError } from './extraction-empty-error';
import { TranslationServiceError } from './translation-service-error';

describe('ExtractionEmptyError', () => {
  test('reports the number of pages searched', () => {
    const error = new ExtractionEmptyError(12);

    expect(error.name).toBe('ExtractionEmptyError');
    expect(error.code).toBe('EXTRACTION_EMPTY');
    expect(error.totalPages).toBe(12);
    expect(error.message).toBe(
      'No text could be extracted from any of 12 pages',
    );
    expect(error).toBeInstanceOf(PipelineError);
  });

  test('has a dedicated message for a document without pages', () => {
    expect(new ExtractionEmptyError(0).message).toBe(
      'The document has no pages',
    );
  });
});

describe('TranslationServiceError', () => {
  test('carries the chunk index and the cause', () => {
    const cause = new Error('429 Too Many Requests');
    const error = new TranslationServiceError(2, cause);

    expect(error.name).toBe('TranslationServiceError');
    expect(error.code).toBe('TRANSLATION_SERVICE_ERROR');
    expect(error.chunkIndex).toBe(2);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      'Chunk 3 could not be translated: 429 Too Many Requests',
    );
  });

  test('stringifies non-Error causes', () => {
    expect(new TranslationServiceError(0, 'timeout').message).toBe(
      'Chunk 1 could not be translated: timeout',
    );
  });
});
