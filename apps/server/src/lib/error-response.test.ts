import { InputError, PageExtractionError } from '@pdf-lingo/pdf-extractor';
import { ConfigurationError } from '@pdf-lingo/shared';
import {
  ExtractionEmptyError,
  TranslationServiceError,
} from '@pdf-lingo/translator';
import { describe, expect, test } from 'vitest';
import { z } from 'zod';

import {
  createValidationErrorResponse,
  toErrorResponse,
} from './error-response';

describe('toErrorResponse', () => {
  test.each([
    [
      new ConfigurationError('dpi', 'must be an integer'),
      400,
      { error: 'Invalid dpi: must be an integer', code: 'CONFIGURATION_ERROR' },
    ],
    [
      new InputError('/tmp/x.pdf', 'May not be a PDF file'),
      400,
      {
        error: 'Cannot open PDF document: May not be a PDF file',
        code: 'INPUT_ERROR',
      },
    ],
    [
      new ExtractionEmptyError(2),
      422,
      {
        error: 'No text could be extracted from any of 2 pages',
        code: 'EXTRACTION_EMPTY',
      },
    ],
    [
      new TranslationServiceError(0, new Error('quota exceeded')),
      500,
      {
        error:
          'Translation failed: Chunk 1 could not be translated: quota exceeded',
        code: 'TRANSLATION_SERVICE_ERROR',
      },
    ],
    [
      new PageExtractionError(4, 'tesseract crashed'),
      500,
      {
        error: 'Translation failed: Failed to extract page 4: tesseract crashed',
        code: 'PAGE_EXTRACTION_ERROR',
      },
    ],
  ])('maps %s', (error, status, body) => {
    expect(toErrorResponse(error)).toEqual({ status, body });
  });

  test('maps unknown errors to 500', () => {
    expect(toErrorResponse(new Error('ENOSPC: no space left'))).toEqual({
      status: 500,
      body: {
        error: 'Translation failed: ENOSPC: no space left',
        code: 'INTERNAL_ERROR',
      },
    });
  });

  test('maps non-Error values to 500', () => {
    expect(toErrorResponse('boom').body.error).toBe('Translation failed: boom');
  });
});

describe('createValidationErrorResponse', () => {
  test('uses the first issue as the message and lists all issues', () => {
    const result = z
      .object({ file: z.string({ required_error: 'file is required' }) })
      .safeParse({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(createValidationErrorResponse(result.error)).toEqual({
        status: 400,
        body: {
          error: 'file is required',
          code: 'BAD_REQUEST',
          details: [{ path: 'file', message: 'file is required' }],
        },
      });
    }
  });
});
