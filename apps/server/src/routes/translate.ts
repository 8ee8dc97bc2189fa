import type { LoggerMethods } from '@pdf-lingo/logger';
import type { PdfTranslator } from '@pdf-lingo/translator';

import type { ErrorResponseBody } from '../lib/error-response';
import type { TranslationDefaults } from '../validations/translate-form';

import { withTempDir } from '@pdf-lingo/shared';
import { Hono } from 'hono';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  createValidationErrorResponse,
  toErrorResponse,
} from '../lib/error-response';
import {
  parseTranslateFormData,
  toTranslateFormRequest,
} from '../validations/translate-form';

const UPLOAD_TEMP_DIR_PREFIX = 'pdf-lingo-upload-';

export interface TranslateRouteDependencies {
  logger: LoggerMethods;
  pdfTranslator: Pick<PdfTranslator, 'translate'>;
  defaults: TranslationDefaults;
  /** Deadline of one translation request */
  requestTimeoutMs: number;
}

/**
 * POST /translate
 *
 * multipart/form-data with `file` (the PDF) and optional `target`,
 * `ocr_lang` and `dpi`. Responds with the translated text as
 * text/plain; page statistics go into `X-*` headers.
 */
export function createTranslateRoutes(deps: TranslateRouteDependencies): Hono {
  const { logger, pdfTranslator, defaults, requestTimeoutMs } = deps;
  const translate = new Hono();

  translate.post('/', async (c) => {
    let formData: FormData;
    try {
      formData = await c.req.formData();
    } catch (error) {
      logger.warn('[TranslateRoute] Unreadable request body:', error);
      return c.json<ErrorResponseBody>(
        { error: 'Expected a multipart/form-data body.', code: 'BAD_REQUEST' },
        400,
      );
    }

    const parsed = parseTranslateFormData(formData);
    if (!parsed.success) {
      const { status, body } = createValidationErrorResponse(parsed.error);
      return c.json(body, status);
    }

    // Client disconnect or deadline, whichever comes first
    const abortSignal = AbortSignal.any([
      c.req.raw.signal,
      AbortSignal.timeout(requestTimeoutMs),
    ]);

    try {
      const request = toTranslateFormRequest(parsed.data, defaults);
      const result = await withTempDir(UPLOAD_TEMP_DIR_PREFIX, async (dir) => {
        const pdfPath = join(dir, 'upload.pdf');
        await writeFile(pdfPath, Buffer.from(await request.file.arrayBuffer()));

        return pdfTranslator.translate(pdfPath, {
          targetLanguage: request.targetLanguage,
          ocrLanguage: request.ocrLanguage,
          dpi: request.dpi,
          abortSignal,
        });
      });

      c.header('X-Total-Pages', String(result.totalPages));
      c.header('X-Ocr-Pages', result.ocrPages.join(','));
      c.header('X-Failed-Pages', result.failedPages.join(','));
      c.header('X-Chunk-Count', String(result.chunkCount));
      return c.text(result.text, 200);
    } catch (error) {
      const { status, body } = toErrorResponse(error);
      if (status >= 500) {
        logger.error('[TranslateRoute] Translation failed:', error);
      }
      return c.json(body, status);
    }
  });

  return translate;
}
