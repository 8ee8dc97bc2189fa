import type { LoggerMethods } from '@pdf-lingo/logger';

import type { OcrEngine } from '../types/ocr-engine';

import { spawnAsync } from '@pdf-lingo/shared';

/**
 * OCR through the tesseract command-line tool, reading the result from
 * stdout.
 *
 * ## System Requirements
 * - Tesseract 4+ with the traineddata of every requested language
 */
export class TesseractOcrEngine implements OcrEngine {
  constructor(private readonly logger: LoggerMethods) {}

  async recognize(
    imagePath: string,
    language: string,
    options?: { abortSignal?: AbortSignal },
  ): Promise<string> {
    const result = await spawnAsync(
      'tesseract',
      [imagePath, 'stdout', '-l', language],
      { signal: options?.abortSignal },
    );

    if (result.code !== 0) {
      throw new Error(
        `[TesseractOcrEngine] tesseract failed (lang=${language}): ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    if (result.stdout.trim().length === 0) {
      this.logger.debug(
        `[TesseractOcrEngine] No text recognized in ${imagePath}`,
      );
    }

    return result.stdout;
  }
}
