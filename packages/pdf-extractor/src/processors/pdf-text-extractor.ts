import type { LoggerMethods } from '@pdf-lingo/logger';

import { spawnAsync } from '@pdf-lingo/shared';

import { InputError } from '../errors/input-error';

/**
 * Reads the embedded text layer of PDF pages with poppler's command-line
 * tools.
 *
 * ## System Requirements
 * - Poppler utils (`apt install poppler-utils` / `brew install poppler`)
 */
export class PdfTextExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Get total page count of a PDF using pdfinfo.
   *
   * @throws InputError when pdfinfo cannot open the document
   */
  async getPageCount(
    pdfPath: string,
    abortSignal?: AbortSignal,
  ): Promise<number> {
    const result = await spawnAsync('pdfinfo', [pdfPath], {
      signal: abortSignal,
    });
    if (result.code !== 0) {
      const reason = result.stderr.trim() || 'Unknown error';
      this.logger.warn(`[PdfTextExtractor] pdfinfo failed: ${reason}`);
      throw new InputError(pdfPath, reason);
    }

    const match = result.stdout.match(/^Pages:\s+(\d+)/m);
    if (!match) {
      throw new InputError(pdfPath, 'pdfinfo reported no page count');
    }
    return parseInt(match[1], 10);
  }

  /**
   * Extract the text layer of a single page using pdftotext.
   *
   * @param pageNo - 1-based page number
   * @returns Raw page text (untrimmed, possibly empty)
   * @throws Error when pdftotext exits with a non-zero code
   */
  async extractPageText(
    pdfPath: string,
    pageNo: number,
    abortSignal?: AbortSignal,
  ): Promise<string> {
    const result = await spawnAsync(
      'pdftotext',
      [
        '-f',
        pageNo.toString(),
        '-l',
        pageNo.toString(),
        '-enc',
        'UTF-8',
        pdfPath,
        '-',
      ],
      { signal: abortSignal },
    );

    if (result.code !== 0) {
      throw new Error(
        `[PdfTextExtractor] pdftotext failed for page ${pageNo}: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    return result.stdout;
  }
}
