import type { LoggerMethods } from '@pdf-lingo/logger';

import { spawnAsync } from '@pdf-lingo/shared';
import { join } from 'node:path';

import { PAGE_RENDERER } from '../config/constants';

/** Result of rendering one page */
export interface PageRenderResult {
  /** Absolute path to the rendered RGB PNG */
  filePath: string;
  /** Resolution the page was rendered at */
  dpi: number;
  /** Scale applied to the 72-DPI page space (`dpi / 72`) */
  scale: number;
}

/** Options for page rendering */
export interface PageRenderOptions {
  dpi: number;
  abortSignal?: AbortSignal;
}

/**
 * Renders a single PDF page to an RGB PNG (white background, no alpha
 * channel) using ImageMagick.
 *
 * ## System Requirements
 * - ImageMagick 7 (`magick`)
 * - Ghostscript
 */
export class PageRenderer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Render one page of a PDF.
   *
   * @param pdfPath - Absolute path to the source PDF file
   * @param pageNo - 1-based page number
   * @param outputDir - Existing directory that receives the image
   * @throws Error when ImageMagick exits with a non-zero code
   */
  async renderPage(
    pdfPath: string,
    pageNo: number,
    outputDir: string,
    options: PageRenderOptions,
  ): Promise<PageRenderResult> {
    const { dpi } = options;
    const scale = dpi / PAGE_RENDERER.BASE_DPI;
    const filePath = join(outputDir, `page_${pageNo}.png`);

    this.logger.debug(
      `[PageRenderer] Rendering page ${pageNo} at ${dpi} DPI (scale ${scale.toFixed(3)})...`,
    );

    const result = await spawnAsync(
      'magick',
      [
        '-density',
        dpi.toString(),
        `${pdfPath}[${pageNo - 1}]`,
        '-background',
        'white',
        '-alpha',
        'remove',
        '-alpha',
        'off',
        `PNG24:${filePath}`,
      ],
      { signal: options.abortSignal },
    );

    if (result.code !== 0) {
      throw new Error(
        `[PageRenderer] Failed to render page ${pageNo}: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    return { filePath, dpi, scale };
  }
}
