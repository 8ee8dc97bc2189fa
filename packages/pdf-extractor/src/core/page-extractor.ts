import type { LoggerMethods } from '@pdf-lingo/logger';
import type { PageExtractionResult } from '@pdf-lingo/model';

import type { OcrEngine } from '../types/ocr-engine';

import { withTempDir } from '@pdf-lingo/shared';

import { PAGE_EXTRACTOR } from '../config/constants';
import { PageRenderer } from '../processors/page-renderer';
import { PdfTextExtractor } from '../processors/pdf-text-extractor';
import { TesseractOcrEngine } from '../processors/tesseract-ocr-engine';
import { countMeaningfulCharacters } from '../utils/page-sections';

/** Collaborators of PageExtractor; defaults use poppler, ImageMagick and tesseract */
export interface PageExtractorDependencies {
  textExtractor?: Pick<PdfTextExtractor, 'extractPageText'>;
  pageRenderer?: Pick<PageRenderer, 'renderPage'>;
  ocrEngine?: OcrEngine;
}

export interface PageExtractorOptions {
  /**
   * Minimum number of non-whitespace characters for the text layer to be
   * used as is (default: 40)
   */
  meaningfulTextThreshold?: number;
}

export interface PageExtractOptions {
  dpi: number;
  ocrLanguage: string;
  abortSignal?: AbortSignal;
}

/**
 * Produces the text of one page: the embedded text layer when it carries
 * enough characters, OCR of the rendered page otherwise.
 */
export class PageExtractor {
  private readonly textExtractor: Pick<PdfTextExtractor, 'extractPageText'>;
  private readonly pageRenderer: Pick<PageRenderer, 'renderPage'>;
  private readonly ocrEngine: OcrEngine;
  private readonly meaningfulTextThreshold: number;

  constructor(
    private readonly logger: LoggerMethods,
    dependencies: PageExtractorDependencies = {},
    options: PageExtractorOptions = {},
  ) {
    this.textExtractor =
      dependencies.textExtractor ?? new PdfTextExtractor(logger);
    this.pageRenderer = dependencies.pageRenderer ?? new PageRenderer(logger);
    this.ocrEngine = dependencies.ocrEngine ?? new TesseractOcrEngine(logger);
    this.meaningfulTextThreshold =
      options.meaningfulTextThreshold ??
      PAGE_EXTRACTOR.MEANINGFUL_TEXT_THRESHOLD;
  }

  /**
   * Extract one page.
   *
   * Failures of the text layer, renderer or OCR engine are returned as a
   * `failed` result. Cancellation through `abortSignal` is rethrown.
   *
   * @param pageNo - 1-based page number
   */
  async extract(
    pdfPath: string,
    pageNo: number,
    options: PageExtractOptions,
  ): Promise<PageExtractionResult> {
    const { abortSignal } = options;

    try {
      abortSignal?.throwIfAborted();

      const nativeText = await this.textExtractor.extractPageText(
        pdfPath,
        pageNo,
        abortSignal,
      );
      const meaningfulLength = countMeaningfulCharacters(nativeText);

      if (meaningfulLength >= this.meaningfulTextThreshold) {
        return {
          status: 'ok',
          pageNo,
          text: nativeText.trim(),
          method: 'native',
        };
      }

      this.logger.debug(
        `[PageExtractor] Page ${pageNo}: ${meaningfulLength} meaningful characters, running OCR (lang=${options.ocrLanguage})`,
      );
      const ocrText = await this.recognizePage(pdfPath, pageNo, options);

      return { status: 'ok', pageNo, text: ocrText.trim(), method: 'ocr' };
    } catch (error) {
      if (abortSignal?.aborted) {
        throw error;
      }

      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`[PageExtractor] Page ${pageNo} failed: ${reason}`);
      return { status: 'failed', pageNo, reason };
    }
  }

  private recognizePage(
    pdfPath: string,
    pageNo: number,
    options: PageExtractOptions,
  ): Promise<string> {
    return withTempDir(PAGE_EXTRACTOR.TEMP_DIR_PREFIX, async (dir) => {
      const { filePath } = await this.pageRenderer.renderPage(
        pdfPath,
        pageNo,
        dir,
        { dpi: options.dpi, abortSignal: options.abortSignal },
      );
      return this.ocrEngine.recognize(filePath, options.ocrLanguage, {
        abortSignal: options.abortSignal,
      });
    });
  }
}
