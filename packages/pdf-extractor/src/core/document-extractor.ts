import type { LoggerMethods } from '@pdf-lingo/logger';
import type {
  ExtractedDocument,
  PageExtractionResult,
  PageFailurePolicy,
} from '@pdf-lingo/model';

import { ConcurrentPool, ConfigurationError } from '@pdf-lingo/shared';

import { DOCUMENT_EXTRACTOR, PAGE_EXTRACTOR } from '../config/constants';
import { PageExtractionError } from '../errors/page-extraction-error';
import { PdfTextExtractor } from '../processors/pdf-text-extractor';
import { formatPageSections } from '../utils/page-sections';
import { PageExtractor } from './page-extractor';

export interface DocumentExtractOptions {
  dpi: number;
  ocrLanguage: string;
  /** Pages extracted at the same time (default: 1) */
  pageConcurrency?: number;
  /** Behavior on a failed page (default: 'isolate') */
  pageFailurePolicy?: PageFailurePolicy;
  abortSignal?: AbortSignal;
}

/**
 * Extracts every page of a PDF and lays the texts out as page sections in
 * document order.
 */
export class DocumentExtractor {
  private readonly pageExtractor: Pick<PageExtractor, 'extract'>;
  private readonly textExtractor: Pick<PdfTextExtractor, 'getPageCount'>;

  constructor(
    private readonly logger: LoggerMethods,
    pageExtractor?: Pick<PageExtractor, 'extract'>,
    textExtractor?: Pick<PdfTextExtractor, 'getPageCount'>,
  ) {
    this.pageExtractor = pageExtractor ?? new PageExtractor(logger);
    this.textExtractor = textExtractor ?? new PdfTextExtractor(logger);
  }

  /**
   * @throws ConfigurationError for an invalid dpi or page concurrency
   * @throws InputError when the document cannot be opened
   * @throws PageExtractionError for a failed page under the `abort` policy,
   * or when every page of a non-empty document failed
   */
  async extractDocument(
    pdfPath: string,
    options: DocumentExtractOptions,
  ): Promise<ExtractedDocument> {
    const {
      dpi,
      ocrLanguage,
      abortSignal,
      pageConcurrency = DOCUMENT_EXTRACTOR.DEFAULT_PAGE_CONCURRENCY,
      pageFailurePolicy = DOCUMENT_EXTRACTOR.DEFAULT_PAGE_FAILURE_POLICY,
    } = options;

    if (!Number.isInteger(dpi) || dpi < 1 || dpi > PAGE_EXTRACTOR.MAX_DPI) {
      throw new ConfigurationError(
        'dpi',
        `must be an integer between 1 and ${PAGE_EXTRACTOR.MAX_DPI}, got ${dpi}`,
      );
    }
    if (!Number.isInteger(pageConcurrency) || pageConcurrency < 1) {
      throw new ConfigurationError(
        'pageConcurrency',
        `must be a positive integer, got ${pageConcurrency}`,
      );
    }

    const totalPages = await this.textExtractor.getPageCount(
      pdfPath,
      abortSignal,
    );
    this.logger.info(
      `[DocumentExtractor] Extracting ${totalPages} pages (concurrency ${pageConcurrency}, policy ${pageFailurePolicy})`,
    );

    const pageNumbers = Array.from({ length: totalPages }, (_, i) => i + 1);
    const pages = await ConcurrentPool.run(
      pageNumbers,
      pageConcurrency,
      async (pageNo): Promise<PageExtractionResult> => {
        const result = await this.pageExtractor.extract(pdfPath, pageNo, {
          dpi,
          ocrLanguage,
          abortSignal,
        });
        if (result.status === 'failed' && pageFailurePolicy === 'abort') {
          throw new PageExtractionError(result.pageNo, result.reason);
        }
        return result;
      },
    );

    const firstFailure = pages.find((page) => page.status === 'failed');
    if (
      firstFailure?.status === 'failed' &&
      pages.every((page) => page.status === 'failed')
    ) {
      this.logger.error(
        `[DocumentExtractor] All ${totalPages} pages failed, first: ${firstFailure.reason}`,
      );
      throw new PageExtractionError(
        firstFailure.pageNo,
        `${firstFailure.reason} (all ${totalPages} pages failed)`,
      );
    }

    const pageTexts = pages.map((page) =>
      page.status === 'ok' ? page.text : '',
    );
    const hasText = pageTexts.some((text) => text.length > 0);
    const text = hasText ? formatPageSections(pageTexts) : '';

    const ocrCount = pages.filter(
      (page) => page.status === 'ok' && page.method === 'ocr',
    ).length;
    const failedCount = pages.filter((page) => page.status === 'failed').length;
    this.logger.info(
      `[DocumentExtractor] Extracted ${totalPages} pages (${ocrCount} via OCR, ${failedCount} failed), ${text.length} characters`,
    );

    return { text, pages, totalPages };
  }
}
