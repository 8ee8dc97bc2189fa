import type { LoggerMethods } from '@pdf-lingo/logger';
import type {
  PageFailurePolicy,
  PdfTranslationRequest,
  PdfTranslationResult,
} from '@pdf-lingo/model';
import type { DocumentExtractor } from '@pdf-lingo/pdf-extractor';

import type { TranslationOrchestrator } from './orchestrator/translation-orchestrator';

import { PAGE_EXTRACTOR } from '@pdf-lingo/pdf-extractor';
import { ConfigurationError } from '@pdf-lingo/shared';

import { PDF_TRANSLATOR } from './config/constants';
import { ExtractionEmptyError } from './errors/extraction-empty-error';

export interface PdfTranslatorOptions {
  /** Pages extracted at the same time (default: 1) */
  pageConcurrency?: number;
  /** Behavior on a failed page (default: 'isolate') */
  pageFailurePolicy?: PageFailurePolicy;
}

/**
 * PDF in, translated text out: validates the request, extracts every page
 * and translates the result.
 */
export class PdfTranslator {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly extractor: Pick<DocumentExtractor, 'extractDocument'>,
    private readonly orchestrator: Pick<
      TranslationOrchestrator,
      'translateWithStats'
    >,
    private readonly options: PdfTranslatorOptions = {},
  ) {}

  /**
   * @throws ConfigurationError for an invalid request, before any work
   * @throws InputError when the file cannot be opened as a PDF
   * @throws ExtractionEmptyError when pages were read but none yields any text
   * @throws PageExtractionError when every page failed to extract
   * @throws TranslationServiceError when a chunk cannot be translated
   */
  async translate(
    pdfPath: string,
    request: PdfTranslationRequest,
  ): Promise<PdfTranslationResult> {
    PdfTranslator.validateRequest(request);

    const { dpi, ocrLanguage, targetLanguage, sourceLanguage, abortSignal } =
      request;
    this.logger.info(
      `[PdfTranslator] Translating ${pdfPath} into ${targetLanguage} (dpi ${dpi}, ocr ${ocrLanguage})`,
    );

    const document = await this.extractor.extractDocument(pdfPath, {
      dpi,
      ocrLanguage,
      abortSignal,
      pageConcurrency: this.options.pageConcurrency,
      pageFailurePolicy: this.options.pageFailurePolicy,
    });

    if (document.text.length === 0) {
      throw new ExtractionEmptyError(document.totalPages);
    }

    const translation = await this.orchestrator.translateWithStats(
      document.text,
      { targetLanguage, sourceLanguage, abortSignal },
    );

    const ocrPages: number[] = [];
    const failedPages: number[] = [];
    for (const page of document.pages) {
      if (page.status === 'failed') {
        failedPages.push(page.pageNo);
      } else if (page.method === 'ocr') {
        ocrPages.push(page.pageNo);
      }
    }

    this.logger.info(
      `[PdfTranslator] Done: ${document.totalPages} pages, ${translation.chunkCount} chunks, ${translation.text.length} characters`,
    );

    return {
      text: translation.text,
      totalPages: document.totalPages,
      ocrPages,
      failedPages,
      chunkCount: translation.chunkCount,
    };
  }

  /**
   * @throws ConfigurationError describing the first invalid field
   */
  static validateRequest(request: PdfTranslationRequest): void {
    const { dpi, ocrLanguage, targetLanguage } = request;

    if (!Number.isInteger(dpi) || dpi < 1 || dpi > PAGE_EXTRACTOR.MAX_DPI) {
      throw new ConfigurationError(
        'dpi',
        `must be an integer between 1 and ${PAGE_EXTRACTOR.MAX_DPI}, got ${dpi}`,
      );
    }
    if (!PDF_TRANSLATOR.OCR_LANGUAGE_PATTERN.test(ocrLanguage)) {
      throw new ConfigurationError(
        'ocrLanguage',
        `expected a tesseract language list such as 'eng' or 'eng+deu', got '${ocrLanguage}'`,
      );
    }
    if (targetLanguage.trim().length === 0) {
      throw new ConfigurationError('targetLanguage', 'must not be empty');
    }
  }
}
