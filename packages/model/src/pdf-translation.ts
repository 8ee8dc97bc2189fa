/**
 * Parameters of one PDF translation request.
 */
export interface PdfTranslationRequest {
  /** Target language code passed to the translator (e.g., 'zh-CN') */
  targetLanguage: string;

  /** Source language code, or 'auto' to let the translator detect it */
  sourceLanguage?: string;

  /** Tesseract language list used for OCR pages (e.g., 'eng', 'eng+deu') */
  ocrLanguage: string;

  /** Rasterization resolution for OCR pages */
  dpi: number;

  /** Request-scoped cancellation */
  abortSignal?: AbortSignal;
}

/**
 * Outcome of a successful PDF translation.
 */
export interface PdfTranslationResult {
  /** Translated text, chunks joined with a blank line */
  text: string;

  totalPages: number;

  /** 1-based numbers of pages whose text came from OCR */
  ocrPages: number[];

  /** 1-based numbers of pages that failed and were left empty */
  failedPages: number[];

  /** Number of chunks sent to the translator */
  chunkCount: number;
}
