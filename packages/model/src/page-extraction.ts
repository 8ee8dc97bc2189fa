/**
 * How a page's text was obtained.
 * - `native`: embedded text layer of the PDF
 * - `ocr`: rasterized page image run through OCR
 */
export type PageTextMethod = 'native' | 'ocr';

/**
 * Page extracted successfully. `text` is trimmed and may be empty
 * (a blank page is not an error).
 */
export interface PageExtractionSuccess {
  status: 'ok';

  /** 1-based page number */
  pageNo: number;

  text: string;

  method: PageTextMethod;
}

/**
 * Page could not be extracted (text layer, rendering or OCR failed).
 */
export interface PageExtractionFailure {
  status: 'failed';

  /** 1-based page number */
  pageNo: number;

  /** Human-readable cause, suitable for logs */
  reason: string;
}

export type PageExtractionResult =
  | PageExtractionSuccess
  | PageExtractionFailure;

/**
 * What to do when a single page fails.
 * - `isolate`: keep going; the page contributes an empty section
 * - `abort`: stop the whole document on the first failed page
 */
export type PageFailurePolicy = 'isolate' | 'abort';

/**
 * Aggregate text of a document, one section per page.
 */
export interface ExtractedDocument {
  /**
   * Page sections (`\n\n===== Page N =====\n<text>`) joined in page order
   * and trimmed as a whole. Empty when no page produced any text.
   */
  text: string;

  /** Per-page outcomes, index 0 → page 1 */
  pages: PageExtractionResult[];

  totalPages: number;
}
