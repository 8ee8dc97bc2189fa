/**
 * Configuration constants for PageExtractor
 */
export const PAGE_EXTRACTOR = {
  /**
   * Pages with fewer non-whitespace characters than this in their text layer
   * are treated as scanned and sent through OCR
   */
  MEANINGFUL_TEXT_THRESHOLD: 40,

  /**
   * Default rasterization DPI for OCR pages
   */
  DEFAULT_DPI: 300,

  /**
   * Upper bound accepted for the rasterization DPI
   */
  MAX_DPI: 1200,

  /**
   * Default tesseract language
   */
  DEFAULT_OCR_LANGUAGE: 'eng',

  /**
   * Prefix of the per-page temporary directory holding the rendered bitmap
   */
  TEMP_DIR_PREFIX: 'pdf-lingo-page-',
} as const;

/**
 * Configuration constants for PageRenderer
 */
export const PAGE_RENDERER = {
  /**
   * Native PDF coordinate space resolution; a page rendered at `dpi`
   * is scaled by `dpi / BASE_DPI`
   */
  BASE_DPI: 72,
} as const;

/**
 * Configuration constants for DocumentExtractor
 */
export const DOCUMENT_EXTRACTOR = {
  /**
   * Pages extracted at the same time
   */
  DEFAULT_PAGE_CONCURRENCY: 1,

  /**
   * Failed pages are left empty instead of aborting the document
   */
  DEFAULT_PAGE_FAILURE_POLICY: 'isolate',
} as const;
