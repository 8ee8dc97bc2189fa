/**
 * Configuration constants for TextChunker
 */
export const TEXT_CHUNKER = {
  /**
   * Default maximum chunk length in characters, below the request size the
   * translation backends accept
   */
  DEFAULT_MAX_LENGTH: 4500,

  /**
   * Paragraph separator; also the join used inside a chunk
   */
  PARAGRAPH_SEPARATOR: '\n\n',
} as const;

/**
 * Configuration constants for TranslationOrchestrator
 */
export const TRANSLATION_ORCHESTRATOR = {
  /**
   * Chunks translated at the same time
   */
  DEFAULT_CONCURRENCY: 1,

  /**
   * Source language value that lets the translator detect the language
   */
  AUTO_SOURCE_LANGUAGE: 'auto',
} as const;

/**
 * Configuration constants for PdfTranslator
 */
export const PDF_TRANSLATOR = {
  DEFAULT_TARGET_LANGUAGE: 'zh-CN',

  /**
   * Tesseract language list: `eng`, `chi_sim`, `eng+deu`, ...
   */
  OCR_LANGUAGE_PATTERN: /^[a-z][a-z0-9_]*(\+[a-z][a-z0-9_]*)*$/i,
} as const;

/**
 * Configuration constants for LlmChunkTranslator
 */
export const LLM_CHUNK_TRANSLATOR = {
  DEFAULT_MAX_RETRIES: 3,

  /**
   * Locale used to spell out language names in prompts
   */
  DISPLAY_LOCALE: 'en',
} as const;
