export {
  DocumentExtractor,
  type DocumentExtractOptions,
} from './core/document-extractor';
export {
  PageExtractor,
  type PageExtractOptions,
  type PageExtractorDependencies,
  type PageExtractorOptions,
} from './core/page-extractor';
export { PdfTextExtractor } from './processors/pdf-text-extractor';
export {
  PageRenderer,
  type PageRenderOptions,
  type PageRenderResult,
} from './processors/page-renderer';
export { TesseractOcrEngine } from './processors/tesseract-ocr-engine';
export type { OcrEngine } from './types/ocr-engine';
export { InputError } from './errors/input-error';
export { PageExtractionError } from './errors/page-extraction-error';
export {
  countMeaningfulCharacters,
  formatPageMarker,
  formatPageSections,
} from './utils/page-sections';
export {
  DOCUMENT_EXTRACTOR,
  PAGE_EXTRACTOR,
  PAGE_RENDERER,
} from './config/constants';
