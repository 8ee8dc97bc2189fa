export type {
  ExtractedDocument,
  PageExtractionFailure,
  PageExtractionResult,
  PageExtractionSuccess,
  PageFailurePolicy,
  PageTextMethod,
} from './page-extraction';
export type {
  PdfTranslationRequest,
  PdfTranslationResult,
} from './pdf-translation';
export type { PipelineErrorCode } from './pipeline-error-code';
