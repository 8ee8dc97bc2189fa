/**
 * Discriminator carried by every pipeline error. Transport layers map these
 * to their own status codes; the pipeline itself never does.
 */
export type PipelineErrorCode =
  | 'INPUT_ERROR'
  | 'PAGE_EXTRACTION_ERROR'
  | 'EXTRACTION_EMPTY'
  | 'TRANSLATION_SERVICE_ERROR'
  | 'CONFIGURATION_ERROR';
