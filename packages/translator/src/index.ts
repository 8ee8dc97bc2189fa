export { PdfTranslator, type PdfTranslatorOptions } from './pdf-translator';
export {
  TranslationOrchestrator,
  type TextTranslation,
  type TranslateTextOptions,
  type TranslationOrchestratorOptions,
} from './orchestrator/translation-orchestrator';
export { TextChunker } from './chunker/text-chunker';
export { LlmChunkTranslator } from './translators/llm-chunk-translator';
export type {
  ChunkTranslationOptions,
  ChunkTranslator,
} from './types/chunk-translator';
export type { BaseLLMComponentOptions } from './core/base-llm-component';
export { ExtractionEmptyError } from './errors/extraction-empty-error';
export { TranslationServiceError } from './errors/translation-service-error';
export {
  LLM_CHUNK_TRANSLATOR,
  PDF_TRANSLATOR,
  TEXT_CHUNKER,
  TRANSLATION_ORCHESTRATOR,
} from './config/constants';
