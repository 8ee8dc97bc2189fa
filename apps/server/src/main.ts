import { serve } from '@hono/node-server';
import { createConsoleLogger } from '@pdf-lingo/logger';
import { DocumentExtractor, PageExtractor } from '@pdf-lingo/pdf-extractor';
import {
  LlmChunkTranslator,
  PdfTranslator,
  TranslationOrchestrator,
} from '@pdf-lingo/translator';

import { createApp } from './app';
import { formatConfigIssues, loadConfig } from './config';
import { createModel } from './lib/model-factory';

const parsed = loadConfig();
if (!parsed.success) {
  const bootLogger = createConsoleLogger();
  bootLogger.error('[HttpServer] Invalid configuration:');
  for (const line of formatConfigIssues(parsed.error)) {
    bootLogger.error(`  ${line}`);
  }
  process.exit(1);
}
const config = parsed.data;

const logger = createConsoleLogger({ level: config.LOG_LEVEL });

const chunkTranslator = new LlmChunkTranslator(
  logger,
  createModel(config.TRANSLATION_MODEL),
  { maxRetries: config.TRANSLATION_MAX_RETRIES },
  config.TRANSLATION_FALLBACK_MODEL
    ? createModel(config.TRANSLATION_FALLBACK_MODEL)
    : undefined,
);

const pdfTranslator = new PdfTranslator(
  logger,
  new DocumentExtractor(
    logger,
    new PageExtractor(
      logger,
      {},
      { meaningfulTextThreshold: config.MEANINGFUL_TEXT_THRESHOLD },
    ),
  ),
  new TranslationOrchestrator(logger, chunkTranslator, {
    maxChunkLength: config.CHUNK_MAX_LENGTH,
    concurrency: config.TRANSLATION_CONCURRENCY,
  }),
  {
    pageConcurrency: config.PAGE_CONCURRENCY,
    pageFailurePolicy: config.PAGE_FAILURE_POLICY,
  },
);

const app = createApp({
  logger,
  pdfTranslator,
  defaults: {
    targetLanguage: config.DEFAULT_TARGET,
    ocrLanguage: config.DEFAULT_OCR_LANG,
    dpi: config.DEFAULT_DPI,
  },
  requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
});

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: config.HOST },
  (info) => {
    logger.info(
      `[HttpServer] Listening on http://${info.address}:${info.port} (model ${config.TRANSLATION_MODEL})`,
    );
  },
);

function shutdown(signal: string): void {
  logger.info(`[HttpServer] ${signal} received, closing server`);
  server.close((error) => {
    if (error) {
      logger.error('[HttpServer] Error while closing:', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
