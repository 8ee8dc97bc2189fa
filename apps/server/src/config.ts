import { LOG_LEVELS } from '@pdf-lingo/logger';
import {
  DOCUMENT_EXTRACTOR,
  PAGE_EXTRACTOR,
} from '@pdf-lingo/pdf-extractor';
import {
  LLM_CHUNK_TRANSLATOR,
  PDF_TRANSLATOR,
  TEXT_CHUNKER,
  TRANSLATION_ORCHESTRATOR,
} from '@pdf-lingo/translator';
import { z } from 'zod';

/**
 * Environment variables read by the server. Every variable is optional;
 * numeric values are coerced from their string form.
 */
export const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  TRANSLATION_MODEL: z
    .string()
    .regex(/^[a-z]+\/.+$/, 'expected "provider/model-name"')
    .default('openai/gpt-4o-mini'),
  TRANSLATION_FALLBACK_MODEL: z
    .string()
    .regex(/^[a-z]+\/.+$/, 'expected "provider/model-name"')
    .optional(),
  TRANSLATION_MAX_RETRIES: z.coerce
    .number()
    .int()
    .min(0)
    .default(LLM_CHUNK_TRANSLATOR.DEFAULT_MAX_RETRIES),
  TRANSLATION_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1)
    .default(TRANSLATION_ORCHESTRATOR.DEFAULT_CONCURRENCY),

  PAGE_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1)
    .default(DOCUMENT_EXTRACTOR.DEFAULT_PAGE_CONCURRENCY),
  PAGE_FAILURE_POLICY: z
    .enum(['isolate', 'abort'])
    .default(DOCUMENT_EXTRACTOR.DEFAULT_PAGE_FAILURE_POLICY),
  MEANINGFUL_TEXT_THRESHOLD: z.coerce
    .number()
    .int()
    .min(0)
    .default(PAGE_EXTRACTOR.MEANINGFUL_TEXT_THRESHOLD),
  CHUNK_MAX_LENGTH: z.coerce
    .number()
    .int()
    .min(1)
    .default(TEXT_CHUNKER.DEFAULT_MAX_LENGTH),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(600_000),

  DEFAULT_TARGET: z
    .string()
    .min(1)
    .default(PDF_TRANSLATOR.DEFAULT_TARGET_LANGUAGE),
  DEFAULT_OCR_LANG: z
    .string()
    .min(1)
    .default(PAGE_EXTRACTOR.DEFAULT_OCR_LANGUAGE),
  DEFAULT_DPI: z.coerce
    .number()
    .int()
    .min(1)
    .max(PAGE_EXTRACTOR.MAX_DPI)
    .default(PAGE_EXTRACTOR.DEFAULT_DPI),
});

export type ServerConfig = z.infer<typeof envSchema>;

/**
 * Parse server configuration from environment variables. Empty values are
 * treated as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ReturnType<typeof envSchema.safeParse> {
  const defined = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== '',
    ),
  );
  return envSchema.safeParse(defined);
}

/**
 * One line per validation issue, e.g.
 * `PORT: Number must be less than or equal to 65535`.
 */
export function formatConfigIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join('.')}: ${issue.message}`,
  );
}
