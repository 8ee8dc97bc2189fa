import type { PipelineErrorCode } from '@pdf-lingo/model';
import type { z } from 'zod';

import { isPipelineError } from '@pdf-lingo/shared';

export type ErrorStatus = 400 | 404 | 422 | 500;

export type ErrorResponseCode =
  | PipelineErrorCode
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

/**
 * Standard error response format.
 */
export interface ErrorResponseBody {
  error: string;
  code: ErrorResponseCode;
  details?: Array<{
    path: string;
    message: string;
  }>;
}

export interface ErrorResponse {
  status: ErrorStatus;
  body: ErrorResponseBody;
}

const STATUS_BY_CODE: Record<PipelineErrorCode, ErrorStatus> = {
  CONFIGURATION_ERROR: 400,
  INPUT_ERROR: 400,
  EXTRACTION_EMPTY: 422,
  PAGE_EXTRACTION_ERROR: 500,
  TRANSLATION_SERVICE_ERROR: 500,
};

/**
 * Map an error raised while serving a translation to its HTTP response.
 * Client-side errors keep their message; server-side ones are reported as
 * `Translation failed: <reason>`.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  const message = error instanceof Error ? error.message : String(error);

  if (isPipelineError(error)) {
    const status = STATUS_BY_CODE[error.code];
    return {
      status,
      body: {
        error: status === 500 ? `Translation failed: ${message}` : message,
        code: error.code,
      },
    };
  }

  return {
    status: 500,
    body: { error: `Translation failed: ${message}`, code: 'INTERNAL_ERROR' },
  };
}

/**
 * Create a consistent 400 response from Zod errors.
 */
export function createValidationErrorResponse(
  error: z.ZodError,
): ErrorResponse {
  const details = error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

  return {
    status: 400,
    body: {
      error: details[0]?.message ?? 'Validation failed',
      code: 'BAD_REQUEST',
      details,
    },
  };
}
