import type { LoggerMethods } from '@pdf-lingo/logger';
import type { MiddlewareHandler } from 'hono';

/**
 * Request/response log middleware: one line per request with method, path,
 * status and duration. 5xx is logged as error, 4xx as warn.
 */
export function createHttpLogger(logger: LoggerMethods): MiddlewareHandler {
  return async (c, next) => {
    const startTime = performance.now();

    await next();

    const durationMs = Math.round(performance.now() - startTime);
    const status = c.res.status;
    const path = new URL(c.req.url).pathname;
    const line = `[HttpServer] ${c.req.method} ${path} ${status} ${durationMs}ms`;

    if (status >= 500) {
      logger.error(line);
    } else if (status >= 400) {
      logger.warn(line);
    } else {
      logger.info(line);
    }
  };
}
