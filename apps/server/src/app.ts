import type { ErrorResponseBody } from './lib/error-response';
import type { TranslateRouteDependencies } from './routes/translate';

import { Hono } from 'hono';

import { toErrorResponse } from './lib/error-response';
import { createHttpLogger } from './middleware/http-logger';
import health from './routes/health';
import { createTranslateRoutes } from './routes/translate';

export type AppDependencies = TranslateRouteDependencies;

/**
 * Build the HTTP application. Collaborators are injected so the same app
 * runs against the real pipeline in main.ts and against fakes in tests.
 */
export function createApp(deps: AppDependencies): Hono {
  const app = new Hono();

  app.use('*', createHttpLogger(deps.logger));

  app.route('/health', health);
  app.route('/translate', createTranslateRoutes(deps));

  app.notFound((c) =>
    c.json<ErrorResponseBody>({ error: 'Not found', code: 'NOT_FOUND' }, 404),
  );

  app.onError((error, c) => {
    deps.logger.error('[HttpServer] Unhandled error:', error);
    const { status, body } = toErrorResponse(error);
    return c.json(body, status);
  });

  return app;
}
