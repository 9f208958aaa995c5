import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { AdvisorDependencies } from '@autoreg/core/src/infrastructure/advisor-dependencies.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { health } from './routes/health.js';
import { createSessionRoutes } from './routes/sessions.js';
import { createQueryRoutes } from './routes/queries.js';
import { createStatsRoutes } from './routes/stats.js';
import { createChildLogger } from '@autoreg/shared/src/logger.js';

const log = createChildLogger('api:server');

export function createApp(deps: AdvisorDependencies): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Automotive Regulation Advisor API',
        version: '0.1.0',
        description:
          'Cited, advisory answers to automotive regulation questions drawn from official regulatory websites',
      },
    });
    return c.json(spec);
  });

  app.route('/sessions', createSessionRoutes(deps.advisor));
  app.route('/queries', createQueryRoutes(deps.advisor));
  app.route('/', createStatsRoutes(deps));

  return app;
}
