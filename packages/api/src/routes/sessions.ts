import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { RegulationAdvisor } from '@autoreg/core/src/advisor/regulation-advisor.js';
import { createRouter, type AppEnv } from '../types.js';
import { SessionParamsSchema } from '../schemas/requests.js';
import { CreateSessionResponseSchema, QueryHistoryResponseSchema } from '../schemas/responses.js';

const createSessionRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Sessions'],
  summary: 'Start an advisory session',
  responses: {
    201: {
      description: 'Session started',
      content: {
        'application/json': {
          schema: CreateSessionResponseSchema,
        },
      },
    },
  },
});

const listQueriesRoute = createRoute({
  method: 'get',
  path: '/{sessionId}/queries',
  tags: ['Sessions'],
  summary: 'Logged queries of a session',
  request: {
    params: SessionParamsSchema,
  },
  responses: {
    200: {
      description: 'Queries in the order they were asked',
      content: {
        'application/json': {
          schema: QueryHistoryResponseSchema,
        },
      },
    },
  },
});

export function createSessionRoutes(advisor: RegulationAdvisor): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(createSessionRoute, (c) => {
    const session = advisor.startSession();
    return c.json(
      {
        sessionId: session.sessionId,
        startedAt: session.startedAt.toISOString(),
      },
      201,
    );
  });

  routes.openapi(listQueriesRoute, async (c) => {
    const { sessionId } = c.req.valid('param');
    const entries = await advisor.history(sessionId);

    return c.json(
      {
        sessionId,
        queries: entries.map((entry) => ({
          timestamp: entry.timestamp.toISOString(),
          query: entry.query,
          answer: entry.answer,
          topic: entry.topic,
          sourceCount: entry.sourceCount,
          responseTimeSeconds: entry.responseTimeSeconds,
          success: entry.success,
        })),
      },
      200,
    );
  });

  return routes;
}
