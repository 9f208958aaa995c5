import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type {
  AdvisorResponse,
  RegulationAdvisor,
} from '@autoreg/core/src/advisor/regulation-advisor.js';
import { createRouter, type AppEnv } from '../types.js';
import { AskQuerySchema } from '../schemas/requests.js';
import { ErrorResponseSchema, QueryResponseSchema, type QueryResponse } from '../schemas/responses.js';

const askRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Queries'],
  summary: 'Ask a regulation question',
  description:
    'Runs source selection, retrieval, ranking and synthesis. Pipeline failures are reported through `status`, not as HTTP errors.',
  request: {
    body: {
      content: {
        'application/json': {
          schema: AskQuerySchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Answer, or the reason there is none',
      content: {
        'application/json': {
          schema: QueryResponseSchema,
        },
      },
    },
    400: {
      description: 'Invalid request',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    404: {
      description: 'Unknown session',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function toQueryResponse(response: AdvisorResponse): QueryResponse {
  const base = {
    sessionId: response.sessionId,
    query: response.query,
    topic: response.topic,
    responseTimeSeconds: response.responseTimeSeconds,
  };

  if (response.status === 'answered') {
    const { highlights } = response;
    return {
      ...base,
      status: response.status,
      answer: response.answer,
      citations: response.citations.map((citation) => ({ ...citation })),
      highlights: {
        regulationNumbers: [...highlights.regulationNumbers],
        regions: [...highlights.regions],
        categories: [...highlights.categories],
        limits: [...highlights.limits],
        complianceDates: [...highlights.complianceDates],
      },
      suggestions: [],
      usedSecondary: response.usedSecondary,
      usedStaticFallback: response.usedStaticFallback,
    };
  }

  return {
    ...base,
    status: response.status,
    message: response.message,
    citations: [],
    suggestions: [...response.suggestions],
  };
}

export function createQueryRoutes(advisor: RegulationAdvisor): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(askRoute, async (c) => {
    const body = c.req.valid('json');
    const session =
      body.sessionId !== undefined ? advisor.getSession(body.sessionId) : advisor.startSession();

    const response = await advisor.ask(session, body.query);
    return c.json(toQueryResponse(response), 200);
  });

  return routes;
}
