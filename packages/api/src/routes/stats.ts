import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { LearningCache } from '@autoreg/core/src/learning/learning-cache.js';
import { computeQueryStatistics } from '@autoreg/core/src/query-log/query-statistics.js';
import type { QueryLogRepository } from '@autoreg/core/src/repositories/query-log.repository.js';
import { createRouter, type AppEnv } from '../types.js';
import { LearningCacheResponseSchema, StatsResponseSchema } from '../schemas/responses.js';

const statsRoute = createRoute({
  method: 'get',
  path: '/stats',
  tags: ['Statistics'],
  summary: 'Aggregate query statistics',
  responses: {
    200: {
      description: 'Statistics over the whole query log',
      content: {
        'application/json': {
          schema: StatsResponseSchema,
        },
      },
    },
  },
});

const learningCacheRoute = createRoute({
  method: 'get',
  path: '/learning-cache',
  tags: ['Statistics'],
  summary: 'Citation counts per domain',
  responses: {
    200: {
      description: 'Domains ordered by citation count',
      content: {
        'application/json': {
          schema: LearningCacheResponseSchema,
        },
      },
    },
  },
});

export interface StatsRouteDeps {
  readonly queryLog: QueryLogRepository;
  readonly learningCache: LearningCache;
}

export function createStatsRoutes(deps: StatsRouteDeps): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(statsRoute, async (c) => {
    const stats = computeQueryStatistics(await deps.queryLog.readAll());
    return c.json(
      {
        ...stats,
        topTopics: stats.topTopics.map((entry) => ({ ...entry })),
        queriesPerDay: { ...stats.queriesPerDay },
      },
      200,
    );
  });

  routes.openapi(learningCacheRoute, (c) => {
    const domains = Object.entries(deps.learningCache.snapshot())
      .map(([domain, count]) => ({ domain, count }))
      .sort((a, b) => b.count - a.count || a.domain.localeCompare(b.domain));
    return c.json({ domains }, 200);
  });

  return routes;
}
