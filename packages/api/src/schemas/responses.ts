import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Sessions
export const CreateSessionResponseSchema = z
  .object({
    sessionId: z.string(),
    startedAt: z.string(),
  })
  .openapi('CreateSessionResponse');

export const QueryHistoryResponseSchema = z
  .object({
    sessionId: z.string(),
    queries: z.array(
      z.object({
        timestamp: z.string(),
        query: z.string(),
        answer: z.string(),
        topic: z.string(),
        sourceCount: z.number().int(),
        responseTimeSeconds: z.number(),
        success: z.boolean(),
      }),
    ),
  })
  .openapi('QueryHistoryResponse');

// Queries
const CitationSchema = z.object({
  index: z.number().int(),
  url: z.string(),
  title: z.string(),
});

const HighlightsSchema = z.object({
  regulationNumbers: z.array(z.string()),
  regions: z.array(z.string()),
  categories: z.array(z.string()),
  limits: z.array(z.string()),
  complianceDates: z.array(z.string()),
});

export const QueryResponseSchema = z
  .object({
    sessionId: z.string(),
    query: z.string(),
    status: z.enum(['answered', 'no_data', 'unavailable']),
    answer: z.string().optional(),
    message: z.string().optional(),
    citations: z.array(CitationSchema),
    highlights: HighlightsSchema.optional(),
    suggestions: z.array(z.string()),
    topic: z.string(),
    responseTimeSeconds: z.number(),
    usedSecondary: z.boolean().optional(),
    usedStaticFallback: z.boolean().optional(),
  })
  .openapi('QueryResponse');

export type QueryResponse = z.infer<typeof QueryResponseSchema>;

// Statistics
export const StatsResponseSchema = z
  .object({
    totalQueries: z.number().int(),
    successfulQueries: z.number().int(),
    successRate: z.number(),
    averageResponseTimeSeconds: z.number(),
    topTopics: z.array(z.object({ topic: z.string(), count: z.number().int() })),
    queriesPerDay: z.record(z.string(), z.number().int()),
  })
  .openapi('StatsResponse');

export const LearningCacheResponseSchema = z
  .object({
    domains: z.array(z.object({ domain: z.string(), count: z.number().int() })),
  })
  .openapi('LearningCacheResponse');
