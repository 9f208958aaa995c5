import { z } from '@hono/zod-openapi';

export const MAX_QUERY_LENGTH = 2000;

export const AskQuerySchema = z
  .object({
    sessionId: z.string().min(1).optional(),
    query: z.string().trim().min(1).max(MAX_QUERY_LENGTH),
  })
  .openapi('AskQueryRequest');

export type AskQueryRequest = z.infer<typeof AskQuerySchema>;

export const SessionParamsSchema = z.object({
  sessionId: z.string().min(1),
});
