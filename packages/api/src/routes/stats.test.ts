import { describe, it, expect } from 'vitest';
import { LearningCacheResponseSchema, StatsResponseSchema } from '../schemas/responses.js';
import { createTestApp } from '../test-helpers.js';

describe('GET /stats', () => {
  it('should report zeros for an empty log', async () => {
    const { app } = await createTestApp();

    const res = await app.request('/stats');

    expect(res.status).toBe(200);
    expect(StatsResponseSchema.parse(await res.json())).toEqual({
      totalQueries: 0,
      successfulQueries: 0,
      successRate: 0,
      averageResponseTimeSeconds: 0,
      topTopics: [],
      queriesPerDay: {},
    });
  });

  it('should aggregate logged queries', async () => {
    const { app, deps } = await createTestApp();
    await deps.queryLog.append({
      sessionId: 'a',
      timestamp: new Date('2026-05-04T08:00:00.000Z'),
      query: 'EU NOx limits',
      answer: '80 mg/km',
      topic: 'Emissions Standards',
      sourceCount: 2,
      responseTimeSeconds: 3,
      success: true,
    });
    await deps.queryLog.append({
      sessionId: 'b',
      timestamp: new Date('2026-05-05T09:00:00.000Z'),
      query: 'Japan crash tests',
      answer: 'No data',
      topic: 'NO_DATA_FOUND',
      sourceCount: 0,
      responseTimeSeconds: 1,
      success: false,
    });

    const body = StatsResponseSchema.parse(await (await app.request('/stats')).json());

    expect(body.totalQueries).toBe(2);
    expect(body.successfulQueries).toBe(1);
    expect(body.successRate).toBe(0.5);
    expect(body.averageResponseTimeSeconds).toBe(2);
    expect(body.queriesPerDay).toEqual({ '2026-05-04': 1, '2026-05-05': 1 });
  });
});

describe('GET /learning-cache', () => {
  it('should list domains by citation count', async () => {
    const { app } = await createTestApp({
      cachedCounts: { 'www.epa.gov': 1, 'ec.europa.eu': 4, 'unece.org': 1 },
    });

    const res = await app.request('/learning-cache');

    expect(LearningCacheResponseSchema.parse(await res.json())).toEqual({
      domains: [
        { domain: 'ec.europa.eu', count: 4 },
        { domain: 'unece.org', count: 1 },
        { domain: 'www.epa.gov', count: 1 },
      ],
    });
  });
});
