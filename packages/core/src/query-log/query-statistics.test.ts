import { describe, it, expect } from 'vitest';
import type { QueryLogEntry } from '@autoreg/shared/src/types/session.types.js';
import { computeQueryStatistics } from './query-statistics.js';

function entry(timestamp: string, topic: string, success: boolean, responseTimeSeconds: number): QueryLogEntry {
  return {
    sessionId: 'session-1',
    timestamp: new Date(timestamp),
    query: 'q',
    answer: 'a',
    topic,
    sourceCount: 1,
    responseTimeSeconds,
    success,
  };
}

describe('computeQueryStatistics', () => {
  it('should return zeros for an empty log', () => {
    expect(computeQueryStatistics([])).toEqual({
      totalQueries: 0,
      successfulQueries: 0,
      successRate: 0,
      averageResponseTimeSeconds: 0,
      topTopics: [],
      queriesPerDay: {},
    });
  });

  it('should aggregate success, timing, topics and days', () => {
    const stats = computeQueryStatistics([
      entry('2026-01-15T10:00:00Z', 'Safety Requirements', true, 2),
      entry('2026-01-15T23:59:00Z', 'Emissions Standards', true, 4),
      entry('2026-01-16T08:00:00Z', 'Emissions Standards', false, 1),
      entry('2026-01-16T09:00:00Z', 'no_data', false, 1),
    ]);

    expect(stats.totalQueries).toBe(4);
    expect(stats.successfulQueries).toBe(2);
    expect(stats.successRate).toBe(0.5);
    expect(stats.averageResponseTimeSeconds).toBe(2);
    expect(stats.topTopics).toEqual([
      { topic: 'Emissions Standards', count: 2 },
      { topic: 'Safety Requirements', count: 1 },
      { topic: 'no_data', count: 1 },
    ]);
    expect(stats.queriesPerDay).toEqual({ '2026-01-15': 2, '2026-01-16': 2 });
  });
});
