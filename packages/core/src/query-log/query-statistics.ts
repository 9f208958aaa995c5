import type { QueryLogEntry, QueryStatistics } from '@autoreg/shared/src/types/session.types.js';

function dayOf(timestamp: Date): string {
  return timestamp.toISOString().slice(0, 10);
}

/** Aggregates a query log; topics are ordered by frequency, ties by first appearance. */
export function computeQueryStatistics(entries: readonly QueryLogEntry[]): QueryStatistics {
  if (entries.length === 0) {
    return {
      totalQueries: 0,
      successfulQueries: 0,
      successRate: 0,
      averageResponseTimeSeconds: 0,
      topTopics: [],
      queriesPerDay: {},
    };
  }

  const topicCounts = new Map<string, number>();
  const queriesPerDay: Record<string, number> = {};
  let successfulQueries = 0;
  let totalResponseTime = 0;

  for (const entry of entries) {
    if (entry.success) {
      successfulQueries++;
    }
    totalResponseTime += entry.responseTimeSeconds;
    topicCounts.set(entry.topic, (topicCounts.get(entry.topic) ?? 0) + 1);
    const day = dayOf(entry.timestamp);
    queriesPerDay[day] = (queriesPerDay[day] ?? 0) + 1;
  }

  const topTopics = [...topicCounts]
    .map(([topic, count]) => ({ topic, count }))
    .sort((a, b) => b.count - a.count);

  return {
    totalQueries: entries.length,
    successfulQueries,
    successRate: successfulQueries / entries.length,
    averageResponseTimeSeconds: totalResponseTime / entries.length,
    topTopics,
    queriesPerDay,
  };
}
