import { describe, it, expect } from 'vitest';
import type { QueryLogEntry } from '@autoreg/shared/src/types/session.types.js';
import { createInMemoryQueryLogRepository } from './in-memory-query-log.repository.js';

function entry(sessionId: string, query: string): QueryLogEntry {
  return {
    sessionId,
    timestamp: new Date('2026-01-15T10:00:00Z'),
    query,
    answer: 'answer',
    topic: 'General',
    sourceCount: 1,
    responseTimeSeconds: 1.5,
    success: true,
  };
}

describe('InMemoryQueryLogRepository', () => {
  it('should return entries in append order', async () => {
    const repo = createInMemoryQueryLogRepository();
    await repo.append(entry('s1', 'first'));
    await repo.append(entry('s2', 'second'));

    const all = await repo.readAll();
    expect(all.map((e) => e.query)).toEqual(['first', 'second']);
  });

  it('should filter by session', async () => {
    const repo = createInMemoryQueryLogRepository();
    await repo.append(entry('s1', 'first'));
    await repo.append(entry('s2', 'second'));
    await repo.append(entry('s1', 'third'));

    const mine = await repo.findBySession('s1');
    expect(mine.map((e) => e.query)).toEqual(['first', 'third']);
  });
});
