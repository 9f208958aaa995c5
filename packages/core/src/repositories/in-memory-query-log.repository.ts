import type { QueryLogEntry } from '@autoreg/shared/src/types/session.types.js';
import type { QueryLogRepository } from './query-log.repository.js';

export function createInMemoryQueryLogRepository(): QueryLogRepository {
  const entries: QueryLogEntry[] = [];

  return {
    initialize(): Promise<void> {
      return Promise.resolve();
    },

    append(entry: QueryLogEntry): Promise<void> {
      entries.push({ ...entry });
      return Promise.resolve();
    },

    readAll(): Promise<QueryLogEntry[]> {
      return Promise.resolve([...entries]);
    },

    findBySession(sessionId: string): Promise<QueryLogEntry[]> {
      return Promise.resolve(entries.filter((entry) => entry.sessionId === sessionId));
    },
  };
}
