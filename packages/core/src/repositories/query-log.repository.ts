import type { QueryLogEntry } from '@autoreg/shared/src/types/session.types.js';

/** Append-only record of answered and failed queries. */
export interface QueryLogRepository {
  /** Prepares the backing store; safe to call more than once. */
  initialize(): Promise<void>;
  /** Rejects with PersistenceError when the entry could not be stored. */
  append(entry: QueryLogEntry): Promise<void>;
  readAll(): Promise<QueryLogEntry[]>;
  findBySession(sessionId: string): Promise<QueryLogEntry[]>;
}
