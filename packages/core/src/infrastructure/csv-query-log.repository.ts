import { randomUUID } from 'node:crypto';
import { access, appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { QueryLogEntry } from '@autoreg/shared/src/types/session.types.js';
import { createChildLogger } from '@autoreg/shared/src/logger.js';
import { PersistenceError, toError } from '@autoreg/shared/src/utils/errors.js';
import { createMutex } from '@autoreg/shared/src/utils/concurrency.js';
import type { QueryLogRepository } from '../repositories/query-log.repository.js';

const log = createChildLogger('infrastructure:query-log-csv');

export const QUERY_LOG_COLUMNS = [
  'session_id',
  'timestamp',
  'query',
  'response',
  'regulation_topic',
  'num_sources',
  'response_time',
  'query_successful',
] as const;

type QueryLogRow = Record<(typeof QUERY_LOG_COLUMNS)[number], string>;

const RowSchema = z.object({
  session_id: z.string(),
  timestamp: z
    .string()
    .transform((value) => new Date(value))
    .refine((date) => !Number.isNaN(date.getTime()), 'Invalid timestamp'),
  query: z.string(),
  response: z.string(),
  regulation_topic: z.string(),
  num_sources: z.coerce.number().int().min(0),
  response_time: z.coerce.number().min(0),
  query_successful: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['true', 'false', '1', '0']))
    .transform((value) => value === 'true' || value === '1'),
});

function toRow(entry: QueryLogEntry): QueryLogRow {
  return {
    session_id: entry.sessionId,
    timestamp: entry.timestamp.toISOString(),
    query: entry.query,
    response: entry.answer,
    regulation_topic: entry.topic,
    num_sources: String(entry.sourceCount),
    response_time: entry.responseTimeSeconds.toFixed(3),
    query_successful: String(entry.success),
  };
}

/** Parses a query log file; rows that do not fit the columns are skipped. */
export function parseQueryLog(content: string): QueryLogEntry[] {
  const records: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records)) {
    return [];
  }

  const entries: QueryLogEntry[] = [];
  records.forEach((record: unknown, index: number) => {
    const result = RowSchema.safeParse(record);
    if (!result.success) {
      log.warn({ row: index + 1, issues: result.error.issues.length }, 'Skipping malformed query log row');
      return;
    }
    const row = result.data;
    entries.push({
      sessionId: row.session_id,
      timestamp: row.timestamp,
      query: row.query,
      answer: row.response,
      topic: row.regulation_topic,
      sourceCount: row.num_sources,
      responseTimeSeconds: row.response_time,
      success: row.query_successful,
    });
  });
  return entries;
}

export function formatQueryLogRow(entry: QueryLogEntry): string {
  return stringify([toRow(entry)], { columns: [...QUERY_LOG_COLUMNS] });
}

export interface CsvQueryLogRepository extends QueryLogRepository {
  /**
   * Writes a copy of the log to `outputPath` with every session id replaced by a
   * fresh UUID, consistently per session. Resolves to the number of rows written;
   * an empty log writes no file.
   */
  exportAnonymized(outputPath: string): Promise<number>;
}

/** Maps each distinct session id to a new random one. */
export function anonymizeSessions(
  entries: readonly QueryLogEntry[],
  generateId: () => string = randomUUID,
): QueryLogEntry[] {
  const aliases = new Map<string, string>();
  return entries.map((entry) => {
    let alias = aliases.get(entry.sessionId);
    if (alias === undefined) {
      alias = generateId();
      aliases.set(entry.sessionId, alias);
    }
    return { ...entry, sessionId: alias };
  });
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function createCsvQueryLogRepository(filePath: string): CsvQueryLogRepository {
  const mutex = createMutex();

  async function ensureFile(): Promise<void> {
    try {
      await access(filePath);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, `${QUERY_LOG_COLUMNS.join(',')}\n`, 'utf-8');
      log.info({ filePath }, 'Initialized query log');
    }
  }

  async function readEntries(): Promise<QueryLogEntry[]> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new PersistenceError(`Failed to read query log ${filePath}`, toError(error));
    }
    return parseQueryLog(content);
  }

  return {
    initialize(): Promise<void> {
      return mutex.runExclusive(async () => {
        try {
          await ensureFile();
        } catch (error) {
          throw new PersistenceError(`Failed to initialize query log ${filePath}`, toError(error));
        }
      });
    },

    append(entry: QueryLogEntry): Promise<void> {
      return mutex.runExclusive(async () => {
        try {
          await ensureFile();
          await appendFile(filePath, formatQueryLogRow(entry), 'utf-8');
        } catch (error) {
          throw new PersistenceError(`Failed to append to query log ${filePath}`, toError(error));
        }
        log.debug({ sessionId: entry.sessionId, success: entry.success }, 'Query logged');
      });
    },

    readAll(): Promise<QueryLogEntry[]> {
      return mutex.runExclusive(readEntries);
    },

    async findBySession(sessionId: string): Promise<QueryLogEntry[]> {
      const entries = await mutex.runExclusive(readEntries);
      return entries.filter((entry) => entry.sessionId === sessionId);
    },

    async exportAnonymized(outputPath: string): Promise<number> {
      const entries = await mutex.runExclusive(readEntries);
      if (entries.length === 0) {
        log.warn({ filePath }, 'No query log data to anonymize');
        return 0;
      }

      const content = stringify(anonymizeSessions(entries).map(toRow), {
        header: true,
        columns: [...QUERY_LOG_COLUMNS],
      });
      try {
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(outputPath, content, 'utf-8');
      } catch (error) {
        throw new PersistenceError(`Failed to write anonymized query log ${outputPath}`, toError(error));
      }
      log.info({ outputPath, rows: entries.length }, 'Anonymized query log exported');
      return entries.length;
    },
  };
}
