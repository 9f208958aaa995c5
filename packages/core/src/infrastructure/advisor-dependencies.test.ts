import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestCatalog, createTestSettings } from '../test-fixtures.js';
import { LEARNING_CACHE_FILE, QUERY_LOG_FILE, createAdvisorDependencies } from './advisor-dependencies.js';

describe('createAdvisorDependencies', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'autoreg-deps-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should answer offline in mock mode and persist both flat files', async () => {
    const { advisor, learningCache, queryLog } = await createAdvisorDependencies({
      config: { catalog: createTestCatalog(), settings: createTestSettings() },
      credentials: { mode: 'mock' },
      dataDir,
    });

    const session = advisor.startSession();
    const response = await advisor.ask(session, 'What are NOx emissions limits for EU diesel vehicles?');

    expect(response.status).toBe('answered');
    expect(response.topic).toBe('Emissions Standards');
    if (response.status !== 'answered') return;
    expect(response.citations).toHaveLength(2);

    expect(Object.values(learningCache.snapshot())).toEqual([1, 1]);
    const stored: unknown = JSON.parse(await readFile(join(dataDir, LEARNING_CACHE_FILE), 'utf-8'));
    expect(stored).toEqual({ domainCounts: learningCache.snapshot() });

    const entries = await queryLog.findBySession(session.sessionId);
    expect(entries).toHaveLength(1);
    expect(entries[0].success).toBe(true);
    expect(entries[0].sourceCount).toBe(3);
  });

  it('should write the query log header on start-up', async () => {
    await createAdvisorDependencies({
      config: { catalog: createTestCatalog(), settings: createTestSettings() },
      credentials: { mode: 'mock' },
      dataDir,
    });

    const content = await readFile(join(dataDir, QUERY_LOG_FILE), 'utf-8');
    expect(content).toBe(
      'session_id,timestamp,query,response,regulation_topic,num_sources,response_time,query_successful\n',
    );
  });
});
