import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import { NoDataFoundError, SynthesisError } from '@autoreg/shared/src/utils/errors.js';
import { createLearningCache } from '../learning/learning-cache.js';
import type { TextLlmClient, TextLlmRequest } from '../llm/text-llm-client.js';
import { SELECTION_PROMPT_MARKER } from '../llm/text-llm-client.js';
import { createInMemoryLearningCacheRepository } from '../repositories/in-memory-learning-cache.repository.js';
import { createWebsiteSelector } from '../selection/website-selector.js';
import { createMockRegulationDatabaseClient } from '../sources/mock-regulation-database-client.js';
import { createMockScrapeClient } from '../sources/mock-scrape-client.js';
import type { MockScrapeResponse } from '../sources/mock-scrape-client.js';
import { createSourceFetcher } from '../sources/source-fetcher.js';
import type { RegulationDatabaseClient, ScrapeClient } from '../sources/types.js';
import { createAnswerSynthesizer } from '../synthesis/answer-synthesizer.js';
import { createTestCatalog, createTestSession, createTestSettings } from '../test-fixtures.js';
import { createPipeline } from './pipeline.js';
import type { PipelineDeps } from './pipeline.js';

const QUERY = 'What are NOx emissions limits for EU diesel vehicles?';

const EU_URL = 'https://ec.europa.eu/growth/sectors/automotive-industry_en';
const EPA_URL = 'https://www.epa.gov/regulations-emissions-vehicles-and-engines';

const EU_PAGE = {
  title: 'Vehicle emissions - European Commission',
  markdown:
    '[Skip to content](#main)\n\n# Euro 6 emissions limits\n\n' +
    'Under Regulation (EC) No 715/2007 the NOx limit for diesel passenger vehicles in the EU is 80 mg/km. ' +
    'Manufacturers shall demonstrate compliance during type approval. ' +
    'The limits apply to new registrations from 1 September 2015.',
};

const FILLER_PAGE = {
  title: 'Placeholder',
  markdown:
    'Lorem ipsum dolor sit amet, consectetur adipiscing elit, sed do eiusmod tempor incididunt ut labore et dolore magna aliqua.\n\n' +
    'Ut enim ad minim veniam, quis nostrud exercitation ullamco laboris nisi ut aliquip ex ea commodo consequat.',
};

const SECONDARY_HIT = {
  text: 'Euro 6\nNOx limit: 80 mg/km for diesel passenger cars.',
  url: 'https://regdb.test/db/doc.php?id=1',
  title: 'Euro 6 light-duty emissions',
};

interface Harness {
  readonly deps: PipelineDeps;
  readonly invoke: Mock<TextLlmClient['invoke']>;
  readonly repository: ReturnType<typeof createInMemoryLearningCacheRepository>;
}

function createHarness(options: {
  readonly selection?: string;
  readonly answer?: string | Error;
  readonly pages?: ReadonlyMap<string, MockScrapeResponse>;
  readonly scrapeClient?: ScrapeClient;
  readonly secondaryClient?: RegulationDatabaseClient;
  readonly retrieval?: Record<string, unknown>;
  readonly cached?: Record<string, number>;
}): Harness {
  const answer = options.answer ?? 'The NOx limit is 80 mg/km [Source 0].';
  const invoke = vi.fn<TextLlmClient['invoke']>((request: TextLlmRequest) => {
    if (request.systemPrompt.includes(SELECTION_PROMPT_MARKER)) {
      return Promise.resolve({ content: options.selection ?? 'EU_COMMISSION' });
    }
    return answer instanceof Error ? Promise.reject(answer) : Promise.resolve({ content: answer });
  });
  const llmClient: TextLlmClient = { invoke };
  const settings = createTestSettings({ retrieval: options.retrieval ?? {} });
  const repository = createInMemoryLearningCacheRepository(options.cached);

  return {
    invoke,
    repository,
    deps: {
      websiteSelector: createWebsiteSelector({
        llmClient,
        catalog: createTestCatalog(),
        maxSites: 3,
        temperature: 0.1,
        maxOutputTokens: 100,
      }),
      sourceFetcher: createSourceFetcher({
        scrapeClient: options.scrapeClient ?? createMockScrapeClient(options.pages ?? new Map([[EU_URL, EU_PAGE]])),
        secondaryClient: options.secondaryClient,
        retrieval: settings.retrieval,
      }),
      answerSynthesizer: createAnswerSynthesizer({ llmClient, temperature: 0.1, maxOutputTokens: 512 }),
      learningCache: createLearningCache(repository),
    },
  };
}

describe('createPipeline', () => {
  it('should answer with citations that map to source URLs', async () => {
    const { deps } = createHarness({});
    const pipeline = createPipeline(deps);

    const result = await pipeline.run(QUERY, createTestSession());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.answer.text).toBe('The NOx limit is 80 mg/km [Source 0].');
    expect(result.value.citations).toEqual([
      { index: 0, url: EU_URL, title: 'Vehicle emissions - European Commission' },
    ]);
    expect(result.value.selection).toEqual({ urls: [EU_URL], strategy: 'llm' });
    expect(result.value.fragments).toHaveLength(1);
    expect(result.value.siteFailureCount).toBe(0);
    expect(result.value.usedSecondary).toBe(false);
    expect(result.value.usedStaticFallback).toBe(false);
  });

  it('should record cited domains in the learning cache and persist them', async () => {
    const { deps, repository } = createHarness({});
    const pipeline = createPipeline(deps);

    await pipeline.run(QUERY, createTestSession());

    expect(deps.learningCache.count('ec.europa.eu')).toBe(1);
    expect(repository.writeCount).toBe(1);
    await expect(repository.read()).resolves.toEqual({ 'ec.europa.eu': 1 });
  });

  it('should scrape previously cited domains first', async () => {
    const scrape = vi.fn<ScrapeClient['scrape']>((url: string) =>
      Promise.resolve(url === EU_URL ? EU_PAGE : null),
    );
    const { deps } = createHarness({
      selection: 'US_EPA, EU_COMMISSION',
      scrapeClient: { scrape },
      cached: { 'ec.europa.eu': 3 },
    });
    await deps.learningCache.load();
    const pipeline = createPipeline(deps);

    await pipeline.run(QUERY, createTestSession());

    expect(scrape.mock.calls.map(([url]) => url)).toEqual([EU_URL, EPA_URL]);
  });

  it('should answer from the secondary database when primary pages are irrelevant', async () => {
    const search = vi.fn<RegulationDatabaseClient['search']>().mockResolvedValue([SECONDARY_HIT]);
    const { deps } = createHarness({
      selection: 'US_EPA, EU_COMMISSION',
      pages: new Map([
        [EPA_URL, FILLER_PAGE],
        [EU_URL, FILLER_PAGE],
      ]),
      secondaryClient: { ...createMockRegulationDatabaseClient(), search },
    });
    const pipeline = createPipeline(deps);

    const result = await pipeline.run(QUERY, createTestSession());

    expect(search).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.usedSecondary).toBe(true);
    expect(result.value.citations).toEqual([
      { index: 0, url: SECONDARY_HIT.url, title: 'Euro 6 light-duty emissions' },
    ]);
  });

  it('should end with a no_data failure when no source yields content', async () => {
    const { deps, invoke } = createHarness({
      pages: new Map(),
      retrieval: { enableStaticFallback: false },
    });
    const pipeline = createPipeline(deps);

    const result = await pipeline.run(QUERY, createTestSession());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('no_data');
    expect(result.error.error).toBeInstanceOf(NoDataFoundError);
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('should end with a no_data failure when nothing passes the relevance threshold', async () => {
    const { deps } = createHarness({});
    const pipeline = createPipeline({ ...deps, ranking: { minInclusionScore: 5 } });

    const result = await pipeline.run(QUERY, createTestSession());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('no_data');
    expect(result.error.error.message).toBe('No retrieved content was relevant to the query');
  });

  it('should end with a synthesis failure and leave the cache untouched when the model fails', async () => {
    const { deps, repository } = createHarness({ answer: new Error('quota exceeded') });
    const pipeline = createPipeline(deps);

    const result = await pipeline.run(QUERY, createTestSession());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('synthesis');
    expect(result.error.error).toBeInstanceOf(SynthesisError);
    expect(result.error.error.message).toBe('Language model unavailable');
    expect(repository.writeCount).toBe(0);
  });
});
