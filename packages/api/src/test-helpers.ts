import type { OpenAPIHono } from '@hono/zod-openapi';
import { vi } from 'vitest';
import { createRegulationAdvisor } from '@autoreg/core/src/advisor/regulation-advisor.js';
import type { AdvisorDependencies } from '@autoreg/core/src/infrastructure/advisor-dependencies.js';
import { createLearningCache } from '@autoreg/core/src/learning/learning-cache.js';
import type { Pipeline, PipelineAnswer } from '@autoreg/core/src/orchestration/pipeline.js';
import type { PipelineFailure } from '@autoreg/core/src/orchestration/pipeline-state.js';
import { createInMemoryLearningCacheRepository } from '@autoreg/core/src/repositories/in-memory-learning-cache.repository.js';
import { createInMemoryQueryLogRepository } from '@autoreg/core/src/repositories/in-memory-query-log.repository.js';
import type { DomainCounts } from '@autoreg/core/src/repositories/learning-cache.repository.js';
import { err, ok } from '@autoreg/shared/src/utils/result.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export const SAMPLE_URL = 'https://ec.europa.eu/growth/sectors/automotive-industry_en';

export const SAMPLE_ANSWER: PipelineAnswer = {
  answer: { text: 'Diesel cars may emit at most 80 mg/km NOx [Source 0].', citedFragmentIndices: [0] },
  fragments: [
    {
      text: 'Under Regulation (EC) No 715/2007 the NOx limit for diesel passenger cars in the EU is 80 mg/km.',
      sourceUrl: SAMPLE_URL,
      sourceTitle: 'Vehicle emissions - European Commission',
      relevanceScore: 1.4,
      origin: 'primary',
    },
  ],
  citations: [{ index: 0, url: SAMPLE_URL, title: 'Vehicle emissions - European Commission' }],
  selection: { urls: [SAMPLE_URL], strategy: 'llm' },
  siteFailureCount: 0,
  usedSecondary: false,
  usedStaticFallback: false,
};

export function createStubPipeline(outcome: PipelineAnswer | PipelineFailure = SAMPLE_ANSWER): Pipeline {
  return {
    run: vi.fn<Pipeline['run']>().mockResolvedValue('kind' in outcome ? err(outcome) : ok(outcome)),
  };
}

export function jsonPost(body: Record<string, unknown>, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

export interface TestAppOptions {
  readonly pipeline?: Pipeline;
  readonly cachedCounts?: DomainCounts;
  readonly now?: () => Date;
}

/**
 * App over in-memory repositories; the pipeline answers with SAMPLE_ANSWER unless one is given.
 * For use in unit tests only.
 */
export async function createTestApp(
  options: TestAppOptions = {},
): Promise<{ app: OpenAPIHono<AppEnv>; deps: AdvisorDependencies }> {
  const queryLog = createInMemoryQueryLogRepository();
  const learningCache = createLearningCache(
    createInMemoryLearningCacheRepository(options.cachedCounts),
  );
  await learningCache.load();

  const deps: AdvisorDependencies = {
    advisor: createRegulationAdvisor({
      pipeline: options.pipeline ?? createStubPipeline(),
      queryLog,
      now: options.now,
    }),
    learningCache,
    queryLog,
  };
  return { app: createApp(deps), deps };
}
