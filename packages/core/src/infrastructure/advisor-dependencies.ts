import { join } from 'node:path';
import type { AppConfig, ServiceCredentials } from '@autoreg/schemas/src/config-loader.js';
import { createChildLogger } from '@autoreg/shared/src/logger.js';
import { createRegulationAdvisor } from '../advisor/regulation-advisor.js';
import type { RegulationAdvisor } from '../advisor/regulation-advisor.js';
import { createLearningCache } from '../learning/learning-cache.js';
import type { LearningCache } from '../learning/learning-cache.js';
import { createTextLlmClient } from '../llm/text-llm-client.js';
import type { TextLlmClientOptions } from '../llm/text-llm-client.js';
import { createPipeline } from '../orchestration/pipeline.js';
import type { QueryLogRepository } from '../repositories/query-log.repository.js';
import { createWebsiteSelector } from '../selection/website-selector.js';
import { createMockRegulationDatabaseClient } from '../sources/mock-regulation-database-client.js';
import { createMockScrapeClient } from '../sources/mock-scrape-client.js';
import { createRegulationDatabaseClient } from '../sources/regulation-database-client.js';
import { createScrapeClient } from '../sources/scrape-client.js';
import { createSourceFetcher } from '../sources/source-fetcher.js';
import type { RegulationDatabaseClient, ScrapeClient } from '../sources/types.js';
import { createAnswerSynthesizer } from '../synthesis/answer-synthesizer.js';
import { createCsvQueryLogRepository } from './csv-query-log.repository.js';
import { createFileLearningCacheRepository } from './file-learning-cache.repository.js';

const log = createChildLogger('infrastructure:advisor-dependencies');

export const LEARNING_CACHE_FILE = 'learning-cache.json';
export const QUERY_LOG_FILE = 'query-log.csv';

export interface AdvisorDependencyOptions {
  readonly config: AppConfig;
  readonly credentials: ServiceCredentials;
  readonly dataDir: string;
  readonly llm?: TextLlmClientOptions;
}

export interface AdvisorDependencies {
  readonly advisor: RegulationAdvisor;
  readonly learningCache: LearningCache;
  readonly queryLog: QueryLogRepository;
}

function createSourceClients(credentials: ServiceCredentials): {
  scrapeClient: ScrapeClient;
  secondaryClient?: RegulationDatabaseClient;
} {
  if (credentials.mode === 'mock') {
    return {
      scrapeClient: createMockScrapeClient(),
      secondaryClient: createMockRegulationDatabaseClient(),
    };
  }

  const scrapeClient = createScrapeClient({
    apiKey: credentials.scrapeApiKey,
    baseUrl: credentials.scrapeBaseUrl,
  });
  if (!credentials.regulationDatabase) {
    log.info('Regulation database credentials not configured, secondary source disabled');
    return { scrapeClient };
  }
  return {
    scrapeClient,
    secondaryClient: createRegulationDatabaseClient({ credentials: credentials.regulationDatabase }),
  };
}

/**
 * Builds the advisor and its collaborators. Flat files live under `dataDir`;
 * the query log header is written and the learning cache loaded before returning.
 */
export async function createAdvisorDependencies(
  options: AdvisorDependencyOptions,
): Promise<AdvisorDependencies> {
  const { config, credentials, dataDir } = options;
  const { settings } = config;

  log.info({ mode: credentials.mode, dataDir }, 'Creating advisor dependencies');

  const llmClient = await createTextLlmClient(credentials, options.llm);
  const { scrapeClient, secondaryClient } = createSourceClients(credentials);

  const learningCache = createLearningCache(
    createFileLearningCacheRepository(join(dataDir, LEARNING_CACHE_FILE)),
  );
  const queryLog = createCsvQueryLogRepository(join(dataDir, QUERY_LOG_FILE));

  await Promise.all([learningCache.load(), queryLog.initialize()]);

  const scoring = {
    maxScore: settings.scoring.maxScore,
    shortTextLength: settings.scoring.shortTextLength,
    veryShortTextLength: settings.scoring.veryShortTextLength,
    shortTextPenalty: settings.scoring.shortTextPenalty,
    veryShortTextPenalty: settings.scoring.veryShortTextPenalty,
  };

  const pipeline = createPipeline({
    websiteSelector: createWebsiteSelector({
      llmClient,
      catalog: config.catalog,
      maxSites: settings.retrieval.maxSitesPerQuery,
      temperature: settings.synthesis.selectionTemperature,
      maxOutputTokens: settings.synthesis.selectionMaxOutputTokens,
    }),
    sourceFetcher: createSourceFetcher({
      scrapeClient,
      secondaryClient,
      retrieval: settings.retrieval,
      extraction: settings.extraction,
      scoring,
      minInclusionScore: settings.scoring.minInclusionScore,
    }),
    answerSynthesizer: createAnswerSynthesizer({
      llmClient,
      temperature: settings.synthesis.temperature,
      maxOutputTokens: settings.synthesis.maxOutputTokens,
    }),
    learningCache,
    ranking: {
      minInclusionScore: settings.scoring.minInclusionScore,
      maxFragments: settings.scoring.maxFragmentsForSynthesis,
      scoring,
    },
  });

  return {
    advisor: createRegulationAdvisor({ pipeline, queryLog }),
    learningCache,
    queryLog,
  };
}
