import type { RetrievalSettings } from '@autoreg/schemas/src/settings.schema.js';
import type { Fragment, SearchTermSet } from '@autoreg/shared/src/types/regulation.types.js';
import type { SessionContext } from '@autoreg/shared/src/types/session.types.js';
import { createChildLogger, errorMessage } from '@autoreg/shared/src/logger.js';
import { NoDataFoundError, SiteFetchError, toError } from '@autoreg/shared/src/utils/errors.js';
import { mapWithConcurrency } from '@autoreg/shared/src/utils/concurrency.js';
import { err, ok } from '@autoreg/shared/src/utils/result.js';
import type { Result } from '@autoreg/shared/src/utils/result.js';
import {
  DEFAULT_EXTRACTION_OPTIONS,
  cleanText,
  extractRelevantContent,
  truncateAtWordBoundary,
} from '../retrieval/content-extractor.js';
import type { ExtractionOptions } from '../retrieval/content-extractor.js';
import { DEFAULT_RANKING_OPTIONS } from '../retrieval/fragment-ranker.js';
import { inferCategory, inferRegion } from '../retrieval/query-classifier.js';
import { scoreRelevance } from '../retrieval/relevance-scorer.js';
import type { ScoringOptions } from '../retrieval/relevance-scorer.js';
import { staticFallbackFor } from './static-fallback.js';
import type { RegulationDatabaseClient, ScrapeClient, ScrapedPage } from './types.js';

const log = createChildLogger('sources:source-fetcher');

export interface SourceFetcherDeps {
  readonly scrapeClient: ScrapeClient;
  /** Absent when no licensed database credentials are configured. */
  readonly secondaryClient?: RegulationDatabaseClient;
  readonly retrieval: RetrievalSettings;
  readonly extraction?: Partial<ExtractionOptions>;
  readonly scoring?: Partial<ScoringOptions>;
  /** Fragments scoring at or below this count as no content, so the fallback chain still runs. */
  readonly minInclusionScore?: number;
}

export interface SourceFetchResult {
  readonly fragments: readonly Fragment[];
  readonly sourceUrls: readonly string[];
  readonly sourceTitles: readonly string[];
  readonly siteFailures: readonly SiteFetchError[];
  readonly usedSecondary: boolean;
  readonly usedStaticFallback: boolean;
}

export interface SourceFetcher {
  /** Rejects with NoDataFoundError when every source in the chain came up empty. */
  fetch(
    query: string,
    urls: readonly string[],
    terms: SearchTermSet,
    session?: SessionContext,
  ): Promise<SourceFetchResult>;
}

type SiteOutcome = Result<Fragment | null, SiteFetchError>;

function asSiteFetchError(error: unknown, url: string): SiteFetchError {
  if (error instanceof SiteFetchError) {
    return error;
  }
  return new SiteFetchError(`Scrape failed for ${url}: ${errorMessage(error)}`, url, undefined, toError(error));
}

export function createSourceFetcher(deps: SourceFetcherDeps): SourceFetcher {
  const { scrapeClient, secondaryClient, retrieval } = deps;
  const maxLength = deps.extraction?.maxLength ?? DEFAULT_EXTRACTION_OPTIONS.maxLength;
  const minInclusionScore = Math.max(
    deps.minInclusionScore ?? DEFAULT_RANKING_OPTIONS.minInclusionScore,
    0,
  );

  async function fetchSite(
    query: string,
    url: string,
    terms: SearchTermSet,
    sessionId: string | undefined,
  ): Promise<SiteOutcome> {
    log.debug({ sessionId, url }, 'Scraping site');

    let page: ScrapedPage | null;
    try {
      page = await scrapeClient.scrape(url, retrieval.scrapeTimeoutMs);
    } catch (error) {
      const failure = asSiteFetchError(error, url);
      log.warn({ sessionId, url, status: failure.status, error: failure.message }, 'Site fetch failed');
      return err(failure);
    }

    if (page === null) {
      log.warn({ sessionId, url }, 'No content returned for site');
      return ok(null);
    }

    const content = extractRelevantContent(page.markdown, terms, query, deps.extraction);
    if (content.length <= retrieval.minSubstantialContentLength) {
      log.debug({ sessionId, url, length: content.length }, 'Extracted content too short');
      return ok(null);
    }

    const relevanceScore = scoreRelevance(query, content, deps.scoring);
    if (relevanceScore <= minInclusionScore) {
      log.debug({ sessionId, url, relevanceScore }, 'Extracted content not relevant to the query');
      return ok(null);
    }

    const fragment: Fragment = {
      text: content,
      sourceUrl: url,
      sourceTitle: page.title !== undefined && page.title.trim() !== '' ? page.title : url,
      relevanceScore,
      origin: 'primary',
    };
    return ok(fragment);
  }

  async function fetchSecondary(
    query: string,
    sessionId: string | undefined,
  ): Promise<Fragment[]> {
    if (!secondaryClient) {
      log.debug({ sessionId }, 'Secondary database not configured');
      return [];
    }

    const region = inferRegion(query);
    const category = inferCategory(query);
    try {
      const hits = await secondaryClient.search({
        query,
        region,
        category,
        maxResults: retrieval.maxSecondaryResults,
        timeoutMs: retrieval.secondaryTimeoutMs,
      });

      const fragments: Fragment[] = [];
      for (const hit of hits) {
        const text = truncateAtWordBoundary(cleanText(hit.text), maxLength);
        const relevanceScore = text === '' ? 0 : scoreRelevance(query, text, deps.scoring);
        if (relevanceScore <= minInclusionScore) {
          continue;
        }
        fragments.push({
          text,
          sourceUrl: hit.url,
          sourceTitle: hit.title,
          relevanceScore,
          origin: 'secondary',
        });
      }
      log.info(
        { sessionId, region, category, hits: hits.length, added: fragments.length },
        'Secondary database consulted',
      );
      return fragments;
    } catch (error) {
      log.warn({ sessionId, region, category, error: errorMessage(error) }, 'Secondary database unavailable');
      return [];
    }
  }

  function staticFragment(query: string): Fragment {
    const fallback = staticFallbackFor(query);
    return {
      text: fallback.text,
      sourceUrl: fallback.sourceUrl,
      sourceTitle: fallback.sourceTitle,
      relevanceScore: scoreRelevance(query, fallback.text, deps.scoring),
      origin: 'static',
    };
  }

  return {
    async fetch(query, urls, terms, session) {
      const sessionId = session?.sessionId;
      log.info({ sessionId, sites: urls.length }, 'Fetching regulation sources');

      const outcomes = await mapWithConcurrency(urls, retrieval.fetchConcurrency, (url) =>
        fetchSite(query, url, terms, sessionId),
      );

      const fragments: Fragment[] = [];
      const siteFailures: SiteFetchError[] = [];
      for (const outcome of outcomes) {
        if (!outcome.ok) {
          siteFailures.push(outcome.error);
        } else if (outcome.value !== null) {
          fragments.push(outcome.value);
        }
      }

      let usedSecondary = false;
      if (fragments.length < retrieval.minPrimaryFragments) {
        log.info(
          { sessionId, primary: fragments.length, required: retrieval.minPrimaryFragments },
          'Insufficient primary content, trying secondary database',
        );
        const secondary = await fetchSecondary(query, sessionId);
        fragments.push(...secondary);
        usedSecondary = secondary.length > 0;
      }

      let usedStaticFallback = false;
      if (fragments.length === 0 && retrieval.enableStaticFallback) {
        log.warn({ sessionId }, 'All sources empty, using static fallback text');
        fragments.push(staticFragment(query));
        usedStaticFallback = true;
      }

      if (fragments.length === 0) {
        log.error({ sessionId, failures: siteFailures.length }, 'No regulation data found from any source');
        throw new NoDataFoundError('No regulation data found for the query');
      }

      log.info(
        { sessionId, fragments: fragments.length, failures: siteFailures.length, usedSecondary, usedStaticFallback },
        'Regulation sources fetched',
      );

      return {
        fragments,
        sourceUrls: fragments.map((fragment) => fragment.sourceUrl),
        sourceTitles: fragments.map((fragment) => fragment.sourceTitle),
        siteFailures,
        usedSecondary,
        usedStaticFallback,
      };
    },
  };
}
