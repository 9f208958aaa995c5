import { StateGraph, START, END } from '@langchain/langgraph';
import type {
  AnswerResult,
  Citation,
  Fragment,
  WebsiteSelection,
} from '@autoreg/shared/src/types/regulation.types.js';
import type { SessionContext } from '@autoreg/shared/src/types/session.types.js';
import { createChildLogger, errorMessage } from '@autoreg/shared/src/logger.js';
import { NoDataFoundError, SynthesisError } from '@autoreg/shared/src/utils/errors.js';
import { err, ok } from '@autoreg/shared/src/utils/result.js';
import type { Result } from '@autoreg/shared/src/utils/result.js';
import type { LearningCache } from '../learning/learning-cache.js';
import { rankFragments } from '../retrieval/fragment-ranker.js';
import type { RankingOptions } from '../retrieval/fragment-ranker.js';
import { extractSearchTerms } from '../retrieval/search-terms.js';
import type { WebsiteSelector } from '../selection/website-selector.js';
import type { SourceFetcher } from '../sources/source-fetcher.js';
import { resolveCitations } from '../synthesis/answer-synthesizer.js';
import type { AnswerSynthesizer } from '../synthesis/answer-synthesizer.js';
import { PipelineGraphAnnotation, type PipelineFailure, type PipelineGraphState } from './pipeline-state.js';

const log = createChildLogger('orchestration:pipeline');

export interface PipelineDeps {
  readonly websiteSelector: WebsiteSelector;
  readonly sourceFetcher: SourceFetcher;
  readonly answerSynthesizer: AnswerSynthesizer;
  readonly learningCache: LearningCache;
  readonly ranking?: Partial<RankingOptions>;
}

export interface PipelineAnswer {
  readonly answer: AnswerResult;
  /** The fragments handed to the synthesizer, in source-label order. */
  readonly fragments: readonly Fragment[];
  readonly citations: readonly Citation[];
  readonly selection: WebsiteSelection;
  readonly siteFailureCount: number;
  readonly usedSecondary: boolean;
  readonly usedStaticFallback: boolean;
}

export interface Pipeline {
  run(query: string, session: SessionContext): Promise<Result<PipelineAnswer, PipelineFailure>>;
}

function routeOnFailure(next: string): (state: PipelineGraphState) => string {
  return (state: PipelineGraphState): string => (state.failure ? '__end__' : next);
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  log.info('Initializing regulation pipeline');

  async function selectSources(state: PipelineGraphState): Promise<Partial<PipelineGraphState>> {
    const [searchTerms, selection] = await Promise.all([
      Promise.resolve(extractSearchTerms(state.query)),
      deps.websiteSelector.select(state.query, state.session),
    ]);
    const prioritizedUrls = deps.learningCache.prioritize(selection.urls);
    log.debug(
      { sessionId: state.session.sessionId, strategy: selection.strategy, urls: prioritizedUrls },
      'Sources selected',
    );
    return { searchTerms, selection, prioritizedUrls };
  }

  async function fetchSources(state: PipelineGraphState): Promise<Partial<PipelineGraphState>> {
    try {
      const fetchResult = await deps.sourceFetcher.fetch(
        state.query,
        state.prioritizedUrls ?? [],
        state.searchTerms ?? extractSearchTerms(state.query),
        state.session,
      );
      return { fetchResult };
    } catch (error) {
      if (error instanceof NoDataFoundError) {
        return { failure: { kind: 'no_data', error } };
      }
      throw error;
    }
  }

  function rankSources(state: PipelineGraphState): Partial<PipelineGraphState> {
    const rankedFragments = rankFragments(state.query, state.fetchResult?.fragments ?? [], deps.ranking);
    if (rankedFragments.length === 0) {
      log.warn({ sessionId: state.session.sessionId }, 'No fragment passed the relevance threshold');
      return {
        failure: {
          kind: 'no_data',
          error: new NoDataFoundError('No retrieved content was relevant to the query'),
        },
      };
    }
    return { rankedFragments };
  }

  async function synthesize(state: PipelineGraphState): Promise<Partial<PipelineGraphState>> {
    try {
      const answer = await deps.answerSynthesizer.synthesize(
        state.query,
        state.rankedFragments ?? [],
        state.session,
      );
      return { answer };
    } catch (error) {
      if (error instanceof SynthesisError) {
        return { failure: { kind: 'synthesis', error } };
      }
      throw error;
    }
  }

  async function learn(state: PipelineGraphState): Promise<Partial<PipelineGraphState>> {
    if (!state.answer) {
      return {};
    }
    const cited = resolveCitations(state.answer, state.rankedFragments ?? []);
    try {
      await deps.learningCache.recordCitations(cited.map((citation) => citation.url));
      await deps.learningCache.persist();
    } catch (error) {
      log.warn({ sessionId: state.session.sessionId, error: errorMessage(error) }, 'Learning cache update failed');
    }
    return {};
  }

  const graph = new StateGraph(PipelineGraphAnnotation)
    .addNode('selectSources', selectSources)
    .addNode('fetchSources', fetchSources)
    .addNode('rankSources', rankSources)
    .addNode('synthesize', synthesize)
    .addNode('learn', learn)
    .addEdge(START, 'selectSources')
    .addEdge('selectSources', 'fetchSources')
    .addConditionalEdges('fetchSources', routeOnFailure('rankSources'), {
      rankSources: 'rankSources',
      __end__: END,
    })
    .addConditionalEdges('rankSources', routeOnFailure('synthesize'), {
      synthesize: 'synthesize',
      __end__: END,
    })
    .addConditionalEdges('synthesize', routeOnFailure('learn'), {
      learn: 'learn',
      __end__: END,
    })
    .addEdge('learn', END)
    .compile();

  return {
    async run(query: string, session: SessionContext): Promise<Result<PipelineAnswer, PipelineFailure>> {
      log.info({ sessionId: session.sessionId }, 'Running regulation pipeline');

      const result = await graph.invoke({
        session,
        query,
        searchTerms: undefined,
        selection: undefined,
        prioritizedUrls: undefined,
        fetchResult: undefined,
        rankedFragments: undefined,
        answer: undefined,
        failure: undefined,
      });

      if (result.failure) {
        log.warn(
          { sessionId: session.sessionId, kind: result.failure.kind, error: result.failure.error.message },
          'Pipeline ended without an answer',
        );
        return err(result.failure);
      }

      const { answer, selection, fetchResult } = result;
      const fragments = result.rankedFragments ?? [];
      if (!answer || !selection || !fetchResult) {
        const failure: PipelineFailure = {
          kind: 'synthesis',
          error: new SynthesisError('Pipeline finished without an answer'),
        };
        return err(failure);
      }

      log.info({ sessionId: session.sessionId, cited: answer.citedFragmentIndices.length }, 'Pipeline complete');

      return ok({
        answer,
        fragments,
        citations: resolveCitations(answer, fragments),
        selection,
        siteFailureCount: fetchResult.siteFailures.length,
        usedSecondary: fetchResult.usedSecondary,
        usedStaticFallback: fetchResult.usedStaticFallback,
      });
    },
  };
}
