import { randomUUID } from 'node:crypto';
import type { Citation, RegulationMetadata } from '@autoreg/shared/src/types/regulation.types.js';
import type { QueryLogEntry, SessionContext } from '@autoreg/shared/src/types/session.types.js';
import { createChildLogger, errorMessage } from '@autoreg/shared/src/logger.js';
import { SchemaValidationError, SessionNotFoundError } from '@autoreg/shared/src/utils/errors.js';
import type { Pipeline, PipelineAnswer } from '../orchestration/pipeline.js';
import type { PipelineFailure } from '../orchestration/pipeline-state.js';
import type { QueryLogRepository } from '../repositories/query-log.repository.js';
import { classifyTopic } from '../retrieval/query-classifier.js';
import {
  extractRegulationMetadata,
  mergeMetadata,
  suggestRefinements,
} from '../retrieval/regulation-metadata.js';

const log = createChildLogger('advisor:regulation-advisor');

export const NO_DATA_MESSAGE =
  'No matching regulation data was found for this question. Try naming the region, the vehicle category or the regulation number.';
export const UNAVAILABLE_MESSAGE =
  'The language model is currently unavailable. Please try again later.';

export interface RegulationAdvisorDeps {
  readonly pipeline: Pipeline;
  readonly queryLog: QueryLogRepository;
  readonly now?: () => Date;
}

interface AdvisorResponseBase {
  readonly sessionId: string;
  readonly query: string;
  readonly topic: string;
  readonly responseTimeSeconds: number;
}

export interface AnsweredResponse extends AdvisorResponseBase {
  readonly status: 'answered';
  readonly answer: string;
  readonly citations: readonly Citation[];
  readonly highlights: RegulationMetadata;
  readonly usedSecondary: boolean;
  readonly usedStaticFallback: boolean;
}

export interface FailedResponse extends AdvisorResponseBase {
  readonly status: 'no_data' | 'unavailable';
  readonly message: string;
  readonly suggestions: readonly string[];
}

export type AdvisorResponse = AnsweredResponse | FailedResponse;

export interface RegulationAdvisor {
  startSession(): SessionContext;
  /** Throws SessionNotFoundError for ids this advisor never issued. */
  getSession(sessionId: string): SessionContext;
  ask(session: SessionContext, query: string): Promise<AdvisorResponse>;
  history(sessionId: string): Promise<QueryLogEntry[]>;
}

/** Metadata of the cited fragments, or of every fragment when nothing was cited. */
function highlightsOf(result: PipelineAnswer): RegulationMetadata {
  const cited = result.citations
    .map((citation) => result.fragments[citation.index])
    .filter((fragment) => fragment !== undefined);
  const texts = (cited.length > 0 ? cited : result.fragments).map((fragment) => fragment.text);
  return mergeMetadata(texts.map(extractRegulationMetadata));
}

function toFailedResponse(
  base: AdvisorResponseBase,
  query: string,
  failure: PipelineFailure,
): FailedResponse {
  if (failure.kind === 'no_data') {
    return { ...base, status: 'no_data', message: NO_DATA_MESSAGE, suggestions: suggestRefinements(query, []) };
  }
  return { ...base, status: 'unavailable', message: UNAVAILABLE_MESSAGE, suggestions: [] };
}

export function createRegulationAdvisor(deps: RegulationAdvisorDeps): RegulationAdvisor {
  const now = deps.now ?? ((): Date => new Date());
  const sessions = new Map<string, SessionContext>();

  async function record(entry: QueryLogEntry): Promise<void> {
    try {
      await deps.queryLog.append(entry);
    } catch (error) {
      log.warn({ sessionId: entry.sessionId, error: errorMessage(error) }, 'Query log append failed');
    }
  }

  return {
    startSession(): SessionContext {
      const session: SessionContext = { sessionId: randomUUID(), startedAt: now() };
      sessions.set(session.sessionId, session);
      log.info({ sessionId: session.sessionId }, 'Session started');
      return session;
    },

    getSession(sessionId: string): SessionContext {
      const session = sessions.get(sessionId);
      if (!session) {
        throw new SessionNotFoundError(sessionId);
      }
      return session;
    },

    async ask(session: SessionContext, query: string): Promise<AdvisorResponse> {
      const trimmed = query.trim();
      if (trimmed === '') {
        throw new SchemaValidationError('Query must not be empty', ['query: must not be empty']);
      }

      const startedAt = now();
      const result = await deps.pipeline.run(trimmed, session);
      const finishedAt = now();
      const responseTimeSeconds = Math.max(finishedAt.getTime() - startedAt.getTime(), 0) / 1000;

      let response: AdvisorResponse;
      if (result.ok) {
        const { value } = result;
        response = {
          sessionId: session.sessionId,
          query: trimmed,
          topic: classifyTopic(trimmed, value.answer.text),
          responseTimeSeconds,
          status: 'answered',
          answer: value.answer.text,
          citations: value.citations,
          highlights: highlightsOf(value),
          usedSecondary: value.usedSecondary,
          usedStaticFallback: value.usedStaticFallback,
        };
      } else {
        response = toFailedResponse(
          {
            sessionId: session.sessionId,
            query: trimmed,
            topic: result.error.error.code,
            responseTimeSeconds,
          },
          trimmed,
          result.error,
        );
      }

      await record({
        sessionId: session.sessionId,
        timestamp: finishedAt,
        query: trimmed,
        answer: response.status === 'answered' ? response.answer : response.message,
        topic: response.topic,
        sourceCount: result.ok ? result.value.fragments.length : 0,
        responseTimeSeconds,
        success: result.ok,
      });

      log.info(
        { sessionId: session.sessionId, status: response.status, topic: response.topic, responseTimeSeconds },
        'Query handled',
      );
      return response;
    },

    history(sessionId: string): Promise<QueryLogEntry[]> {
      return deps.queryLog.findBySession(sessionId);
    },
  };
}
