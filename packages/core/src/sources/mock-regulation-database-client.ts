import { createChildLogger } from '@autoreg/shared/src/logger.js';
import { SecondarySourceError } from '@autoreg/shared/src/utils/errors.js';
import type { RegulationDatabaseClient, SecondaryHit, SecondarySearchRequest } from './types.js';

const log = createChildLogger('sources:mock-regulation-database');

export function createMockRegulationDatabaseClient(
  result: readonly SecondaryHit[] | Error = [],
): RegulationDatabaseClient {
  log.info('Using mock regulation database client');

  return {
    search(request: SecondarySearchRequest): Promise<readonly SecondaryHit[]> {
      log.debug({ query: request.query, region: request.region }, 'Mock regulation database search');

      if (result instanceof Error) {
        return Promise.reject(new SecondarySourceError(result.message, result));
      }
      return Promise.resolve(result.slice(0, request.maxResults));
    },

    getById(regulationId: string): Promise<SecondaryHit> {
      if (result instanceof Error) {
        return Promise.reject(new SecondarySourceError(result.message, result));
      }
      const hit = result.find((candidate) => /[?&]id=([^&#]+)/.exec(candidate.url)?.[1] === regulationId);
      return hit
        ? Promise.resolve(hit)
        : Promise.reject(new SecondarySourceError(`Regulation ${regulationId} not found`));
    },
  };
}
