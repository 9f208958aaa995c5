import { createChildLogger, errorMessage } from '@autoreg/shared/src/logger.js';
import { createMutex } from '@autoreg/shared/src/utils/concurrency.js';
import type {
  DomainCounts,
  LearningCacheRepository,
} from '../repositories/learning-cache.repository.js';

const log = createChildLogger('learning:learning-cache');

export interface LearningCache {
  /** Replaces the in-memory mapping with the stored one; starts empty if it cannot be read. */
  load(): Promise<void>;
  /** Stable sort, most-cited domains first. */
  prioritize(urls: readonly string[]): string[];
  /** +1 for the domain of every URL that has one. */
  recordCitations(urls: readonly string[]): Promise<void>;
  /** Rejects with CacheIOError when the repository write fails. */
  persist(): Promise<void>;
  count(domain: string): number;
  snapshot(): DomainCounts;
}

const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Host of a URL, lowercased. Scheme-less URLs such as `a.com/x` are read as
 * https; URIs without a host (URNs) have no domain.
 */
export function domainOf(url: string): string | null {
  const candidate = url.includes('://') || SCHEME.test(url) ? url : `https://${url}`;
  try {
    const host = new URL(candidate).hostname;
    return host === '' ? null : host;
  } catch {
    return null;
  }
}

export function createLearningCache(repository: LearningCacheRepository): LearningCache {
  const counts = new Map<string, number>();
  const mutex = createMutex();
  let loaded = false;

  function countOf(domain: string): number {
    return counts.get(domain) ?? 0;
  }

  async function loadUnlocked(): Promise<void> {
    counts.clear();
    try {
      const stored = await repository.read();
      for (const [domain, value] of Object.entries(stored)) {
        counts.set(domain, value);
      }
      log.info({ domains: counts.size }, 'Learning cache loaded');
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Learning cache unreadable, starting empty');
    }
    loaded = true;
  }

  return {
    load(): Promise<void> {
      return mutex.runExclusive(loadUnlocked);
    },

    prioritize(urls: readonly string[]): string[] {
      return urls
        .map((url, index) => {
          const domain = domainOf(url);
          return { url, index, count: domain === null ? 0 : countOf(domain) };
        })
        .sort((a, b) => b.count - a.count || a.index - b.index)
        .map((entry) => entry.url);
    },

    recordCitations(urls: readonly string[]): Promise<void> {
      return mutex.runExclusive(async () => {
        if (!loaded) {
          await loadUnlocked();
        }
        for (const url of urls) {
          const domain = domainOf(url);
          if (domain === null) {
            log.debug({ url }, 'Citation without a domain ignored');
            continue;
          }
          counts.set(domain, countOf(domain) + 1);
        }
      });
    },

    persist(): Promise<void> {
      return mutex.runExclusive(async () => {
        if (!loaded) {
          await loadUnlocked();
        }
        await repository.write(Object.fromEntries(counts));
        log.debug({ domains: counts.size }, 'Learning cache persisted');
      });
    },

    count(domain: string): number {
      return countOf(domain.toLowerCase());
    },

    snapshot(): DomainCounts {
      return Object.fromEntries(counts);
    },
  };
}
