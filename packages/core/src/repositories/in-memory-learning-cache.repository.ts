import type { DomainCounts, LearningCacheRepository } from './learning-cache.repository.js';

export interface InMemoryLearningCacheRepository extends LearningCacheRepository {
  readonly writeCount: number;
}

export function createInMemoryLearningCacheRepository(
  initial: DomainCounts = {},
): InMemoryLearningCacheRepository {
  let stored: DomainCounts = { ...initial };
  let writeCount = 0;

  return {
    get writeCount(): number {
      return writeCount;
    },

    read(): Promise<DomainCounts> {
      return Promise.resolve({ ...stored });
    },

    write(counts: DomainCounts): Promise<void> {
      stored = { ...counts };
      writeCount++;
      return Promise.resolve();
    },
  };
}
