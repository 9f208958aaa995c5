import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createChildLogger } from '@autoreg/shared/src/logger.js';
import { CacheIOError, toError } from '@autoreg/shared/src/utils/errors.js';
import type {
  DomainCounts,
  LearningCacheRepository,
} from '../repositories/learning-cache.repository.js';

const log = createChildLogger('infrastructure:learning-cache-file');

const CountsSchema = z.record(z.number().int().min(0));

const CacheFileSchema = z.union([
  z.object({ domainCounts: CountsSchema }),
  z.object({ website_success_rates: CountsSchema }).passthrough(),
]);

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/** Reads the current `{ domainCounts }` file or the older `{ website_success_rates }` one. */
export function parseCacheFile(content: unknown): DomainCounts {
  const parsed = CacheFileSchema.parse(content);
  return 'domainCounts' in parsed ? parsed.domainCounts : parsed.website_success_rates;
}

export function createFileLearningCacheRepository(filePath: string): LearningCacheRepository {
  return {
    async read(): Promise<DomainCounts> {
      let content: string;
      try {
        content = await readFile(filePath, 'utf-8');
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          log.info({ filePath }, 'No learning cache file yet, starting empty');
          return {};
        }
        throw new CacheIOError(`Failed to read learning cache ${filePath}`, toError(error));
      }

      try {
        return parseCacheFile(JSON.parse(content) as unknown);
      } catch (error) {
        throw new CacheIOError(`Malformed learning cache ${filePath}`, toError(error));
      }
    },

    async write(counts: DomainCounts): Promise<void> {
      const tempPath = `${filePath}.${String(process.pid)}.tmp`;
      try {
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(tempPath, JSON.stringify({ domainCounts: counts }, null, 2), 'utf-8');
        await rename(tempPath, filePath);
      } catch (error) {
        throw new CacheIOError(`Failed to write learning cache ${filePath}`, toError(error));
      }
      log.debug({ filePath, domains: Object.keys(counts).length }, 'Learning cache written');
    },
  };
}
