import { describe, it, expect } from 'vitest';
import { createInMemoryLearningCacheRepository } from '../repositories/in-memory-learning-cache.repository.js';
import type { LearningCacheRepository } from '../repositories/learning-cache.repository.js';
import { createLearningCache, domainOf } from './learning-cache.js';

describe('domainOf', () => {
  it.each([
    ['https://www.EPA.gov/regulations', 'www.epa.gov'],
    ['a.com/x', 'a.com'],
    ['http://unece.org', 'unece.org'],
    ['urn:autoreg:static-fallback:emissions', null],
    ['', null],
  ])('should read %s as %s', (url, expected) => {
    expect(domainOf(url)).toBe(expected);
  });
});

describe('createLearningCache', () => {
  it('should keep input order on equal counts and promote recorded domains', async () => {
    const cache = createLearningCache(createInMemoryLearningCacheRepository());
    await cache.load();

    expect(cache.prioritize(['a.com/x', 'b.com/y'])).toEqual(['a.com/x', 'b.com/y']);

    await cache.recordCitations(['b.com/y']);

    expect(cache.prioritize(['a.com/x', 'b.com/y'])).toEqual(['b.com/y', 'a.com/x']);
  });

  it('should increase a domain by exactly the number of recorded citations', async () => {
    const cache = createLearningCache(
      createInMemoryLearningCacheRepository({ 'www.epa.gov': 4, 'unece.org': 6 }),
    );
    await cache.load();
    const before = cache.prioritize(['https://unece.org/r', 'https://www.epa.gov/a']);

    for (let i = 0; i < 3; i++) {
      await cache.recordCitations([`https://www.epa.gov/page-${String(i)}`]);
    }

    expect(before).toEqual(['https://unece.org/r', 'https://www.epa.gov/a']);
    expect(cache.count('www.epa.gov')).toBe(7);
    expect(cache.prioritize(['https://unece.org/r', 'https://www.epa.gov/a'])).toEqual([
      'https://www.epa.gov/a',
      'https://unece.org/r',
    ]);
  });

  it('should ignore citations without a domain', async () => {
    const cache = createLearningCache(createInMemoryLearningCacheRepository());

    await cache.recordCitations(['urn:autoreg:static-fallback:safety']);

    expect(cache.snapshot()).toEqual({});
  });

  it('should persist the full mapping', async () => {
    const repository = createInMemoryLearningCacheRepository({ 'unece.org': 2 });
    const cache = createLearningCache(repository);
    await cache.load();

    await cache.recordCitations(['https://www.nhtsa.gov/laws', 'https://unece.org/r']);
    await cache.persist();

    expect(repository.writeCount).toBe(1);
    await expect(repository.read()).resolves.toEqual({ 'unece.org': 3, 'www.nhtsa.gov': 1 });
  });

  it('should not lose updates from concurrent requests', async () => {
    const repository = createInMemoryLearningCacheRepository();
    const cache = createLearningCache(repository);

    await Promise.all(
      Array.from({ length: 10 }, async () => {
        await cache.recordCitations(['https://unece.org/r']);
        await cache.persist();
      }),
    );

    await expect(repository.read()).resolves.toEqual({ 'unece.org': 10 });
  });

  it('should start empty when the repository cannot be read', async () => {
    const failing: LearningCacheRepository = {
      read: () => Promise.reject(new Error('disk on fire')),
      write: () => Promise.resolve(),
    };
    const cache = createLearningCache(failing);

    await cache.load();

    expect(cache.snapshot()).toEqual({});
  });
});
