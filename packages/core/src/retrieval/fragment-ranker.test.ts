import { describe, it, expect } from 'vitest';
import { rankFragments } from './fragment-ranker.js';
import type { FragmentCandidate } from './fragment-ranker.js';

function candidate(sourceUrl: string, relevanceScore?: number, text = 'text'): FragmentCandidate {
  return { text, sourceUrl, sourceTitle: sourceUrl, relevanceScore, origin: 'primary' };
}

describe('rankFragments', () => {
  it('should sort by descending score and keep discovery order on ties', () => {
    const ranked = rankFragments('q', [
      candidate('a', 0.5),
      candidate('b', 1.2),
      candidate('c', 0.5),
      candidate('d', 0.9),
    ]);

    expect(ranked.map((f) => f.sourceUrl)).toEqual(['b', 'd', 'a', 'c']);
  });

  it('should drop fragments at or below the inclusion score', () => {
    const ranked = rankFragments('q', [candidate('a', 0), candidate('b', 0.1), candidate('c', 0.11)]);

    expect(ranked.map((f) => f.sourceUrl)).toEqual(['c']);
  });

  it('should always drop zero scores even with a negative threshold', () => {
    const ranked = rankFragments('q', [candidate('a', 0), candidate('b', 0.05)], {
      minInclusionScore: -1,
    });

    expect(ranked.map((f) => f.sourceUrl)).toEqual(['b']);
  });

  it('should keep static fallback text below the inclusion score', () => {
    const fallback: FragmentCandidate = { ...candidate('urn:autoreg:static-fallback:general', 0.02), origin: 'static' };

    const ranked = rankFragments('q', [candidate('a', 0.05), fallback]);

    expect(ranked.map((f) => f.sourceUrl)).toEqual(['urn:autoreg:static-fallback:general']);
  });

  it('should cap the number of fragments', () => {
    const candidates = [1.0, 0.9, 0.8, 0.7, 0.6, 0.5, 0.4].map((score, i) =>
      candidate(`site-${String(i)}`, score),
    );

    const ranked = rankFragments('q', candidates, { maxFragments: 3 });
    expect(ranked.map((f) => f.sourceUrl)).toEqual(['site-0', 'site-1', 'site-2']);
  });

  it('should score candidates that carry no score', () => {
    const ranked = rankFragments('battery charging', [
      candidate('unrelated', undefined, 'Cookie settings and newsletter signup for visitors.'),
      candidate(
        'related',
        undefined,
        'Battery charging requirements for electric vehicles shall follow Regulation No 100. '.repeat(3),
      ),
    ]);

    expect(ranked).toHaveLength(1);
    expect(ranked[0].sourceUrl).toBe('related');
    expect(ranked[0].relevanceScore).toBeGreaterThan(0.1);
  });
});
