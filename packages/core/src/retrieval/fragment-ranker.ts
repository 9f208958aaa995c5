import type { Fragment } from '@autoreg/shared/src/types/regulation.types.js';
import { scoreRelevance } from './relevance-scorer.js';
import type { ScoringOptions } from './relevance-scorer.js';

export type FragmentCandidate = Omit<Fragment, 'relevanceScore'> & {
  readonly relevanceScore?: number;
};

export interface RankingOptions {
  readonly minInclusionScore: number;
  readonly maxFragments: number;
  readonly scoring?: Partial<ScoringOptions>;
}

export const DEFAULT_RANKING_OPTIONS: RankingOptions = {
  minInclusionScore: 0.1,
  maxFragments: 5,
};

/**
 * Scores unscored candidates, drops those at or below the inclusion score,
 * and returns the best `maxFragments` in descending score order.
 * Equal scores keep discovery order. Static fallback text is the last
 * resort of the retrieval chain and is kept whatever it scores.
 */
export function rankFragments(
  query: string,
  candidates: readonly FragmentCandidate[],
  options: Partial<RankingOptions> = {},
): Fragment[] {
  const opts: RankingOptions = { ...DEFAULT_RANKING_OPTIONS, ...options };
  const threshold = Math.max(opts.minInclusionScore, 0);

  const scored: Fragment[] = candidates.map((candidate) => ({
    ...candidate,
    relevanceScore:
      candidate.relevanceScore ?? scoreRelevance(query, candidate.text, opts.scoring),
  }));

  return scored
    .filter((fragment) => fragment.origin === 'static' || fragment.relevanceScore > threshold)
    .sort((a, b) => b.relevanceScore - a.relevanceScore)
    .slice(0, opts.maxFragments);
}
