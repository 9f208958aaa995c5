import { clamp } from '@autoreg/shared/src/utils/math.js';
import { tfidfSimilarity } from './tfidf.js';
import {
  QUERY_CATEGORY_TERMS,
  TECHNICAL_VALUE_PATTERNS,
  citesRegulationNumber,
  containsTerm,
  countIndicators,
  tokenizeWords,
} from './regulatory-patterns.js';

export interface ScoringOptions {
  readonly tfidfWeight: number;
  readonly keywordWeight: number;
  readonly maxDensityBonus: number;
  readonly regulationNumberBonus: number;
  readonly technicalValueBonus: number;
  readonly maxTechnicalBonus: number;
  readonly categoryTermBonus: number;
  readonly maxCategoryBonus: number;
  readonly shortTextLength: number;
  readonly veryShortTextLength: number;
  readonly shortTextPenalty: number;
  readonly veryShortTextPenalty: number;
  readonly maxScore: number;
}

export const DEFAULT_SCORING_OPTIONS: ScoringOptions = {
  tfidfWeight: 1.0,
  keywordWeight: 0.5,
  maxDensityBonus: 0.3,
  regulationNumberBonus: 0.2,
  technicalValueBonus: 0.1,
  maxTechnicalBonus: 0.2,
  categoryTermBonus: 0.05,
  maxCategoryBonus: 0.15,
  shortTextLength: 200,
  veryShortTextLength: 100,
  shortTextPenalty: 0.7,
  veryShortTextPenalty: 0.4,
  maxScore: 2.0,
};

const OVERLAP_STOP_WORDS: ReadonlySet<string> = new Set([
  'the',
  'a',
  'an',
  'and',
  'or',
  'but',
  'in',
  'on',
  'at',
  'to',
  'for',
  'of',
  'with',
  'by',
  'is',
  'are',
  'was',
  'were',
  'what',
  'which',
  'how',
  'when',
  'where',
  'who',
  'why',
]);

function contentWords(text: string): Set<string> {
  return new Set(tokenizeWords(text).filter((word) => !OVERLAP_STOP_WORDS.has(word)));
}

export function keywordOverlap(query: string, text: string): number {
  const queryWords = contentWords(query);
  if (queryWords.size === 0) {
    return 0;
  }
  const textWords = contentWords(text);
  let shared = 0;
  for (const word of queryWords) {
    if (textWords.has(word)) {
      shared++;
    }
  }
  return shared / queryWords.size;
}

function countTechnicalValues(text: string): number {
  let occurrences = 0;
  for (const pattern of TECHNICAL_VALUE_PATTERNS) {
    occurrences += text.match(pattern)?.length ?? 0;
  }
  return occurrences;
}

function mentionsCategory(queryTokens: ReadonlySet<string>, category: string): boolean {
  const singular = category.endsWith('s') ? category.slice(0, -1) : category;
  return queryTokens.has(category) || queryTokens.has(singular) || queryTokens.has(`${category}s`);
}

function categoryBonus(query: string, text: string, options: ScoringOptions): number {
  const queryTokens = new Set(tokenizeWords(query));
  const textTokenList = tokenizeWords(text);
  const textTokens = new Set(textTokenList);
  const joined = textTokenList.join(' ');

  let bonus = 0;
  for (const [category, terms] of Object.entries(QUERY_CATEGORY_TERMS)) {
    if (!mentionsCategory(queryTokens, category)) {
      continue;
    }
    const hits = terms.filter((term) => containsTerm(textTokens, joined, term)).length;
    bonus += Math.min(hits * options.categoryTermBonus, options.maxCategoryBonus);
  }
  return bonus;
}

/**
 * Scores how well `text` answers `query`, in [0, options.maxScore].
 * Lexical similarity is combined with bonuses for regulatory language,
 * cited regulation numbers, technical limits and query-category vocabulary,
 * then scaled down for short passages.
 */
export function scoreRelevance(
  query: string,
  text: string,
  options: Partial<ScoringOptions> = {},
): number {
  const opts: ScoringOptions = { ...DEFAULT_SCORING_OPTIONS, ...options };
  if (text.trim() === '') {
    return 0;
  }

  let total = opts.tfidfWeight * tfidfSimilarity(query, text);
  total += opts.keywordWeight * keywordOverlap(query, text);
  total += Math.min(countIndicators(text) / 10, opts.maxDensityBonus);

  if (citesRegulationNumber(text)) {
    total += opts.regulationNumberBonus;
  }

  total += Math.min(countTechnicalValues(text) * opts.technicalValueBonus, opts.maxTechnicalBonus);
  total += categoryBonus(query, text, opts);

  if (text.length < opts.veryShortTextLength) {
    total *= opts.veryShortTextPenalty;
  } else if (text.length < opts.shortTextLength) {
    total *= opts.shortTextPenalty;
  }

  return clamp(total, 0, opts.maxScore);
}
