import type { SearchTermSet } from '@autoreg/shared/src/types/regulation.types.js';

const QUERY_STOP_WORDS: ReadonlySet<string> = new Set([
  'what',
  'is',
  'are',
  'the',
  'for',
  'a',
  'an',
  'in',
  'on',
  'about',
  'how',
  'can',
  'do',
  'does',
]);

const REGULATORY_VOCABULARY: readonly string[] = [
  'regulation',
  'standard',
  'directive',
  'requirement',
  'law',
  'homologation',
  'type approval',
];

const REGION_NAMES: readonly string[] = [
  'eu',
  'european',
  'us',
  'united states',
  'uk',
  'japan',
  'china',
  'global',
  'international',
];

// ECE-R100, GB-1589, FMVSS-208
const REGULATION_CODE_PATTERN = /\b[A-Z]{1,5}-[A-Z]?\d{1,4}\b/g;

function stripPunctuation(token: string): string {
  return token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
}

/**
 * Derives the search vocabulary for a query. The fixed regulatory and
 * region vocabulary is always included, so the result is never empty.
 */
export function extractSearchTerms(query: string): SearchTermSet {
  const terms = new Set<string>();

  for (const raw of query.split(/\s+/)) {
    const token = stripPunctuation(raw.toLowerCase());
    if (token.length > 2 && !QUERY_STOP_WORDS.has(token)) {
      terms.add(token);
    }
  }

  for (const term of REGULATORY_VOCABULARY) {
    terms.add(term);
  }
  for (const region of REGION_NAMES) {
    terms.add(region);
  }

  for (const match of query.matchAll(REGULATION_CODE_PATTERN)) {
    terms.add(match[0].toLowerCase());
  }

  return terms;
}
