import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { cosineSimilarity } from '@autoreg/shared/src/utils/math.js';

const STOP_WORDS_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'data',
  'english-stop-words.json',
);

const ENGLISH_STOP_WORDS: ReadonlySet<string> = new Set(
  z.array(z.string()).parse(JSON.parse(readFileSync(STOP_WORDS_PATH, 'utf-8'))),
);

export function tokenizeForTfidf(text: string): string[] {
  const tokens = text.toLowerCase().match(/\b\w\w+\b/g) ?? [];
  return tokens.filter((token) => !ENGLISH_STOP_WORDS.has(token));
}

function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * TF-IDF weight vectors for a small corpus: raw counts times the smoothed
 * inverse document frequency `ln((1 + n) / (1 + df)) + 1`.
 */
export function buildTfidfVectors(documents: readonly string[]): Map<string, number>[] {
  const counts = documents.map((doc) => countTerms(tokenizeForTfidf(doc)));
  const documentFrequency = new Map<string, number>();
  for (const termCounts of counts) {
    for (const term of termCounts.keys()) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const n = documents.length;
  return counts.map((termCounts) => {
    const vector = new Map<string, number>();
    for (const [term, count] of termCounts) {
      const df = documentFrequency.get(term) ?? 0;
      vector.set(term, count * (Math.log((1 + n) / (1 + df)) + 1));
    }
    return vector;
  });
}

/** Cosine similarity of the query and text over the two-document corpus. */
export function tfidfSimilarity(query: string, text: string): number {
  const [queryVector, textVector] = buildTfidfVectors([query, text]);
  return cosineSimilarity(queryVector, textVector);
}
