import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { inferCategory } from '../retrieval/query-classifier.js';

export type StaticFallbackTopic = 'emissions' | 'safety' | 'homologation' | 'general';

export const STATIC_FALLBACK_URN_PREFIX = 'urn:autoreg:static-fallback:';

const StaticTextSchema = z.object({
  title: z.string().min(1),
  text: z.string().min(200),
});

const StaticFallbackFileSchema = z.object({
  emissions: StaticTextSchema,
  safety: StaticTextSchema,
  homologation: StaticTextSchema,
  general: StaticTextSchema,
});

const STATIC_FALLBACK_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'data',
  'static-fallback.json',
);

const STATIC_TEXTS = StaticFallbackFileSchema.parse(
  JSON.parse(readFileSync(STATIC_FALLBACK_PATH, 'utf-8')),
);

export interface StaticFallbackText {
  readonly topic: StaticFallbackTopic;
  readonly text: string;
  readonly sourceUrl: string;
  readonly sourceTitle: string;
}

export function selectFallbackTopic(query: string): StaticFallbackTopic {
  switch (inferCategory(query)) {
    case 'Emissions':
      return 'emissions';
    case 'Safety':
      return 'safety';
    case 'Homologation':
      return 'homologation';
    default:
      return 'general';
  }
}

/** Canned advisory text for the query's topic, used when no source yielded content. */
export function staticFallbackFor(query: string): StaticFallbackText {
  const topic = selectFallbackTopic(query);
  const entry = STATIC_TEXTS[topic];
  return {
    topic,
    text: entry.text,
    sourceUrl: `${STATIC_FALLBACK_URN_PREFIX}${topic}`,
    sourceTitle: entry.title,
  };
}
