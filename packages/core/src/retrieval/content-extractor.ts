import type { SearchTermSet } from '@autoreg/shared/src/types/regulation.types.js';
import { createChildLogger } from '@autoreg/shared/src/logger.js';
import { citesRegulationNumber, countIndicators } from './regulatory-patterns.js';

const log = createChildLogger('retrieval:content-extractor');

export interface ExtractionOptions {
  readonly maxLength: number;
  readonly sectionThreshold: number;
  readonly paragraphThreshold: number;
  readonly fallbackParagraphs: number;
}

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  maxLength: 3000,
  sectionThreshold: 2.0,
  paragraphThreshold: 1,
  fallbackParagraphs: 3,
};

const DOCUMENT_LINK = /\.(?:pdf|docx?)$/i;

const BOILERPLATE_LINE =
  /^(?:skip to (?:main )?content|home|menu|main menu|navigation|search|share|print|back to top|accept(?: all)? cookies|cookies?|cookie (?:settings|policy)|privacy(?: policy| notice)?|terms (?:of use|and conditions)|legal notice|accessibility|sitemap|follow us|subscribe|newsletter|sign in|log ?in|contact(?: us)?|©|copyright)\b/i;

const MAX_BOILERPLATE_LINE_LENGTH = 80;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Number of distinct search terms occurring as whole words (plural allowed). */
export function countTermHits(text: string, terms: SearchTermSet): number {
  const lower = text.toLowerCase();
  let hits = 0;
  for (const term of terms) {
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(term)}s?(?![\\p{L}\\p{N}])`, 'u');
    if (pattern.test(lower)) {
      hits++;
    }
  }
  return hits;
}

export function scoreSection(text: string, terms: SearchTermSet): number {
  let score = countTermHits(text, terms);
  score += 0.5 * Math.min(countIndicators(text), 4);
  if (citesRegulationNumber(text)) {
    score += 1.0;
  }
  return score;
}

export function splitSections(raw: string): string[] {
  const sections: string[] = [];
  let current: string[] = [];

  for (const line of raw.split(/\r?\n/)) {
    if (/^\s{0,3}#{1,6}\s/.test(line) && current.some((l) => l.trim() !== '')) {
      sections.push(current.join('\n'));
      current = [];
    }
    current.push(line);
  }
  if (current.some((l) => l.trim() !== '')) {
    sections.push(current.join('\n'));
  }
  return sections;
}

export function splitParagraphs(raw: string): string[] {
  return raw.split(/\r?\n\s*\r?\n/).filter((paragraph) => paragraph.trim() !== '');
}

function replaceLinks(text: string): string {
  return text.replace(/\[([^\]]*)\]\(([^)\s]*)(?:\s+"[^"]*")?\)/g, (_match, label: string, url: string) =>
    DOCUMENT_LINK.test(url) ? `${label} (${url})` : label,
  );
}

function removeStrayUrls(text: string): string {
  return text.replace(/(?<!\()\bhttps?:\/\/[^\s)]+/g, (url) => {
    const bare = url.replace(/[.,;:!?]+$/, '');
    return DOCUMENT_LINK.test(bare) ? url : url.slice(bare.length);
  });
}

function isBoilerplate(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length <= MAX_BOILERPLATE_LINE_LENGTH && BOILERPLATE_LINE.test(trimmed);
}

/**
 * Strips markdown syntax, navigation chrome and stray URLs from scraped text.
 * Links to .pdf/.doc/.docx documents are kept. Applying it twice changes nothing.
 */
export function cleanText(text: string): string {
  let cleaned = text.replace(/!\[[^\]]*\]\([^)]*\)/g, '');
  cleaned = replaceLinks(cleaned);
  cleaned = cleaned.replace(/^\s{0,3}#{1,6}\s*/gm, '');
  cleaned = cleaned.replace(/(\*\*|__)(.+?)\1/g, '$2');
  cleaned = cleaned.replace(/\*([^*\n]+)\*/g, '$1');
  cleaned = removeStrayUrls(cleaned);

  const lines = cleaned
    .split(/\r?\n/)
    .filter((line) => !isBoilerplate(line))
    .map((line) =>
      line
        .replace(/([!?.,;:*=|~_-])\1{2,}/g, '$1')
        .replace(/[ \t]+/g, ' ')
        .trim(),
    );

  return lines
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Shortens `text` to at most `maxLength` UTF-16 units, cutting at the last
 * whitespace inside the budget. A single over-long word is cut without
 * splitting a surrogate pair.
 */
export function truncateAtWordBoundary(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  if (/\s/.test(text.charAt(maxLength))) {
    return text.slice(0, maxLength).trimEnd();
  }

  const head = text.slice(0, maxLength);
  const lastSpace = head.search(/\s\S*$/);
  if (lastSpace > 0) {
    return head.slice(0, lastSpace).trimEnd();
  }

  const lastCode = head.charCodeAt(head.length - 1);
  return lastCode >= 0xd800 && lastCode <= 0xdbff ? head.slice(0, -1) : head;
}

function concatenateWithinBudget(parts: readonly string[], maxLength: number): string {
  let result = '';
  for (const part of parts) {
    if (part === '') {
      continue;
    }
    if (result === '') {
      result = truncateAtWordBoundary(part, maxLength);
      continue;
    }
    const next = `${result}\n\n${part}`;
    if (next.length > maxLength) {
      break;
    }
    result = next;
  }
  return result;
}

/**
 * Reduces a scraped page to the passages most relevant to the search terms.
 * Sections are admitted by a cheap regulatory score; when none qualifies,
 * paragraphs mentioning the terms are used, and failing that the first few
 * paragraphs of the page.
 */
export function extractRelevantContent(
  raw: string,
  terms: SearchTermSet,
  query: string,
  options: Partial<ExtractionOptions> = {},
): string {
  const opts: ExtractionOptions = { ...DEFAULT_EXTRACTION_OPTIONS, ...options };
  if (raw.trim() === '') {
    return '';
  }

  const admitted = splitSections(raw)
    .map((section, index) => ({ section, index, score: scoreSection(section, terms) }))
    .filter((entry) => entry.score >= opts.sectionThreshold)
    .sort((a, b) => b.score - a.score || a.index - b.index);

  if (admitted.length > 0) {
    log.debug({ query, sections: admitted.length }, 'Sections admitted');
    return concatenateWithinBudget(
      admitted.map((entry) => cleanText(entry.section)),
      opts.maxLength,
    );
  }

  const paragraphs = splitParagraphs(raw);
  const matching = paragraphs.filter(
    (paragraph) => countTermHits(paragraph, terms) >= opts.paragraphThreshold,
  );
  if (matching.length > 0) {
    log.debug({ query, paragraphs: matching.length }, 'No section qualified, using paragraphs');
    return concatenateWithinBudget(matching.map(cleanText), opts.maxLength);
  }

  log.debug({ query }, 'No paragraph matched, using leading paragraphs');
  return concatenateWithinBudget(
    paragraphs.slice(0, opts.fallbackParagraphs).map(cleanText),
    opts.maxLength,
  );
}
