import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { RegulationMetadata } from '@autoreg/shared/src/types/regulation.types.js';

const PATTERNS_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'data',
  'metadata-patterns.json',
);

const PatternTableSchema = z.record(z.string(), z.array(z.string()).min(1));

const MetadataPatternsSchema = z.object({
  regions: PatternTableSchema,
  categories: PatternTableSchema,
});

type CompiledTable = readonly (readonly [string, readonly RegExp[]])[];

// Bare acronyms (US, LED) only match in upper case.
function compilePattern(source: string): RegExp {
  return new RegExp(source, /^\\b[A-Z0-9]+\\b$/.test(source) ? '' : 'i');
}

function compileTable(table: Record<string, string[]>): CompiledTable {
  return Object.entries(table).map(([name, sources]) => [name, sources.map(compilePattern)]);
}

const patterns = MetadataPatternsSchema.parse(JSON.parse(readFileSync(PATTERNS_PATH, 'utf-8')));
const REGION_PATTERNS = compileTable(patterns.regions);
const CATEGORY_PATTERNS = compileTable(patterns.categories);

const REGULATION_NUMBER_PATTERNS: readonly RegExp[] = [
  /\b(?:regulation|directive|standard)\s+(?:\((?:EC|EU|EEC)\)\s+)?(?:no\.?\s*)?\d+(?:\/\d+)*/gi,
  /\b(?:ECE[-\s]?R|FMVSS|ISO|SAE[-\s]?J|ASTM)\s*\d+/gi,
  /\bUN(?:ECE)?\s+(?:regulation\s+)?(?:no\.?\s*)?\d+/gi,
  /\bCFR\s*\d+\.\d+/gi,
];

const LIMIT_PATTERNS: readonly RegExp[] = [
  /\b\d+(?:\.\d+)?\s*(?:mg\/km|g\/km|g\/test|dB|ppm|bar|kPa|mph|km\/h|mm|cm|kg|tonnes?)(?![a-z])/gi,
  /\b\d+(?:\.\d+)?\s*%/g,
  /\b(?:maximum|minimum|limited to|limit of|not\s+exceed(?:ing)?|less\s+than|greater\s+than)\s+\d+(?:\.\d+)?/gi,
  /[€$£¥]\s*\d+(?:,\d{3})*(?:\.\d{2})?/g,
];

const MONTH = '(?:January|February|March|April|May|June|July|August|September|October|November|December)';

const COMPLIANCE_DATE_PATTERNS: readonly RegExp[] = [
  /\b(?:effective|applicable|mandatory|enforced?)\s+(?:from|by|on|after)\s+([^,\n.]{4,30})/gi,
  /\b(?:deadline|due\s+date|compliance\s+date)\s*:?\s*([^,\n.]{4,30})/gi,
  /\b(?:phase[-\s]in|implementation)\s+(?:period|date|schedule)\s*:?\s*([^,\n.]{4,50})/gi,
  new RegExp(
    `\\b(?:from|by|before|after|until)\\s+(\\d{1,2}\\s+${MONTH}\\s+\\d{4}|${MONTH}\\s+\\d{1,2},?\\s+\\d{4})`,
    'gi',
  ),
];

function normalize(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function unique(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const normalized = normalize(value);
    if (normalized !== '') {
      seen.add(normalized);
    }
  }
  return [...seen];
}

function collectMatches(text: string, regexes: readonly RegExp[], group = 0): string[] {
  const found: string[] = [];
  for (const regex of regexes) {
    for (const match of text.matchAll(regex)) {
      const value = match[group] ?? match[0];
      found.push(value);
    }
  }
  return found;
}

function matchTable(text: string, table: CompiledTable): string[] {
  return table
    .filter(([, regexes]) => regexes.some((regex) => regex.test(text)))
    .map(([name]) => name);
}

export function extractRegulationMetadata(text: string): RegulationMetadata {
  return {
    regulationNumbers: unique(collectMatches(text, REGULATION_NUMBER_PATTERNS)),
    regions: matchTable(text, REGION_PATTERNS),
    categories: matchTable(text, CATEGORY_PATTERNS),
    limits: unique(collectMatches(text, LIMIT_PATTERNS)),
    complianceDates: unique(collectMatches(text, COMPLIANCE_DATE_PATTERNS, 1)),
  };
}

export function mergeMetadata(items: readonly RegulationMetadata[]): RegulationMetadata {
  return {
    regulationNumbers: unique(items.flatMap((m) => m.regulationNumbers)),
    regions: unique(items.flatMap((m) => m.regions)),
    categories: unique(items.flatMap((m) => m.categories)),
    limits: unique(items.flatMap((m) => m.limits)),
    complianceDates: unique(items.flatMap((m) => m.complianceDates)),
  };
}

/**
 * Follow-up searches for the regions, categories and regulation numbers a
 * query asks about that none of the retrieved texts covers.
 */
export function suggestRefinements(query: string, texts: readonly string[]): string[] {
  const asked = extractRegulationMetadata(query);
  const covered = mergeMetadata(texts.map(extractRegulationMetadata));

  const missingRegions = asked.regions.filter((r) => !covered.regions.includes(r));
  const missingCategories = asked.categories.filter((c) => !covered.categories.includes(c));
  const missingNumbers = asked.regulationNumbers.filter(
    (n) => !covered.regulationNumbers.some((c) => c.toLowerCase() === n.toLowerCase()),
  );

  const suggestions: string[] = [];
  for (const region of missingRegions) {
    for (const category of asked.categories) {
      suggestions.push(`${region} ${category} regulations`);
    }
  }
  for (const category of missingCategories) {
    suggestions.push(normalize(`${category} regulations ${asked.regions.join(' ')}`));
  }
  for (const number of missingNumbers) {
    suggestions.push(`${number} automotive requirements`);
  }
  return unique(suggestions);
}
