/** Words whose presence marks a passage as regulatory prose. */
export const REGULATORY_INDICATORS: readonly string[] = [
  'regulation',
  'directive',
  'standard',
  'requirement',
  'shall',
  'must',
  'compliance',
  'certification',
  'approval',
  'limit',
  'maximum',
  'minimum',
  'article',
  'section',
  'paragraph',
  'amendment',
  'annex',
  'schedule',
];

export const REGULATION_NUMBER_PATTERNS: readonly RegExp[] = [
  /\bregulation\s+(?:\(\w+\)\s+)?(?:no\.?\s*)?\d+/i,
  /\bdirective\s+\d+\/\d+/i,
  /\bstandard\s+(?:no\.?\s*)?\d+/i,
  /\bece[-\s]?r\d+/i,
  /\bfmvss\s*\d+/i,
  /\biso\s*\d+/i,
  /\bsae\s*j\d+/i,
];

export const TECHNICAL_VALUE_PATTERNS: readonly RegExp[] = [
  /\d+(?:\.\d+)?\s*(?:mg\/km|g\/test|dB|%|ppm|bar|kPa|mph|km\/h)/gi,
  /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/g,
  /[€$£¥]\s*\d+/g,
  /\b\d+\s*(?:years?|months?|days?)\b/gi,
];

export const QUERY_CATEGORY_TERMS: Readonly<Record<string, readonly string[]>> = {
  emissions: ['emission', 'exhaust', 'co2', 'nox', 'pollutant'],
  safety: ['safety', 'crash', 'protection', 'airbag', 'seatbelt'],
  fuel: ['fuel', 'gasoline', 'diesel', 'consumption', 'efficiency'],
  electric: ['electric', 'battery', 'charging', 'ev', 'hybrid'],
  autonomous: ['autonomous', 'automated', 'driver assistance', 'adas'],
};

export function citesRegulationNumber(text: string): boolean {
  return REGULATION_NUMBER_PATTERNS.some((pattern) => pattern.test(text));
}

export function tokenizeWords(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Whole-word presence: a single word matches a token or its plural,
 * a phrase matches as a substring of the space-joined token stream.
 */
export function containsTerm(tokens: ReadonlySet<string>, joined: string, term: string): boolean {
  if (term.includes(' ')) {
    return ` ${joined} `.includes(` ${term} `);
  }
  return tokens.has(term) || tokens.has(`${term}s`);
}

export function countIndicators(text: string): number {
  const tokens = new Set(tokenizeWords(text));
  return REGULATORY_INDICATORS.filter((indicator) => tokens.has(indicator) || tokens.has(`${indicator}s`))
    .length;
}
