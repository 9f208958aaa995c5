export type Region = 'US' | 'EU' | 'Japan' | 'China' | 'UK' | 'India' | 'Australia' | 'Global';

export type RegulationCategory =
  | 'Emissions'
  | 'Safety'
  | 'Homologation'
  | 'Electric Vehicles'
  | 'Fuel'
  | 'Noise'
  | 'Lighting'
  | 'General';

const REGION_KEYWORDS: readonly (readonly [Exclude<Region, 'Global'>, readonly string[]])[] = [
  ['US', ['us', 'usa', 'united states', 'america', 'american']],
  ['EU', ['eu', 'europe', 'european']],
  ['Japan', ['japan', 'japanese']],
  ['China', ['china', 'chinese']],
  ['UK', ['uk', 'britain', 'british', 'united kingdom']],
  ['India', ['india', 'indian']],
  ['Australia', ['australia', 'australian']],
];

const CATEGORY_KEYWORDS: readonly (readonly [
  Exclude<RegulationCategory, 'General'>,
  readonly string[],
])[] = [
  ['Emissions', ['emission', 'exhaust', 'co2', 'pollution', 'nox']],
  ['Safety', ['safety', 'crash', 'protection', 'airbag']],
  ['Homologation', ['homologation', 'type approval', 'certification']],
  ['Electric Vehicles', ['electric', 'ev', 'battery']],
  ['Fuel', ['fuel', 'gasoline', 'diesel']],
  ['Noise', ['noise', 'sound']],
  ['Lighting', ['light', 'headlight', 'lamp', 'illumination']],
];

const TOPIC_KEYWORDS: readonly (readonly [string, string])[] = [
  ['emission', 'Emissions Standards'],
  ['safety', 'Safety Requirements'],
  ['fuel', 'Fuel Efficiency'],
  ['electric', 'Electric Vehicles'],
  ['autonomous', 'Autonomous Driving'],
  ['homologation', 'Homologation'],
  ['type approval', 'Type Approval'],
  ['certification', 'Certification'],
  ['recall', 'Recalls'],
  ['import', 'Import Regulations'],
];

export const GENERAL_TOPIC = 'General';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive match that also accepts a plural `s`. */
export function mentionsKeyword(text: string, keyword: string): boolean {
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}s?(?![\\p{L}\\p{N}])`, 'iu');
  return pattern.test(text);
}

export function inferRegion(query: string): Region {
  for (const [region, keywords] of REGION_KEYWORDS) {
    if (keywords.some((keyword) => mentionsKeyword(query, keyword))) {
      return region;
    }
  }
  return 'Global';
}

export function inferCategory(query: string): RegulationCategory {
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => mentionsKeyword(query, keyword))) {
      return category;
    }
  }
  return 'General';
}

/** First topic whose keyword appears in the query or, failing that, in the answer. */
export function classifyTopic(query: string, answer: string): string {
  for (const [keyword, topic] of TOPIC_KEYWORDS) {
    if (mentionsKeyword(query, keyword) || mentionsKeyword(answer, keyword)) {
      return topic;
    }
  }
  return GENERAL_TOPIC;
}
