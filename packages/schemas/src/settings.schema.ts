import { z } from 'zod';

const RetrievalSettingsSchema = z.object({
  maxSitesPerQuery: z.number().int().min(1).max(10).default(3),
  /** Below this many primary fragments the secondary database is consulted. */
  minPrimaryFragments: z.number().int().min(0).default(2),
  minSubstantialContentLength: z.number().int().min(0).default(100),
  fetchConcurrency: z.number().int().min(1).max(10).default(1),
  scrapeTimeoutMs: z.number().int().positive().default(30_000),
  secondaryTimeoutMs: z.number().int().positive().default(15_000),
  maxSecondaryResults: z.number().int().min(1).default(5),
  enableStaticFallback: z.boolean().default(true),
});

const ExtractionSettingsSchema = z.object({
  maxLength: z.number().int().positive().default(3000),
  sectionThreshold: z.number().min(0).default(2.0),
  paragraphThreshold: z.number().min(0).default(1),
  fallbackParagraphs: z.number().int().min(1).default(3),
});

const ScoringSettingsSchema = z.object({
  minInclusionScore: z.number().min(0).default(0.1),
  maxFragmentsForSynthesis: z.number().int().min(1).default(5),
  maxScore: z.number().positive().default(2.0),
  shortTextLength: z.number().int().min(0).default(200),
  veryShortTextLength: z.number().int().min(0).default(100),
  shortTextPenalty: z.number().min(0).max(1).default(0.7),
  veryShortTextPenalty: z.number().min(0).max(1).default(0.4),
});

const SynthesisSettingsSchema = z.object({
  temperature: z.number().min(0).max(2).default(0.1),
  maxOutputTokens: z.number().int().positive().default(2048),
  selectionTemperature: z.number().min(0).max(2).default(0.1),
  selectionMaxOutputTokens: z.number().int().positive().default(100),
});

export const SettingsSchema = z.object({
  $schema: z.string().optional(),
  retrieval: RetrievalSettingsSchema.default({}),
  extraction: ExtractionSettingsSchema.default({}),
  scoring: ScoringSettingsSchema.default({}),
  synthesis: SynthesisSettingsSchema.default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type RetrievalSettings = z.infer<typeof RetrievalSettingsSchema>;
export type ExtractionSettings = z.infer<typeof ExtractionSettingsSchema>;
export type ScoringSettings = z.infer<typeof ScoringSettingsSchema>;
export type SynthesisSettings = z.infer<typeof SynthesisSettingsSchema>;

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}
