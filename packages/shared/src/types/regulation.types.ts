export interface WebsiteCatalogEntry {
  readonly key: string;
  readonly url: string;
}

export type SearchTermSet = ReadonlySet<string>;

export type FragmentOrigin = 'primary' | 'secondary' | 'static';

export interface Fragment {
  readonly text: string;
  readonly sourceUrl: string;
  readonly sourceTitle: string;
  readonly relevanceScore: number;
  readonly origin: FragmentOrigin;
}

export interface AnswerResult {
  readonly text: string;
  /** Positions in the fragment list handed to the synthesizer. May be out of range. */
  readonly citedFragmentIndices: readonly number[];
}

export type SelectionStrategy = 'llm' | 'heuristic';

export interface WebsiteSelection {
  readonly urls: readonly string[];
  readonly strategy: SelectionStrategy;
}

export interface RegulationMetadata {
  readonly regulationNumbers: readonly string[];
  readonly regions: readonly string[];
  readonly categories: readonly string[];
  readonly limits: readonly string[];
  readonly complianceDates: readonly string[];
}

export interface Citation {
  readonly index: number;
  readonly url: string;
  readonly title: string;
}
