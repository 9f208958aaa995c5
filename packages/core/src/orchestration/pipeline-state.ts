import { Annotation } from '@langchain/langgraph';
import type {
  AnswerResult,
  Fragment,
  SearchTermSet,
  WebsiteSelection,
} from '@autoreg/shared/src/types/regulation.types.js';
import type { SessionContext } from '@autoreg/shared/src/types/session.types.js';
import type { NoDataFoundError, SynthesisError } from '@autoreg/shared/src/utils/errors.js';
import type { SourceFetchResult } from '../sources/source-fetcher.js';

export type PipelineFailure =
  | { readonly kind: 'no_data'; readonly error: NoDataFoundError }
  | { readonly kind: 'synthesis'; readonly error: SynthesisError };

export const PipelineGraphAnnotation = Annotation.Root({
  session: Annotation<SessionContext>,
  query: Annotation<string>,
  searchTerms: Annotation<SearchTermSet | undefined>,
  selection: Annotation<WebsiteSelection | undefined>,
  prioritizedUrls: Annotation<readonly string[] | undefined>,
  fetchResult: Annotation<SourceFetchResult | undefined>,
  rankedFragments: Annotation<readonly Fragment[] | undefined>,
  answer: Annotation<AnswerResult | undefined>,
  failure: Annotation<PipelineFailure | undefined>,
});

export type PipelineGraphState = typeof PipelineGraphAnnotation.State;
