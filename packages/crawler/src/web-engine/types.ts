import type { ContentFilter } from '../filters/types.js';

type DefaultMetadata = {
  duration: number;
  method: string;
};

type Metadata = DefaultMetadata & Record<string, unknown>;

type FetchSuccess = {
  success: true;
  url: string;
  finalUrl: string;
  title: string;
  /** Filtered ("fit") Markdown, null when the filter kept nothing. */
  primaryDocument: string | null;
  /** Unfiltered Markdown of the whole page. */
  fallbackDocument: string | null;
  links: string[];
  metadata: Metadata;
};

type FetchFailure = {
  success: false;
  url: string;
  errorMessage: string;
  errorCode: 'unexpected' | 'blocked' | 'http-error' | 'timeout';
  metadata: Metadata;
};

type FetchOutcome = FetchSuccess | FetchFailure;

type FetchPageOptions = {
  filter: ContentFilter;
  excludedTags: readonly string[];
};

type ResolvedDocument =
  | { kind: 'fit'; content: string }
  | { kind: 'raw'; content: string }
  | { kind: 'none' };

export type {
  FetchFailure,
  FetchOutcome,
  FetchPageOptions,
  FetchSuccess,
  Metadata,
  ResolvedDocument,
};
