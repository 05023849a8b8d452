type PruningMode = 'fixed' | 'dynamic';

type PruningFilterConfig = {
  kind: 'pruning';
  threshold: number;
  mode: PruningMode;
  minWordsPerBlock: number;
};

type QueryRelevanceFilterConfig = {
  kind: 'query-relevance';
  query: string;
  threshold: number;
};

type FilterConfig = PruningFilterConfig | QueryRelevanceFilterConfig;

type ContentBlockKind =
  | 'heading'
  | 'paragraph'
  | 'list'
  | 'table'
  | 'code'
  | 'quote';

/** One structural block of a page, already rendered as Markdown. */
type ContentBlock = {
  kind: ContentBlockKind;
  markdown: string;
  text: string;
  wordCount: number;
  /** Share of the block's characters that sit inside links, 0..1. */
  linkDensity: number;
};

/** Filter inputs as they appear in the run configuration. */
type FilterOptions = {
  pruningThreshold: number;
  pruningType: PruningMode;
  minWordThreshold: number;
  useQuery: boolean;
  query: string;
  queryThreshold: number;
};

/**
 * Opaque handle handed to the page fetch adapter. Reduces the blocks of a
 * page to the "fit" subset.
 */
abstract class ContentFilter {
  abstract readonly name: string;
  abstract readonly config: FilterConfig;
  abstract filter(blocks: readonly ContentBlock[]): ContentBlock[];
  abstract describe(): string;
}

export type {
  ContentBlock,
  ContentBlockKind,
  FilterConfig,
  FilterOptions,
  PruningFilterConfig,
  PruningMode,
  QueryRelevanceFilterConfig,
};
export { ContentFilter };
