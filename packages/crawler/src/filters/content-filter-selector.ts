import { PruningContentFilter } from './pruning-filter.js';
import { QueryRelevanceContentFilter } from './query-relevance-filter.js';
import type { ContentFilter, FilterConfig, FilterOptions } from './types.js';

/**
 * A non-empty query with `useQuery` always wins over the pruning options,
 * even when those are set too.
 */
export function selectFilterConfig(options: FilterOptions): FilterConfig {
  const query = options.query.trim();

  if (options.useQuery && query.length > 0) {
    return {
      kind: 'query-relevance',
      query,
      threshold: options.queryThreshold,
    };
  }

  return {
    kind: 'pruning',
    threshold: options.pruningThreshold,
    mode: options.pruningType,
    minWordsPerBlock: options.minWordThreshold,
  };
}

export function buildFilter(config: FilterConfig): ContentFilter {
  switch (config.kind) {
    case 'query-relevance':
      return new QueryRelevanceContentFilter(config);
    case 'pruning':
      return new PruningContentFilter(config);
  }
}
