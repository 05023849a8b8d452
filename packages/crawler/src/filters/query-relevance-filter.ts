import { ContentFilter } from './types.js';
import type { ContentBlock, QueryRelevanceFilterConfig } from './types.js';

const K1 = 1.2;
const B = 0.75;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Okapi BM25 score of every block against the query, treating the blocks of
 * one page as the corpus.
 */
export function bm25Scores(
  query: string,
  blocks: readonly ContentBlock[],
): number[] {
  const queryTerms = [...new Set(tokenize(query))];
  const documents = blocks.map((block) => tokenize(block.text));
  const total = documents.length;
  if (total === 0 || queryTerms.length === 0) {
    return documents.map(() => 0);
  }

  const avgLength =
    documents.reduce((sum, tokens) => sum + tokens.length, 0) / total || 1;

  const idf = new Map<string, number>();
  for (const term of queryTerms) {
    const df = documents.filter((tokens) => tokens.includes(term)).length;
    idf.set(term, Math.log((total - df + 0.5) / (df + 0.5) + 1));
  }

  return documents.map((tokens) => {
    let score = 0;
    for (const term of queryTerms) {
      const tf = tokens.filter((token) => token === term).length;
      if (tf === 0) {
        continue;
      }

      const norm = K1 * (1 - B + (B * tokens.length) / avgLength);
      score += (idf.get(term) ?? 0) * ((tf * (K1 + 1)) / (tf + norm));
    }
    return score;
  });
}

export class QueryRelevanceContentFilter extends ContentFilter {
  readonly name = 'query-relevance';
  readonly config: QueryRelevanceFilterConfig;

  constructor(config: QueryRelevanceFilterConfig) {
    super();
    this.config = config;
  }

  filter(blocks: readonly ContentBlock[]): ContentBlock[] {
    const scores = bm25Scores(this.config.query, blocks);
    return blocks.filter(
      (_, index) => (scores[index] ?? 0) >= this.config.threshold,
    );
  }

  describe(): string {
    return `BM25ContentFilter with query: '${this.config.query}' (threshold: ${this.config.threshold})`;
  }
}
