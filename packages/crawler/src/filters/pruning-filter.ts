import { ContentFilter } from './types.js';
import type {
  ContentBlock,
  ContentBlockKind,
  PruningFilterConfig,
} from './types.js';

const KIND_WEIGHT: Record<ContentBlockKind, number> = {
  paragraph: 1,
  list: 0.9,
  code: 0.9,
  quote: 0.9,
  table: 0.8,
  heading: 0.8,
};

// word count at which a block gets the full length factor
const FULL_LENGTH_WORDS = 20;

/**
 * Text density score in [0, 1]: structural weight of the block, penalised by
 * link density and (except for headings) by shortness.
 */
export function densityScore(block: ContentBlock): number {
  const lengthFactor =
    block.kind === 'heading'
      ? 1
      : Math.min(1, block.wordCount / FULL_LENGTH_WORDS);

  return KIND_WEIGHT[block.kind] * (1 - block.linkDensity) * lengthFactor;
}

export class PruningContentFilter extends ContentFilter {
  readonly name = 'pruning';
  readonly config: PruningFilterConfig;

  constructor(config: PruningFilterConfig) {
    super();
    this.config = config;
  }

  filter(blocks: readonly ContentBlock[]): ContentBlock[] {
    const candidates = blocks.filter(
      (block) => block.wordCount >= this.config.minWordsPerBlock,
    );
    if (candidates.length === 0) {
      return [];
    }

    const scored = candidates.map((block) => ({
      block,
      score: densityScore(block),
    }));
    const cut = this.cutLine(scored.map((entry) => entry.score));

    return scored
      .filter((entry) => entry.score >= cut)
      .map((entry) => entry.block);
  }

  describe(): string {
    const { threshold, mode, minWordsPerBlock } = this.config;
    return `PruningContentFilter (threshold: ${threshold}, type: ${mode}, min_words: ${minWordsPerBlock})`;
  }

  /**
   * `fixed` uses the threshold as an absolute score. `dynamic` treats it as
   * the fraction of the page's score distribution to cut away.
   */
  private cutLine(scores: number[]): number {
    if (this.config.mode === 'fixed') {
      return this.config.threshold;
    }

    const sorted = [...scores].sort((a, b) => a - b);
    const index = Math.floor(this.config.threshold * (sorted.length - 1));
    return sorted[index] ?? 0;
  }
}
