import type { ContentFilter } from '../filters/types.js';
import type { FetchOutcome } from './types.js';

type EngineType = 'http' | 'custom';

/**
 * Boundary to whatever renders pages. Each instance is one session and is
 * used by one fetch at a time; the engine pool hands them out.
 */
abstract class PageFetchAdapter {
  abstract readonly engineType: EngineType;

  /** Throws CrawlInitializationError when the backend cannot start. */
  async initialize(): Promise<void> {}

  abstract fetch(
    url: string,
    filter: ContentFilter,
    excludedTags: readonly string[],
  ): Promise<FetchOutcome>;

  abstract cleanup(): Promise<void>;
}

export { PageFetchAdapter };
export type { EngineType };
