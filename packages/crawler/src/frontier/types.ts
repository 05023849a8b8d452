type FrontierEntry = Readonly<{
  url: string;
  depth: number;
  discoveredFrom: string | null;
}>;

type FrontierState = 'idle' | 'running' | 'completed' | 'limit-reached' | 'cancelled';

type FrontierOptions = {
  maxDepth: number;
  maxPages: number;
  includeExternal: boolean;
  concurrency: number;
  signal?: AbortSignal;
};

export type { FrontierEntry, FrontierOptions, FrontierState };
