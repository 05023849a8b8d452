type ErrorKind =
  | 'fetch-failure'
  | 'extraction-failure'
  | 'sitemap-unreachable'
  | 'sitemap-parse-error'
  | 'persistence-error'
  | 'reconciliation-gap';

/** Error kinds that can end up on a PageResult. */
type PageErrorKind = Extract<
  ErrorKind,
  'fetch-failure' | 'extraction-failure' | 'persistence-error' | 'reconciliation-gap'
>;

const PAGE_ERROR_KINDS: readonly PageErrorKind[] = [
  'fetch-failure',
  'extraction-failure',
  'persistence-error',
  'reconciliation-gap',
];

function isPageErrorKind(value: unknown): value is PageErrorKind {
  return PAGE_ERROR_KINDS.some((kind) => kind === value);
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised when the automation backend cannot be started. This is the only
 * failure that aborts a whole run.
 */
class CrawlInitializationError extends Error {
  readonly code = 'initialization-failure' as const;
  readonly engine: string;
  readonly reason: string;

  constructor(engine: string, reason: string) {
    super(`Crawler initialization failed (${engine}): ${reason}`);
    this.name = 'CrawlInitializationError';
    this.engine = engine;
    this.reason = reason;
  }
}

class ConfigError extends Error {
  readonly code = 'invalid-config' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

class WorkerFatalError extends Error {
  readonly code = 'worker-fatal' as const;
  readonly workerId: number;

  constructor(workerId: number, reason: string) {
    super(`Worker ${workerId} failed: ${reason}`);
    this.name = 'WorkerFatalError';
    this.workerId = workerId;
  }
}

export type { ErrorKind, PageErrorKind };
export {
  CrawlInitializationError,
  ConfigError,
  WorkerFatalError,
  isPageErrorKind,
  toErrorMessage,
};
