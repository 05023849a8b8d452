import { createLogger, type Logger } from '@workspace/logger';
import { toErrorMessage, type PageErrorKind } from '../errors/crawl-errors.js';
import type { CrawlMetrics } from '../observability/metrics.js';
import type { ResultStore } from '../storage/result-store.js';
import { resolveDocument } from '../web-engine/document-policy.js';
import type { EnginePool } from '../web-engine/engine-pool.js';
import type { FetchOutcome, FetchPageOptions } from '../web-engine/types.js';
import { failureResult, successResult } from './page-result.js';
import type { EventSink, PageVisitor, ProcessedPage } from './types.js';

type PageProcessorDeps = FetchPageOptions & {
  pool: EnginePool;
  store: ResultStore;
  metrics: CrawlMetrics;
  emit: EventSink;
  logger?: Logger;
};

/**
 * Fetch, document choice and persistence of one URL. Every call yields a
 * result; only a backend that cannot start makes it throw.
 */
export class PageProcessor implements PageVisitor {
  private readonly deps: PageProcessorDeps;
  private readonly log: Logger;

  constructor(deps: PageProcessorDeps) {
    this.deps = deps;
    this.log = deps.logger ?? createLogger('PageProcessor');
  }

  async visit(url: string, depth: number): Promise<ProcessedPage> {
    const { metrics, emit } = this.deps;
    emit({ type: 'scrape-started', url });
    metrics.increment('requests.total');

    const outcome = await metrics.time('fetch', () => this.fetch(url));
    if (!outcome.success) {
      metrics.increment('requests.failed');
      return this.fail(url, depth, 'fetch-failure', outcome.errorMessage);
    }
    metrics.increment('requests.success');

    const document = resolveDocument(outcome);
    if (document.kind === 'none') {
      return {
        ...this.fail(url, depth, 'extraction-failure', 'No markdown content generated'),
        links: outcome.links,
        finalUrl: outcome.finalUrl,
      };
    }
    this.log.debug(`Using ${document.kind} document (${document.content.length} chars) for ${url}`);

    const persisted = await metrics.time('persist', () =>
      this.deps.store.persist(url, document.content),
    );
    if (!persisted.ok) {
      return {
        ...this.fail(url, depth, 'persistence-error', persisted.error.message),
        links: outcome.links,
        finalUrl: outcome.finalUrl,
      };
    }

    metrics.increment('documents.saved');
    metrics.increment(`documents.${document.kind}`);
    emit({ type: 'save-succeeded', url, path: persisted.savedPath });

    return {
      result: successResult({
        url,
        depth,
        content: document.content,
        documentKind: document.kind,
        savedPath: persisted.savedPath,
        byteLength: persisted.byteLength,
      }),
      links: outcome.links,
      finalUrl: outcome.finalUrl,
    };
  }

  private async fetch(url: string): Promise<FetchOutcome> {
    const { pool, filter, excludedTags } = this.deps;
    const adapter = await pool.acquire();
    try {
      return await adapter.fetch(url, filter, excludedTags);
    } catch (error) {
      return {
        success: false,
        url,
        errorMessage: toErrorMessage(error),
        errorCode: 'unexpected',
        metadata: { duration: 0, method: adapter.engineType },
      };
    } finally {
      pool.release(adapter);
    }
  }

  private fail(
    url: string,
    depth: number,
    errorKind: PageErrorKind,
    errorMessage: string,
  ): ProcessedPage {
    this.deps.metrics.increment('documents.failed');
    this.log.warn(`${errorKind} for ${url}: ${errorMessage}`);
    this.deps.emit({ type: 'failed', url, message: errorMessage, errorKind });

    return {
      result: failureResult({ url, depth, errorKind, errorMessage }),
      links: [],
    };
  }
}

export type { PageProcessorDeps };
