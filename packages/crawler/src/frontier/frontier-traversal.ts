import { createLogger, type Logger } from '@workspace/logger';
import { releaseInOrder } from '../utils/ordered-window.js';
import { normalizeUrl, sameAuthority } from '../utils/url.js';
import type { PageResult, PageVisitor, ProcessedPage } from '../orchestrator/types.js';
import { FrontierQueue } from './frontier-queue.js';
import type { FrontierEntry, FrontierOptions, FrontierState } from './types.js';

/**
 * Breadth-first crawl from a base URL. Results come out in dequeue order,
 * which is layer order, whatever order the fetches complete in.
 *
 * One instance runs once; build a new one for the next crawl.
 */
export class FrontierTraversal {
  private readonly visitor: PageVisitor;
  private readonly options: FrontierOptions;
  private readonly log: Logger;
  private readonly queue: FrontierQueue;
  private currentState: FrontierState;
  private dequeued: number;

  constructor(visitor: PageVisitor, options: FrontierOptions, logger?: Logger) {
    this.visitor = visitor;
    this.options = options;
    this.log = logger ?? createLogger('Frontier');
    this.queue = new FrontierQueue();
    this.currentState = 'idle';
    this.dequeued = 0;
  }

  get state(): FrontierState {
    return this.currentState;
  }

  get visitedCount(): number {
    return this.queue.visitedCount;
  }

  async *crawl(baseUrl: string): AsyncGenerator<PageResult> {
    if (this.currentState !== 'idle') {
      throw new Error(`Frontier traversal already ${this.currentState}`);
    }

    const base = normalizeUrl(baseUrl) ?? baseUrl;
    this.currentState = 'running';
    this.queue.enqueue(base, 0, null);

    const { signal } = this.options;
    const next = (): FrontierEntry | undefined => {
      if (signal?.aborted || this.dequeued >= this.options.maxPages) {
        return undefined;
      }

      const entry = this.queue.dequeue();
      if (entry) {
        this.dequeued += 1;
      }
      return entry;
    };

    const pages = releaseInOrder(
      next,
      (entry) => this.visitor.visit(entry.url, entry.depth),
      this.options.concurrency,
    );

    for await (const { item: entry, value: page } of pages) {
      if (!signal?.aborted) {
        this.enqueueLinks(entry, page, base);
      }
      yield page.result;
    }

    this.currentState = this.finalState();
    this.log.info(
      `Frontier ${this.currentState}: ${this.dequeued} pages, ${this.queue.pending} left in queue`,
    );
  }

  private enqueueLinks(entry: FrontierEntry, page: ProcessedPage, base: string): void {
    const documentUrl =
      page.finalUrl === undefined ? entry.url : (normalizeUrl(page.finalUrl) ?? entry.url);
    if (documentUrl !== entry.url) {
      this.queue.markVisited(documentUrl);
    }

    const depth = entry.depth + 1;
    if (depth > this.options.maxDepth) {
      return;
    }

    let added = 0;
    for (const link of page.links) {
      const url = normalizeUrl(link, documentUrl);
      if (!url) {
        continue;
      }
      if (!this.options.includeExternal && !sameAuthority(url, base)) {
        continue;
      }
      if (this.queue.enqueue(url, depth, entry.url)) {
        added += 1;
      }
    }

    this.log.debug(`Enqueued ${added} links from ${entry.url} at depth ${depth}`);
  }

  private finalState(): FrontierState {
    if (this.options.signal?.aborted) {
      return 'cancelled';
    }

    return this.queue.pending > 0 && this.dequeued >= this.options.maxPages
      ? 'limit-reached'
      : 'completed';
  }
}
