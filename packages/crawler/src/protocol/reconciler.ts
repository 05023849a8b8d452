import { createLogger, type Logger } from '@workspace/logger';
import { failureResult, successResult } from '../orchestrator/page-result.js';
import type { PageResult } from '../orchestrator/types.js';
import type { ReconciliationGap } from '../pipeline/types.js';
import type { ResultStore } from '../storage/result-store.js';
import type { WorkerEvent } from './events.js';

type ReconcilerStore = Pick<ResultStore, 'exists' | 'pathFor' | 'read'>;

type Settled =
  | { success: true; savedPath: string }
  | { success: false; message: string; errorKind: PageResult['errorKind'] };

type Reconciliation = {
  results: PageResult[];
  gaps: ReconciliationGap[];
  finished: { pageCount: number; bucketPath: string } | null;
};

/**
 * Builds page results from the event stream of a single worker. The first
 * outcome reported for a URL wins. Every expected URL ends up with a result:
 * one that never reported is looked up on disk, and recorded as a
 * reconciliation gap failure when its document is not there.
 */
export class EventReconciler {
  private readonly expected: readonly string[];
  private readonly store: ReconcilerStore;
  private readonly log: Logger;
  private readonly settled: Map<string, Settled>;
  private readonly started: Set<string>;
  private readonly gaps: ReconciliationGap[];
  private finished: Reconciliation['finished'];

  constructor(expectedUrls: readonly string[], store: ReconcilerStore, logger?: Logger) {
    this.expected = expectedUrls;
    this.store = store;
    this.log = logger ?? createLogger('Reconciler');
    this.settled = new Map();
    this.started = new Set();
    this.gaps = [];
    this.finished = null;
  }

  accept(event: WorkerEvent): void {
    switch (event.type) {
      case 'scrape-started':
        this.started.add(event.url);
        return;
      case 'save-succeeded':
        this.settle(event.url, { success: true, savedPath: event.path }, event.path);
        return;
      case 'failed':
        this.settle(
          event.url,
          { success: false, message: event.message, errorKind: event.errorKind ?? 'fetch-failure' },
          event.message,
        );
        return;
      case 'run-finished':
        this.finished = { pageCount: event.pageCount, bucketPath: event.bucketPath };
        return;
      case 'info':
      case 'unrecognized':
        return;
    }
  }

  async acceptAll(events: AsyncIterable<WorkerEvent> | Iterable<WorkerEvent>): Promise<void> {
    for await (const event of events) {
      this.accept(event);
    }
  }

  async finalize(): Promise<Reconciliation> {
    const order = [
      ...new Set([...this.expected, ...this.started, ...this.settled.keys()]),
    ];

    const results: PageResult[] = [];
    for (const url of order) {
      const outcome = this.settled.get(url);
      if (outcome) {
        results.push(await this.toResult(url, outcome));
        continue;
      }

      this.gaps.push({ kind: 'missing-outcome', url, detail: 'No outcome reported' });
      results.push(await this.recover(url));
    }

    return { results, gaps: [...this.gaps], finished: this.finished };
  }

  private settle(url: string | null, outcome: Settled, detail: string): void {
    if (url === null) {
      this.log.warn('Outcome without a preceding URL:', detail);
      this.gaps.push({ kind: 'unattributed-outcome', url: null, detail });
      return;
    }

    if (this.settled.has(url)) {
      this.gaps.push({ kind: 'duplicate-outcome', url, detail });
      return;
    }

    this.settled.set(url, outcome);
  }

  private async toResult(url: string, outcome: Settled): Promise<PageResult> {
    if (!outcome.success) {
      return failureResult({
        url,
        depth: 0,
        errorKind: outcome.errorKind ?? 'fetch-failure',
        errorMessage: outcome.message,
      });
    }

    const content = (await this.store.read(outcome.savedPath)) ?? '';
    return successResult({
      url,
      depth: 0,
      content,
      documentKind: null,
      savedPath: outcome.savedPath,
      byteLength: Buffer.byteLength(content, 'utf-8'),
    });
  }

  private async recover(url: string): Promise<PageResult> {
    if (await this.store.exists(url)) {
      this.log.info(`Recovered ${url} from its saved document`);
      return this.toResult(url, { success: true, savedPath: this.store.pathFor(url) });
    }

    return failureResult({
      url,
      depth: 0,
      errorKind: 'reconciliation-gap',
      errorMessage: 'Worker reported no outcome and no saved document was found',
    });
  }
}

export type { Reconciliation, ReconcilerStore };
