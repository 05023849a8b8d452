import { createLogger, type Logger } from '@workspace/logger';
import { toConfigInput, type CrawlConfig } from '../config/crawl-config.js';
import { WorkerFatalError } from '../errors/crawl-errors.js';
import type { CrawlTarget } from '../orchestrator/types.js';
import { CrawlReportBuilder } from '../pipeline/crawl-report.js';
import type { CrawlReport } from '../pipeline/types.js';
import { uniqueUrls } from '../utils/url.js';
import type { WorkerChannel } from './channel.js';
import type { WorkerEvent } from './events.js';
import { EventReconciler, type Reconciliation, type ReconcilerStore } from './reconciler.js';

type ListTarget = Extract<CrawlTarget, { kind: 'single-url' | 'url-list' }>;

type WorkerDriverOptions = {
  workers: number;
  store: ReconcilerStore;
  /** Sees every event as it arrives, tagged with the worker that sent it. */
  onEvent?: (event: WorkerEvent, workerId: number) => void;
  logger?: Logger;
};

/** Contiguous slices, so that concatenating them keeps input order. */
export function splitIntoChunks<T>(items: readonly T[], parts: number): T[][] {
  const count = Math.max(1, Math.min(parts, items.length));
  const size = Math.ceil(items.length / count);
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

/**
 * Runs a URL list on N workers, each behind its own channel, and rebuilds the
 * report from their event streams. Each stream gets its own reconciler, so
 * URL attribution never crosses workers.
 */
export class WorkerDriver {
  private readonly channelFor: (workerId: number) => WorkerChannel;
  private readonly options: WorkerDriverOptions;
  private readonly log: Logger;

  constructor(channelFor: (workerId: number) => WorkerChannel, options: WorkerDriverOptions) {
    this.channelFor = channelFor;
    this.options = options;
    this.log = options.logger ?? createLogger('WorkerDriver');
  }

  async run(target: ListTarget, config: CrawlConfig, signal?: AbortSignal): Promise<CrawlReport> {
    const urls = uniqueUrls(target.kind === 'single-url' ? [target.url] : target.urls);
    const chunks = splitIntoChunks(urls, this.options.workers);
    this.log.info(`Dispatching ${urls.length} URLs to ${chunks.length} workers`);

    const report = new CrawlReportBuilder(target, target.kind === 'single-url' ? 'single' : 'list');
    const reconciled = await Promise.all(
      chunks.map((chunk, workerId) => this.runWorker(workerId, chunk, config, signal)),
    );

    for (const { results, gaps } of reconciled) {
      results.forEach((result) => report.add(result));
      report.addGaps(gaps);
    }

    return report.finalize(signal?.aborted ? 'cancelled' : 'completed');
  }

  private async runWorker(
    workerId: number,
    urls: string[],
    config: CrawlConfig,
    signal: AbortSignal | undefined,
  ): Promise<Reconciliation> {
    const reconciler = new EventReconciler(urls, this.options.store, this.log);
    const job = { type: 'run' as const, workerId, urls, config: toConfigInput(config) };

    let fatal: string | undefined;
    for await (const message of this.channelFor(workerId).run(job, signal)) {
      switch (message.type) {
        case 'event':
          this.options.onEvent?.(message.event, workerId);
          reconciler.accept(message.event);
          break;
        case 'fatal':
          fatal = message.message;
          break;
        case 'done':
          break;
      }
    }

    if (fatal !== undefined) {
      throw new WorkerFatalError(workerId, fatal);
    }

    const reconciliation = await reconciler.finalize();
    if (reconciliation.gaps.length > 0) {
      this.log.warn(`Worker ${workerId}: ${reconciliation.gaps.length} reconciliation gaps`);
    }
    return reconciliation;
  }
}

export type { ListTarget, WorkerDriverOptions };
