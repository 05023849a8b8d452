import { createLogger } from '@workspace/logger';
import { parseCrawlConfig } from '../config/crawl-config.js';
import { CrawlInitializationError, toErrorMessage } from '../errors/crawl-errors.js';
import { CrawlRunner, type CrawlRunnerDeps } from '../orchestrator/crawl-runner.js';
import type { WorkerJob, WorkerMessage } from './messages.js';

const log = createLogger('Worker');

/**
 * Worker side of a job: runs the URL list and reports every event through
 * `send`. Anything that stops the run is sent as a `fatal` message; the
 * returned promise does not reject.
 */
export async function runWorkerJob(
  job: WorkerJob,
  send: (message: WorkerMessage) => void,
  deps: Omit<CrawlRunnerDeps, 'emit'> = {},
  signal?: AbortSignal,
): Promise<void> {
  try {
    const config = parseCrawlConfig(job.config);
    const runner = new CrawlRunner(config, {
      ...deps,
      emit: (event) => send({ type: 'event', event }),
    });
    await runner.run({ kind: 'url-list', urls: job.urls }, signal);
  } catch (error) {
    const message =
      error instanceof CrawlInitializationError ? error.reason : toErrorMessage(error);
    log.error(`Worker ${job.workerId} stopped:`, message);
    send({ type: 'fatal', message });
  }
}
