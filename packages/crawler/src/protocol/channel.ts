import { fork } from 'node:child_process';
import { createInterface } from 'node:readline';
import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createLogger, type Logger } from '@workspace/logger';
import type { CrawlRunnerDeps } from '../orchestrator/crawl-runner.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { workerMessageSchema, type WorkerJob, type WorkerMessage } from './messages.js';
import { runWorkerJob } from './worker-job.js';

/** Carries one job to a worker and its messages back, in emission order. */
interface WorkerChannel {
  run(job: WorkerJob, signal?: AbortSignal): AsyncIterable<WorkerMessage>;
}

/** Runs the job in this process. Used for tests and `--workers` without isolation. */
class InProcessChannel implements WorkerChannel {
  private readonly deps: Omit<CrawlRunnerDeps, 'emit'>;

  constructor(deps: Omit<CrawlRunnerDeps, 'emit'> = {}) {
    this.deps = deps;
  }

  async *run(job: WorkerJob, signal?: AbortSignal): AsyncGenerator<WorkerMessage> {
    const queue = new AsyncQueue<WorkerMessage>();
    const finished = runWorkerJob(job, (message) => queue.push(message), this.deps, signal).then(
      () => {
        queue.push({ type: 'done' });
        queue.close();
      },
      (error: unknown) => queue.fail(error),
    );

    try {
      yield* queue;
    } finally {
      await finished;
    }
  }
}

const moduleExtension = extname(fileURLToPath(import.meta.url));
const DEFAULT_ENTRY = fileURLToPath(new URL(`./worker-entry${moduleExtension}`, import.meta.url));

type ChildProcessChannelOptions = {
  entryPath?: string;
  /** Receives the protocol lines the worker prints on stdout. */
  onLine?: (line: string) => void;
  logger?: Logger;
};

/**
 * Runs the job in a forked Node process over the IPC channel. The worker
 * also prints each event as a protocol line on its stdout.
 */
class ChildProcessChannel implements WorkerChannel {
  private readonly entryPath: string;
  private readonly onLine: (line: string) => void;
  private readonly log: Logger;

  constructor(options: ChildProcessChannelOptions = {}) {
    this.entryPath = options.entryPath ?? DEFAULT_ENTRY;
    this.log = options.logger ?? createLogger('WorkerChannel');
    this.onLine = options.onLine ?? ((line) => this.log.debug(line));
  }

  async *run(job: WorkerJob, signal?: AbortSignal): AsyncGenerator<WorkerMessage> {
    const queue = new AsyncQueue<WorkerMessage>();
    const child = fork(this.entryPath, [], {
      execArgv: this.entryPath.endsWith('.ts') ? ['--import', 'tsx'] : [],
      stdio: ['ignore', 'pipe', 'inherit', 'ipc'],
    });
    let finished = false;

    if (child.stdout) {
      createInterface({ input: child.stdout, crlfDelay: Infinity }).on('line', this.onLine);
    }

    child.on('message', (raw: unknown) => {
      const parsed = workerMessageSchema.safeParse(raw);
      if (!parsed.success) {
        this.log.warn(`Ignoring malformed message from worker ${job.workerId}`);
        return;
      }
      if (parsed.data.type === 'done' || parsed.data.type === 'fatal') {
        finished = true;
      }
      queue.push(parsed.data);
    });
    child.on('error', (error) => queue.fail(error));
    child.on('close', (code, exitSignal) => {
      if (!finished) {
        queue.push({
          type: 'fatal',
          message: `Worker exited early (${exitSignal ?? `code ${code ?? 'unknown'}`})`,
        });
      }
      queue.close();
    });

    const cancel = (): void => {
      if (child.connected) {
        child.send({ type: 'cancel' });
      }
    };
    signal?.addEventListener('abort', cancel, { once: true });

    child.send(job);
    try {
      yield* queue;
    } finally {
      signal?.removeEventListener('abort', cancel);
      if (child.exitCode === null && child.signalCode === null) {
        child.kill();
      }
    }
  }
}

export { ChildProcessChannel, InProcessChannel };
export type { ChildProcessChannelOptions, WorkerChannel };
