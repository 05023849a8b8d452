import { log } from '@workspace/logger';
import { formatEventLine } from './events.js';
import {
  formatFatalLine,
  workerCommandSchema,
  type WorkerJob,
  type WorkerMessage,
} from './messages.js';
import { runWorkerJob } from './worker-job.js';

const controller = new AbortController();

function send(message: WorkerMessage): void {
  if (message.type === 'event') {
    process.stdout.write(`${formatEventLine(message.event)}\n`);
  } else if (message.type === 'fatal') {
    process.stdout.write(`${formatFatalLine(message.message)}\n`);
  }

  process.send?.(message);
}

function sendAndFlush(message: WorkerMessage): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!process.send) {
      resolve();
      return;
    }

    process.send(message, undefined, {}, (error) => (error ? reject(error) : resolve()));
  });
}

function nextJob(): Promise<WorkerJob> {
  return new Promise((resolve) => {
    process.on('message', (raw: unknown) => {
      const parsed = workerCommandSchema.safeParse(raw);
      if (!parsed.success) {
        log.warn('Ignoring malformed command:', parsed.error.issues[0]?.message ?? 'unknown');
        return;
      }

      if (parsed.data.type === 'cancel') {
        controller.abort();
        return;
      }
      resolve(parsed.data);
    });
  });
}

if (!process.send) {
  log.fatal('worker-entry must be started with an IPC channel');
  process.exit(1);
}

const job = await nextJob();
await runWorkerJob(job, send, {}, controller.signal);
await sendAndFlush({ type: 'done' });
process.disconnect();
