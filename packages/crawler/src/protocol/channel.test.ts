import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { parseCrawlConfig, toConfigInput } from '../config/crawl-config.js';
import { ScriptedAdapter } from '../testing/fakes.js';
import { ChildProcessChannel, InProcessChannel, type WorkerChannel } from './channel.js';
import type { WorkerJob, WorkerMessage } from './messages.js';

const job: WorkerJob = {
  type: 'run',
  workerId: 0,
  urls: ['https://example.com/a'],
  config: toConfigInput(parseCrawlConfig({ output_dir: 'tmp/test-channel' })),
};

const workerEntry = (name: string) =>
  fileURLToPath(new URL(`../testing/workers/${name}.ts`, import.meta.url));

async function drain(channel: WorkerChannel, signal?: AbortSignal): Promise<WorkerMessage[]> {
  const messages: WorkerMessage[] = [];
  for await (const message of channel.run(job, signal)) {
    messages.push(message);
  }
  return messages;
}

describe('InProcessChannel', () => {
  it('reports a backend failure as a fatal message before done', async () => {
    class DownAdapter extends ScriptedAdapter {
      async initialize(): Promise<void> {
        throw new Error('backend unavailable');
      }
    }
    const channel = new InProcessChannel({ engineFactory: () => new DownAdapter({}) });

    const messages = await drain(channel);

    expect(messages.slice(-2)).toEqual([
      { type: 'fatal', message: 'backend unavailable' },
      { type: 'done' },
    ]);
  });
});

describe('ChildProcessChannel', { timeout: 20_000 }, () => {
  it('turns an exit before done into a fatal message', async () => {
    const channel = new ChildProcessChannel({ entryPath: workerEntry('exit-early') });

    const messages = await drain(channel);

    expect(messages).toEqual([
      { type: 'event', event: { type: 'scrape-started', url: 'https://example.com/a' } },
      { type: 'fatal', message: 'Worker exited early (code 3)' },
    ]);
  });

  it('drops messages outside the protocol and forwards stdout lines', async () => {
    const lines: string[] = [];
    const channel = new ChildProcessChannel({
      entryPath: workerEntry('malformed'),
      onLine: (line) => lines.push(line),
    });

    const messages = await drain(channel);

    expect(messages).toEqual([
      { type: 'event', event: { type: 'scrape-started', url: 'https://example.com/a' } },
      { type: 'done' },
    ]);
    expect(lines).toEqual(['[SCRAPE] https://example.com/a']);
  });

  it('forwards an abort to the worker as a cancel command', async () => {
    const controller = new AbortController();
    const channel = new ChildProcessChannel({ entryPath: workerEntry('cancellable') });

    const messages: WorkerMessage[] = [];
    for await (const message of channel.run(job, controller.signal)) {
      messages.push(message);
      if (message.type === 'event') {
        controller.abort();
      }
    }

    expect(messages).toEqual([
      { type: 'event', event: { type: 'info', message: 'waiting' } },
      { type: 'done' },
    ]);
  });
});
