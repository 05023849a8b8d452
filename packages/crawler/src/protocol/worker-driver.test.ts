import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { parseCrawlConfig } from '../config/crawl-config.js';
import { CrawlInitializationError, WorkerFatalError } from '../errors/crawl-errors.js';
import { ResultStore } from '../storage/result-store.js';
import { ScriptedAdapter, type ScriptedPage } from '../testing/fakes.js';
import { InProcessChannel } from './channel.js';
import { WorkerDriver, splitIntoChunks } from './worker-driver.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-worker-driver');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

const PAGES: Record<string, ScriptedPage> = {
  'https://example.com/a': { primaryDocument: '# A' },
  'https://example.com/c': { fallbackDocument: '# C' },
  'https://example.org/d': { primaryDocument: '# D' },
};

class UnavailableAdapter extends ScriptedAdapter {
  async initialize(): Promise<void> {
    throw new CrawlInitializationError('custom', 'backend unavailable');
  }
}

const driverFor = (pages: Record<string, ScriptedPage>, workers: number) => {
  const workerIds: number[] = [];
  const driver = new WorkerDriver(
    (workerId) => {
      workerIds.push(workerId);
      return new InProcessChannel({ engineFactory: () => new ScriptedAdapter(pages) });
    },
    { workers, store: new ResultStore({ rootDir: TEST_DIR }) },
  );
  return { driver, workerIds };
};

describe('splitIntoChunks', () => {
  it('makes contiguous slices', () => {
    expect(splitIntoChunks([1, 2, 3, 4, 5], 2)).toEqual([
      [1, 2, 3],
      [4, 5],
    ]);
  });

  it('never makes more chunks than items', () => {
    expect(splitIntoChunks(['a'], 4)).toEqual([['a']]);
    expect(splitIntoChunks([], 3)).toEqual([]);
  });
});

describe('WorkerDriver', () => {
  beforeEach(cleanup);
  afterEach(cleanup);

  const config = parseCrawlConfig({ output_dir: TEST_DIR, concurrency: 2 });

  it('merges worker results in input order', async () => {
    const { driver, workerIds } = driverFor(PAGES, 2);
    const urls = [
      'https://example.com/a',
      'https://example.com/b',
      'https://example.com/c',
      'https://example.org/d',
    ];

    const report = await driver.run({ kind: 'url-list', urls }, config);

    expect(workerIds).toEqual([0, 1]);
    expect(report.status).toBe('completed');
    expect(report.discovery).toBe('list');
    expect(report.gaps).toEqual([]);
    expect(report.results.map((result) => [result.url, result.success])).toEqual([
      ['https://example.com/a', true],
      ['https://example.com/b', false],
      ['https://example.com/c', true],
      ['https://example.org/d', true],
    ]);
    expect(report.results[1]).toMatchObject({ errorKind: 'fetch-failure', errorMessage: 'HTTP 404' });
    expect(report.results[2]).toMatchObject({ savedPath: 'example.com/c.md', content: '# C' });
    expect(report.summary).toEqual({ total: 4, succeeded: 3, failed: 1, totalBytes: 9 });
  });

  it('trims the URL list and drops blanks and repeats before dispatch', async () => {
    const { driver, workerIds } = driverFor(PAGES, 2);

    const report = await driver.run(
      { kind: 'url-list', urls: [' https://example.com/a', '', 'https://example.com/a'] },
      config,
    );

    expect(workerIds).toEqual([0]);
    expect(report.gaps).toEqual([]);
    expect(report.results.map((result) => [result.url, result.success])).toEqual([
      ['https://example.com/a', true],
    ]);
  });

  it('runs a single URL on one worker', async () => {
    const { driver, workerIds } = driverFor(PAGES, 3);

    const report = await driver.run({ kind: 'single-url', url: 'https://example.com/a' }, config);

    expect(workerIds).toEqual([0]);
    expect(report.discovery).toBe('single');
    expect(report.results).toHaveLength(1);
    expect(report.results[0]).toMatchObject({ success: true, savedPath: 'example.com/a.md' });
  });

  it('fails the run when a worker cannot start its backend', async () => {
    const driver = new WorkerDriver(
      () =>
        new InProcessChannel({
          engineFactory: () => new UnavailableAdapter(PAGES),
        }),
      { workers: 1, store: new ResultStore({ rootDir: TEST_DIR }) },
    );

    const run = driver.run({ kind: 'url-list', urls: ['https://example.com/a'] }, config);

    await expect(run).rejects.toThrow(WorkerFatalError);
    await expect(run).rejects.toThrow('Worker 0 failed: backend unavailable');
  });

  it('reports unattempted URLs of a cancelled run as gaps', async () => {
    const { driver } = driverFor(PAGES, 1);
    const controller = new AbortController();
    controller.abort();

    const report = await driver.run(
      { kind: 'url-list', urls: ['https://example.com/a'] },
      config,
      controller.signal,
    );

    expect(report.status).toBe('cancelled');
    expect(report.results[0]).toMatchObject({ success: false, errorKind: 'reconciliation-gap' });
    expect(report.gaps).toEqual([
      { kind: 'missing-outcome', url: 'https://example.com/a', detail: 'No outcome reported' },
    ]);
  });
});
