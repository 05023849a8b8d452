import { describe, it, expect } from 'vitest';
import { relativePathOf } from '../storage/url-key-mapper.js';
import { EventReconciler, type ReconcilerStore } from './reconciler.js';

class MemoryStore implements ReconcilerStore {
  readonly files = new Map<string, string>();

  pathFor(url: string): string {
    return relativePathOf(url);
  }

  async exists(url: string): Promise<boolean> {
    return this.files.has(this.pathFor(url));
  }

  async read(savedPath: string): Promise<string | undefined> {
    return this.files.get(savedPath);
  }
}

const A = 'https://example.com/a';
const B = 'https://example.com/b';

describe('EventReconciler', () => {
  it('builds results from outcomes and reads saved content back', async () => {
    const store = new MemoryStore();
    store.files.set('example.com/a.md', '# A');
    const reconciler = new EventReconciler([A, B], store);

    await reconciler.acceptAll([
      { type: 'scrape-started', url: A },
      { type: 'save-succeeded', url: A, path: 'example.com/a.md' },
      { type: 'scrape-started', url: B },
      { type: 'failed', url: B, message: 'HTTP 500', errorKind: 'fetch-failure' },
      { type: 'run-finished', pageCount: 2, bucketPath: '/out' },
    ]);
    const { results, gaps, finished } = await reconciler.finalize();

    expect(gaps).toEqual([]);
    expect(finished).toEqual({ pageCount: 2, bucketPath: '/out' });
    expect(results).toEqual([
      {
        url: A,
        depth: 0,
        success: true,
        content: '# A',
        documentKind: null,
        errorKind: null,
        errorMessage: null,
        savedPath: 'example.com/a.md',
        byteLength: 3,
      },
      {
        url: B,
        depth: 0,
        success: false,
        content: null,
        documentKind: null,
        errorKind: 'fetch-failure',
        errorMessage: 'HTTP 500',
        savedPath: null,
        byteLength: 0,
      },
    ]);
  });

  it('keeps the first outcome and records later ones as duplicates', async () => {
    const reconciler = new EventReconciler([A], new MemoryStore());

    reconciler.accept({ type: 'failed', url: A, message: 'HTTP 503' });
    reconciler.accept({ type: 'save-succeeded', url: A, path: 'example.com/a.md' });
    const { results, gaps } = await reconciler.finalize();

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ success: false, errorKind: 'fetch-failure', errorMessage: 'HTTP 503' });
    expect(gaps).toEqual([{ kind: 'duplicate-outcome', url: A, detail: 'example.com/a.md' }]);
  });

  it('records outcomes without a URL and fails URLs that never reported', async () => {
    const reconciler = new EventReconciler([A], new MemoryStore());

    reconciler.accept({ type: 'save-succeeded', url: null, path: 'example.com/x.md' });
    const { results, gaps } = await reconciler.finalize();

    expect(gaps).toEqual([
      { kind: 'unattributed-outcome', url: null, detail: 'example.com/x.md' },
      { kind: 'missing-outcome', url: A, detail: 'No outcome reported' },
    ]);
    expect(results[0]).toMatchObject({
      url: A,
      success: false,
      errorKind: 'reconciliation-gap',
      errorMessage: 'Worker reported no outcome and no saved document was found',
    });
  });

  it('recovers a silent URL whose document is on disk', async () => {
    const store = new MemoryStore();
    store.files.set('example.com/a.md', 'saved before the worker died');
    const reconciler = new EventReconciler([A], store);

    reconciler.accept({ type: 'scrape-started', url: A });
    const { results, gaps } = await reconciler.finalize();

    expect(results[0]).toMatchObject({
      url: A,
      success: true,
      savedPath: 'example.com/a.md',
      content: 'saved before the worker died',
    });
    expect(gaps).toEqual([{ kind: 'missing-outcome', url: A, detail: 'No outcome reported' }]);
  });

  it('appends URLs the worker reported but nobody expected', async () => {
    const reconciler = new EventReconciler([A], new MemoryStore());

    reconciler.accept({ type: 'failed', url: B, message: 'HTTP 404' });
    reconciler.accept({ type: 'failed', url: A, message: 'HTTP 404' });
    const { results } = await reconciler.finalize();

    expect(results.map((result) => result.url)).toEqual([A, B]);
  });
});
