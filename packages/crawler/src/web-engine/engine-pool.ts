import { CrawlInitializationError, toErrorMessage } from '../errors/crawl-errors.js';
import type { PageFetchAdapter } from './engine-adapter.js';

type EngineFactory = () => PageFetchAdapter;

type EnginePoolConfig = {
  maxSize: number;
};

type Waiter = {
  resolve: (adapter: PageFetchAdapter) => void;
  reject: (error: Error) => void;
};

/**
 * Hands out adapter sessions, at most `maxSize` at a time. A session is
 * used by exactly one in-flight fetch.
 */
export class EnginePool {
  private readonly idle: PageFetchAdapter[];
  private readonly active: Set<PageFetchAdapter>;
  private readonly factory: EngineFactory;
  private readonly maxSize: number;
  private readonly waiters: Waiter[];
  private closed: boolean;

  constructor(factory: EngineFactory, config?: Partial<EnginePoolConfig>) {
    this.factory = factory;
    this.maxSize = Math.max(1, config?.maxSize ?? 4);
    this.idle = [];
    this.active = new Set();
    this.waiters = [];
    this.closed = false;
  }

  /**
   * Starts one session up front so that an unavailable backend fails the run
   * before any URL is attempted.
   */
  async warmUp(): Promise<void> {
    const adapter = await this.acquire();
    this.release(adapter);
  }

  async acquire(): Promise<PageFetchAdapter> {
    if (this.closed) {
      throw new Error('Engine pool is closed');
    }

    const idleAdapter = this.idle.pop();
    if (idleAdapter) {
      this.active.add(idleAdapter);
      return idleAdapter;
    }

    if (this.active.size < this.maxSize) {
      const adapter = this.factory();
      this.active.add(adapter);
      try {
        await adapter.initialize();
      } catch (error) {
        this.active.delete(adapter);
        if (error instanceof CrawlInitializationError) {
          throw error;
        }
        throw new CrawlInitializationError(
          adapter.engineType,
          toErrorMessage(error),
        );
      }
      return adapter;
    }

    return new Promise<PageFetchAdapter>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  release(adapter: PageFetchAdapter): void {
    this.active.delete(adapter);

    const waiter = this.waiters.shift();
    if (waiter) {
      this.active.add(adapter);
      waiter.resolve(adapter);
      return;
    }

    this.idle.push(adapter);
  }

  async cleanup(): Promise<void> {
    this.closed = true;
    const all = [...this.idle, ...this.active];
    this.idle.length = 0;
    this.active.clear();

    for (const waiter of this.waiters) {
      waiter.reject(new Error('Engine pool is closed'));
    }
    this.waiters.length = 0;

    await Promise.all(all.map((adapter) => adapter.cleanup()));
  }

  get activeCount(): number {
    return this.active.size;
  }

  get idleCount(): number {
    return this.idle.length;
  }

  get totalCount(): number {
    return this.active.size + this.idle.length;
  }
}

export type { EngineFactory, EnginePoolConfig };
