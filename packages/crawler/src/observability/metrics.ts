import type { Logger } from '@workspace/logger';

type DurationStats = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type MetricSnapshot = {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  durations: Record<string, DurationStats>;
};

/**
 * Run-level counters (`requests.*`, `documents.*`), gauges and timings,
 * logged once when a run ends.
 */
export class CrawlMetrics {
  private readonly counters: Map<string, number>;
  private readonly gauges: Map<string, number>;
  private readonly durations: Map<string, number[]>;

  constructor() {
    this.counters = new Map();
    this.gauges = new Map();
    this.durations = new Map();
  }

  increment(counter: string, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  recordDuration(name: string, ms: number): void {
    const values = this.durations.get(name);
    if (values) {
      values.push(ms);
      return;
    }

    this.durations.set(name, [ms]);
  }

  /** Runs `task` and records how long it took under `name`. */
  async time<T>(name: string, task: () => Promise<T>): Promise<T> {
    const startTime = performance.now();
    try {
      return await task();
    } finally {
      this.recordDuration(name, performance.now() - startTime);
    }
  }

  counter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): MetricSnapshot {
    const durations: Record<string, DurationStats> = {};
    for (const [name, values] of this.durations) {
      durations[name] = summarize(values);
    }

    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      durations,
    };
  }

  log(logger: Pick<Logger, 'info'>): void {
    logger.info('[Metrics]', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.durations.clear();
  }
}

function summarize(values: readonly number[]): DurationStats {
  const count = values.length;
  const total = values.reduce((sum, value) => sum + value, 0);

  return {
    count,
    min: count > 0 ? Math.min(...values) : 0,
    max: count > 0 ? Math.max(...values) : 0,
    avg: count > 0 ? total / count : 0,
    total,
  };
}

export type { DurationStats, MetricSnapshot };
