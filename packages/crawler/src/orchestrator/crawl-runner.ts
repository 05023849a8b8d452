import { createLogger, type Logger } from '@workspace/logger';
import type { CrawlConfig } from '../config/crawl-config.js';
import { ConfigError } from '../errors/crawl-errors.js';
import { buildFilter, selectFilterConfig } from '../filters/content-filter-selector.js';
import { FrontierTraversal } from '../frontier/frontier-traversal.js';
import { CrawlMetrics } from '../observability/metrics.js';
import { CrawlReportBuilder } from '../pipeline/crawl-report.js';
import type { CrawlReport, CrawlStatus, DiscoveryMode } from '../pipeline/types.js';
import { SitemapResolver } from '../sitemap/sitemap-resolver.js';
import { ResultStore } from '../storage/result-store.js';
import { bucketOf } from '../storage/url-key-mapper.js';
import { HttpClient, type TextFetcher } from '../utils/http-client.js';
import { releaseInOrder } from '../utils/ordered-window.js';
import { normalizeUrl, uniqueUrls } from '../utils/url.js';
import { EnginePool, type EngineFactory } from '../web-engine/engine-pool.js';
import { HttpPageFetchAdapter } from '../web-engine/http-engine.js';
import { failureResult } from './page-result.js';
import { PageProcessor } from './page-processor.js';
import type { CrawlTarget, EventSink, ProcessedPage } from './types.js';

type CrawlRunnerDeps = {
  engineFactory?: EngineFactory;
  /** HTTP client for sitemap probing. */
  fetcher?: TextFetcher;
  store?: ResultStore;
  emit?: EventSink;
  metrics?: CrawlMetrics;
  logger?: Logger;
};

type RunContext = {
  processor: PageProcessor;
  report: CrawlReportBuilder;
  signal: AbortSignal | undefined;
};

const discoveryOf = (target: CrawlTarget): DiscoveryMode => {
  switch (target.kind) {
    case 'single-url':
      return 'single';
    case 'url-list':
      return 'list';
    case 'site-crawl':
      return 'frontier';
  }
};

/**
 * Drives one run: picks the work set for the target, fetches it through a
 * pool of page adapters and collects the results into a report.
 *
 * Per-URL failures end up in the report. The returned promise only rejects
 * when the page backend cannot start or the target itself is invalid.
 */
export class CrawlRunner {
  private readonly config: CrawlConfig;
  private readonly engineFactory: EngineFactory;
  private readonly fetcher: TextFetcher;
  private readonly store: ResultStore;
  private readonly emit: EventSink;
  private readonly metrics: CrawlMetrics;
  private readonly log: Logger;

  constructor(config: CrawlConfig, deps: CrawlRunnerDeps = {}) {
    this.config = config;
    this.log = deps.logger ?? createLogger('CrawlRunner');
    this.engineFactory =
      deps.engineFactory ??
      (() => new HttpPageFetchAdapter({ timeoutMs: config.requestTimeoutMs }));
    this.fetcher =
      deps.fetcher ??
      new HttpClient({ timeoutMs: config.requestTimeoutMs, concurrency: config.concurrency });
    this.store = deps.store ?? new ResultStore({ rootDir: config.outputDir });
    this.emit = deps.emit ?? (() => undefined);
    this.metrics = deps.metrics ?? new CrawlMetrics();
  }

  get resultStore(): ResultStore {
    return this.store;
  }

  async run(target: CrawlTarget, signal?: AbortSignal): Promise<CrawlReport> {
    if (target.kind === 'site-crawl' && !normalizeUrl(target.baseUrl)) {
      throw new ConfigError(`Invalid base URL: ${target.baseUrl}`);
    }

    const filter = buildFilter(selectFilterConfig(this.config));
    this.emit({ type: 'info', message: `Using ${filter.describe()}` });
    this.log.info(`Starting ${target.kind} run`, { filter: filter.name, outputDir: this.store.root });

    const pool = new EnginePool(this.engineFactory, { maxSize: this.config.concurrency });
    const context: RunContext = {
      processor: new PageProcessor({
        pool,
        store: this.store,
        metrics: this.metrics,
        emit: this.emit,
        filter,
        excludedTags: this.config.excludedTags,
      }),
      report: new CrawlReportBuilder(target, discoveryOf(target)),
      signal,
    };

    try {
      await pool.warmUp();

      const status = await this.runTarget(target, context);
      const report = context.report.finalize(status);
      this.emit({
        type: 'run-finished',
        pageCount: report.results.length,
        bucketPath:
          target.kind === 'site-crawl'
            ? this.store.absolutePathOf(bucketOf(target.baseUrl))
            : this.store.root,
      });
      this.log.info(
        `Run ${status}: ${report.summary.succeeded} saved, ${report.summary.failed} failed`,
      );

      return report;
    } finally {
      await pool.cleanup();
      this.metrics.log(this.log);
    }
  }

  private runTarget(target: CrawlTarget, context: RunContext): Promise<CrawlStatus> {
    switch (target.kind) {
      case 'single-url':
        return this.runUrls([target.url], context);
      case 'url-list':
        return this.runUrls(target.urls, context);
      case 'site-crawl':
        return this.runSite(target.baseUrl, context);
    }
  }

  private async runUrls(urls: readonly string[], context: RunContext): Promise<CrawlStatus> {
    const unique = uniqueUrls(urls);
    if (unique.length < urls.length) {
      this.log.debug(`Skipping ${urls.length - unique.length} blank or repeated URLs`);
    }

    let index = 0;
    const next = (): string | undefined =>
      context.signal?.aborted ? undefined : unique[index++];

    const pages = releaseInOrder(
      next,
      (url) => this.visitListed(url, context.processor),
      this.config.concurrency,
    );
    for await (const { value } of pages) {
      context.report.add(value.result);
    }

    return context.report.count < unique.length ? 'cancelled' : 'completed';
  }

  private async visitListed(url: string, processor: PageProcessor): Promise<ProcessedPage> {
    if (normalizeUrl(url)) {
      return processor.visit(url, 0);
    }

    const errorMessage = `Invalid URL: ${url}`;
    this.emit({ type: 'scrape-started', url });
    this.emit({ type: 'failed', url, message: errorMessage, errorKind: 'fetch-failure' });
    this.metrics.increment('documents.failed');
    return {
      result: failureResult({ url, depth: 0, errorKind: 'fetch-failure', errorMessage }),
      links: [],
    };
  }

  private async runSite(baseUrl: string, context: RunContext): Promise<CrawlStatus> {
    const { maxPages } = this.config;

    if (this.config.trySitemap) {
      const resolver = new SitemapResolver(this.fetcher, {
        extraPaths: this.config.sitemapExtraPaths,
        maxSitemapDepth: this.config.maxSitemapDepth,
        useRobotsTxt: this.config.useRobotsTxt,
        concurrency: this.config.concurrency,
      });
      const resolution = await resolver.resolve(baseUrl);
      context.report.setSitemap(resolution);

      if (resolution.urls.length > 0) {
        context.report.setDiscovery('sitemap');
        this.emit({
          type: 'info',
          message: `Found ${resolution.urls.length} URLs in ${resolution.sitemapFound ?? 'sitemap'}`,
        });

        const status = await this.runUrls(resolution.urls.slice(0, maxPages), context);
        return status === 'completed' && resolution.urls.length > maxPages
          ? 'limit-reached'
          : status;
      }

      this.emit({ type: 'info', message: 'No sitemap found, crawling links' });
    }

    const traversal = new FrontierTraversal(context.processor, {
      maxDepth: this.config.maxDepth,
      maxPages,
      includeExternal: this.config.includeExternal,
      concurrency: this.config.concurrency,
      signal: context.signal,
    });
    for await (const result of traversal.crawl(baseUrl)) {
      context.report.add(result);
    }
    this.metrics.gauge('frontier.visited', traversal.visitedCount);

    switch (traversal.state) {
      case 'cancelled':
        return 'cancelled';
      case 'limit-reached':
        return 'limit-reached';
      default:
        return 'completed';
    }
  }
}

/** One URL, one result. */
export function runSingle(
  url: string,
  config: CrawlConfig,
  deps?: CrawlRunnerDeps,
  signal?: AbortSignal,
): Promise<CrawlReport> {
  return new CrawlRunner(config, deps).run({ kind: 'single-url', url }, signal);
}

export function runBatch(
  urls: readonly string[],
  config: CrawlConfig,
  deps?: CrawlRunnerDeps,
  signal?: AbortSignal,
): Promise<CrawlReport> {
  return new CrawlRunner(config, deps).run({ kind: 'url-list', urls }, signal);
}

export function runSiteCrawl(
  baseUrl: string,
  config: CrawlConfig,
  deps?: CrawlRunnerDeps,
  signal?: AbortSignal,
): Promise<CrawlReport> {
  return new CrawlRunner(config, deps).run({ kind: 'site-crawl', baseUrl }, signal);
}

export type { CrawlRunnerDeps };
