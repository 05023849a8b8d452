import type { CrawlTarget, PageResult } from '../orchestrator/types.js';
import type { SitemapResolution } from '../sitemap/types.js';
import type {
  CrawlReport,
  CrawlStatus,
  DiscoveryMode,
  ReconciliationGap,
  ReportSummary,
  SitemapSummary,
} from './types.js';

export function summarize(results: readonly PageResult[]): ReportSummary {
  let succeeded = 0;
  let totalBytes = 0;
  for (const result of results) {
    if (result.success) {
      succeeded += 1;
      totalBytes += result.byteLength;
    }
  }

  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    totalBytes,
  };
}

/** Collects results as they arrive; `finalize` may be called once. */
export class CrawlReportBuilder {
  private readonly target: CrawlTarget;
  private readonly startedAt: Date;
  private readonly results: PageResult[];
  private readonly gaps: ReconciliationGap[];
  private discovery: DiscoveryMode;
  private sitemap: SitemapSummary | null;
  private report: CrawlReport | undefined;

  constructor(target: CrawlTarget, discovery: DiscoveryMode, startedAt = new Date()) {
    this.target = target;
    this.discovery = discovery;
    this.startedAt = startedAt;
    this.results = [];
    this.gaps = [];
    this.sitemap = null;
  }

  get count(): number {
    return this.results.length;
  }

  setDiscovery(discovery: DiscoveryMode): this {
    this.assertOpen();
    this.discovery = discovery;
    return this;
  }

  setSitemap(resolution: SitemapResolution): this {
    this.assertOpen();
    this.sitemap = {
      found: resolution.sitemapFound,
      urlCount: resolution.urls.length,
      attempts: resolution.attempts,
      issues: resolution.issues,
    };
    return this;
  }

  add(result: PageResult): this {
    this.assertOpen();
    this.results.push(result);
    return this;
  }

  addGaps(gaps: readonly ReconciliationGap[]): this {
    this.assertOpen();
    this.gaps.push(...gaps);
    return this;
  }

  finalize(status: CrawlStatus, finishedAt = new Date()): CrawlReport {
    this.assertOpen();
    const results = Object.freeze([...this.results]);

    this.report = Object.freeze({
      target: this.target,
      discovery: this.discovery,
      status,
      results,
      summary: summarize(results),
      gaps: Object.freeze([...this.gaps]),
      sitemap: this.sitemap,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
    });

    return this.report;
  }

  private assertOpen(): void {
    if (this.report) {
      throw new Error('Crawl report already finalized');
    }
  }
}
