import { describe, it, expect } from 'vitest';
import { CrawlReportBuilder, summarize } from './crawl-report.js';
import { failureResult, successResult } from '../orchestrator/page-result.js';

const saved = successResult({
  url: 'https://example.com/a',
  depth: 0,
  content: '# A',
  documentKind: 'fit',
  savedPath: 'example.com/a.md',
  byteLength: 3,
});

const failed = failureResult({
  url: 'https://example.com/b',
  depth: 1,
  errorKind: 'fetch-failure',
  errorMessage: 'HTTP 500',
});

describe('summarize', () => {
  it('counts successes, failures and saved bytes', () => {
    expect(summarize([saved, failed, saved])).toEqual({
      total: 3,
      succeeded: 2,
      failed: 1,
      totalBytes: 6,
    });
  });
});

describe('CrawlReportBuilder', () => {
  it('builds a report in arrival order', () => {
    const builder = new CrawlReportBuilder(
      { kind: 'site-crawl', baseUrl: 'https://example.com' },
      'frontier',
      new Date('2024-05-01T10:00:00.000Z'),
    );
    builder.add(saved).add(failed);
    builder.addGaps([{ kind: 'unattributed-outcome', url: null, detail: 'x' }]);

    const report = builder.finalize('limit-reached', new Date('2024-05-01T10:00:05.000Z'));

    expect(report.results.map((result) => result.url)).toEqual([
      'https://example.com/a',
      'https://example.com/b',
    ]);
    expect(report.status).toBe('limit-reached');
    expect(report.summary).toEqual({ total: 2, succeeded: 1, failed: 1, totalBytes: 3 });
    expect(report.gaps).toHaveLength(1);
    expect(report.sitemap).toBeNull();
    expect(report.startedAt).toBe('2024-05-01T10:00:00.000Z');
    expect(report.finishedAt).toBe('2024-05-01T10:00:05.000Z');
  });

  it('records the sitemap resolution', () => {
    const builder = new CrawlReportBuilder({ kind: 'site-crawl', baseUrl: 'https://example.com' }, 'frontier');
    builder.setDiscovery('sitemap').setSitemap({
      urls: ['https://example.com/a', 'https://example.com/b'],
      sitemapFound: 'https://example.com/sitemap.xml',
      attempts: [{ url: 'https://example.com/sitemap.xml', status: 'found' }],
      issues: [],
    });

    const report = builder.finalize('completed');

    expect(report.discovery).toBe('sitemap');
    expect(report.sitemap).toEqual({
      found: 'https://example.com/sitemap.xml',
      urlCount: 2,
      attempts: [{ url: 'https://example.com/sitemap.xml', status: 'found' }],
      issues: [],
    });
  });

  it('is finalized once', () => {
    const builder = new CrawlReportBuilder({ kind: 'single-url', url: 'https://example.com/a' }, 'single');
    const report = builder.finalize('completed');

    expect(Object.isFrozen(report)).toBe(true);
    expect(() => builder.add(saved)).toThrow('Crawl report already finalized');
    expect(() => builder.finalize('completed')).toThrow('Crawl report already finalized');
  });
});
