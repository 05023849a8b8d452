import pLimit from 'p-limit';
import { createLogger, type Logger } from '@workspace/logger';
import { toErrorMessage } from '../errors/crawl-errors.js';
import { originOf } from '../utils/url.js';
import type { HttpTextOutcome, TextFetcher } from '../utils/http-client.js';
import {
  parseRobotsSitemaps,
  parseTextSitemap,
  parseXmlSitemap,
} from './sitemap-parser.js';
import type {
  SitemapAttempt,
  SitemapFetchOutcome,
  SitemapIssue,
  SitemapResolution,
  SitemapResolverOptions,
} from './types.js';

const CANDIDATE_PATHS = [
  '/sitemap.xml',
  '/sitemap_index.xml',
  '/sitemap.txt',
  '/sitemap/sitemap.xml',
  '/sitemapindex.xml',
] as const;

const DEFAULT_OPTIONS: SitemapResolverOptions = {
  extraPaths: ['/wp-sitemap.xml'],
  maxSitemapDepth: 1,
  useRobotsTxt: false,
  concurrency: 4,
};

type RunState = {
  attempts: SitemapAttempt[];
  issues: SitemapIssue[];
  fetched: Set<string>;
};

export class SitemapResolver {
  private readonly fetcher: TextFetcher;
  private readonly options: SitemapResolverOptions;
  private readonly log: Logger;

  constructor(fetcher: TextFetcher, options?: Partial<SitemapResolverOptions>) {
    this.fetcher = fetcher;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.log = options?.logger ?? createLogger('Sitemap');
  }

  /**
   * Probes the candidate locations in order and returns the URLs of the first
   * one that answers 200 and lists at least one page. Later candidates are
   * never requested.
   */
  async resolve(baseUrl: string): Promise<SitemapResolution> {
    const state: RunState = { attempts: [], issues: [], fetched: new Set() };
    const origin = originOf(baseUrl);
    if (!origin) {
      return this.resolution([], null, state);
    }

    const candidates = [...CANDIDATE_PATHS, ...this.options.extraPaths].map(
      (path) => new URL(path, origin).href,
    );

    for (const candidate of candidates) {
      const urls = await this.tryCandidate(candidate, state);
      if (urls.length > 0) {
        return this.resolution(urls, candidate, state);
      }
    }

    if (this.options.useRobotsTxt) {
      for (const candidate of await this.robotsSitemaps(origin)) {
        if (state.fetched.has(candidate)) {
          continue;
        }
        const urls = await this.tryCandidate(candidate, state);
        if (urls.length > 0) {
          return this.resolution(urls, candidate, state);
        }
      }
    }

    this.log.info(`No usable sitemap for ${origin}`);
    return this.resolution([], null, state);
  }

  private async tryCandidate(url: string, state: RunState): Promise<string[]> {
    const outcome = await this.fetchSitemap(url, state);
    if (!outcome.ok) {
      this.log.debug(`Sitemap candidate rejected: ${url} (${outcome.message})`);
      state.attempts.push({ url, status: outcome.kind, detail: outcome.message });
      return [];
    }

    const urls = [
      ...outcome.sitemap.pageUrls,
      ...(await this.expandNested(outcome.sitemap.sitemapUrls, 1, state)),
    ];
    const unique = [...new Set(urls)];

    state.attempts.push({ url, status: unique.length > 0 ? 'found' : 'empty' });
    if (unique.length > 0) {
      this.log.info(`Sitemap found: ${url} (${unique.length} URLs)`);
    }

    return unique;
  }

  private async expandNested(
    sitemapUrls: readonly string[],
    level: number,
    state: RunState,
  ): Promise<string[]> {
    const pending = sitemapUrls.filter((url) => !state.fetched.has(url));
    if (pending.length === 0) {
      return [];
    }

    if (level > this.options.maxSitemapDepth) {
      this.log.debug(
        `Skipping ${pending.length} nested sitemaps beyond depth ${this.options.maxSitemapDepth}`,
      );
      return [];
    }

    const limit = pLimit(Math.max(1, this.options.concurrency));
    const children = await Promise.all(
      pending.map((url) => limit(() => this.fetchSitemap(url, state))),
    );

    const urls: string[] = [];
    for (const child of children) {
      if (!child.ok) {
        this.log.warn(`Nested sitemap failed: ${child.url} (${child.message})`);
        state.issues.push({ url: child.url, kind: child.kind, message: child.message });
        continue;
      }

      urls.push(...child.sitemap.pageUrls);
      urls.push(...(await this.expandNested(child.sitemap.sitemapUrls, level + 1, state)));
    }

    return urls;
  }

  private async fetchSitemap(url: string, state: RunState): Promise<SitemapFetchOutcome> {
    state.fetched.add(url);

    let response: HttpTextOutcome;
    try {
      response = await this.fetcher.getText(url);
    } catch (error) {
      return { ok: false, url, kind: 'sitemap-unreachable', message: toErrorMessage(error) };
    }

    if (!response.ok) {
      return { ok: false, url, kind: 'sitemap-unreachable', message: response.reason };
    }
    if (response.status !== 200) {
      return { ok: false, url, kind: 'sitemap-unreachable', message: `HTTP ${response.status}` };
    }

    const contentType = response.contentType.toLowerCase();
    const isText = contentType.includes('text/plain') || /\.txt(?:$|[?#])/i.test(url);

    if (contentType.includes('xml') || (!isText && response.body.trimStart().startsWith('<'))) {
      const parsed = parseXmlSitemap(response.body);
      return parsed.ok
        ? { ok: true, url, sitemap: parsed.sitemap }
        : { ok: false, url, kind: 'sitemap-parse-error', message: parsed.message };
    }

    if (isText) {
      return { ok: true, url, sitemap: parseTextSitemap(response.body) };
    }

    return {
      ok: false,
      url,
      kind: 'sitemap-parse-error',
      message: `Unrecognized sitemap format (${contentType || 'no content type'})`,
    };
  }

  private async robotsSitemaps(origin: string): Promise<string[]> {
    const robotsUrl = new URL('/robots.txt', origin).href;
    const response = await this.fetcher.getText(robotsUrl).catch((error: unknown) => {
      this.log.debug(`robots.txt unavailable: ${toErrorMessage(error)}`);
      return undefined;
    });
    if (!response?.ok || response.status !== 200) {
      return [];
    }

    return parseRobotsSitemaps(response.body).flatMap((entry) => {
      try {
        return [new URL(entry, origin).href];
      } catch {
        return [];
      }
    });
  }

  private resolution(
    urls: string[],
    sitemapFound: string | null,
    state: RunState,
  ): SitemapResolution {
    return { urls, sitemapFound, attempts: state.attempts, issues: state.issues };
  }
}

export { CANDIDATE_PATHS };
