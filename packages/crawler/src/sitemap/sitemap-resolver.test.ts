import { describe, it, expect } from 'vitest';
import { SitemapResolver } from './sitemap-resolver.js';
import { FakeTextFetcher } from '../testing/fakes.js';

const urlset = (...locs: string[]): string =>
  `<urlset>${locs.map((loc) => `<url><loc>${loc}</loc></url>`).join('')}</urlset>`;

const index = (...locs: string[]): string =>
  `<sitemapindex>${locs.map((loc) => `<sitemap><loc>${loc}</loc></sitemap>`).join('')}</sitemapindex>`;

describe('SitemapResolver', () => {
  it('stops at the first candidate that yields URLs', async () => {
    const fetcher = new FakeTextFetcher({
      'https://example.com/sitemap_index.xml': {
        body: urlset('https://example.com/1', 'https://example.com/2', 'https://example.com/3'),
      },
      'https://example.com/sitemap.txt': { contentType: 'text/plain', body: 'https://example.com/never' },
    });
    const resolver = new SitemapResolver(fetcher);

    const resolution = await resolver.resolve('https://example.com/docs/start');

    expect(resolution.urls).toEqual([
      'https://example.com/1',
      'https://example.com/2',
      'https://example.com/3',
    ]);
    expect(resolution.sitemapFound).toBe('https://example.com/sitemap_index.xml');
    expect(fetcher.requested).toEqual([
      'https://example.com/sitemap.xml',
      'https://example.com/sitemap_index.xml',
    ]);
    expect(resolution.attempts).toEqual([
      { url: 'https://example.com/sitemap.xml', status: 'sitemap-unreachable', detail: 'HTTP 404' },
      { url: 'https://example.com/sitemap_index.xml', status: 'found' },
    ]);
  });

  it('follows one level of sitemap index and deduplicates', async () => {
    const fetcher = new FakeTextFetcher({
      'https://example.com/sitemap.xml': {
        body: index('https://example.com/a.xml', 'https://example.com/b.xml'),
      },
      'https://example.com/a.xml': { body: urlset('https://example.com/p1', 'https://example.com/p2') },
      'https://example.com/b.xml': { body: urlset('https://example.com/p2', 'https://example.com/p3') },
    });

    const resolution = await new SitemapResolver(fetcher).resolve('https://example.com');

    expect(resolution.urls).toEqual([
      'https://example.com/p1',
      'https://example.com/p2',
      'https://example.com/p3',
    ]);
    expect(resolution.sitemapFound).toBe('https://example.com/sitemap.xml');
    expect(resolution.issues).toEqual([]);
  });

  it('records failed nested sitemaps without aborting the parent', async () => {
    const fetcher = new FakeTextFetcher({
      'https://example.com/sitemap.xml': {
        body: index('https://example.com/a.xml', 'https://example.com/b.xml'),
      },
      'https://example.com/a.xml': { body: urlset('https://example.com/p1') },
      'https://example.com/b.xml': { status: 500, body: 'oops' },
    });

    const resolution = await new SitemapResolver(fetcher).resolve('https://example.com');

    expect(resolution.urls).toEqual(['https://example.com/p1']);
    expect(resolution.issues).toEqual([
      { url: 'https://example.com/b.xml', kind: 'sitemap-unreachable', message: 'HTTP 500' },
    ]);
  });

  it('does not descend past the configured sitemap depth', async () => {
    const fetcher = new FakeTextFetcher({
      'https://example.com/sitemap.xml': { body: index('https://example.com/a.xml') },
      'https://example.com/a.xml': { body: index('https://example.com/deep.xml') },
      'https://example.com/deep.xml': { body: urlset('https://example.com/deep-page') },
    });

    const shallow = await new SitemapResolver(fetcher, { extraPaths: [] }).resolve('https://example.com');
    expect(shallow.urls).toEqual([]);
    expect(fetcher.requested).not.toContain('https://example.com/deep.xml');

    const deep = await new SitemapResolver(fetcher, { maxSitemapDepth: 2 }).resolve('https://example.com');
    expect(deep.urls).toEqual(['https://example.com/deep-page']);
  });

  it('skips malformed XML and falls through to a text sitemap', async () => {
    const fetcher = new FakeTextFetcher({
      'https://example.com/sitemap.xml': { body: '<urlset><url><loc>https://example.com/a</url></urlset>' },
      'https://example.com/sitemap.txt': {
        contentType: 'text/plain; charset=utf-8',
        body: 'https://example.com/t1\nnot a url\n\nhttps://example.com/t2\n',
      },
    });

    const resolution = await new SitemapResolver(fetcher).resolve('https://example.com');

    expect(resolution.urls).toEqual(['https://example.com/t1', 'https://example.com/t2']);
    expect(resolution.sitemapFound).toBe('https://example.com/sitemap.txt');
    expect(resolution.attempts[0]?.status).toBe('sitemap-parse-error');
  });

  it('reads sitemaps declared in robots.txt when enabled', async () => {
    const fetcher = new FakeTextFetcher({
      'https://example.com/robots.txt': {
        contentType: 'text/plain',
        body: 'User-agent: *\nSitemap: https://example.com/custom-map.xml',
      },
      'https://example.com/custom-map.xml': { body: urlset('https://example.com/from-robots') },
    });

    const disabled = await new SitemapResolver(fetcher).resolve('https://example.com');
    expect(disabled.urls).toEqual([]);

    const enabled = await new SitemapResolver(fetcher, { useRobotsTxt: true }).resolve('https://example.com');
    expect(enabled.urls).toEqual(['https://example.com/from-robots']);
    expect(enabled.sitemapFound).toBe('https://example.com/custom-map.xml');
  });

  it('returns an empty resolution when no candidate is usable', async () => {
    const fetcher = new FakeTextFetcher({});

    const resolution = await new SitemapResolver(fetcher).resolve('https://example.com');

    expect(resolution.urls).toEqual([]);
    expect(resolution.sitemapFound).toBeNull();
    expect(resolution.attempts.map((attempt) => attempt.url)).toEqual([
      'https://example.com/sitemap.xml',
      'https://example.com/sitemap_index.xml',
      'https://example.com/sitemap.txt',
      'https://example.com/sitemap/sitemap.xml',
      'https://example.com/sitemapindex.xml',
      'https://example.com/wp-sitemap.xml',
    ]);
  });
});
