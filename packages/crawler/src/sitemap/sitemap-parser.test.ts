import { describe, it, expect } from 'vitest';
import {
  parseRobotsSitemaps,
  parseTextSitemap,
  parseXmlSitemap,
} from './sitemap-parser.js';

describe('parseXmlSitemap', () => {
  it('collects page locations of a urlset', () => {
    const outcome = parseXmlSitemap(`<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url><loc>https://example.com/a</loc><lastmod>2024-01-01</lastmod></url>
  <url><loc> https://example.com/b </loc></url>
</urlset>`);

    expect(outcome).toEqual({
      ok: true,
      sitemap: {
        pageUrls: ['https://example.com/a', 'https://example.com/b'],
        sitemapUrls: [],
      },
    });
  });

  it('separates nested sitemaps of an index', () => {
    const outcome = parseXmlSitemap(`<sitemapindex>
  <sitemap><loc>https://example.com/posts.xml</loc></sitemap>
</sitemapindex>`);

    expect(outcome).toEqual({
      ok: true,
      sitemap: { pageUrls: [], sitemapUrls: ['https://example.com/posts.xml'] },
    });
  });

  it('ignores namespace prefixes', () => {
    const outcome = parseXmlSitemap(`<sm:urlset xmlns:sm="http://www.sitemaps.org/schemas/sitemap/0.9">
  <sm:url><sm:loc>https://example.com/ns</sm:loc></sm:url>
</sm:urlset>`);

    expect(outcome).toEqual({
      ok: true,
      sitemap: { pageUrls: ['https://example.com/ns'], sitemapUrls: [] },
    });
  });

  it('rejects malformed documents', () => {
    const outcome = parseXmlSitemap('<urlset><url><loc>https://example.com/a</url></urlset>');

    expect(outcome.ok).toBe(false);
  });

  it('skips empty locations', () => {
    const outcome = parseXmlSitemap('<urlset><url><loc></loc></url><url><loc>https://example.com/x</loc></url></urlset>');

    expect(outcome).toEqual({
      ok: true,
      sitemap: { pageUrls: ['https://example.com/x'], sitemapUrls: [] },
    });
  });
});

describe('parseTextSitemap', () => {
  it('keeps only lines that start with a URI scheme', () => {
    const sitemap = parseTextSitemap(
      'https://example.com/t1\r\nnot a url\n\n  https://example.com/t2  \n/relative',
    );

    expect(sitemap.pageUrls).toEqual(['https://example.com/t1', 'https://example.com/t2']);
  });
});

describe('parseRobotsSitemaps', () => {
  it('reads Sitemap directives case-insensitively', () => {
    const urls = parseRobotsSitemaps(
      'User-agent: *\nDisallow: /admin\nSitemap: https://example.com/a.xml\nsitemap:https://example.com/b.xml',
    );

    expect(urls).toEqual(['https://example.com/a.xml', 'https://example.com/b.xml']);
  });
});
