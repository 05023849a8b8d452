import type { Logger } from '@workspace/logger';

type SitemapErrorKind = 'sitemap-unreachable' | 'sitemap-parse-error';

/** Locations found in one sitemap document. */
type ParsedSitemap = {
  pageUrls: string[];
  /** `<loc>` entries of `<sitemap>` elements, i.e. nested sitemaps. */
  sitemapUrls: string[];
};

type SitemapFetchOutcome =
  | { ok: true; url: string; sitemap: ParsedSitemap }
  | { ok: false; url: string; kind: SitemapErrorKind; message: string };

type SitemapAttempt = {
  url: string;
  status: 'found' | 'empty' | SitemapErrorKind;
  detail?: string;
};

type SitemapIssue = {
  url: string;
  kind: SitemapErrorKind;
  message: string;
};

type SitemapResolution = {
  /** Deduplicated, in first-seen order. Empty when no sitemap was usable. */
  urls: string[];
  sitemapFound: string | null;
  attempts: SitemapAttempt[];
  issues: SitemapIssue[];
};

type SitemapResolverOptions = {
  extraPaths: readonly string[];
  maxSitemapDepth: number;
  useRobotsTxt: boolean;
  concurrency: number;
  logger?: Logger;
};

export type {
  ParsedSitemap,
  SitemapAttempt,
  SitemapErrorKind,
  SitemapFetchOutcome,
  SitemapIssue,
  SitemapResolution,
  SitemapResolverOptions,
};
