import type { CrawlTarget, PageResult } from '../orchestrator/types.js';
import type { SitemapAttempt, SitemapIssue } from '../sitemap/types.js';

type CrawlStatus = 'completed' | 'limit-reached' | 'cancelled';

/** How the work set of a run was obtained. */
type DiscoveryMode = 'single' | 'list' | 'sitemap' | 'frontier';

type GapKind =
  | 'unattributed-outcome'
  | 'duplicate-outcome'
  | 'missing-outcome';

/** A worker event that could not be matched to exactly one URL. */
type ReconciliationGap = {
  kind: GapKind;
  url: string | null;
  detail: string;
};

type ReportSummary = {
  total: number;
  succeeded: number;
  failed: number;
  totalBytes: number;
};

type SitemapSummary = {
  found: string | null;
  urlCount: number;
  attempts: SitemapAttempt[];
  issues: SitemapIssue[];
};

type CrawlReport = Readonly<{
  target: CrawlTarget;
  discovery: DiscoveryMode;
  status: CrawlStatus;
  results: readonly PageResult[];
  summary: ReportSummary;
  gaps: readonly ReconciliationGap[];
  sitemap: SitemapSummary | null;
  startedAt: string;
  finishedAt: string;
}>;

export type {
  CrawlReport,
  CrawlStatus,
  DiscoveryMode,
  GapKind,
  ReconciliationGap,
  ReportSummary,
  SitemapSummary,
};
