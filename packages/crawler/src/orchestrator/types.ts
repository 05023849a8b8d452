import type { PageErrorKind } from '../errors/crawl-errors.js';
import type { WorkerEvent } from '../protocol/events.js';

type CrawlTarget =
  | { readonly kind: 'single-url'; readonly url: string }
  | { readonly kind: 'url-list'; readonly urls: readonly string[] }
  | { readonly kind: 'site-crawl'; readonly baseUrl: string };

/** Which document of the fallback policy was persisted. */
type DocumentKind = 'fit' | 'raw';

type PageResult = Readonly<{
  url: string;
  depth: number;
  success: boolean;
  content: string | null;
  documentKind: DocumentKind | null;
  errorKind: PageErrorKind | null;
  errorMessage: string | null;
  savedPath: string | null;
  byteLength: number;
}>;

/** A page result plus the outbound links of a successful fetch. */
type ProcessedPage = {
  result: PageResult;
  links: string[];
  /** Document URL after redirects; relative links resolve against it. */
  finalUrl?: string;
};

type PageVisitor = {
  visit(url: string, depth: number): Promise<ProcessedPage>;
};

type EventSink = (event: WorkerEvent) => void;

export type {
  CrawlTarget,
  DocumentKind,
  EventSink,
  PageResult,
  PageVisitor,
  ProcessedPage,
};
