export {
  CrawlRunner,
  runBatch,
  runSingle,
  runSiteCrawl,
  type CrawlRunnerDeps
} from "./orchestrator/crawl-runner.js"
export type {
  CrawlTarget,
  DocumentKind,
  EventSink,
  PageResult,
  PageVisitor,
  ProcessedPage
} from "./orchestrator/types.js"
export {
  crawlConfigSchema,
  defaultCrawlConfig,
  loadConfigFile,
  parseCrawlConfig,
  toConfigInput,
  type CrawlConfig,
  type CrawlConfigInput
} from "./config/crawl-config.js"
export {
  ConfigError,
  CrawlInitializationError,
  WorkerFatalError,
  isPageErrorKind,
  toErrorMessage,
  type ErrorKind,
  type PageErrorKind
} from "./errors/crawl-errors.js"
export { ContentFilter } from "./filters/types.js"
export type { ContentBlock, FilterConfig, FilterOptions } from "./filters/types.js"
export { PruningContentFilter } from "./filters/pruning-filter.js"
export { QueryRelevanceContentFilter } from "./filters/query-relevance-filter.js"
export { buildFilter, selectFilterConfig } from "./filters/content-filter-selector.js"
export { FrontierTraversal } from "./frontier/frontier-traversal.js"
export type { FrontierEntry, FrontierOptions, FrontierState } from "./frontier/types.js"
export { SitemapResolver } from "./sitemap/sitemap-resolver.js"
export type { SitemapAttempt, SitemapIssue, SitemapResolution } from "./sitemap/types.js"
export { ResultStore } from "./storage/result-store.js"
export type { PersistOutcome } from "./storage/types.js"
export { bucketOf, fileKeyOf, relativePathOf } from "./storage/url-key-mapper.js"
export { PageFetchAdapter, type EngineType } from "./web-engine/engine-adapter.js"
export { HttpPageFetchAdapter } from "./web-engine/http-engine.js"
export type { FetchOutcome, FetchFailure, FetchSuccess } from "./web-engine/types.js"
export { HttpClient, type TextFetcher } from "./utils/http-client.js"
export { CrawlReportBuilder, summarize } from "./pipeline/crawl-report.js"
export { formatReport, toReportJson, writeReport } from "./pipeline/report-writer.js"
export type { CrawlReport, CrawlStatus, ReconciliationGap } from "./pipeline/types.js"
export {
  formatEventLine,
  workerEventSchema,
  type LineStyle,
  type WorkerEvent
} from "./protocol/events.js"
export { parseEventLines, parseLine, readLines } from "./protocol/line-parser.js"
export { EventReconciler } from "./protocol/reconciler.js"
export {
  ChildProcessChannel,
  InProcessChannel,
  type WorkerChannel
} from "./protocol/channel.js"
export { WorkerDriver } from "./protocol/worker-driver.js"
export type { WorkerCommand, WorkerMessage } from "./protocol/messages.js"
