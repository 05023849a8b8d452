import { readFile } from 'node:fs/promises';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { loadConfigFile, parseCrawlConfig, type CrawlConfig } from '../config/crawl-config.js';
import {
  ConfigError,
  CrawlInitializationError,
  WorkerFatalError,
  toErrorMessage,
} from '../errors/crawl-errors.js';
import { CrawlRunner, type CrawlRunnerDeps } from '../orchestrator/crawl-runner.js';
import type { CrawlTarget, EventSink } from '../orchestrator/types.js';
import { formatReport, writeReport } from '../pipeline/report-writer.js';
import type { CrawlReport } from '../pipeline/types.js';
import { ChildProcessChannel, InProcessChannel } from '../protocol/channel.js';
import { formatEventLine, type LineStyle } from '../protocol/events.js';
import { formatFatalLine } from '../protocol/messages.js';
import { WorkerDriver } from '../protocol/worker-driver.js';
import { ResultStore } from '../storage/result-store.js';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const booleanFlag = z.preprocess(
  (value) => (typeof value === 'string' ? value.toLowerCase() : value),
  booleanFromCliSchema,
);

const numberFlag = (schema: z.ZodNumber) =>
  z.preprocess((value) => {
    if (typeof value === 'string' && value.trim().length > 0) {
      const parsedValue = Number(value);
      return Number.isFinite(parsedValue) ? parsedValue : value;
    }

    return value;
  }, schema);

const pathFlag = (message: string) => z.string().trim().min(1, message);

// Range checks on config values are left to the config schema.
const crawlOptionsSchema = z.object({
  config: pathFlag('Invalid --config path').optional(),
  outputDir: pathFlag('Invalid --outputDir path').optional(),
  pruningThreshold: numberFlag(z.number({ invalid_type_error: 'Invalid --pruningThreshold' })).optional(),
  pruningType: z.enum(['fixed', 'dynamic']).optional(),
  minWordThreshold: numberFlag(z.number({ invalid_type_error: 'Invalid --minWordThreshold' })).optional(),
  useQuery: booleanFlag.optional(),
  query: z.string().optional(),
  queryThreshold: numberFlag(z.number({ invalid_type_error: 'Invalid --queryThreshold' })).optional(),
  maxDepth: numberFlag(z.number({ invalid_type_error: 'Invalid --maxDepth' })).optional(),
  maxPages: numberFlag(z.number({ invalid_type_error: 'Invalid --maxPages' })).optional(),
  includeExternal: booleanFlag.optional(),
  trySitemap: booleanFlag.optional(),
  useRobotsTxt: booleanFlag.optional(),
  maxSitemapDepth: numberFlag(z.number({ invalid_type_error: 'Invalid --maxSitemapDepth' })).optional(),
  concurrency: numberFlag(z.number({ invalid_type_error: 'Invalid --concurrency' })).optional(),
  requestTimeoutMs: numberFlag(z.number({ invalid_type_error: 'Invalid --requestTimeoutMs' })).optional(),
  workers: numberFlag(
    z.number().int().min(1, 'Invalid --workers. Provide a positive integer.'),
  ).default(1),
  isolate: booleanFlag.default('false'),
  format: z.enum(['lines', 'json']).default('lines'),
  reportFile: pathFlag('Invalid --reportFile path').optional(),
  pretty: booleanFlag.default('false'),
});

/** `single` and `site` take one URL. */
const urlArgsSchema = z.object({
  url: z.string().trim().min(1, 'Missing required option: --url'),
  ...crawlOptionsSchema.shape,
});

const batchArgsSchema = z
  .object({
    file: pathFlag('Invalid --file path').optional(),
    urls: z.string().optional(),
    ...crawlOptionsSchema.shape,
  })
  .refine((args) => args.file !== undefined || args.urls !== undefined, {
    message: 'Missing required option: --file or --urls',
  });

const configObjectSchema = z.record(z.string(), z.unknown());

type CrawlOptions = z.infer<typeof crawlOptionsSchema>;
type BatchArgs = z.infer<typeof batchArgsSchema>;

type ActionIo = {
  /** Stand-ins for the HTTP backend; only used by in-process runs. */
  deps?: Omit<CrawlRunnerDeps, 'emit'>;
  print?: (text: string) => void;
};

/** One URL per line; blank lines are skipped. */
export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function resolveBatchUrls(args: BatchArgs): Promise<string[]> {
  const urls = args.urls ? args.urls.split(/[\s,]+/).filter((url) => url.length > 0) : [];
  if (!args.file) {
    return urls;
  }

  try {
    return [...urls, ...parseUrlList(await readFile(args.file, 'utf-8'))];
  } catch (error) {
    throw new ConfigError(`Cannot read URL file ${args.file}: ${toErrorMessage(error)}`);
  }
}

function configOverrides(options: CrawlOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {
    output_dir: options.outputDir,
    pruning_threshold: options.pruningThreshold,
    pruning_type: options.pruningType,
    min_word_threshold: options.minWordThreshold,
    use_query: options.useQuery ?? (options.query !== undefined ? true : undefined),
    query: options.query,
    query_threshold: options.queryThreshold,
    max_depth: options.maxDepth,
    max_pages: options.maxPages,
    include_external: options.includeExternal,
    try_sitemap: options.trySitemap,
    use_robots_txt: options.useRobotsTxt,
    max_sitemap_depth: options.maxSitemapDepth,
    concurrency: options.concurrency,
    request_timeout_ms: options.requestTimeoutMs,
  };

  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

/** Config file values, overridden by whichever flags were given. */
export async function resolveCrawlConfig(options: CrawlOptions): Promise<CrawlConfig> {
  let fileConfig: Record<string, unknown> = {};
  if (options.config) {
    const parsed = configObjectSchema.safeParse(await loadConfigFile(options.config));
    if (!parsed.success) {
      throw new ConfigError(`${options.config}: expected a JSON object`);
    }
    fileConfig = parsed.data;
  }

  return parseCrawlConfig({ ...fileConfig, ...configOverrides(options) });
}

function execute(
  target: CrawlTarget,
  config: CrawlConfig,
  options: CrawlOptions,
  print: (text: string) => void,
  io: ActionIo,
  signal: AbortSignal,
): Promise<CrawlReport> {
  const echo = (style: LineStyle): EventSink => (event) => {
    if (options.format === 'lines') {
      print(formatEventLine(event, style));
    }
  };

  if (target.kind !== 'site-crawl' && (options.isolate || options.workers > 1)) {
    // worker streams interleave, so every outcome line carries its URL
    const driver = new WorkerDriver(
      () => (options.isolate ? new ChildProcessChannel() : new InProcessChannel(io.deps)),
      {
        workers: options.workers,
        store: new ResultStore({ rootDir: config.outputDir }),
        onEvent: echo('site'),
      },
    );
    return driver.run(target, config, signal);
  }

  const style = target.kind === 'site-crawl' ? 'site' : 'scrape';
  return new CrawlRunner(config, { ...io.deps, emit: echo(style) }).run(target, signal);
}

/**
 * Runs one crawl target and prints its protocol lines or its JSON report.
 * Returns the process exit code: page failures still exit with 0.
 */
export async function runCrawlAction(
  target: CrawlTarget,
  options: CrawlOptions,
  io: ActionIo = {},
): Promise<number> {
  const print = io.print ?? ((text: string) => console.log(text));
  const startTime = Date.now();
  const controller = new AbortController();
  const abort = (signal: NodeJS.Signals): void => {
    log.warn(`Received ${signal}, finishing in-flight pages`);
    controller.abort();
  };
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    const config = await resolveCrawlConfig(options);
    log.info('Starting crawl action', JSON.stringify({ target, outputDir: config.outputDir }));

    const report = await execute(target, config, options, print, io, controller.signal);

    if (options.reportFile) {
      await writeReport(options.reportFile, report, options.pretty);
    }
    if (options.format === 'json') {
      print(formatReport(report, options.pretty));
    }

    log.info(
      'Crawl action finished',
      JSON.stringify({ status: report.status, ...report.summary, durationMs: Date.now() - startTime }),
    );
    return 0;
  } catch (error) {
    if (
      error instanceof ConfigError ||
      error instanceof CrawlInitializationError ||
      error instanceof WorkerFatalError
    ) {
      log.error(error.message);
      if (options.format === 'lines') {
        print(
          error instanceof CrawlInitializationError
            ? formatFatalLine(error.reason)
            : formatEventLine({ type: 'failed', url: null, message: error.message }),
        );
      }
      return 1;
    }

    throw error;
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
  }
}

export { batchArgsSchema, crawlOptionsSchema, urlArgsSchema };
export type { ActionIo, BatchArgs, CrawlOptions };
