import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, toErrorMessage } from '../errors/crawl-errors.js';
import type { FilterOptions } from '../filters/types.js';

const DEFAULT_EXCLUDED_TAGS: readonly string[] = ['nav', 'footer', 'header', 'style', 'script'];

/** Run configuration as written in config files and sent to workers. */
export const crawlConfigSchema = z
  .object({
    pruning_threshold: z
      .number()
      .min(0, 'pruning_threshold must be between 0 and 1')
      .max(1, 'pruning_threshold must be between 0 and 1')
      .default(0.35),
    pruning_type: z.enum(['fixed', 'dynamic']).default('dynamic'),
    min_word_threshold: z.number().int().min(0).default(5),
    use_query: z.boolean().default(false),
    query: z.string().default(''),
    query_threshold: z.number().positive('query_threshold must be > 0').default(1.2),
    max_depth: z.number().int().min(1, 'max_depth must be >= 1').default(2),
    max_pages: z.number().int().min(1, 'max_pages must be >= 1').default(20),
    include_external: z.boolean().default(false),
    try_sitemap: z.boolean().default(true),
    concurrency: z.number().int().min(1).max(64).default(4),
    output_dir: z.string().min(1).default('.'),
    excluded_tags: z.array(z.string().min(1)).default(() => [...DEFAULT_EXCLUDED_TAGS]),
    sitemap_extra_paths: z
      .array(z.string().startsWith('/', 'sitemap_extra_paths entries must start with /'))
      .default(() => ['/wp-sitemap.xml']),
    max_sitemap_depth: z.number().int().min(0).default(1),
    use_robots_txt: z.boolean().default(false),
    request_timeout_ms: z.number().int().positive().default(10_000),
  })
  .strict();

export type CrawlConfigInput = z.input<typeof crawlConfigSchema>;
type CrawlConfigFile = z.output<typeof crawlConfigSchema>;

export type CrawlConfig = FilterOptions & {
  maxDepth: number;
  maxPages: number;
  includeExternal: boolean;
  trySitemap: boolean;
  concurrency: number;
  outputDir: string;
  excludedTags: string[];
  sitemapExtraPaths: string[];
  maxSitemapDepth: number;
  useRobotsTxt: boolean;
  requestTimeoutMs: number;
};

export function parseCrawlConfig(input: unknown): CrawlConfig {
  const parsed = crawlConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.');
    throw new ConfigError(
      path ? `${path}: ${issue?.message}` : (issue?.message ?? 'Invalid configuration'),
    );
  }

  return fromFile(parsed.data);
}

export function defaultCrawlConfig(): CrawlConfig {
  return parseCrawlConfig({});
}

/** Inverse of `parseCrawlConfig`, for handing a config to a worker. */
export function toConfigInput(config: CrawlConfig): CrawlConfigFile {
  return {
    pruning_threshold: config.pruningThreshold,
    pruning_type: config.pruningType,
    min_word_threshold: config.minWordThreshold,
    use_query: config.useQuery,
    query: config.query,
    query_threshold: config.queryThreshold,
    max_depth: config.maxDepth,
    max_pages: config.maxPages,
    include_external: config.includeExternal,
    try_sitemap: config.trySitemap,
    concurrency: config.concurrency,
    output_dir: config.outputDir,
    excluded_tags: config.excludedTags,
    sitemap_extra_paths: config.sitemapExtraPaths,
    max_sitemap_depth: config.maxSitemapDepth,
    use_robots_txt: config.useRobotsTxt,
    request_timeout_ms: config.requestTimeoutMs,
  };
}

export async function loadConfigFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${toErrorMessage(error)}`);
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${path}: ${toErrorMessage(error)}`);
  }
}

function fromFile(file: CrawlConfigFile): CrawlConfig {
  return {
    pruningThreshold: file.pruning_threshold,
    pruningType: file.pruning_type,
    minWordThreshold: file.min_word_threshold,
    useQuery: file.use_query,
    query: file.query,
    queryThreshold: file.query_threshold,
    maxDepth: file.max_depth,
    maxPages: file.max_pages,
    includeExternal: file.include_external,
    trySitemap: file.try_sitemap,
    concurrency: file.concurrency,
    outputDir: file.output_dir,
    excludedTags: file.excluded_tags,
    sitemapExtraPaths: file.sitemap_extra_paths,
    maxSitemapDepth: file.max_sitemap_depth,
    useRobotsTxt: file.use_robots_txt,
    requestTimeoutMs: file.request_timeout_ms,
  };
}

export { DEFAULT_EXCLUDED_TAGS };
