#!/usr/bin/env node
import { z } from 'zod';
import {
  batchArgsSchema,
  resolveBatchUrls,
  runCrawlAction,
  urlArgsSchema,
} from './actions/run.js';
import { ConfigError } from './errors/crawl-errors.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('single'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('batch'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('site'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const separator = arg.indexOf('=');
    const key = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    if (!key) {
      continue;
    }

    if (separator !== -1) {
      options[key] = arg.slice(separator + 1);
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (
    !command ||
    command === 'help' ||
    command === '--help' ||
    command === '-h'
  ) {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`site-markdown-crawler CLI

Usage:
  cli help
  cli single --url="https://example.com/docs/getting-started"
  cli single --url="https://example.com/docs/" --query="install configure" --queryThreshold=1.5
  cli batch --file="./urls.txt"
  cli batch --urls="https://example.com/a,https://example.com/b" --workers=2
  cli batch --file="./urls.txt" --workers=4 --isolate
  cli site --url="https://example.com" --maxPages=50 --maxDepth=3
  cli site --url="https://example.com" --trySitemap=false --includeExternal
  cli site --url="https://example.com" --format=json --pretty --reportFile="./tmp/report.json"

Commands:
  help    Show this help message
  single  Fetch one URL and save its content as Markdown
  batch   Fetch a list of URLs, in order
  site    Discover pages through the sitemap, or by following links, and save them

Shared options:
  --config            JSON config file with snake_case keys (flags override it)
  --outputDir         Root directory of the saved Markdown (default: .)
  --pruningThreshold  Block score threshold between 0 and 1 (default: 0.35)
  --pruningType       fixed or dynamic (default: dynamic)
  --minWordThreshold  Blocks with fewer words are dropped (default: 5)
  --query             Keep blocks relevant to this query instead of pruning
  --useQuery          true/false. Defaults to true when --query is given.
  --queryThreshold    Relevance threshold for --query (default: 1.2)
  --concurrency       In-flight fetches (default: 4)
  --requestTimeoutMs  Per-request timeout (default: 10000)
  --format            lines or json (default: lines)
  --reportFile        Also write the JSON report to this path
  --pretty            Pretty-print JSON output

Batch options:
  --file     Text file with one URL per line
  --urls     Comma separated URLs
  --workers  Split the list across this many workers (default: 1)
  --isolate  Run each worker in its own process

Site options:
  --maxDepth         Link depth from the base URL (default: 2)
  --maxPages         Maximum pages to save (default: 20)
  --includeExternal  Follow links to other hosts (default: false)
  --trySitemap       Use the sitemap when there is one (default: true)
  --useRobotsTxt     Also look for sitemaps listed in robots.txt (default: false)
  --maxSitemapDepth  How many levels of sitemap indexes to follow (default: 1)

Environment:
  LOG_LEVEL    fatal, error, warn, info, debug, trace or silent (default: info)
  LOG_PRETTY   false for JSON logs on stderr
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  if (parsedCliInput.data.command === 'batch') {
    const parsedBatchArgs = batchArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedBatchArgs.success) {
      console.error(parsedBatchArgs.error.issues[0]?.message ?? 'Invalid arguments');
      printHelp();
      return 1;
    }

    let urls: string[];
    try {
      urls = await resolveBatchUrls(parsedBatchArgs.data);
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(error.message);
        return 1;
      }
      throw error;
    }

    return runCrawlAction({ kind: 'url-list', urls }, parsedBatchArgs.data);
  }

  const parsedUrlArgs = urlArgsSchema.safeParse(parsedCliInput.data.options);
  if (!parsedUrlArgs.success) {
    console.error(parsedUrlArgs.error.issues[0]?.message ?? 'Invalid arguments');
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'single') {
    return runCrawlAction({ kind: 'single-url', url: parsedUrlArgs.data.url }, parsedUrlArgs.data);
  }

  return runCrawlAction({ kind: 'site-crawl', baseUrl: parsedUrlArgs.data.url }, parsedUrlArgs.data);
}

const exitCode = await main();
process.exitCode = exitCode;
