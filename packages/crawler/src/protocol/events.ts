import { z } from 'zod';

const pageErrorKindSchema = z.enum([
  'fetch-failure',
  'extraction-failure',
  'persistence-error',
  'reconciliation-gap',
]);

export const workerEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('scrape-started'), url: z.string() }),
  z.object({
    type: z.literal('save-succeeded'),
    url: z.string().nullable(),
    path: z.string(),
  }),
  z.object({
    type: z.literal('failed'),
    url: z.string().nullable(),
    message: z.string(),
    errorKind: pageErrorKindSchema.optional(),
  }),
  z.object({
    type: z.literal('run-finished'),
    pageCount: z.number().int().min(0),
    bucketPath: z.string(),
  }),
  z.object({ type: z.literal('info'), message: z.string() }),
  z.object({ type: z.literal('unrecognized'), rawLine: z.string() }),
]);

export type WorkerEvent = z.infer<typeof workerEventSchema>;
export type WorkerEventType = WorkerEvent['type'];

/**
 * `scrape` renders outcomes the way per-URL runs print them (the URL comes
 * from the preceding `[SCRAPE]` line); `site` puts the URL on the outcome
 * line itself.
 */
export type LineStyle = 'scrape' | 'site';

export function formatEventLine(event: WorkerEvent, style: LineStyle = 'scrape'): string {
  switch (event.type) {
    case 'scrape-started':
      return `[SCRAPE] ${event.url}`;
    case 'save-succeeded':
      return style === 'site' && event.url
        ? `[OK] ${event.url} -> ${event.path}`
        : `[SUCCESS] Saved to: ${event.path}`;
    case 'failed':
      return event.url ? `[ERROR] ${event.url}: ${event.message}` : `[ERROR] ${event.message}`;
    case 'run-finished':
      return `[DONE] Crawled ${event.pageCount} pages. Markdown saved in: ${event.bucketPath}`;
    case 'info':
      return `[INFO] ${event.message}`;
    case 'unrecognized':
      return event.rawLine;
  }
}

/** True for events that settle the outcome of a URL. */
export function isTerminalEvent(
  event: WorkerEvent,
): event is Extract<WorkerEvent, { type: 'save-succeeded' | 'failed' }> {
  return event.type === 'save-succeeded' || event.type === 'failed';
}
