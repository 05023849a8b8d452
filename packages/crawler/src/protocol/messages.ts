import { z } from 'zod';
import { crawlConfigSchema } from '../config/crawl-config.js';
import { workerEventSchema } from './events.js';

/** Driver → worker. */
export const workerCommandSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('run'),
    workerId: z.number().int().min(0),
    urls: z.array(z.string()),
    config: crawlConfigSchema,
  }),
  z.object({ type: z.literal('cancel') }),
]);

/** Worker → driver. */
export const workerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('event'), event: workerEventSchema }),
  z.object({ type: z.literal('fatal'), message: z.string() }),
  z.object({ type: z.literal('done') }),
]);

export type WorkerCommand = z.infer<typeof workerCommandSchema>;
export type WorkerJob = Extract<WorkerCommand, { type: 'run' }>;
export type WorkerMessage = z.infer<typeof workerMessageSchema>;

export function formatFatalLine(message: string): string {
  return `[ERROR] Crawler initialization failed: ${message}`;
}
