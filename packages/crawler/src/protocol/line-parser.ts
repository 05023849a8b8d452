import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { WorkerEvent } from './events.js';

type LineSource = Iterable<string> | AsyncIterable<string>;

const URL_MESSAGE = /^(\S+:\/\/\S+?):\s(.*)$/;
const INLINE_SAVE = /^(\S+:\/\/\S+)\s+->\s+(.+)$/;
const SAVED_TO = /^.*?to:\s*(.+)$/;
const DONE = /^Crawled (\d+) .*?saved in: (.+)$/;

/**
 * Turns protocol lines into events. Bare `[SUCCESS]` and `[ERROR]` lines are
 * attributed to the URL of the latest `[SCRAPE]` line, or to null when there
 * was none, so one parser must only ever see the lines of one worker.
 *
 * Takes any sync or async sequence of lines; wrap a Node `Readable` with
 * `readLines` first.
 */
export async function* parseEventLines(source: LineSource): AsyncGenerator<WorkerEvent> {
  let currentUrl: string | null = null;

  for await (const rawLine of splitLines(source)) {
    const line = rawLine.replace(/\r$/, '');
    if (line.trim().length === 0) {
      continue;
    }

    const event = parseLine(line.trim(), currentUrl);
    if (event.type === 'scrape-started') {
      currentUrl = event.url;
    }
    yield event;
  }
}

export function parseLine(line: string, currentUrl: string | null): WorkerEvent {
  const prefix = /^\[([A-Z]+)\]\s?(.*)$/.exec(line);
  if (!prefix) {
    return { type: 'unrecognized', rawLine: line };
  }

  const [, tag, rest = ''] = prefix;
  switch (tag) {
    case 'SCRAPE': {
      const url = rest.trim();
      return url ? { type: 'scrape-started', url } : { type: 'unrecognized', rawLine: line };
    }
    case 'SUCCESS': {
      const saved = /^Saved to:\s*(.+)$/.exec(rest);
      return saved?.[1]
        ? { type: 'save-succeeded', url: currentUrl, path: saved[1].trim() }
        : { type: 'unrecognized', rawLine: line };
    }
    case 'OK': {
      const inline = INLINE_SAVE.exec(rest);
      if (inline?.[1] && inline[2]) {
        return { type: 'save-succeeded', url: inline[1], path: inline[2].trim() };
      }
      const saved = SAVED_TO.exec(rest);
      return saved?.[1]
        ? { type: 'save-succeeded', url: currentUrl, path: saved[1].trim() }
        : { type: 'unrecognized', rawLine: line };
    }
    case 'ERROR': {
      const withUrl = URL_MESSAGE.exec(rest);
      if (withUrl?.[1] && withUrl[2] !== undefined) {
        return { type: 'failed', url: withUrl[1], message: withUrl[2] };
      }
      return { type: 'failed', url: currentUrl, message: rest.trim() };
    }
    case 'DONE': {
      const done = DONE.exec(rest);
      return done?.[1] && done[2]
        ? { type: 'run-finished', pageCount: Number(done[1]), bucketPath: done[2].trim() }
        : { type: 'unrecognized', rawLine: line };
    }
    case 'INFO':
      return { type: 'info', message: rest.trim() };
    default:
      return { type: 'unrecognized', rawLine: line };
  }
}

/** Lines of a byte stream such as a worker's stdout. */
export function readLines(stream: Readable): AsyncIterable<string> {
  return createInterface({ input: stream, crlfDelay: Infinity });
}

async function* splitLines(source: LineSource): AsyncGenerator<string> {
  for await (const chunk of source) {
    yield* chunk.split('\n');
  }
}
