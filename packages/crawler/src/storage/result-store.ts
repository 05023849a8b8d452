import { randomUUID } from 'node:crypto';
import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { createLogger, type Logger } from '@workspace/logger';
import { toErrorMessage } from '../errors/crawl-errors.js';
import { relativePathOf } from './url-key-mapper.js';
import type { PersistOutcome, ResultStoreOptions } from './types.js';

/**
 * Writes one Markdown document per URL under `<rootDir>/<bucket>/<key>.md`.
 * Re-persisting a URL overwrites its file.
 */
export class ResultStore {
  private readonly rootDir: string;
  private readonly log: Logger;
  private readonly writtenBy: Map<string, string>;

  constructor(options: ResultStoreOptions, logger?: Logger) {
    this.rootDir = resolve(options.rootDir);
    this.log = logger ?? createLogger('ResultStore');
    this.writtenBy = new Map();
  }

  get root(): string {
    return this.rootDir;
  }

  pathFor(url: string): string {
    return relativePathOf(url);
  }

  absolutePathOf(savedPath: string): string {
    return join(this.rootDir, ...savedPath.split('/'));
  }

  async persist(url: string, document: string): Promise<PersistOutcome> {
    const savedPath = this.pathFor(url);
    const absolutePath = this.absolutePathOf(savedPath);
    // one temp file per write: colliding keys may be persisted concurrently
    const tmpPath = `${absolutePath}.${randomUUID()}.tmp`;

    const previousUrl = this.writtenBy.get(savedPath);
    if (previousUrl !== undefined && previousUrl !== url) {
      this.log.warn(
        'File key collision, overwriting',
        JSON.stringify({ savedPath, previousUrl, url }),
      );
    }

    try {
      // recursive mkdir tolerates a bucket created concurrently by another worker
      await mkdir(dirname(absolutePath), { recursive: true });
      await writeFile(tmpPath, document, 'utf-8');
      await rename(tmpPath, absolutePath);
    } catch (error) {
      const message = toErrorMessage(error);
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.log.warn(`Could not remove ${tmpPath}: ${toErrorMessage(cleanupError)}`);
      });
      this.log.error('Failed to persist document', JSON.stringify({ url, message }));
      return {
        ok: false,
        error: { kind: 'persistence-error', message, path: savedPath },
      };
    }

    this.writtenBy.set(savedPath, url);

    return {
      ok: true,
      savedPath,
      absolutePath,
      byteLength: Buffer.byteLength(document, 'utf-8'),
    };
  }

  async exists(url: string): Promise<boolean> {
    try {
      await access(this.absolutePathOf(this.pathFor(url)));
      return true;
    } catch {
      return false;
    }
  }

  async read(savedPath: string): Promise<string | undefined> {
    try {
      return await readFile(this.absolutePathOf(savedPath), 'utf-8');
    } catch {
      return undefined;
    }
  }
}
