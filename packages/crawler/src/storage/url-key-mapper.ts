const DOCUMENT_EXTENSION = '.md';
const INDEX_KEY = 'index';
const UNKNOWN_BUCKET = 'unknown';

/**
 * Maps URLs to their on-disk identity: a domain bucket (folder) and a file key.
 *
 * The mapping is lossy. Characters outside `[A-Za-z0-9_-]` are dropped, so
 * `/a.b` and `/ab` share a key, and the query string is ignored entirely.
 * Colliding URLs overwrite each other's file.
 */

function parse(url: string): URL | undefined {
  try {
    return new URL(url);
  } catch {
    return undefined;
  }
}

export function bucketOf(url: string): string {
  const parsed = parse(url);
  if (!parsed || parsed.host.length === 0) {
    return UNKNOWN_BUCKET;
  }

  return parsed.host.replace(/:/g, '_');
}

export function fileKeyOf(url: string): string {
  const parsed = parse(url);
  if (!parsed) {
    return INDEX_KEY;
  }

  const key = parsed.pathname
    .replace(/^\/+|\/+$/g, '')
    .replace(/\//g, '_')
    .replace(/[^A-Za-z0-9_-]/g, '');

  return key.length > 0 ? key : INDEX_KEY;
}

export function fileNameOf(url: string): string {
  return `${fileKeyOf(url)}${DOCUMENT_EXTENSION}`;
}

/** `<bucket>/<fileKey>.md`, always with forward slashes. */
export function relativePathOf(url: string): string {
  return `${bucketOf(url)}/${fileNameOf(url)}`;
}

export { DOCUMENT_EXTENSION };
