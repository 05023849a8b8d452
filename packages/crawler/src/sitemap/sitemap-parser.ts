import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { hasUriScheme } from '../utils/url.js';
import type { ParsedSitemap } from './types.js';

type SitemapParseOutcome =
  | { ok: true; sitemap: ParsedSitemap }
  | { ok: false; message: string };

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
});

/**
 * Collects every `loc` element of the tree, whatever its namespace prefix.
 * A `loc` whose parent is `sitemap` points at a nested sitemap.
 */
export function parseXmlSitemap(body: string): SitemapParseOutcome {
  const validation = XMLValidator.validate(body);
  if (validation !== true) {
    const { msg, line } = validation.err;
    return { ok: false, message: `${msg} (line ${line})` };
  }

  const tree: unknown = parser.parse(body);
  const sitemap: ParsedSitemap = { pageUrls: [], sitemapUrls: [] };
  collectLocs(tree, undefined, sitemap);

  return { ok: true, sitemap };
}

export function parseTextSitemap(body: string): ParsedSitemap {
  const pageUrls = body
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => hasUriScheme(line));

  return { pageUrls, sitemapUrls: [] };
}

/** `Sitemap:` directives of a robots.txt body. */
export function parseRobotsSitemaps(body: string): string[] {
  const urls: string[] = [];
  for (const line of body.split(/\r?\n/)) {
    const match = /^\s*sitemap\s*:\s*(\S+)/i.exec(line);
    if (match?.[1]) {
      urls.push(match[1]);
    }
  }

  return urls;
}

function collectLocs(
  node: unknown,
  parentKey: string | undefined,
  sitemap: ParsedSitemap,
): void {
  if (Array.isArray(node)) {
    for (const item of node) {
      collectLocs(item, parentKey, sitemap);
    }
    return;
  }

  if (typeof node !== 'object' || node === null) {
    return;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key !== 'loc') {
      collectLocs(value, key, sitemap);
      continue;
    }

    const target =
      parentKey === 'sitemap' ? sitemap.sitemapUrls : sitemap.pageUrls;
    for (const loc of Array.isArray(value) ? value : [value]) {
      if (typeof loc === 'string' && loc.trim().length > 0) {
        target.push(loc.trim());
      }
    }
  }
}

export type { SitemapParseOutcome };
