import { PageFetchAdapter } from '../web-engine/engine-adapter.js';
import type { FetchOutcome } from '../web-engine/types.js';
import type { HttpTextOutcome, TextFetcher } from '../utils/http-client.js';

type ScriptedPage = {
  primaryDocument?: string | null;
  fallbackDocument?: string | null;
  links?: string[];
};

/**
 * Page adapter answering from a fixed URL → page map; unknown URLs are 404s.
 * Adapters built from one pool factory can share a `fetched` log.
 */
export class ScriptedAdapter extends PageFetchAdapter {
  readonly engineType = 'custom' as const;
  cleaned = false;

  constructor(
    private readonly pages: Record<string, ScriptedPage>,
    readonly fetched: string[] = [],
  ) {
    super();
  }

  async fetch(url: string): Promise<FetchOutcome> {
    this.fetched.push(url);
    const page = this.pages[url];
    if (!page) {
      return {
        success: false,
        url,
        errorMessage: 'HTTP 404',
        errorCode: 'http-error',
        metadata: { duration: 0, method: 'scripted' },
      };
    }

    return {
      success: true,
      url,
      finalUrl: url,
      title: '',
      primaryDocument: page.primaryDocument ?? null,
      fallbackDocument: page.fallbackDocument ?? null,
      links: page.links ?? [],
      metadata: { duration: 0, method: 'scripted' },
    };
  }

  async cleanup(): Promise<void> {
    this.cleaned = true;
  }
}

type Route = {
  status?: number;
  contentType?: string;
  body: string;
  /** Where redirects end; the requested URL when unset. */
  finalUrl?: string;
};

/** In-memory `TextFetcher`; unknown URLs answer 404. */
export class FakeTextFetcher implements TextFetcher {
  readonly requested: string[] = [];

  constructor(private readonly routes: Record<string, Route>) {}

  async getText(url: string): Promise<HttpTextOutcome> {
    this.requested.push(url);
    const route = this.routes[url];
    if (!route) {
      return { ok: true, url, status: 404, contentType: 'text/html', body: 'Not found' };
    }

    return {
      ok: true,
      url: route.finalUrl ?? url,
      status: route.status ?? 200,
      contentType: route.contentType ?? 'application/xml',
      body: route.body,
    };
  }
}

export type { Route, ScriptedPage };
