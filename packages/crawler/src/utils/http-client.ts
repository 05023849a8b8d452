import axios, { type AxiosInstance } from 'axios';
import pLimit from 'p-limit';
import { toErrorMessage } from '../errors/crawl-errors.js';

type HttpResponse = {
  ok: true;
  /** Final URL once redirects are followed. */
  url: string;
  status: number;
  contentType: string;
  body: string;
};

type HttpFailure = {
  ok: false;
  url: string;
  reason: string;
  timedOut: boolean;
};

type HttpTextOutcome = HttpResponse | HttpFailure;

/** Anything that can GET a URL as text. Tests substitute in-memory fakes. */
type TextFetcher = {
  getText(url: string): Promise<HttpTextOutcome>;
};

type HttpClientOptions = {
  userAgent?: string;
  timeoutMs?: number;
  concurrency?: number;
};

/** URL of the document axios ended on, after following redirects. */
function finalUrlOf(request: { res?: { responseUrl?: unknown } } | undefined, url: string): string {
  const responseUrl = request?.res?.responseUrl;
  return typeof responseUrl === 'string' && responseUrl.length > 0 ? responseUrl : url;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export class HttpClient implements TextFetcher {
  private readonly client: AxiosInstance;
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(options: HttpClientOptions = {}) {
    this.client = axios.create({
      timeout: options.timeoutMs ?? 10_000,
      maxRedirects: 5,
      responseType: 'text',
      // keep bodies as raw text, never JSON-parsed
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept:
          'text/html,application/xhtml+xml,application/xml;q=0.9,text/plain;q=0.8,*/*;q=0.5',
        'Accept-Language': 'en-US,en;q=0.9',
      },
    });
    this.limit = pLimit(Math.max(1, options.concurrency ?? 8));
  }

  async getText(url: string): Promise<HttpTextOutcome> {
    return this.limit(async () => {
      try {
        const response = await this.client.get<unknown>(url);
        const body =
          typeof response.data === 'string'
            ? response.data
            : String(response.data ?? '');

        return {
          ok: true,
          url: finalUrlOf(response.request, url),
          status: response.status,
          contentType: String(response.headers['content-type'] ?? ''),
          body,
        };
      } catch (error) {
        const timedOut =
          axios.isAxiosError(error) &&
          (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');

        return {
          ok: false,
          url,
          reason: toErrorMessage(error),
          timedOut,
        };
      }
    });
  }
}

export type {
  HttpClientOptions,
  HttpFailure,
  HttpResponse,
  HttpTextOutcome,
  TextFetcher,
};
