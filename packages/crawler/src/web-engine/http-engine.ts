import { createLogger, type Logger } from '@workspace/logger'
import { HttpClient, type HttpClientOptions, type TextFetcher } from '../utils/http-client.js'
import { PageFetchAdapter } from './engine-adapter.js'
import { extractPage, renderBlocks } from './markdown-extractor.js'
import type { ContentFilter } from '../filters/types.js'
import type { FetchOutcome } from './types.js'

const isHtml = (contentType: string, body: string): boolean =>
  /html/i.test(contentType) || (contentType === '' && /^\s*(<!doctype html|<html)/i.test(body))

const isPlainText = (contentType: string): boolean => /^text\/(plain|markdown)/i.test(contentType)

/**
 * Static HTML engine: fetches with axios, parses with cheerio. Does not run
 * page scripts.
 */
export class HttpPageFetchAdapter extends PageFetchAdapter {
  readonly engineType = 'http' as const
  private readonly fetcher: TextFetcher
  private readonly log: Logger

  constructor(options?: HttpClientOptions & { fetcher?: TextFetcher; logger?: Logger }) {
    super()
    this.fetcher = options?.fetcher ?? new HttpClient(options)
    this.log = options?.logger ?? createLogger('HttpEngine')
  }

  async fetch(url: string, filter: ContentFilter, excludedTags: readonly string[]): Promise<FetchOutcome> {
    const startTime = Date.now()
    this.log.debug(`Fetching content: ${url}`)

    const response = await this.fetcher.getText(url)

    if (!response.ok) {
      this.log.warn('Fetch failed:', response.reason)
      return {
        success: false,
        url,
        errorMessage: response.reason,
        errorCode: response.timedOut ? 'timeout' : 'unexpected',
        metadata: { duration: Date.now() - startTime, method: 'http' }
      }
    }

    if (response.status >= 400) {
      return {
        success: false,
        url,
        errorMessage: `HTTP ${response.status}`,
        errorCode: response.status === 403 || response.status === 429 ? 'blocked' : 'http-error',
        metadata: { duration: Date.now() - startTime, method: 'http', statusCode: response.status }
      }
    }

    const metadata = {
      duration: 0,
      method: 'http',
      statusCode: response.status,
      contentType: response.contentType
    }

    if (!isHtml(response.contentType, response.body)) {
      const text = isPlainText(response.contentType) ? response.body : null
      return {
        success: true,
        url,
        finalUrl: response.url,
        title: '',
        primaryDocument: null,
        fallbackDocument: text,
        links: [],
        metadata: { ...metadata, duration: Date.now() - startTime }
      }
    }

    const page = extractPage(response.body, response.url, excludedTags)
    const kept = filter.filter(page.blocks)

    return {
      success: true,
      url,
      finalUrl: response.url,
      title: page.title,
      primaryDocument: kept.length > 0 ? renderBlocks(kept) : null,
      fallbackDocument: page.blocks.length > 0 ? renderBlocks(page.blocks) : null,
      links: page.links,
      metadata: {
        ...metadata,
        duration: Date.now() - startTime,
        filter: filter.name,
        blocks: page.blocks.length,
        keptBlocks: kept.length
      }
    }
  }

  async cleanup(): Promise<void> {}
}
