/**
 * Single-page fetch: GET the page, gate on text/html, extract outbound links
 */
import { httpRequest, DEFAULT_USER_AGENT, type HttpResponse } from './http-client.js';
import { extractLinks } from '../crawl/link-extractor.js';
import { logger } from '../logger.js';
import type { FetchError, FetchOptions, FetchResult } from './types.js';

const HTML_MEDIA_TYPES = ['text/html'] as const;

/** Logger interface accepted by the fetcher. */
type Log = Pick<typeof logger, 'info' | 'debug' | 'warn' | 'error'>;

function toFetchError(error: HttpResponse['error']): FetchError {
  switch (error) {
    case 'wrong_content_type':
      return 'non_html_content';
    case 'invalid_url':
    case 'http_status_error':
    case 'response_too_large':
      return error;
    default:
      return 'network_error';
  }
}

/** Build a failure result with common fields pre-filled. */
function failResult(
  url: string,
  startTime: number,
  response: HttpResponse
): FetchResult {
  const error = toFetchError(response.error);
  const statusCode = response.statusCode > 0 ? response.statusCode : null;
  return {
    success: false,
    url,
    finalUrl: response.url !== url ? response.url : undefined,
    statusCode,
    contentType: statusCode !== null ? response.mediaType : undefined,
    links: [],
    latencyMs: Date.now() - startTime,
    error,
    errorDetails: {
      message: response.message,
      statusCode: statusCode ?? undefined,
      contentType: error === 'non_html_content' ? response.mediaType : undefined,
    },
  };
}

/**
 * Fetches one page and collects its outbound links.
 *
 * Relative links resolve against the requested URL, even when the server
 * redirected elsewhere. A fetcher is meant to be used for a single page;
 * `outLinks()` reflects the most recent `fetch()`.
 */
export class Fetcher {
  private links: string[] = [];
  private readonly log: Log;

  constructor(
    readonly url: string,
    private readonly options: FetchOptions = {}
  ) {
    this.log = logger.child?.({ url }) ?? logger;
  }

  async fetch(): Promise<FetchResult> {
    const startTime = Date.now();
    this.links = [];

    const response = await httpRequest(this.url, {
      headers: { 'User-Agent': this.options.userAgent ?? DEFAULT_USER_AGENT },
      timeoutMs: this.options.timeoutMs,
      maxBytes: this.options.maxBytes,
      acceptMediaTypes: HTML_MEDIA_TYPES,
    });

    if (!response.success || response.html === undefined) {
      const result = failResult(this.url, startTime, response);
      if (result.error === 'non_html_content') {
        this.log.info({ contentType: response.mediaType }, 'Skipping non-HTML content');
      } else {
        this.log.warn(
          { error: result.error, statusCode: result.statusCode, message: response.message },
          'Fetch failed'
        );
      }
      return result;
    }

    this.links = extractLinks(response.html, this.url);
    const latencyMs = Date.now() - startTime;
    this.log.debug({ latencyMs, linkCount: this.links.length }, 'Fetched page');

    return {
      success: true,
      url: this.url,
      finalUrl: response.url !== this.url ? response.url : undefined,
      statusCode: response.statusCode,
      contentType: response.mediaType,
      links: [...this.links],
      latencyMs,
    };
  }

  /** Outbound links of the last fetch; empty before the first one. */
  outLinks(): string[] {
    return [...this.links];
  }
}

/** Convenience wrapper: fetch one page with a fresh Fetcher. */
export function fetchPage(url: string, options: FetchOptions = {}): Promise<FetchResult> {
  return new Fetcher(url, options).fetch();
}
