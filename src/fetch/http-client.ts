/**
 * Thin HTTP GET client over the runtime's fetch().
 * Handles status checks, media-type gating, size limits and UTF-8 decoding.
 */
import { logger } from '../logger.js';
import type { HttpClientError } from './types.js';

/** Configuration constants */
export const DEFAULT_USER_AGENT = 'hostcrawl/1.0';
export const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

/** Media type assumed when Content-Type is missing or malformed. */
const FALLBACK_MEDIA_TYPE = 'text/plain';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  maxBytes?: number;
  /**
   * Media types the caller can handle. When the response has any other
   * type the body is discarded unread and `error` is `wrong_content_type`.
   */
  acceptMediaTypes?: readonly string[];
}

export interface HttpResponse {
  success: boolean;
  statusCode: number;
  /** Final response URL after redirects. */
  url: string;
  mediaType: string;
  html?: string;
  headers: Record<string, string>;
  error?: HttpClientError;
  message?: string;
}

/**
 * Reduce a Content-Type header to its lowercased `type/subtype`.
 * Parameters are dropped; anything without a slash counts as text/plain.
 */
export function parseMediaType(contentType: string | null | undefined): string {
  if (!contentType) return FALLBACK_MEDIA_TYPE;
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  const slash = mediaType.indexOf('/');
  if (slash <= 0 || slash === mediaType.length - 1) return FALLBACK_MEDIA_TYPE;
  return mediaType;
}

/**
 * Read a response body with a byte limit and decode it as UTF-8.
 * Invalid byte sequences become U+FFFD instead of failing the read.
 * Returns null when the limit is exceeded.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
  if (!response.body) return '';

  const reader = response.body.getReader();
  const decoder = new TextDecoder('utf-8', { fatal: false });
  const chunks: string[] = [];
  let totalBytes = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;

    totalBytes += value.byteLength;
    if (totalBytes > maxBytes) {
      await reader.cancel();
      return null;
    }
    chunks.push(decoder.decode(value, { stream: true }));
  }
  chunks.push(decoder.decode());

  return chunks.join('');
}

function failure(
  url: string,
  error: HttpClientError,
  message: string,
  extra: Partial<HttpResponse> = {}
): HttpResponse {
  return {
    success: false,
    statusCode: 0,
    url,
    mediaType: FALLBACK_MEDIA_TYPE,
    headers: {},
    error,
    message,
    ...extra,
  };
}

/**
 * Make a single HTTP GET request. Redirects are followed by the transport.
 * Never throws: every failure is reported through `error` and `message`.
 */
export async function httpRequest(
  url: string,
  options: HttpRequestOptions = {}
): Promise<HttpResponse> {
  const maxBytes = options.maxBytes ?? MAX_RESPONSE_SIZE;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return failure(url, 'invalid_url', `Invalid URL: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return failure(url, 'invalid_url', `Unsupported protocol: ${parsed.protocol}`);
  }

  logger.debug({ url }, 'Making HTTP request');

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      redirect: 'follow',
      headers: {
        'User-Agent': DEFAULT_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
        ...options.headers,
      },
      ...(options.timeoutMs !== undefined
        ? { signal: AbortSignal.timeout(options.timeoutMs) }
        : {}),
    });
  } catch (error) {
    const message =
      error instanceof DOMException && error.name === 'TimeoutError'
        ? `Request timeout after ${options.timeoutMs}ms for ${url}`
        : `Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`;
    return failure(url, 'network_error', message);
  }

  const headers = Object.fromEntries(response.headers.entries());
  const finalUrl = response.url || url;
  const mediaType = parseMediaType(response.headers.get('content-type'));
  const base = { statusCode: response.status, url: finalUrl, mediaType, headers };

  if (!response.ok) {
    await response.body?.cancel();
    return failure(url, 'http_status_error', `HTTP ${response.status} ${response.statusText}`.trim(), base);
  }

  if (options.acceptMediaTypes && !options.acceptMediaTypes.includes(mediaType)) {
    await response.body?.cancel();
    return failure(url, 'wrong_content_type', `Not interested in files of type ${mediaType}`, base);
  }

  const contentLength = response.headers.get('content-length');
  if (contentLength) {
    const size = parseInt(contentLength, 10);
    if (!isNaN(size) && size > maxBytes) {
      await response.body?.cancel();
      return failure(url, 'response_too_large', `Content-Length ${size} exceeds limit of ${maxBytes} bytes`, base);
    }
  }

  let html: string | null;
  try {
    html = await readBodyWithLimit(response, maxBytes);
  } catch (error) {
    return failure(url, 'network_error', `Error reading response body: ${String(error)}`, base);
  }
  if (html === null) {
    return failure(url, 'response_too_large', `Response body exceeds limit of ${maxBytes} bytes`, base);
  }

  logger.debug({ url, statusCode: response.status, bodyLength: html.length }, 'HTTP request complete');

  return { success: true, ...base, html };
}
