/**
 * Shared types for the fetch module
 */

export type HttpClientError =
  | 'invalid_url'
  | 'network_error'
  | 'http_status_error'
  | 'wrong_content_type'
  | 'response_too_large';

export type FetchError =
  | 'non_html_content'
  | 'invalid_url'
  | 'network_error'
  | 'http_status_error'
  | 'response_too_large';

export interface FetchOptions {
  /** User-Agent header sent with the request. */
  userAgent?: string;
  /** Abort the request after this many milliseconds. No limit when unset. */
  timeoutMs?: number;
  /** Largest body, in bytes, the fetcher will read. */
  maxBytes?: number;
}

export interface FetchResult {
  success: boolean;
  /** The URL that was requested; relative links resolve against it. */
  url: string;
  /** Response URL after redirects, when it differs from `url`. */
  finalUrl?: string;
  statusCode: number | null;
  contentType?: string;
  /** Absolute outbound URLs in document order, without repeats. */
  links: string[];
  latencyMs: number;

  error?: FetchError;
  errorDetails?: {
    message?: string;
    statusCode?: number;
    contentType?: string;
  };
}
