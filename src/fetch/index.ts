/**
 * Public API exports for the fetch module
 */
export { Fetcher, fetchPage } from './http-fetch.js';
export { httpRequest, parseMediaType, DEFAULT_USER_AGENT, MAX_RESPONSE_SIZE } from './http-client.js';
export type { FetchResult, FetchError, FetchOptions } from './types.js';
export type { HttpResponse, HttpRequestOptions } from './http-client.js';
