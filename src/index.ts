/**
 * hostcrawl - breadth-first crawler for a single host.
 *
 * @module hostcrawl
 */
export {
  Crawler,
  InvalidRootUrlError,
  CrawlerOptionsSchema,
  DEFAULT_DEPTH_LIMIT,
  FilterPipeline,
  PrefixFilter,
  ExclusionFilter,
  VisitedFilter,
  HostFilter,
  UrlFrontier,
  normalizeUrl,
  extractLinks,
  createLink,
  linkToString,
} from './crawl/index.js';
export { Fetcher, fetchPage, httpRequest, parseMediaType } from './fetch/index.js';
export type {
  CrawlerOptions,
  CrawlReport,
  Link,
  LinkType,
  UrlFilter,
  FilterVerdict,
  PageCallback,
} from './crawl/index.js';
export type { FetchResult, FetchError, FetchOptions, HttpResponse } from './fetch/index.js';
