/**
 * Crawl module barrel exports
 */
export { Crawler, InvalidRootUrlError } from './crawler.js';
export { CrawlerOptionsSchema, DEFAULT_DEPTH_LIMIT } from './options.js';
export {
  FilterPipeline,
  PrefixFilter,
  ExclusionFilter,
  VisitedFilter,
  HostFilter,
} from './filters.js';
export { UrlFrontier, normalizeUrl } from './url-frontier.js';
export { extractLinks, escapeHref } from './link-extractor.js';
export { createLink, linkKey, linkToString } from './types.js';
export type { CrawlerOptions, ResolvedCrawlerOptions } from './options.js';
export type { UrlFilter, FilterVerdict } from './filters.js';
export type { Link, LinkType, FrontierEntry, CrawlReport, PageCallback } from './types.js';
