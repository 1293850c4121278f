/**
 * Crawler option schema and defaults
 */
import { z } from 'zod';
import type { PageCallback } from './types.js';

export const DEFAULT_DEPTH_LIMIT = 30;

export const CrawlerOptionsSchema = z.object({
  /** Deepest level that is still fetched; the root is depth 0. */
  depthLimit: z.number().int().nonnegative().default(DEFAULT_DEPTH_LIMIT),
  /** Only URLs starting with this prefix are followed or reported. */
  confine: z.string().optional(),
  /** URLs starting with any of these prefixes are never followed. */
  exclude: z.array(z.string()).default(() => []),
  /** Keep the crawl on the root's hostname. */
  locked: z.boolean().default(true),
  /** Apply the prefix and host filters to reported links as well. */
  filterReported: z.boolean().default(true),
  userAgent: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type ResolvedCrawlerOptions = z.output<typeof CrawlerOptionsSchema>;

export type CrawlerOptions = z.input<typeof CrawlerOptionsSchema> & {
  onPage?: PageCallback;
};
