/**
 * Breadth-first single-host crawler
 */
import { Fetcher } from '../fetch/http-fetch.js';
import {
  ExclusionFilter,
  FilterPipeline,
  HostFilter,
  PrefixFilter,
  VisitedFilter,
  type UrlFilter,
} from './filters.js';
import { CrawlerOptionsSchema, type CrawlerOptions, type ResolvedCrawlerOptions } from './options.js';
import { UrlFrontier, normalizeUrl } from './url-frontier.js';
import { createLink, linkKey, type CrawlReport, type FrontierEntry, type Link, type PageCallback } from './types.js';
import { logger } from '../logger.js';

export class InvalidRootUrlError extends Error {
  constructor(
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`Invalid root URL: ${url}`, options);
    this.name = 'InvalidRootUrlError';
  }
}

/**
 * Crawls every page reachable from a root URL, level by level, up to a
 * depth limit.
 *
 * Two filter pipelines drive the crawl. The follow pipeline (prefix,
 * exclusion, visited, host) decides which queued URLs get fetched. The
 * report pipeline (prefix, host) decides which discovered URLs are
 * remembered as links. Discovery and reporting are independent: a URL can
 * be queued without being reported and the other way round.
 */
export class Crawler {
  readonly root: string;
  readonly host: string;
  readonly options: Readonly<ResolvedCrawlerOptions>;

  private readonly frontier: UrlFrontier;
  private readonly visited = new Set<string>();
  private readonly remembered = new Set<string>();
  private readonly links = new Map<string, Link>();
  private readonly followPipeline: FilterPipeline;
  private readonly reportPipeline: FilterPipeline;
  private readonly onPage?: PageCallback;

  private linkCount = 0;
  private followedCount = 0;

  /**
   * @throws InvalidRootUrlError when `root` has no parseable hostname
   * @throws ZodError when an option is out of range
   */
  constructor(root: string, options: CrawlerOptions = {}) {
    const { onPage, ...rest } = options;
    const parsed = CrawlerOptionsSchema.parse(rest);
    this.options = Object.freeze(parsed);
    this.onPage = onPage;

    this.root = normalizeUrl(root);
    let hostname: string;
    try {
      hostname = new URL(this.root).hostname;
    } catch (error) {
      throw new InvalidRootUrlError(root, { cause: error });
    }
    if (!hostname) throw new InvalidRootUrlError(root);
    this.host = hostname;

    this.frontier = new UrlFrontier(this.root);

    const prefix = new PrefixFilter(this.options.confine);
    const hostFilters: UrlFilter[] = this.options.locked ? [new HostFilter(this.host)] : [];

    this.followPipeline = new FilterPipeline([
      prefix,
      new ExclusionFilter(this.options.exclude),
      new VisitedFilter(this.visited),
      ...hostFilters,
    ]);
    this.reportPipeline = new FilterPipeline(
      this.options.filterReported ? [prefix, ...hostFilters] : []
    );
  }

  /** Every URL ever queued, the root included. */
  get urlsSeen(): ReadonlySet<string> {
    return this.frontier.seenUrls;
  }

  /** URLs the crawler has fetched, in crawl order. */
  get visitedLinks(): ReadonlySet<string> {
    return this.visited;
  }

  get urlsRemembered(): ReadonlySet<string> {
    return this.remembered;
  }

  get linksRemembered(): Link[] {
    return [...this.links.values()];
  }

  get numLinks(): number {
    return this.linkCount;
  }

  get numFollowed(): number {
    return this.followedCount;
  }

  async crawl(): Promise<CrawlReport> {
    logger.info({ root: this.root, depthLimit: this.options.depthLimit }, 'Starting crawl');

    for (let entry = this.frontier.next(); entry !== null; entry = this.frontier.next()) {
      try {
        await this.visit(entry);
      } catch (error) {
        logger.error(
          { url: entry.url, depth: entry.depth, error: error instanceof Error ? error.message : String(error) },
          'Abandoning page after unexpected error'
        );
      }
    }

    logger.info({ root: this.root, found: this.linkCount, followed: this.followedCount }, 'Crawl complete');
    return this.report();
  }

  report(): CrawlReport {
    return {
      root: this.root,
      host: this.host,
      depthLimit: this.options.depthLimit,
      numLinks: this.linkCount,
      numFollowed: this.followedCount,
      visited: [...this.visited],
      urls: [...this.remembered],
      links: this.linksRemembered,
    };
  }

  private async visit({ url, depth }: FrontierEntry): Promise<void> {
    if (depth > this.options.depthLimit) {
      logger.debug({ url, depth }, 'Beyond depth limit');
      return;
    }

    const verdict = this.followPipeline.evaluate(url);
    if (!verdict.accepted) {
      if (depth === 0) {
        logger.warn({ url, rejectedBy: verdict.rejectedBy }, 'Starting URL rejected by filters');
      } else {
        logger.debug({ url, rejectedBy: verdict.rejectedBy }, 'Not following');
      }
      return;
    }

    this.visited.add(url);
    this.followedCount++;
    logger.debug({ url, depth }, 'Following');

    const fetcher = new Fetcher(url, {
      userAgent: this.options.userAgent,
      timeoutMs: this.options.timeoutMs,
    });
    const result = await fetcher.fetch();

    for (const outLink of fetcher.outLinks()) {
      const destination = normalizeUrl(outLink);
      this.frontier.add(destination, depth + 1);

      if (this.reportPipeline.accepts(destination)) {
        this.linkCount++;
        this.remembered.add(destination);
        const link = createLink(url, destination);
        this.links.set(linkKey(link), link);
      }
    }

    this.onPage?.({ url, depth, result });
  }
}
