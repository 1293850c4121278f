/**
 * URL predicates that decide what the crawler follows and what it records
 */
import { logger } from '../logger.js';

export interface UrlFilter {
  readonly name: string;
  test(url: string): boolean;
}

export interface FilterVerdict {
  accepted: boolean;
  /** Names of the filters that rejected the URL, in pipeline order. */
  rejectedBy: string[];
}

/** Passes every URL when no prefix is set; otherwise only URLs under it. */
export class PrefixFilter implements UrlFilter {
  readonly name = 'prefix';

  constructor(private readonly prefix?: string) {}

  test(url: string): boolean {
    return this.prefix === undefined || url.startsWith(this.prefix);
  }
}

/** Rejects URLs starting with any of the excluded prefixes. */
export class ExclusionFilter implements UrlFilter {
  readonly name = 'exclude';
  private readonly prefixes: readonly string[];

  constructor(prefixes: readonly string[] = []) {
    this.prefixes = Object.freeze([...prefixes]);
  }

  test(url: string): boolean {
    return !this.prefixes.some((prefix) => url.startsWith(prefix));
  }
}

/** Rejects URLs that are already in the visited set. */
export class VisitedFilter implements UrlFilter {
  readonly name = 'visited';

  constructor(private readonly visited: ReadonlySet<string>) {}

  test(url: string): boolean {
    return !this.visited.has(url);
  }
}

/**
 * Passes URLs whose hostname matches the root hostname.
 * A URL that cannot be parsed fails the filter.
 */
export class HostFilter implements UrlFilter {
  readonly name = 'host';

  constructor(private readonly host: string) {}

  test(url: string): boolean {
    try {
      return new URL(url).hostname === this.host;
    } catch (e) {
      logger.warn({ url, error: String(e) }, "Can't process url");
      return false;
    }
  }
}

/** Ordered AND-composition of filters. An empty pipeline accepts everything. */
export class FilterPipeline {
  private readonly filters: readonly UrlFilter[];

  constructor(filters: readonly UrlFilter[]) {
    this.filters = Object.freeze([...filters]);
  }

  /** Runs every filter so the verdict names all of the rejecting ones. */
  evaluate(url: string): FilterVerdict {
    const rejectedBy = this.filters.filter((f) => !f.test(url)).map((f) => f.name);
    return { accepted: rejectedBy.length === 0, rejectedBy };
  }

  accepts(url: string): boolean {
    return this.filters.every((f) => f.test(url));
  }

  get names(): string[] {
    return this.filters.map((f) => f.name);
  }
}
