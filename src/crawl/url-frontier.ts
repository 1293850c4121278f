/**
 * BFS URL frontier with fragment normalization and enqueue-once dedup
 */
import type { FrontierEntry } from './types.js';

/**
 * Normalize a URL for frontier deduplication by dropping its fragment.
 * Works on the raw string, so it never throws and is idempotent.
 */
export function normalizeUrl(url: string): string {
  const hashIdx = url.indexOf('#');
  return hashIdx === -1 ? url : url.slice(0, hashIdx);
}

export class UrlFrontier {
  private queue: FrontierEntry[] = [];
  private head = 0;
  private readonly seen = new Set<string>();

  /**
   * Seed the frontier. The start URL counts as seen, so links back to it
   * are never queued a second time.
   */
  constructor(startUrl: string) {
    this.add(startUrl, 0);
  }

  /**
   * Queue a URL unless it has been queued before. Membership check and
   * insertion happen together, so a URL enters the queue at most once.
   */
  add(url: string, depth: number): boolean {
    if (this.seen.has(url)) return false;
    this.seen.add(url);
    this.queue.push({ url, depth });
    return true;
  }

  /** Next entry in FIFO order, or null when the frontier is drained. */
  next(): FrontierEntry | null {
    if (this.head >= this.queue.length) return null;
    const entry = this.queue[this.head++];

    // Compact once the consumed prefix dominates the backing array.
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
    return entry;
  }

  hasMore(): boolean {
    return this.head < this.queue.length;
  }

  has(url: string): boolean {
    return this.seen.has(url);
  }

  /** Every URL ever queued, including the start URL. */
  get seenUrls(): ReadonlySet<string> {
    return this.seen;
  }

  get pendingCount(): number {
    return this.queue.length - this.head;
  }
}
