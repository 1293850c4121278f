/**
 * Types for the crawl module
 */
import type { FetchResult } from '../fetch/types.js';

/** The only link type the crawler records today. */
export type LinkType = 'href';

/** A directed edge from a visited page to a URL it references. */
export interface Link {
  readonly source: string;
  readonly destination: string;
  readonly type: LinkType;
}

export interface FrontierEntry {
  url: string;
  depth: number;
}

/** Called once per followed page, after its links have been processed. */
export type PageCallback = (page: { url: string; depth: number; result: FetchResult }) => void;

export interface CrawlReport {
  root: string;
  host: string;
  depthLimit: number;
  /** Discovered links that passed the report filters (repeats included). */
  numLinks: number;
  /** Pages the crawler attempted to fetch. */
  numFollowed: number;
  /** URLs fetched, in crawl order. */
  visited: string[];
  /** Distinct discovered URLs that passed the report filters. */
  urls: string[];
  /** Distinct remembered edges, in discovery order. */
  links: Link[];
}

export function createLink(source: string, destination: string, type: LinkType = 'href'): Link {
  return { source, destination, type };
}

/** Identity of a link for set membership: equal triples share a key. */
export function linkKey(link: Link): string {
  return JSON.stringify([link.source, link.destination, link.type]);
}

export function linkToString(link: Link): string {
  return `${link.source} -> ${link.destination}`;
}
