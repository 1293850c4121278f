import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ZodError } from 'zod';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { Crawler, InvalidRootUrlError } from '../crawl/crawler.js';
import { linkToString } from '../crawl/types.js';
import { logger } from '../logger.js';
import { htmlPage, stubSite, type FakeSite } from './test-helpers.js';

const ROOT = 'http://root.example/';

/** root -> /a, /b; /a -> /c; /b -> /d */
const TREE: FakeSite = {
  [ROOT]: { body: htmlPage('/a', '/b') },
  'http://root.example/a': { body: htmlPage('/c') },
  'http://root.example/b': { body: htmlPage('/d') },
  'http://root.example/c': { body: htmlPage() },
  'http://root.example/d': { body: htmlPage() },
};

describe('Crawler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('construction', () => {
    it('normalizes the root and marks it seen', () => {
      const crawler = new Crawler('http://root.example/#top');
      expect(crawler.root).toBe(ROOT);
      expect(crawler.host).toBe('root.example');
      expect([...crawler.urlsSeen]).toEqual([ROOT]);
      expect(crawler.numFollowed).toBe(0);
      expect(crawler.numLinks).toBe(0);
    });

    it('applies option defaults', () => {
      const { options } = new Crawler(ROOT);
      expect(options).toEqual({ depthLimit: 30, exclude: [], locked: true, filterReported: true });
    });

    it('throws InvalidRootUrlError for an unparseable root', () => {
      expect(() => new Crawler('not a url')).toThrow(InvalidRootUrlError);
      expect(() => new Crawler('mailto:x@root.example')).toThrow('Invalid root URL: mailto:x@root.example');
    });

    it('throws ZodError for invalid options before any request', () => {
      const fetchMock = stubSite(TREE);
      expect(() => new Crawler(ROOT, { depthLimit: -1 })).toThrow(ZodError);
      expect(() => new Crawler(ROOT, { depthLimit: 1.5 })).toThrow(ZodError);
      expect(() => new Crawler(ROOT, { timeoutMs: 0 })).toThrow(ZodError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('crawl', () => {
    it('follows same-host links and reports only those', async () => {
      const fetchMock = stubSite({
        [ROOT]: { body: htmlPage('/a', 'http://other.example/b') },
        'http://root.example/a': { body: htmlPage() },
      });

      const report = await new Crawler(ROOT).crawl();

      expect(report.numFollowed).toBe(2);
      expect(report.numLinks).toBe(1);
      expect(report.links).toEqual([
        { source: ROOT, destination: 'http://root.example/a', type: 'href' },
      ]);
      expect(report.urls).toEqual(['http://root.example/a']);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('visits pages in breadth-first order', async () => {
      stubSite(TREE);

      const report = await new Crawler(ROOT).crawl();

      expect(report.visited).toEqual([
        ROOT,
        'http://root.example/a',
        'http://root.example/b',
        'http://root.example/c',
        'http://root.example/d',
      ]);
      expect(report.links.map(linkToString)).toEqual([
        'http://root.example/ -> http://root.example/a',
        'http://root.example/ -> http://root.example/b',
        'http://root.example/a -> http://root.example/c',
        'http://root.example/b -> http://root.example/d',
      ]);
    });

    it('fetches only the root at depth limit 0 but still counts its links', async () => {
      const fetchMock = stubSite(TREE);

      const report = await new Crawler(ROOT, { depthLimit: 0 }).crawl();

      expect(report.numFollowed).toBe(1);
      expect(report.numLinks).toBe(2);
      expect(report.visited).toEqual([ROOT]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('stops one level past the depth limit', async () => {
      stubSite(TREE);

      const crawler = new Crawler(ROOT, { depthLimit: 1 });
      const report = await crawler.crawl();

      expect(report.visited).toEqual([ROOT, 'http://root.example/a', 'http://root.example/b']);
      expect(report.numLinks).toBe(4);
      expect(crawler.urlsSeen.has('http://root.example/c')).toBe(true);
    });

    it('counts a non-HTML page as followed with no links', async () => {
      stubSite({ [ROOT]: { contentType: 'application/pdf', body: '%PDF-1.7' } });

      const report = await new Crawler(ROOT).crawl();

      expect(report.numFollowed).toBe(1);
      expect(report.numLinks).toBe(0);
      expect(report.links).toEqual([]);
    });

    it('counts a failed fetch as followed with no links', async () => {
      stubSite({ [ROOT]: { body: htmlPage('/gone') } });

      const report = await new Crawler(ROOT).crawl();

      expect(report.visited).toEqual([ROOT, 'http://root.example/gone']);
      expect(report.numLinks).toBe(1);
    });

    it('fetches each page once in a cyclic site', async () => {
      const fetchMock = stubSite({
        [ROOT]: { body: htmlPage('/a', '/b') },
        'http://root.example/a': { body: htmlPage('/', '/b', '/a#top') },
        'http://root.example/b': { body: htmlPage('/a') },
      });

      const crawler = new Crawler(ROOT);
      const report = await crawler.crawl();

      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(report.numFollowed).toBe(3);
      expect(crawler.visitedLinks.size).toBe(crawler.numFollowed);
      expect(report.numLinks).toBe(6);
      expect(report.links).toHaveLength(6);
      expect([...crawler.urlsRemembered]).toEqual([
        'http://root.example/a',
        'http://root.example/b',
        ROOT,
      ]);
    });

    it('counts repeated links but remembers each edge once', async () => {
      stubSite({
        [ROOT]: { body: htmlPage('/x#one', '/x#two') },
        'http://root.example/x': { body: htmlPage() },
      });

      const crawler = new Crawler(ROOT);
      await crawler.crawl();

      expect(crawler.numLinks).toBe(2);
      expect(crawler.linksRemembered).toEqual([
        { source: ROOT, destination: 'http://root.example/x', type: 'href' },
      ]);
    });

    it('lets two sources share a destination', async () => {
      stubSite({
        [ROOT]: { body: htmlPage('/a', '/shared') },
        'http://root.example/a': { body: htmlPage('/shared') },
        'http://root.example/shared': { body: htmlPage() },
      });

      const report = await new Crawler(ROOT).crawl();

      const toShared = report.links.filter((l) => l.destination === 'http://root.example/shared');
      expect(toShared.map((l) => l.source)).toEqual([ROOT, 'http://root.example/a']);
    });

    it('keeps the crawl and the report inside the confine prefix', async () => {
      const docs = 'http://root.example/docs/';
      stubSite({
        [docs]: { body: htmlPage('/docs/a', '/blog/b') },
        'http://root.example/docs/a': { body: htmlPage() },
        'http://root.example/blog/b': { body: htmlPage() },
      });

      const report = await new Crawler(docs, { confine: docs }).crawl();

      expect(report.visited).toEqual([docs, 'http://root.example/docs/a']);
      expect(report.urls).toEqual(['http://root.example/docs/a']);
      expect(report.visited.every((url) => url.startsWith(docs))).toBe(true);
    });

    it('does not follow excluded prefixes but still reports them', async () => {
      stubSite({
        [ROOT]: { body: htmlPage('/private/x', '/pub') },
        'http://root.example/private/x': { body: htmlPage() },
        'http://root.example/pub': { body: htmlPage() },
      });

      const report = await new Crawler(ROOT, { exclude: ['http://root.example/private'] }).crawl();

      expect(report.visited).toEqual([ROOT, 'http://root.example/pub']);
      expect(report.numLinks).toBe(2);
    });

    it('leaves the host when locking is off', async () => {
      stubSite({
        [ROOT]: { body: htmlPage('http://other.example/b') },
        'http://other.example/b': { body: htmlPage() },
      });

      const report = await new Crawler(ROOT, { locked: false }).crawl();

      expect(report.visited).toEqual([ROOT, 'http://other.example/b']);
      expect(report.numLinks).toBe(1);
    });

    it('reports off-host links when report filtering is off', async () => {
      stubSite({ [ROOT]: { body: htmlPage('http://other.example/b', 'mailto:x@example.com') } });

      const report = await new Crawler(ROOT, { filterReported: false }).crawl();

      expect(report.numFollowed).toBe(1);
      expect(report.urls).toEqual(['http://other.example/b', 'mailto:x@example.com']);
    });

    it('keeps every remembered destination on the root host when locked', async () => {
      stubSite({
        [ROOT]: { body: htmlPage('/a', 'https://root.example/s', 'http://cdn.example/x', 'mailto:x@root.example') },
        'http://root.example/a': { body: htmlPage('http://other.example/') },
      });

      const report = await new Crawler(ROOT).crawl();

      expect(report.links.map((l) => new URL(l.destination).hostname)).toEqual([
        'root.example',
        'root.example',
      ]);
    });

    it('warns and fetches nothing when the root is rejected', async () => {
      const fetchMock = stubSite(TREE);

      const report = await new Crawler(ROOT, { confine: 'http://elsewhere.example/' }).crawl();

      expect(report.numFollowed).toBe(0);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        { url: ROOT, rejectedBy: ['prefix'] },
        'Starting URL rejected by filters'
      );
    });

    it('names the exclusion filter when the root is excluded', async () => {
      stubSite(TREE);

      await new Crawler(ROOT, { exclude: [ROOT] }).crawl();

      expect(logger.warn).toHaveBeenCalledWith(
        { url: ROOT, rejectedBy: ['exclude'] },
        'Starting URL rejected by filters'
      );
    });

    it('calls onPage for every followed page', async () => {
      stubSite(TREE);
      const onPage = vi.fn();

      await new Crawler(ROOT, { depthLimit: 1, onPage }).crawl();

      expect(onPage.mock.calls.map(([page]) => [page.url, page.depth, page.result.success])).toEqual([
        [ROOT, 0, true],
        ['http://root.example/a', 1, true],
        ['http://root.example/b', 1, true],
      ]);
    });

    it('abandons only the page that throws', async () => {
      stubSite(TREE);
      const onPage = vi.fn(({ url }: { url: string }) => {
        if (url === 'http://root.example/a') throw new Error('boom');
      });

      const report = await new Crawler(ROOT, { onPage }).crawl();

      expect(report.numFollowed).toBe(5);
      expect(logger.error).toHaveBeenCalledWith(
        { url: 'http://root.example/a', depth: 1, error: 'boom' },
        'Abandoning page after unexpected error'
      );
    });

    it('passes userAgent and timeoutMs to each request', async () => {
      const fetchMock = stubSite({ [ROOT]: { body: htmlPage() } });

      await new Crawler(ROOT, { userAgent: 'test-agent/0.1', timeoutMs: 5000 }).crawl();

      const init = fetchMock.mock.calls[0][1];
      expect(init?.headers).toMatchObject({ 'User-Agent': 'test-agent/0.1' });
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });
  });
});
