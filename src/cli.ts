#!/usr/bin/env node
/**
 * CLI entry point for hostcrawl
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { ZodError } from 'zod';
import { Fetcher } from './fetch/http-fetch.js';
import { Crawler, InvalidRootUrlError } from './crawl/crawler.js';
import { DEFAULT_DEPTH_LIMIT } from './crawl/options.js';
import { linkToString } from './crawl/types.js';
import { logger } from './logger.js';

/** Read version from package.json */
export function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch (error) {
    logger.debug({ pkgPath, error: String(error) }, 'Failed to read version from package.json');
    return 'unknown';
  }
}

interface CliOptions {
  url: string;
  links: boolean;
  edges: boolean;
  depth: number;
  confine?: string;
  exclude: string[];
}

type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  let links = false;
  let edges = false;
  let depth = DEFAULT_DEPTH_LIMIT;
  let confine: string | undefined;
  let exclude: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-l':
      case '--links':
        links = true;
        break;
      case '-e':
      case '--edges':
        edges = true;
        break;
      case '-d':
      case '--depth': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--depth requires a value' };
        const value = args[++i];
        if (!/^\d+$/.test(value)) {
          return { kind: 'error', message: '--depth must be a non-negative integer' };
        }
        depth = parseInt(value, 10);
        break;
      }
      case '-c':
      case '--confine':
        if (i + 1 >= args.length) return { kind: 'error', message: '--confine requires a value' };
        confine = args[++i];
        break;
      case '-x':
      case '--exclude':
        if (i + 1 >= args.length) return { kind: 'error', message: '--exclude requires a value' };
        exclude = args[++i]
          .split(',')
          .map((s) => s.trim())
          .filter((s) => s.length > 0);
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <url> argument' };
  }

  const url = positional[0];
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    return { kind: 'error', message: 'URL must start with http:// or https://' };
  }

  return {
    kind: 'ok',
    opts: { url, links, edges, depth, confine, exclude },
    warnings,
  };
}

function usage(): string {
  return `Usage: hostcrawl <url> [options]

Crawls pages on the host of <url>, breadth first, and reports the links found.

Options:
  -l, --links             Print the links of <url> only, without crawling
  -d, --depth <n>         Maximum depth to traverse (default: ${DEFAULT_DEPTH_LIMIT})
  -c, --confine <prefix>  Only follow and report URLs starting with <prefix>
  -x, --exclude <list>    Comma-separated URL prefixes never to follow
  -e, --edges             Print every link found as "source -> destination"
  -v, --version           Show version number
  -h, --help              Show this help message

Environment:
  LOG_LEVEL               trace, debug, info, warn, error or fatal (default: info)`;
}

/** Fetch one page and print its absolute links, numbered from 1. */
export async function runLinks(url: string): Promise<void> {
  const fetcher = new Fetcher(url);
  await fetcher.fetch();

  let n = 1;
  for (const link of fetcher.outLinks()) {
    if (link.includes('http')) {
      console.log(`${n}. ${link}`);
      n++;
    }
  }
}

/** Crawl from `opts.url` and print the counters, plus the edges when asked. */
export async function runCrawl(opts: CliOptions): Promise<void> {
  console.error(`Crawling ${opts.url} (Max Depth: ${opts.depth})`);

  const crawler = new Crawler(opts.url, {
    depthLimit: opts.depth,
    confine: opts.confine,
    exclude: opts.exclude,
    onPage: ({ url, depth, result }) =>
      logger.debug({ url, depth, success: result.success, links: result.links.length }, 'Page done'),
  });
  const report = await crawler.crawl();

  if (opts.edges) {
    for (const link of report.links) {
      console.log(linkToString(link));
    }
  }

  console.error(`Found:    ${report.numLinks}`);
  console.error(`Followed: ${report.numFollowed}`);
}

export async function main(): Promise<void> {
  const result = parseArgs(process.argv.slice(2));

  switch (result.kind) {
    case 'version':
      console.log(`hostcrawl ${getVersion()}`);
      process.exit(0);
      return;
    case 'help':
      console.log(usage());
      process.exit(0);
      return;
    case 'error':
      console.error(`Error: ${result.message}`);
      console.error(usage());
      process.exit(1);
      return;
  }

  const { opts, warnings } = result;

  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  if (opts.links) {
    await runLinks(opts.url);
    return;
  }

  try {
    await runCrawl(opts);
  } catch (error) {
    if (error instanceof InvalidRootUrlError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    if (error instanceof ZodError) {
      const details = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      console.error(`Error: Invalid crawler options (${details.join('; ')})`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main().catch((err) => {
    console.error(`Fatal: ${err}`);
    process.exit(1);
  });
}
