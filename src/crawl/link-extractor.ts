/**
 * Extract outbound links from HTML
 */
import { parseHTML } from 'linkedom';
import { logger } from '../logger.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/** Escape the five HTML-special characters of an attribute value. */
export function escapeHref(href: string): string {
  return href.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Extract every <a href> target from HTML, in document order.
 *
 * Each href is escaped and resolved against `baseUrl`. Nothing is filtered
 * by scheme or host, and fragments are kept; callers decide what to do
 * with mailto: links or #anchors. Empty hrefs resolve to the base URL.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const { document } = parseHTML(html);
  const links: string[] = [];
  const seen = new Set<string>();

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href');
    if (href === null) continue;

    let resolved: string;
    try {
      resolved = new URL(escapeHref(href), baseUrl).href;
    } catch {
      logger.debug({ href, baseUrl }, 'Skipping unresolvable href');
      continue;
    }

    if (!seen.has(resolved)) {
      seen.add(resolved);
      links.push(resolved);
    }
  }

  return links;
}
