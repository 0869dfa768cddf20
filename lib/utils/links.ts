import type { LinkItem, ReaderPage } from '../types';
import { isSameDomain } from './domain';

// [text](url "optional title"), skipping images; nested brackets are not matched
const MARKDOWN_LINK_PATTERN = /(!?)\[([^\[\]]*)\]\(\s*<?([^\s)>]+)>?(?:\s+"[^"]*")?\s*\)/g;

/**
 * Resolves `href` against `baseUrl` and drops the fragment.
 * Returns null for anything that is not an absolute http(s) URL afterwards.
 */
export function normalizeLinkUrl(href: string, baseUrl: string): string | null {
  try {
    const resolved = new URL(href, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return null;
    }
    resolved.hash = '';
    return resolved.toString();
  } catch {
    return null;
  }
}

/**
 * Links written in the page markdown, in document order, duplicates kept.
 * Link text becomes the title; links without text use the URL.
 */
export function extractMarkdownLinks(markdown: string, baseUrl: string): LinkItem[] {
  const links: LinkItem[] = [];

  for (const match of markdown.matchAll(MARKDOWN_LINK_PATTERN)) {
    const [, bang, text, href] = match;
    if (bang) continue;

    const url = normalizeLinkUrl(href, baseUrl);
    if (!url) continue;

    const title = text.replace(/\s+/g, ' ').trim();
    links.push({ url, title: title || url });
  }

  return links;
}

/**
 * Same-domain links of a fetched page, one entry per URL.
 * When a URL appears more than once the longer title is kept.
 * Sorted by URL so prompts built from it are deterministic.
 */
export function linksFromPage(baseUrl: string, page: ReaderPage | null): LinkItem[] {
  if (!page || page.links.length === 0) {
    return [];
  }

  const discovered = new Map<string, string>();
  for (const link of page.links) {
    if (!isSameDomain(link.url, baseUrl)) continue;

    const existing = discovered.get(link.url);
    if (existing === undefined || link.title.length > existing.length) {
      discovered.set(link.url, link.title);
    }
  }

  return Array.from(discovered, ([url, title]) => ({ url, title })).sort((a, b) =>
    compareCodeUnits(a.url, b.url)
  );
}

export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
