import FirecrawlApp from '@mendable/firecrawl-js';
import { COMPANY_DETAIL_CONFIG, requireSetting } from '../config';
import type { LinkItem, ReaderPage } from '../types';
import { extractMarkdownLinks, normalizeLinkUrl } from '../utils/links';
import type { ObservationHandle } from './tracing';

export interface PageReader {
  /** `parent` is the span the fetch is recorded under */
  readPage(url: string, parent?: ObservationHandle): Promise<ReaderPage | null>;
}

interface ReaderOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
}

const RETRYABLE_STATUS_CODES = new Set([429, 502, 503, 504]);

function isRetryableError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const statusCode = 'statusCode' in error ? error.statusCode : undefined;
  if (typeof statusCode === 'number' && RETRYABLE_STATUS_CODES.has(statusCode)) {
    return true;
  }
  const message = error instanceof Error ? error.message : '';
  return message.includes('network error') || message.includes('server is unreachable');
}

export class FirecrawlService implements PageReader {
  private app: FirecrawlApp;
  private maxRetries: number;
  private baseDelayMs: number;
  private timeoutMs: number;

  constructor(apiKey: string | undefined, options: ReaderOptions = {}) {
    this.app = new FirecrawlApp({ apiKey: requireSetting(apiKey, 'FIRECRAWL_API_KEY') });
    this.maxRetries = options.maxRetries ?? COMPANY_DETAIL_CONFIG.READER.MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? COMPANY_DETAIL_CONFIG.READER.BASE_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? COMPANY_DETAIL_CONFIG.READER.TIMEOUT_MS;
  }

  /**
   * Scrapes one page as markdown plus its outbound links.
   * Returns null when the page could not be fetched; never throws for
   * transport or API errors.
   */
  async readPage(url: string, parent?: ObservationHandle): Promise<ReaderPage | null> {
    // Ensure URL has protocol
    const fullUrl = url.startsWith('http') ? url : `https://${url}`;

    const generation = parent?.span.generation({
      name: 'fetch_firecrawl_page',
      model: 'firecrawl/scrape',
      input: { url: fullUrl },
    });

    const page = await this.scrapeWithRetry(fullUrl);

    if (page) {
      generation?.end({
        output: {
          url: page.url,
          title: page.title ?? null,
          description: page.description ?? null,
          content_length: page.content.length,
          link_count: page.links.length,
        },
      });
    } else {
      generation?.end({ level: 'WARNING', statusMessage: `Could not fetch ${fullUrl}` });
    }

    return page;
  }

  private async scrapeWithRetry(fullUrl: string): Promise<ReaderPage | null> {
    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const result = await this.app.scrapeUrl(fullUrl, {
          formats: ['markdown', 'links'],
          timeout: this.timeoutMs,
          headers: { 'Accept-Language': COMPANY_DETAIL_CONFIG.READER.ACCEPT_LANGUAGE },
        });

        if (!result.success) {
          console.error(`[READER] Firecrawl could not scrape ${fullUrl}: ${result.error}`);
          return null;
        }

        const metadata = result.metadata;
        const finalUrl: unknown = metadata?.url;
        const canonicalUrl =
          (typeof finalUrl === 'string' && finalUrl) || metadata?.sourceURL || fullUrl;
        const content = result.markdown ?? '';

        return {
          content,
          title: metadata?.title || undefined,
          description: metadata?.description || undefined,
          url: canonicalUrl,
          links: collectLinks(content, result.links ?? [], canonicalUrl),
        };
      } catch (error) {
        if (isRetryableError(error) && attempt < this.maxRetries - 1) {
          const delay = this.baseDelayMs * Math.pow(2, attempt);
          console.warn(`[READER] Scrape failed for ${fullUrl} (attempt ${attempt + 1}/${this.maxRetries}), retrying in ${delay}ms...`);
          await new Promise(resolve => setTimeout(resolve, delay));
          continue;
        }

        console.error(`[READER] Failed to scrape ${fullUrl}:`, error instanceof Error ? error.message : error);
        return null;
      }
    }

    return null;
  }
}

/**
 * Markdown links carry display text, the `links` list does not.
 * Markdown links come first (duplicates kept); URLs only known from the
 * list are appended with the URL as their title.
 */
function collectLinks(markdown: string, linkUrls: string[], baseUrl: string): LinkItem[] {
  const links = extractMarkdownLinks(markdown, baseUrl);
  const seen = new Set(links.map(link => link.url));

  for (const href of linkUrls) {
    const url = normalizeLinkUrl(href, baseUrl);
    if (!url || seen.has(url)) continue;
    seen.add(url);
    links.push({ url, title: url });
  }

  return links;
}
