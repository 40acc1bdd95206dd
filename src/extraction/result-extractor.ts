import type { ExtractedItem, ExtractedResults, ExtractionMethod } from '../types/index.js';
import type { BrowserPage, PageElement } from '../engines/browser-engine.js';
import { createLogger, errorMessage } from '../logging/logger.js';

const log = createLogger('result-extractor');

export interface ScrapeContext {
  page: BrowserPage;
  pageUrl: string;
  pageTitle: string;
  limits: ExtractionLimits;
}

export interface ResultScraper {
  method: Exclude<ExtractionMethod, 'none'>;
  scrape(context: ScrapeContext): Promise<ExtractedItem[]>;
}

export interface ExtractionLimits {
  maxResults: number;
  maxSnippetChars: number;
  maxContentChars: number;
  /** Anchors inspected by the generic link scraper. */
  maxLinksScanned: number;
}

export const DEFAULT_EXTRACTION_LIMITS: ExtractionLimits = {
  maxResults: 5,
  maxSnippetChars: 200,
  maxContentChars: 500,
  maxLinksScanned: 100,
};

interface ListingPattern {
  name: string;
  container: string;
  titleLink: string;
  snippet?: string;
  price?: string;
  rating?: string;
}

export const SEARCH_ENGINE_PATTERNS: readonly ListingPattern[] = [
  {
    name: 'duckduckgo',
    container: '[data-testid="result"]',
    titleLink: 'h2 a, .result__title a, a[data-testid="result-title-a"]',
    snippet: '.result__snippet, .result__body, [data-result="snippet"]',
  },
  {
    name: 'google',
    container: '.g',
    titleLink: 'h3 a, .yuRUbf a',
    snippet: '.VwiC3b, .s3v9rd, .IsZvec',
  },
];

export const PRODUCT_LISTING_PATTERNS: readonly ListingPattern[] = [
  {
    name: 'amazon',
    container: '[data-component-type="s-search-result"]',
    titleLink: 'h2 a',
    price: '.a-price-whole, .a-price .a-offscreen',
    rating: '.a-icon-alt',
  },
];

const MIN_TITLE_CHARS = 4;
const MAX_LINK_TITLE_CHARS = 99;
const MIN_BODY_CHARS = 51;

export function resolveLink(href: string, pageUrl: string): string | null {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return '';
  }
}

async function childText(element: PageElement, selector: string | undefined): Promise<string> {
  if (!selector) return '';
  const child = await element.querySelector(selector);
  return child ? (await child.innerText()).trim() : '';
}

async function scrapeListing(
  context: ScrapeContext,
  pattern: ListingPattern,
  kind: ExtractedItem['kind'],
): Promise<ExtractedItem[]> {
  const containers = await context.page.querySelectorAll(pattern.container);
  const items: ExtractedItem[] = [];

  for (const [index, container] of containers.slice(0, context.limits.maxResults).entries()) {
    try {
      const titleLink = await container.querySelector(pattern.titleLink);
      if (!titleLink) continue;

      const title = (await titleLink.innerText()).trim();
      const href = await titleLink.getAttribute('href');
      const link = href ? resolveLink(href, context.pageUrl) : null;
      if (title.length < MIN_TITLE_CHARS || !link) continue;

      const item: ExtractedItem = { kind, title, link };
      if (pattern.snippet) item.snippet = (await childText(container, pattern.snippet)).slice(0, context.limits.maxSnippetChars);
      if (pattern.price) item.price = await childText(container, pattern.price);
      if (pattern.rating) item.rating = await childText(container, pattern.rating);
      items.push(item);
    } catch (error) {
      log.debug('Skipping listing entry', { pattern: pattern.name, index, error: errorMessage(error) });
    }
  }

  return items;
}

async function firstMatchingListing(
  context: ScrapeContext,
  patterns: readonly ListingPattern[],
  kind: ExtractedItem['kind'],
): Promise<ExtractedItem[]> {
  for (const pattern of patterns) {
    const items = await scrapeListing(context, pattern, kind);
    if (items.length > 0) {
      log.debug('Listing pattern matched', { pattern: pattern.name, count: items.length });
      return items;
    }
  }
  return [];
}

export const searchEngineScraper: ResultScraper = {
  method: 'search_engine',
  scrape: (context) => firstMatchingListing(context, SEARCH_ENGINE_PATTERNS, 'search_result'),
};

export const productListingScraper: ResultScraper = {
  method: 'product_listing',
  scrape: (context) => firstMatchingListing(context, PRODUCT_LISTING_PATTERNS, 'product'),
};

/** Absolute links leaving the current host, with a short readable title. */
export const genericLinksScraper: ResultScraper = {
  method: 'generic_links',
  async scrape(context) {
    const pageHost = hostOf(context.pageUrl);
    const anchors = await context.page.querySelectorAll('a[href^="http"]');
    const items: ExtractedItem[] = [];

    for (const anchor of anchors.slice(0, context.limits.maxLinksScanned)) {
      if (items.length >= context.limits.maxResults) break;
      try {
        const href = await anchor.getAttribute('href');
        if (!href || hostOf(href) === pageHost) continue;

        const title = (await anchor.innerText()).trim();
        if (title.length < MIN_TITLE_CHARS || title.length > MAX_LINK_TITLE_CHARS) continue;

        items.push({ kind: 'search_result', title, link: href });
      } catch (error) {
        log.debug('Skipping link', { error: errorMessage(error) });
      }
    }

    return items;
  },
};

export const pageContentScraper: ResultScraper = {
  method: 'page_content',
  async scrape(context) {
    const text = (await context.page.innerText('body')).trim();
    if (text.length < MIN_BODY_CHARS) return [];

    const max = context.limits.maxContentChars;
    const content = text.length > max ? `${text.slice(0, max)}...` : text;
    return [{ kind: 'page_content', title: `Page Content: ${context.pageTitle}`, content }];
  },
};

export const DEFAULT_SCRAPERS: readonly ResultScraper[] = [
  searchEngineScraper,
  productListingScraper,
  genericLinksScraper,
  pageContentScraper,
];

export interface ResultExtractorOptions {
  scrapers?: readonly ResultScraper[];
  limits?: Partial<ExtractionLimits>;
}

/** Tries scrapers in priority order; the first non-empty result wins. */
export class ResultExtractor {
  private scrapers: readonly ResultScraper[];
  private limits: ExtractionLimits;

  constructor(options: ResultExtractorOptions = {}) {
    this.scrapers = options.scrapers ?? DEFAULT_SCRAPERS;
    this.limits = { ...DEFAULT_EXTRACTION_LIMITS, ...options.limits };
  }

  async extract(page: BrowserPage): Promise<ExtractedResults> {
    const pageUrl = page.url();
    const pageTitle = await page.title();
    const context: ScrapeContext = { page, pageUrl, pageTitle, limits: this.limits };

    for (const scraper of this.scrapers) {
      try {
        const results = await scraper.scrape(context);
        if (results.length > 0) {
          log.info('Extracted results', { method: scraper.method, count: results.length });
          return { pageTitle, pageUrl, method: scraper.method, results, resultCount: results.length };
        }
      } catch (error) {
        log.debug('Scraper failed', { method: scraper.method, error: errorMessage(error) });
      }
    }

    return { pageTitle, pageUrl, method: 'none', results: [], resultCount: 0 };
  }
}
