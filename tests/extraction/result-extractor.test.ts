import { describe, it, expect } from 'vitest';
import { ResultExtractor, resolveLink, type ResultScraper } from '../../src/extraction/result-extractor.js';
import { FakeElement, FakePage } from '../helpers/fake-page.js';

const DDG_TITLE = 'h2 a, .result__title a, a[data-testid="result-title-a"]';
const DDG_SNIPPET = '.result__snippet, .result__body, [data-result="snippet"]';

function ddgResult(title: string, href: string, snippet?: string): FakeElement {
  const children: Record<string, FakeElement> = {
    [DDG_TITLE]: new FakeElement({ text: title, attributes: { href } }),
  };
  if (snippet !== undefined) children[DDG_SNIPPET] = new FakeElement({ text: snippet });
  return new FakeElement({ children });
}

function link(title: string, href: string): FakeElement {
  return new FakeElement({ text: title, attributes: { href } });
}

describe('resolveLink', () => {
  it('resolves relative links against the page', () => {
    expect(resolveLink('/l/?u=1', 'https://duckduckgo.com/?q=x')).toBe('https://duckduckgo.com/l/?u=1');
  });
});

describe('ResultExtractor', () => {
  it('reads search engine results first', async () => {
    const page = new FakePage({
      url: 'https://duckduckgo.com/?q=shoes',
      title: 'shoes at DuckDuckGo',
      lists: {
        '[data-testid="result"]': [
          ddgResult('Running Shoes Store', 'https://shoes.test/', ' Lightweight trainers '),
          ddgResult('Hi', 'https://short.test/'),
          ddgResult('Trail Shoes', '/relative', 'x'.repeat(250)),
        ],
        'a[href^="http"]': [link('Elsewhere', 'https://other.test/')],
      },
    });

    const results = await new ResultExtractor().extract(page);

    expect(results.method).toBe('search_engine');
    expect(results.pageTitle).toBe('shoes at DuckDuckGo');
    expect(results.resultCount).toBe(2);
    expect(results.results[0]).toEqual({
      kind: 'search_result',
      title: 'Running Shoes Store',
      link: 'https://shoes.test/',
      snippet: 'Lightweight trainers',
    });
    expect(results.results[1]?.link).toBe('https://duckduckgo.com/relative');
    expect(results.results[1]?.snippet).toHaveLength(200);
  });

  it('reads product listings with price and rating', async () => {
    const product = new FakeElement({
      children: {
        'h2 a': new FakeElement({ text: 'Halloween Dress', attributes: { href: '/dp/1' } }),
        '.a-price-whole, .a-price .a-offscreen': new FakeElement({ text: '19.' }),
        '.a-icon-alt': new FakeElement({ text: '4.5 out of 5 stars' }),
      },
    });
    const page = new FakePage({
      url: 'https://www.amazon.test/s?k=dress',
      lists: { '[data-component-type="s-search-result"]': [product] },
    });

    const results = await new ResultExtractor().extract(page);

    expect(results.method).toBe('product_listing');
    expect(results.results).toEqual([
      {
        kind: 'product',
        title: 'Halloween Dress',
        link: 'https://www.amazon.test/dp/1',
        price: '19.',
        rating: '4.5 out of 5 stars',
      },
    ]);
  });

  it('falls back to off-site links', async () => {
    const page = new FakePage({
      url: 'https://news.test/',
      lists: {
        'a[href^="http"]': [
          link('Same site story', 'https://news.test/story'),
          link('Ok', 'https://short.test/'),
          link('Partner article', 'https://partner.test/a'),
          link('y'.repeat(100), 'https://long.test/'),
        ],
      },
    });

    const results = await new ResultExtractor().extract(page);

    expect(results.method).toBe('generic_links');
    expect(results.results).toEqual([{ kind: 'search_result', title: 'Partner article', link: 'https://partner.test/a' }]);
  });

  it('falls back to truncated body text', async () => {
    const page = new FakePage({ url: 'https://blog.test/', title: 'Blog', bodyText: 'z'.repeat(600) });

    const results = await new ResultExtractor().extract(page);

    expect(results.method).toBe('page_content');
    expect(results.results).toEqual([
      { kind: 'page_content', title: 'Page Content: Blog', content: `${'z'.repeat(500)}...` },
    ]);
  });

  it('returns no results when nothing matches', async () => {
    const page = new FakePage({ url: 'https://blank.test/', title: 'Blank', bodyText: 'too short' });

    const results = await new ResultExtractor().extract(page);

    expect(results).toEqual({
      pageTitle: 'Blank',
      pageUrl: 'https://blank.test/',
      method: 'none',
      results: [],
      resultCount: 0,
    });
  });

  it('moves past a scraper that throws', async () => {
    const failing: ResultScraper = {
      method: 'search_engine',
      scrape: async () => {
        throw new Error('boom');
      },
    };
    const fixed: ResultScraper = {
      method: 'page_content',
      scrape: async () => [{ kind: 'page_content', title: 'Fixed' }],
    };

    const results = await new ResultExtractor({ scrapers: [failing, fixed] }).extract(new FakePage());

    expect(results.method).toBe('page_content');
    expect(results.resultCount).toBe(1);
  });
});
