import { describe, it, expect } from 'vitest';
import {
  PageContextAnalyzer,
  STRUCTURE_SELECTORS,
  classifyPageType,
  emptySnapshot,
} from '../../src/analyzer/page-analyzer.js';
import { FakeElement, FakePage } from '../helpers/fake-page.js';

function anchors(count: number): FakeElement[] {
  return Array.from({ length: count }, (_, i) => new FakeElement({ fields: { tag: 'a', href: `/item/${i}` } }));
}

describe('classifyPageType', () => {
  const none = { hasNavigation: false, hasSearch: false, hasForms: false, hasProducts: false };

  it('prefers ecommerce over search over form', () => {
    expect(classifyPageType({ ...none, hasProducts: true, hasSearch: true, hasForms: true })).toBe('ecommerce');
    expect(classifyPageType({ ...none, hasSearch: true, hasForms: true })).toBe('search');
    expect(classifyPageType({ ...none, hasForms: true })).toBe('form');
    expect(classifyPageType(none)).toBe('content');
  });
});

describe('PageContextAnalyzer', () => {
  it('describes interactive elements with their state', async () => {
    const search = new FakeElement({
      fields: { tag: 'input', type: 'search', placeholder: 'Search products' },
      box: { x: 10, y: 20, width: 300, height: 32 },
    });
    const disabled = new FakeElement({ fields: { tag: 'button', text: 'Checkout' }, enabled: false });
    const page = new FakePage({
      url: 'https://shop.test/',
      title: 'Shop',
      lists: { input: [search], button: [disabled] },
    });

    const snapshot = await new PageContextAnalyzer().analyze(page);

    expect(snapshot.url).toBe('https://shop.test/');
    expect(snapshot.title).toBe('Shop');
    expect(snapshot.viewport).toEqual({ width: 1280, height: 720 });
    expect(snapshot.elements).toHaveLength(2);
    expect(snapshot.elements[0]).toMatchObject({
      tag: 'input',
      type: 'search',
      placeholder: 'Search products',
      visible: true,
      enabled: true,
      boundingBox: { x: 10, y: 20, width: 300, height: 32 },
    });
    expect(snapshot.elements[1]).toMatchObject({ tag: 'button', text: 'Checkout', enabled: false });
  });

  it('caps each category and the overall count', async () => {
    const page = new FakePage({ lists: { a: anchors(12) } });

    const capped = await new PageContextAnalyzer().analyze(page);
    const tight = await new PageContextAnalyzer({ maxElements: 4 }).analyze(page);

    expect(capped.elements).toHaveLength(10);
    expect(tight.elements).toHaveLength(4);
  });

  it('drops structurally equal elements', async () => {
    const twin = () => new FakeElement({ fields: { tag: 'button', text: 'Go' } });
    const page = new FakePage({ lists: { button: [twin(), twin()], '[role="button"]': [twin()] } });

    const snapshot = await new PageContextAnalyzer().analyze(page);

    expect(snapshot.elements).toHaveLength(1);
  });

  it('skips elements and categories that fail to read', async () => {
    const broken = new FakeElement({ describeError: new Error('Element is detached') });
    const ok = new FakeElement({ fields: { tag: 'textarea' } });
    const page = new FakePage({ lists: { textarea: [broken, ok] }, queryErrors: ['input'] });

    const snapshot = await new PageContextAnalyzer().analyze(page);

    expect(snapshot.elements.map((element) => element.tag)).toEqual(['textarea']);
  });

  it('derives structural facts from element counts', async () => {
    const page = new FakePage({
      counts: { [STRUCTURE_SELECTORS.search]: 1, [STRUCTURE_SELECTORS.forms]: 2 },
      queryErrors: [STRUCTURE_SELECTORS.products],
    });

    const snapshot = await new PageContextAnalyzer().analyze(page);

    expect(snapshot.structuralFacts).toEqual({
      hasNavigation: false,
      hasSearch: true,
      hasForms: true,
      hasProducts: false,
      pageType: 'search',
    });
  });

  it('falls back to the default viewport', async () => {
    const snapshot = await new PageContextAnalyzer().analyze(new FakePage({ viewport: null }));

    expect(snapshot.viewport).toEqual({ width: 1280, height: 720 });
  });
});

describe('emptySnapshot', () => {
  it('describes a content page with no elements', () => {
    expect(emptySnapshot('https://shop.test/')).toEqual({
      url: 'https://shop.test/',
      title: '',
      viewport: { width: 1280, height: 720 },
      elements: [],
      structuralFacts: {
        hasNavigation: false,
        hasSearch: false,
        hasForms: false,
        hasProducts: false,
        pageType: 'content',
      },
    });
  });
});
