import type {
  ElementDescriptor,
  PageSnapshot,
  PageType,
  StructuralFacts,
  Viewport,
} from '../types/index.js';
import type { BrowserPage, PageElement } from '../engines/browser-engine.js';
import { createLogger, errorMessage } from '../logging/logger.js';

const log = createLogger('page-analyzer');

export interface ElementCategory {
  selector: string;
  limit: number;
}

export const ELEMENT_CATEGORIES: readonly ElementCategory[] = [
  { selector: 'input', limit: 20 },
  { selector: 'button', limit: 20 },
  { selector: 'select', limit: 20 },
  { selector: 'textarea', limit: 20 },
  { selector: 'a', limit: 10 },
  { selector: 'img', limit: 5 },
  { selector: '[role="button"]', limit: 20 },
  { selector: '[role="link"]', limit: 20 },
  { selector: '[role="textbox"]', limit: 20 },
  { selector: '[onclick]', limit: 20 },
];

export const STRUCTURE_SELECTORS = {
  navigation: 'nav, [role="navigation"]',
  search: 'input[type="search"], input[placeholder*="search" i]',
  forms: 'form',
  products: '[data-testid*="product"], .product, [class*="product"]',
} as const;

export const DEFAULT_VIEWPORT: Viewport = { width: 1280, height: 720 };

export interface PageAnalyzerOptions {
  maxElements?: number;
  categories?: readonly ElementCategory[];
}

type StructureSignals = Omit<StructuralFacts, 'pageType'>;

/** E-commerce signals win over search, search over forms. */
export function classifyPageType(signals: StructureSignals): PageType {
  if (signals.hasProducts) return 'ecommerce';
  if (signals.hasSearch) return 'search';
  if (signals.hasForms) return 'form';
  return 'content';
}

export function emptySnapshot(url: string, title = ''): PageSnapshot {
  return {
    url,
    title,
    viewport: DEFAULT_VIEWPORT,
    elements: [],
    structuralFacts: {
      hasNavigation: false,
      hasSearch: false,
      hasForms: false,
      hasProducts: false,
      pageType: 'content',
    },
  };
}

export class PageContextAnalyzer {
  private maxElements: number;
  private categories: readonly ElementCategory[];

  constructor(options: PageAnalyzerOptions = {}) {
    this.maxElements = options.maxElements ?? 60;
    this.categories = options.categories ?? ELEMENT_CATEGORIES;
  }

  async analyze(page: BrowserPage): Promise<PageSnapshot> {
    const url = page.url();
    const title = await page.title();
    const elements = await this.collectElements(page);
    const structuralFacts = await this.analyzeStructure(page);

    log.info('Page context analyzed', {
      url,
      elements: elements.length,
      pageType: structuralFacts.pageType,
    });

    return {
      url,
      title,
      viewport: page.viewport() ?? DEFAULT_VIEWPORT,
      elements,
      structuralFacts,
    };
  }

  private async collectElements(page: BrowserPage): Promise<ElementDescriptor[]> {
    const elements: ElementDescriptor[] = [];
    const seen = new Set<string>();

    for (const category of this.categories) {
      if (elements.length >= this.maxElements) break;

      let handles: PageElement[];
      try {
        handles = await page.querySelectorAll(category.selector);
      } catch (error) {
        log.debug('Element query failed', { selector: category.selector, error: errorMessage(error) });
        continue;
      }

      let taken = 0;
      for (const handle of handles) {
        if (taken >= category.limit || elements.length >= this.maxElements) break;

        const descriptor = await describeElement(handle, category.selector);
        if (!descriptor) continue;

        const key = JSON.stringify(descriptor);
        if (seen.has(key)) continue;
        seen.add(key);

        elements.push(descriptor);
        taken++;
      }
    }

    return elements;
  }

  private async analyzeStructure(page: BrowserPage): Promise<StructuralFacts> {
    const signals: StructureSignals = {
      hasNavigation: await hasAny(page, STRUCTURE_SELECTORS.navigation),
      hasSearch: await hasAny(page, STRUCTURE_SELECTORS.search),
      hasForms: await hasAny(page, STRUCTURE_SELECTORS.forms),
      hasProducts: await hasAny(page, STRUCTURE_SELECTORS.products),
    };
    return { ...signals, pageType: classifyPageType(signals) };
  }
}

async function describeElement(element: PageElement, selector: string): Promise<ElementDescriptor | null> {
  try {
    const fields = await element.describe();
    const visible = await element.isVisible();
    const enabled = await element.isEnabled();
    const boundingBox = await element.boundingBox();
    return { ...fields, visible, enabled, boundingBox };
  } catch (error) {
    // Detached or cross-origin nodes are skipped
    log.debug('Skipping element', { selector, error: errorMessage(error) });
    return null;
  }
}

async function hasAny(page: BrowserPage, selector: string): Promise<boolean> {
  try {
    return (await page.count(selector)) > 0;
  } catch (error) {
    log.debug('Structure check failed', { selector, error: errorMessage(error) });
    return false;
  }
}
