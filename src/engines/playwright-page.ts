import type { ElementHandle, Page } from 'playwright';
import type { BoundingBox, Viewport } from '../types/index.js';
import type { BrowserPage, ElementFields, LoadState, PageElement } from './browser-engine.js';

const INNER_TEXT_TIMEOUT_MS = 5000;

// Runs inside the page; must stay self-contained.
function readElementFields(el: Element): ElementFields {
  const attr = (name: string): string | null => el.getAttribute(name);
  return {
    tag: el.tagName.toLowerCase(),
    type: attr('type'),
    id: el.id,
    classes: attr('class') ?? '',
    placeholder: attr('placeholder') ?? '',
    text: (el.textContent ?? '').trim().slice(0, 200),
    ariaLabel: attr('aria-label'),
    role: attr('role'),
    href: attr('href'),
  };
}

type Handle = ElementHandle<SVGElement | HTMLElement>;

export class PlaywrightElement implements PageElement {
  constructor(private handle: Handle) {}

  async click(): Promise<void> {
    await this.handle.click();
  }

  async fill(value: string): Promise<void> {
    await this.handle.fill(value);
  }

  async textContent(): Promise<string | null> {
    return this.handle.textContent();
  }

  async innerText(): Promise<string> {
    return this.handle.innerText();
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async querySelector(selector: string): Promise<PageElement | null> {
    const child = await this.handle.$(selector);
    return child ? new PlaywrightElement(child) : null;
  }

  async isVisible(): Promise<boolean> {
    return this.handle.isVisible();
  }

  async isEnabled(): Promise<boolean> {
    return this.handle.isEnabled();
  }

  async boundingBox(): Promise<BoundingBox | null> {
    return this.handle.boundingBox();
  }

  async describe(): Promise<ElementFields> {
    return this.handle.evaluate(readElementFields);
  }
}

export class PlaywrightBrowserPage implements BrowserPage {
  constructor(private page: Page) {}

  async goto(url: string, options: { timeoutMs: number; waitUntil?: LoadState }): Promise<void> {
    await this.page.goto(url, {
      timeout: options.timeoutMs,
      waitUntil: options.waitUntil ?? 'domcontentloaded',
    });
  }

  async waitForLoadState(state: LoadState, timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState(state, { timeout: timeoutMs });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<PageElement> {
    const handle = await this.page.waitForSelector(selector, { timeout: timeoutMs });
    return new PlaywrightElement(handle);
  }

  async querySelectorAll(selector: string): Promise<PageElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightElement(handle));
  }

  async count(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  async pressKey(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async typeText(text: string): Promise<void> {
    await this.page.keyboard.type(text);
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  async innerText(selector: string): Promise<string> {
    return this.page.innerText(selector, { timeout: INNER_TEXT_TIMEOUT_MS });
  }

  url(): string {
    return this.page.url();
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  viewport(): Viewport | null {
    return this.page.viewportSize();
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }
}
