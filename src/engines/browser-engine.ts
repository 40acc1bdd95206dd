import type { BoundingBox, Viewport } from '../types/index.js';

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

/** Attribute and text fields read from a live element in one round trip. */
export interface ElementFields {
  tag: string;
  type: string | null;
  id: string;
  classes: string;
  placeholder: string;
  text: string;
  ariaLabel: string | null;
  role: string | null;
  href: string | null;
}

export interface PageElement {
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  textContent(): Promise<string | null>;
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  querySelector(selector: string): Promise<PageElement | null>;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  boundingBox(): Promise<BoundingBox | null>;
  describe(): Promise<ElementFields>;
}

/**
 * The browser surface the engine needs. Every wait takes an explicit timeout.
 */
export interface BrowserPage {
  goto(url: string, options: { timeoutMs: number; waitUntil?: LoadState }): Promise<void>;
  waitForLoadState(state: LoadState, timeoutMs: number): Promise<void>;
  /** Resolves with the element, or rejects when it does not appear within the timeout. */
  waitForSelector(selector: string, timeoutMs: number): Promise<PageElement>;
  querySelectorAll(selector: string): Promise<PageElement[]>;
  count(selector: string): Promise<number>;
  pressKey(key: string): Promise<void>;
  typeText(text: string): Promise<void>;
  scrollToBottom(): Promise<void>;
  innerText(selector: string): Promise<string>;
  url(): string;
  title(): Promise<string>;
  viewport(): Viewport | null;
  isClosed(): boolean;
}
