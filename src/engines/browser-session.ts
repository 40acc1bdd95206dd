import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import type { Viewport } from '../types/index.js';
import type { BrowserPage } from './browser-engine.js';
import { PlaywrightBrowserPage } from './playwright-page.js';
import { createLogger, errorMessage } from '../logging/logger.js';

const log = createLogger('browser-session');

/** One browser context/page pair, owned by a single task for its lifetime. */
export interface BrowserSession {
  readonly page: BrowserPage;
  /** Releases page, context and browser in that order. Never rejects. */
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<BrowserSession>;

export interface SessionOptions {
  headless: boolean;
  viewport: Viewport;
  userAgent?: string;
  locale?: string;
  launchArgs?: string[];
}

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  headless: true,
  viewport: { width: 1280, height: 720 },
  locale: 'en-US',
  launchArgs: ['--no-sandbox', '--disable-dev-shm-usage'],
};

class PlaywrightSession implements BrowserSession {
  readonly page: BrowserPage;
  private closed = false;

  constructor(
    private browser: Browser,
    private context: BrowserContext,
    private rawPage: Page,
  ) {
    this.page = new PlaywrightBrowserPage(rawPage);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await release('page', () => this.rawPage.close());
    await release('context', () => this.context.close());
    await release('browser', () => this.browser.close());
  }
}

async function release(resource: string, closeFn: () => Promise<void>): Promise<void> {
  try {
    await closeFn();
  } catch (error) {
    log.warn(`Failed to close ${resource}`, { error: errorMessage(error) });
  }
}

export async function launchPlaywrightSession(
  options: SessionOptions = DEFAULT_SESSION_OPTIONS,
): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: options.headless,
    args: options.launchArgs,
  });

  let context: BrowserContext | undefined;
  try {
    context = await browser.newContext({
      viewport: options.viewport,
      userAgent: options.userAgent,
      locale: options.locale,
    });
    const page = await context.newPage();
    log.debug('Browser session started', { headless: options.headless });
    return new PlaywrightSession(browser, context, page);
  } catch (error) {
    const openedContext = context;
    if (openedContext) await release('context', () => openedContext.close());
    await release('browser', () => browser.close());
    throw error;
  }
}

export function playwrightSessionFactory(options: SessionOptions = DEFAULT_SESSION_OPTIONS): SessionFactory {
  return () => launchPlaywrightSession(options);
}
