/**
 * Browser driver on playwright-core.
 *
 * playwright-core ships no browser binaries: set `channel` to use an
 * installed Chrome/Edge, or leave it unset to use a Chromium that
 * `playwright install chromium` placed on the machine.
 */

import { chromium, type Browser, type Page } from 'playwright-core';
import { errorMessage, logger as rootLogger } from '@autopilot/shared-utils';
import { DriverError } from '../errors';
import type { BrowserDriver } from './types';

const logger = rootLogger.child('browser');

export interface PlaywrightBrowserOptions {
  headless: boolean;
  channel?: string;
  timeoutMs: number;
}

const SEARCH_URLS: Record<string, (query: string) => string> = {
  google: q => `https://www.google.com/search?q=${q}`,
  youtube: q => `https://www.youtube.com/results?search_query=${q}`,
  bing: q => `https://www.bing.com/search?q=${q}`,
  duckduckgo: q => `https://duckduckgo.com/?q=${q}`,
};

const SELECTOR_ALIASES: Record<string, string> = {
  first_video: 'ytd-video-renderer a#video-title',
};

/** Adds `https://` when the address has no scheme. */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Result page URL for `query` on `site`. Unknown sites become a Google
 * `site:` search.
 */
export function buildSearchUrl(site: string, query: string): string {
  const key = site.trim().toLowerCase().replace(/^www\./, '').replace(/\.com$/, '');
  const encoded = encodeURIComponent(query.trim());
  const builder = SEARCH_URLS[key];
  if (builder) {
    return builder(encoded);
  }
  return SEARCH_URLS.google(encodeURIComponent(`site:${site.trim()} ${query.trim()}`));
}

export function resolveSelector(selector: string): string {
  return SELECTOR_ALIASES[selector] ?? selector;
}

export class PlaywrightBrowserDriver implements BrowserDriver {
  private browser: Browser | null = null;
  private page: Page | null = null;
  private options: PlaywrightBrowserOptions;

  constructor(options: PlaywrightBrowserOptions) {
    this.options = options;
  }

  isOpen(): boolean {
    return this.page !== null;
  }

  async open(): Promise<void> {
    if (this.page) {
      return;
    }
    try {
      this.browser = await chromium.launch({
        headless: this.options.headless,
        channel: this.options.channel,
        args: ['--disable-blink-features=AutomationControlled'],
        timeout: this.options.timeoutMs,
      });
      const context = await this.browser.newContext({ viewport: null });
      this.page = await context.newPage();
      this.page.setDefaultTimeout(this.options.timeoutMs);
      logger.info('Browser started', { headless: this.options.headless, channel: this.options.channel });
    } catch (error) {
      await this.close();
      throw new DriverError('browser', `Browser could not be started: ${errorMessage(error)}`);
    }
  }

  async navigate(url: string): Promise<void> {
    const page = await this.ensurePage();
    const target = normalizeUrl(url);
    await this.run(`Navigation to ${target} failed`, () => page.goto(target, { waitUntil: 'domcontentloaded' }));
  }

  async search(site: string, query: string): Promise<void> {
    const page = await this.ensurePage();
    const target = buildSearchUrl(site, query);
    await this.run(`Search on ${site} failed`, () => page.goto(target, { waitUntil: 'domcontentloaded' }));
  }

  async click(selector: string): Promise<void> {
    const page = this.requirePage();
    const resolved = resolveSelector(selector);
    await this.run(`Click on ${resolved} failed`, () => page.click(resolved));
  }

  async type(selector: string, text: string): Promise<void> {
    const page = this.requirePage();
    const resolved = resolveSelector(selector);
    await this.run(`Filling ${resolved} failed`, () => page.fill(resolved, text));
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    if (!browser) {
      return;
    }
    try {
      await browser.close();
      logger.info('Browser closed');
    } catch (error) {
      throw new DriverError('browser', `Browser could not be closed: ${errorMessage(error)}`);
    }
  }

  // navigation opens the browser on demand, element actions need a page
  private async ensurePage(): Promise<Page> {
    if (!this.page) {
      await this.open();
    }
    return this.requirePage();
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new DriverError('browser', 'Browser is not open');
    }
    return this.page;
  }

  private async run(failure: string, work: () => Promise<unknown>): Promise<void> {
    try {
      await work();
    } catch (error) {
      throw new DriverError('browser', `${failure}: ${errorMessage(error)}`);
    }
  }
}
