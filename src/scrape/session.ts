/**
 * session.ts
 *
 * The browser primitives the navigator needs, and their Playwright
 * implementation. One PortalSession = one Chromium instance, used by one
 * scrape and closed by it.
 */

import { chromium } from '@playwright/test';
import type { Browser, Page } from '@playwright/test';
import { isTimeoutError } from './errors';
import type { ScrapeConfig } from './types';

export interface PortalSession {
  goto(url: string, timeoutMs: number): Promise<void>;
  reload(timeoutMs: number): Promise<void>;
  count(selector: string): Promise<number>;
  click(selector: string, opts?: { force?: boolean }): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  /** Resolves false when the selector is still missing after timeoutMs. */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  settle(ms: number): Promise<void>;
  text(selector: string): Promise<string>;
  /** Inner HTML of every <td> of every row matched by the selector. */
  readRows(selector: string): Promise<string[][]>;
  close(): Promise<void>;
}

export type CellLike = { tagName: string; innerHTML: string };
export type RowLike = { children: ArrayLike<CellLike> };

// Runs inside the page via evaluateAll, so it must not reference anything outside its own body.
export function rowCells(rows: ArrayLike<RowLike>): string[][] {
  return Array.from(rows, (row) =>
    Array.from(row.children)
      .filter((cell) => cell.tagName.toUpperCase() === 'TD')
      .map((cell) => cell.innerHTML),
  );
}

// true once the wait resolves, false if Playwright gave up waiting; other errors propagate
export async function appeared(wait: Promise<unknown>): Promise<boolean> {
  try {
    await wait;
    return true;
  } catch (err) {
    if (isTimeoutError(err)) return false;
    throw err;
  }
}

export function closeOnce(close: () => Promise<void>): () => Promise<void> {
  let closed = false;
  return async () => {
    if (closed) return;
    closed = true;
    await close();
  };
}

// Runs open(); if it throws, releases what was acquired before rethrowing.
export async function openOrRelease<T>(open: () => Promise<T>, release: () => Promise<void>): Promise<T> {
  try {
    return await open();
  } catch (err) {
    await release();
    throw err;
  }
}

export class PlaywrightPortalSession implements PortalSession {
  readonly close: () => Promise<void>;

  constructor(browser: Browser, private readonly page: Page) {
    this.close = closeOnce(() => browser.close());
  }

  async goto(url: string, timeoutMs: number) {
    await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
  }

  async reload(timeoutMs: number) {
    await this.page.reload({ timeout: timeoutMs, waitUntil: 'domcontentloaded' });
  }

  count(selector: string) {
    return this.page.locator(selector).count();
  }

  async click(selector: string, opts: { force?: boolean } = {}) {
    await this.page.locator(selector).first().click({ force: opts.force });
  }

  async fill(selector: string, value: string) {
    await this.page.locator(selector).first().fill(value);
  }

  waitFor(selector: string, timeoutMs: number) {
    return appeared(this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs }));
  }

  async settle(ms: number) {
    await this.page.waitForTimeout(ms);
  }

  text(selector: string) {
    return this.page.locator(selector).first().innerText();
  }

  readRows(selector: string) {
    return this.page.locator(selector).evaluateAll(rowCells);
  }
}

export async function launchPortalSession(cfg: ScrapeConfig): Promise<PortalSession> {
  const browser = await chromium.launch({
    headless: cfg.headless,
    args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-blink-features=AutomationControlled'],
  });

  return openOrRelease(
    async () => {
      const context = await browser.newContext({ viewport: { width: 1280, height: 720 } });
      const page = await context.newPage();
      page.setDefaultTimeout(cfg.timeouts.actionMs);
      page.setDefaultNavigationTimeout(cfg.timeouts.navigationMs);
      return new PlaywrightPortalSession(browser, page);
    },
    () => browser.close(),
  );
}
