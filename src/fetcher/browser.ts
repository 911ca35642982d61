/**
 * Browser-rendered page source.
 *
 * Drives a locally installed Chrome/Chromium through puppeteer-core, waits
 * for the page's main content node and hands the rendered markup to the
 * same extraction as the static source. puppeteer-core never downloads a
 * browser; the executable path comes from configuration.
 */

import puppeteer from 'puppeteer-core';
import { createConsoleLogger, errorMessage, type Logger } from '../logging/index.js';
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  HttpStatusError,
  type PageSource,
} from './source.js';

/** Main content landmarks; the page is extracted whole when none appears in time */
export const DEFAULT_CONTENT_SELECTOR = 'main, [role="main"], article, #content';

/**
 * The slice of a browser page the source needs
 */
export interface BrowserPage {
  setUserAgent(userAgent: string): Promise<void>;
  goto(
    url: string,
    options: { timeout: number; waitUntil: 'domcontentloaded' | 'load' | 'networkidle2' }
  ): Promise<{ status(): number } | null>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<void>;
  content(): Promise<string>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: {
  executablePath: string;
  args: string[];
}) => Promise<BrowserSession>;

/**
 * Launch headless Chrome with puppeteer-core
 */
export const launchPuppeteer: BrowserLauncher = async (options) => {
  const browser = await puppeteer.launch({
    executablePath: options.executablePath,
    headless: true,
    args: options.args,
  });

  return {
    newPage: async () => {
      const page = await browser.newPage();
      return {
        setUserAgent: (userAgent) => page.setUserAgent(userAgent),
        goto: async (url, gotoOptions) => {
          const response = await page.goto(url, gotoOptions);
          return response ? { status: () => response.status() } : null;
        },
        waitForSelector: async (selector, waitOptions) => {
          await page.waitForSelector(selector, waitOptions);
        },
        content: () => page.content(),
      };
    },
    close: () => browser.close(),
  };
};

export interface BrowserPageSourceOptions {
  executablePath: string;
  timeoutMs?: number;
  userAgent?: string;
  contentSelector?: string;
  launcher?: BrowserLauncher;
  logger?: Logger;
  /** Milliseconds clock for the timeout budget */
  now?: () => number;
}

export class BrowserPageSource implements PageSource {
  readonly name = 'browser';
  private readonly executablePath: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly contentSelector: string;
  private readonly launcher: BrowserLauncher;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: BrowserPageSourceOptions) {
    this.executablePath = options.executablePath;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.contentSelector = options.contentSelector ?? DEFAULT_CONTENT_SELECTOR;
    this.launcher = options.launcher ?? launchPuppeteer;
    this.logger = options.logger ?? createConsoleLogger('fetcher');
    this.now = options.now ?? Date.now;
  }

  async fetchHtml(url: string): Promise<string> {
    const browser = await this.launcher({
      executablePath: this.executablePath,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });

    try {
      const page = await browser.newPage();
      await page.setUserAgent(this.userAgent);

      // Navigation and the content wait share one timeout budget
      const deadline = this.now() + this.timeoutMs;
      const response = await page.goto(url, {
        timeout: this.timeoutMs,
        waitUntil: 'domcontentloaded',
      });

      const status = response?.status();
      if (status !== undefined && status >= 400) {
        throw new HttpStatusError(status, url);
      }

      await this.waitForContent(page, url, deadline - this.now());
      return await page.content();
    } finally {
      try {
        await browser.close();
      } catch (closeError) {
        this.logger.warn('Failed to close browser', { url, error: errorMessage(closeError) });
      }
    }
  }

  /**
   * Wait for a main content node within the remaining budget. A page without
   * one is extracted as loaded.
   */
  private async waitForContent(page: BrowserPage, url: string, remainingMs: number): Promise<void> {
    if (remainingMs <= 0) {
      this.logger.debug('No time left to wait for main content', { url });
      return;
    }
    try {
      await page.waitForSelector(this.contentSelector, { timeout: remainingMs });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        this.logger.debug('Main content not found, extracting the whole page', { url, selector: this.contentSelector });
        return;
      }
      throw error;
    }
  }
}
