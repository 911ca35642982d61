/**
 * Fetcher Module
 *
 * Retrieves a URL's HTML and reduces it to visible text plus title, meta
 * description and headings.
 *
 * Features:
 * - Static HTTP fetch (axios) or full browser rendering (puppeteer-core)
 *   behind one PageSource interface
 * - Browser-like User-Agent and a bounded timeout (default 15s)
 * - Failures classified as timeout, connection, HTTP status or unexpected,
 *   always returned inside the FetchResult, never thrown
 * - Optional FetchCache: repeated URLs inside the fetch window skip the network
 *
 * Usage:
 * ```typescript
 * const fetcher = new Fetcher({ cache: new FetchCache() });
 * const result = await fetcher.fetch('https://example.com');
 * if (!result.success) console.error(result.error_kind, result.error);
 * ```
 */

import axios from 'axios';
import type { FetchFailure, FetchErrorCode, FetchResult } from '../types/index.js';
import type { FetchCache } from '../cache/index.js';
import {
  createConsoleLogger,
  defaultMetrics,
  errorMessage,
  type Logger,
  type Metrics,
} from '../logging/index.js';
import { DEFAULT_HEADINGS_LIMIT, extractPage } from './extract.js';
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  HttpStatusError,
  StaticPageSource,
  type PageSource,
} from './source.js';

// ============================================================================
// Constants
// ============================================================================

/** Socket-level error codes that mean the host could not be reached */
const CONNECTION_ERROR_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ERR_NETWORK',
]);

const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/** Chromium navigation errors */
const BROWSER_CONNECTION_PATTERN =
  /net::ERR_(NAME_NOT_RESOLVED|CONNECTION_REFUSED|CONNECTION_RESET|CONNECTION_CLOSED|ADDRESS_UNREACHABLE|INTERNET_DISCONNECTED|NAME_RESOLUTION_FAILED)/;
const BROWSER_TIMEOUT_PATTERN = /net::ERR_(CONNECTION_TIMED_OUT|TIMED_OUT)/;

const defaultLogger = createConsoleLogger('fetcher');

// ============================================================================
// Error Classification
// ============================================================================

export interface ClassifiedFetchError {
  code: FetchErrorCode;
  message: string;
  status?: number;
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

/**
 * Map a thrown value to one of the fetch failure classes
 */
export function classifyFetchError(error: unknown, url: string, timeoutMs: number): ClassifiedFetchError {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const status = error.response.status;
      const statusText = error.response.statusText ? ` ${error.response.statusText}` : '';
      return {
        code: 'FETCH_HTTP_ERROR',
        message: `HTTP error ${status}${statusText} while fetching ${url}`,
        status,
      };
    }
    if (error.code && TIMEOUT_ERROR_CODES.has(error.code)) {
      return {
        code: 'FETCH_TIMEOUT',
        message: `Request to ${url} timed out after ${timeoutMs}ms`,
      };
    }
    if (error.code && CONNECTION_ERROR_CODES.has(error.code)) {
      return {
        code: 'FETCH_CONNECTION_ERROR',
        message: `Could not connect to ${hostOf(url)}: ${error.message}`,
      };
    }
  }

  if (error instanceof HttpStatusError) {
    return {
      code: 'FETCH_HTTP_ERROR',
      message: `HTTP error ${error.status} while fetching ${url}`,
      status: error.status,
    };
  }

  const message = errorMessage(error);

  if ((error instanceof Error && error.name === 'TimeoutError') || BROWSER_TIMEOUT_PATTERN.test(message)) {
    return {
      code: 'FETCH_TIMEOUT',
      message: `Request to ${url} timed out after ${timeoutMs}ms`,
    };
  }

  if (BROWSER_CONNECTION_PATTERN.test(message)) {
    return {
      code: 'FETCH_CONNECTION_ERROR',
      message: `Could not connect to ${hostOf(url)}: ${message}`,
    };
  }

  return {
    code: 'FETCH_UNEXPECTED',
    message: `Unexpected error fetching ${url}: ${message}`,
  };
}

// ============================================================================
// Fetcher
// ============================================================================

export interface FetcherOptions {
  /** Default: StaticPageSource with the timeout and user agent below */
  source?: PageSource;
  /** Omit to fetch every time */
  cache?: FetchCache;
  timeoutMs?: number;
  userAgent?: string;
  headingsLimit?: number;
  logger?: Logger;
  metrics?: Metrics;
}

export class Fetcher {
  private readonly source: PageSource;
  private readonly cache: FetchCache | undefined;
  private readonly timeoutMs: number;
  private readonly headingsLimit: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: FetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.source =
      options.source ??
      new StaticPageSource({
        timeoutMs: this.timeoutMs,
        userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      });
    this.cache = options.cache;
    this.headingsLimit = options.headingsLimit ?? DEFAULT_HEADINGS_LIMIT;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Fetch and extract one URL. Never rejects.
   *
   * @param url - Absolute http(s) URL
   */
  async fetch(url: string): Promise<FetchResult> {
    try {
      if (!this.cache) {
        return await this.load(url);
      }
      const { result, cached } = await this.cache.getOrLoad(url, () => this.load(url));
      if (cached) {
        this.logger.debug('Fetch served from cache', { url });
        this.metrics.increment('fetcher.cache_hit', { source: this.source.name });
      }
      return result;
    } catch (error) {
      const classified = classifyFetchError(error, url, this.timeoutMs);
      return this.failure(url, classified);
    }
  }

  private async load(url: string): Promise<FetchResult> {
    const startTime = Date.now();
    this.logger.info('Fetching page', { url, source: this.source.name });
    this.metrics.increment('fetcher.started', { source: this.source.name });

    try {
      const html = await this.source.fetchHtml(url);
      const page = extractPage(html, this.headingsLimit);

      if (page.content.length === 0) {
        return this.failure(url, {
          code: 'FETCH_UNEXPECTED',
          message: `No text content found at ${url}`,
        });
      }

      const duration = Date.now() - startTime;
      this.logger.info('Page fetched', {
        url,
        contentLength: page.content.length,
        headings: page.headings.length,
        durationMs: duration,
      });
      this.metrics.timing('fetcher.duration', duration, { source: this.source.name });

      return {
        success: true,
        url,
        content: page.content,
        title: page.title,
        description: page.description,
        headings: page.headings,
        content_length: page.content.length,
        fetched_at: new Date().toISOString(),
      };
    } catch (error) {
      return this.failure(url, classifyFetchError(error, url, this.timeoutMs));
    }
  }

  private failure(url: string, classified: ClassifiedFetchError): FetchFailure {
    this.logger.warn('Fetch failed', { url, code: classified.code, error: classified.message });
    this.metrics.increment('fetcher.failed', { source: this.source.name, code: classified.code });

    const failure: FetchFailure = {
      success: false,
      url,
      error: classified.message,
      error_kind: classified.code,
    };
    if (classified.status !== undefined) {
      failure.status = classified.status;
    }
    return failure;
  }
}

/**
 * One-off fetch without keeping a Fetcher around
 */
export async function fetchPage(url: string, options: FetcherOptions = {}): Promise<FetchResult> {
  return new Fetcher(options).fetch(url);
}

export { extractPage, DEFAULT_HEADINGS_LIMIT, NON_CONTENT_SELECTOR, type ExtractedPage } from './extract.js';
export {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  HttpStatusError,
  StaticPageSource,
  type PageSource,
  type StaticPageSourceOptions,
} from './source.js';
export {
  BrowserPageSource,
  launchPuppeteer,
  DEFAULT_CONTENT_SELECTOR,
  type BrowserLauncher,
  type BrowserSession,
  type BrowserPage,
  type BrowserPageSourceOptions,
} from './browser.js';
