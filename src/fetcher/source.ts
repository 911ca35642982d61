/**
 * Page sources: mechanisms that turn a URL into HTML.
 */

import axios, { type AxiosInstance } from 'axios';

export const DEFAULT_FETCH_TIMEOUT_MS = 15000;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

/**
 * Mechanism that turns a URL into HTML. Throws on failure.
 */
export interface PageSource {
  readonly name: string;
  fetchHtml(url: string): Promise<string>;
}

/**
 * Raised by page sources that see an HTTP status themselves
 */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, url: string) {
    super(`Request to ${url} failed with status code ${status}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

export interface StaticPageSourceOptions {
  timeoutMs?: number;
  userAgent?: string;
  /** Preconfigured axios instance (default: a fresh one) */
  http?: AxiosInstance;
}

/**
 * Single GET with a browser-like identification header
 */
export class StaticPageSource implements PageSource {
  readonly name = 'static';
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: StaticPageSourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.http = options.http ?? axios.create();
  }

  async fetchHtml(url: string): Promise<string> {
    const response = await this.http.get<unknown>(url, {
      headers: {
        'User-Agent': this.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
      },
      timeout: this.timeoutMs,
      maxRedirects: 5,
      responseType: 'text',
    });

    return typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
  }
}
