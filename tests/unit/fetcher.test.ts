/**
 * Unit tests for the Fetcher Module
 *
 * HTTP goes through an in-process axios adapter, the browser through a fake
 * launcher. Nothing leaves the process.
 */

import { describe, test, expect, jest } from '@jest/globals';
import axios, {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import * as cheerio from 'cheerio';
import { FetchCache } from '../../src/cache/index.js';
import {
  BrowserPageSource,
  DEFAULT_CONTENT_SELECTOR,
  DEFAULT_USER_AGENT,
  Fetcher,
  StaticPageSource,
  classifyFetchError,
  extractPage,
  type BrowserLauncher,
  type BrowserPage,
} from '../../src/fetcher/index.js';
import { createMockLogger, createMockMetrics } from '../helpers.js';

// ============================================================================
// Test Utilities
// ============================================================================

const SAMPLE_HTML = `<!doctype html>
<html>
  <head>
    <title>  Acme   Tools </title>
    <meta name="description" content="Tools for makers">
    <style>.hero { color: red; }</style>
  </head>
  <body>
    <nav><a href="/">Home</a><a href="/about">About</a></nav>
    <h1>Welcome</h1>
    <p>Build <b>faster</b> today.</p>
    <h2>Pricing</h2>
    <script>window.tracking = true;</script>
    <noscript>Enable JavaScript</noscript>
    <footer>Copyright Acme</footer>
  </body>
</html>`;

function respond(config: InternalAxiosRequestConfig, data: string, status = 200, statusText = 'OK'): AxiosResponse<string> {
  return { data, status, statusText, headers: {}, config, request: {} };
}

/**
 * axios instance whose adapter answers in process
 */
function createHttp(handler: AxiosAdapter) {
  return axios.create({ adapter: handler });
}

function staticFetcher(handler: AxiosAdapter, extra: { cache?: FetchCache } = {}) {
  const logger = createMockLogger();
  const metrics = createMockMetrics();
  const fetcher = new Fetcher({
    source: new StaticPageSource({ http: createHttp(handler) }),
    cache: extra.cache,
    logger,
    metrics,
  });
  return { fetcher, logger, metrics };
}

// ============================================================================
// extractPage
// ============================================================================

describe('extractPage()', () => {
  test('should extract visible text, title, description and headings', () => {
    const page = extractPage(SAMPLE_HTML);

    expect(page.content).toBe('Welcome Build faster today. Pricing');
    expect(page.title).toBe('Acme Tools');
    expect(page.description).toBe('Tools for makers');
    expect(page.headings).toEqual(['Welcome', 'Pricing']);
  });

  test('should keep adjacent block text apart', () => {
    const page = extractPage('<html><body><h1>Welcome</h1><a>Home</a><a>About</a></body></html>');

    expect(page.content).toBe('Welcome Home About');
  });

  test('should fall back to the og:description', () => {
    const page = extractPage(
      '<html><head><meta property="og:description" content="Shared text"></head><body><p>Hi</p></body></html>'
    );

    expect(page.description).toBe('Shared text');
    expect(page.title).toBeNull();
  });

  test('should read a meta description whatever the case of its name', () => {
    const page = extractPage(
      '<html><head><meta name="Description" content="Mixed case"></head><body><p>Hi</p></body></html>'
    );

    expect(page.description).toBe('Mixed case');
  });

  test('should cap headings at the limit, in document order', () => {
    const page = extractPage('<body><h3>One</h3><h1>Two</h1><h2>Three</h2></body>', 2);

    expect(page.headings).toEqual(['One', 'Two']);
  });

  test('should return empty content for a page without visible text', () => {
    const page = extractPage('<html><body><script>1</script>  </body></html>');

    expect(page.content).toBe('');
    expect(page.headings).toEqual([]);
  });
});

// ============================================================================
// Static source
// ============================================================================

describe('Fetcher with StaticPageSource', () => {
  test('should return a successful FetchResult for a page', async () => {
    const { fetcher } = staticFetcher(async (config) => respond(config, SAMPLE_HTML));

    const result = await fetcher.fetch('https://example.com');

    expect(result).toEqual({
      success: true,
      url: 'https://example.com',
      content: 'Welcome Build faster today. Pricing',
      title: 'Acme Tools',
      description: 'Tools for makers',
      headings: ['Welcome', 'Pricing'],
      content_length: 35,
      fetched_at: expect.any(String),
    });
  });

  test('should send a browser-like User-Agent and the default timeout', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const { fetcher } = staticFetcher(async (config) => {
      seen.push(config);
      return respond(config, '<body>ok</body>');
    });

    await fetcher.fetch('https://example.com');

    expect(seen).toHaveLength(1);
    expect(seen[0]?.headers['User-Agent']).toBe(DEFAULT_USER_AGENT);
    expect(seen[0]?.timeout).toBe(15000);
  });

  test('should classify an HTTP status error with its status code', async () => {
    const { fetcher, metrics } = staticFetcher(async (config) => {
      throw new AxiosError(
        'Request failed with status code 404',
        'ERR_BAD_REQUEST',
        config,
        {},
        respond(config, 'missing', 404, 'Not Found')
      );
    });

    const result = await fetcher.fetch('https://example.com/missing');

    expect(result).toEqual({
      success: false,
      url: 'https://example.com/missing',
      error: 'HTTP error 404 Not Found while fetching https://example.com/missing',
      error_kind: 'FETCH_HTTP_ERROR',
      status: 404,
    });
    expect(metrics.increment).toHaveBeenCalledWith('fetcher.failed', {
      source: 'static',
      code: 'FETCH_HTTP_ERROR',
    });
  });

  test('should classify an unreachable host as a connection error and never throw', async () => {
    const { fetcher } = staticFetcher(async (config) => {
      throw new AxiosError('getaddrinfo ENOTFOUND nowhere.invalid', 'ENOTFOUND', config, {});
    });

    const result = await fetcher.fetch('https://nowhere.invalid');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error_kind).toBe('FETCH_CONNECTION_ERROR');
    expect(result.error).toBe('Could not connect to nowhere.invalid: getaddrinfo ENOTFOUND nowhere.invalid');
    expect(result.status).toBeUndefined();
  });

  test('should classify a timeout', async () => {
    const { fetcher } = staticFetcher(async (config) => {
      throw new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED', config, {});
    });

    const result = await fetcher.fetch('https://slow.test');

    expect(result).toEqual({
      success: false,
      url: 'https://slow.test',
      error: 'Request to https://slow.test timed out after 15000ms',
      error_kind: 'FETCH_TIMEOUT',
    });
  });

  test('should treat a page without visible text as an unexpected failure', async () => {
    const { fetcher } = staticFetcher(async (config) => respond(config, '<html><body><script>1</script></body></html>'));

    const result = await fetcher.fetch('https://example.com');

    expect(result).toEqual({
      success: false,
      url: 'https://example.com',
      error: 'No text content found at https://example.com',
      error_kind: 'FETCH_UNEXPECTED',
    });
  });

  test('should serve a repeated URL from the cache without a second request', async () => {
    const adapter = jest.fn<AxiosAdapter>(async (config) => respond(config, SAMPLE_HTML));
    const { fetcher, logger } = staticFetcher(adapter, { cache: new FetchCache() });

    const first = await fetcher.fetch('https://example.com');
    const second = await fetcher.fetch('https://example.com');

    expect(adapter).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(logger.debug).toHaveBeenCalledWith('Fetch served from cache', { url: 'https://example.com' });
  });

  test('should refetch after a cached failure', async () => {
    let calls = 0;
    const { fetcher } = staticFetcher(
      async (config) => {
        calls += 1;
        if (calls === 1) {
          throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config, {});
        }
        return respond(config, SAMPLE_HTML);
      },
      { cache: new FetchCache() }
    );

    const first = await fetcher.fetch('https://example.com');
    const second = await fetcher.fetch('https://example.com');

    expect(first.success).toBe(false);
    expect(second.success).toBe(true);
    expect(calls).toBe(2);
  });
});

// ============================================================================
// classifyFetchError
// ============================================================================

describe('classifyFetchError()', () => {
  test('should classify an unknown error as unexpected', () => {
    expect(classifyFetchError(new Error('boom'), 'https://example.com', 15000)).toEqual({
      code: 'FETCH_UNEXPECTED',
      message: 'Unexpected error fetching https://example.com: boom',
    });
  });

  test('should classify a non-Error value as unexpected', () => {
    expect(classifyFetchError('weird', 'https://example.com', 15000).code).toBe('FETCH_UNEXPECTED');
  });

  test('should not treat a redirect loop as a connection failure', () => {
    const error = new AxiosError('Maximum number of redirects exceeded', 'ERR_FR_TOO_MANY_REDIRECTS', undefined, {});

    expect(classifyFetchError(error, 'https://example.com', 15000)).toEqual({
      code: 'FETCH_UNEXPECTED',
      message: 'Unexpected error fetching https://example.com: Maximum number of redirects exceeded',
    });
  });

  test('should classify a network failure code as a connection error', () => {
    const error = new AxiosError('Network Error', 'ERR_NETWORK', undefined, {});

    expect(classifyFetchError(error, 'https://example.com', 15000)).toEqual({
      code: 'FETCH_CONNECTION_ERROR',
      message: 'Could not connect to example.com: Network Error',
    });
  });
});

// ============================================================================
// Browser source
// ============================================================================

interface FakeBrowserOptions {
  status?: number;
  html?: string;
  gotoError?: Error;
  /** Milliseconds the navigation takes on the fake clock */
  gotoMs?: number;
  waitError?: Error;
  closeError?: Error;
}

function timeoutError(message: string): Error {
  const error = new Error(message);
  error.name = 'TimeoutError';
  return error;
}

function createFakeBrowser(options: FakeBrowserOptions = {}) {
  let clock = 0;
  const now = () => clock;

  const page = {
    setUserAgent: jest.fn<BrowserPage['setUserAgent']>(async () => undefined),
    goto: jest.fn<BrowserPage['goto']>(async () => {
      clock += options.gotoMs ?? 0;
      if (options.gotoError) throw options.gotoError;
      return { status: () => options.status ?? 200 };
    }),
    waitForSelector: jest.fn<BrowserPage['waitForSelector']>(async () => {
      if (options.waitError) throw options.waitError;
    }),
    content: jest.fn<BrowserPage['content']>(async () => options.html ?? SAMPLE_HTML),
  } satisfies BrowserPage;

  const close = jest.fn(async () => {
    if (options.closeError) throw options.closeError;
  });

  const launcher = jest.fn<BrowserLauncher>(async () => ({
    newPage: async () => page,
    close,
  }));

  return { page, close, launcher, now };
}

describe('Fetcher with BrowserPageSource', () => {
  function browserFetcher(options: FakeBrowserOptions = {}) {
    const fake = createFakeBrowser(options);
    const logger = createMockLogger();
    const source = new BrowserPageSource({
      executablePath: '/usr/bin/chromium',
      launcher: fake.launcher,
      logger,
      now: fake.now,
    });
    return { ...fake, logger, fetcher: new Fetcher({ source, logger }) };
  }

  test('should render the page and wait for the main content node', async () => {
    const { fetcher, page, close, launcher } = browserFetcher();

    const result = await fetcher.fetch('https://example.com');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.content).toBe('Welcome Build faster today. Pricing');
    expect(launcher).toHaveBeenCalledWith({
      executablePath: '/usr/bin/chromium',
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
    expect(page.setUserAgent).toHaveBeenCalledWith(DEFAULT_USER_AGENT);
    expect(page.goto).toHaveBeenCalledWith('https://example.com', {
      timeout: 15000,
      waitUntil: 'domcontentloaded',
    });
    expect(page.waitForSelector).toHaveBeenCalledWith(DEFAULT_CONTENT_SELECTOR, { timeout: 15000 });
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('should not treat a bare body as main content', () => {
    const $ = cheerio.load('<html><body><div id="app"></div></body></html>');

    expect($(DEFAULT_CONTENT_SELECTOR).length).toBe(0);
  });

  test('should give the content wait only what navigation left of the timeout', async () => {
    const { fetcher, page } = browserFetcher({ gotoMs: 4000 });

    await fetcher.fetch('https://example.com');

    expect(page.waitForSelector).toHaveBeenCalledWith(DEFAULT_CONTENT_SELECTOR, { timeout: 11000 });
  });

  test('should extract the whole page when no main content node appears in time', async () => {
    const { fetcher, page, logger } = browserFetcher({
      waitError: timeoutError('Waiting for selector `main` failed: 15000ms exceeded'),
    });

    const result = await fetcher.fetch('https://example.com');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.content).toBe('Welcome Build faster today. Pricing');
    expect(page.content).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith('Main content not found, extracting the whole page', {
      url: 'https://example.com',
      selector: DEFAULT_CONTENT_SELECTOR,
    });
  });

  test('should skip the content wait when navigation used the whole timeout', async () => {
    const { fetcher, page } = browserFetcher({ gotoMs: 15000 });

    const result = await fetcher.fetch('https://example.com');

    expect(result.success).toBe(true);
    expect(page.waitForSelector).not.toHaveBeenCalled();
  });

  test('should fail when the content wait breaks for another reason', async () => {
    const { fetcher, close } = browserFetcher({ waitError: new Error('Target closed') });

    const result = await fetcher.fetch('https://example.com');

    expect(result).toEqual({
      success: false,
      url: 'https://example.com',
      error: 'Unexpected error fetching https://example.com: Target closed',
      error_kind: 'FETCH_UNEXPECTED',
    });
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('should report an HTTP error status and still close the browser', async () => {
    const { fetcher, close, page } = browserFetcher({ status: 503 });

    const result = await fetcher.fetch('https://example.com');

    expect(result).toEqual({
      success: false,
      url: 'https://example.com',
      error: 'HTTP error 503 while fetching https://example.com',
      error_kind: 'FETCH_HTTP_ERROR',
      status: 503,
    });
    expect(page.content).not.toHaveBeenCalled();
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('should classify a name resolution failure as a connection error', async () => {
    const { fetcher } = browserFetcher({
      gotoError: new Error('net::ERR_NAME_NOT_RESOLVED at https://nowhere.test'),
    });

    const result = await fetcher.fetch('https://nowhere.test');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error_kind).toBe('FETCH_CONNECTION_ERROR');
    expect(result.error).toBe('Could not connect to nowhere.test: net::ERR_NAME_NOT_RESOLVED at https://nowhere.test');
  });

  test('should classify a navigation timeout', async () => {
    const { fetcher } = browserFetcher({ gotoError: timeoutError('Navigation timeout of 15000 ms exceeded') });

    const result = await fetcher.fetch('https://slow.test');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error_kind).toBe('FETCH_TIMEOUT');
  });

  test('should log and ignore a failure to close the browser', async () => {
    const { fetcher, logger } = browserFetcher({ closeError: new Error('already closed') });

    const result = await fetcher.fetch('https://example.com');

    expect(result.success).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('Failed to close browser', {
      url: 'https://example.com',
      error: 'already closed',
    });
  });
});
