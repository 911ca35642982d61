/**
 * Shared test doubles
 */

import { jest } from '@jest/globals';
import type { CompletionClient, CompletionRequest } from '../src/completion/index.js';
import { CompletionError } from '../src/errors/index.js';
import type { Logger, Metrics } from '../src/logging/index.js';
import type { FetchSuccess } from '../src/types/index.js';

/**
 * Create a mock logger for testing
 */
export function createMockLogger() {
  return {
    info: jest.fn<Logger['info']>(),
    warn: jest.fn<Logger['warn']>(),
    error: jest.fn<Logger['error']>(),
    debug: jest.fn<Logger['debug']>(),
  } satisfies Logger;
}

/**
 * Create a mock metrics collector for testing
 */
export function createMockMetrics() {
  return {
    increment: jest.fn<Metrics['increment']>(),
    gauge: jest.fn<Metrics['gauge']>(),
    timing: jest.fn<Metrics['timing']>(),
  } satisfies Metrics;
}

type Responder = (request: CompletionRequest) => string | CompletionError;

/**
 * Completion client that records every request and answers through a responder
 */
export class FakeCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly responder: Responder = () => 'ok') {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const answer = this.responder(request);
    if (answer instanceof CompletionError) {
      throw answer;
    }
    return answer;
  }
}

export function fetchSuccess(overrides: Partial<FetchSuccess> = {}): FetchSuccess {
  return {
    success: true,
    url: 'https://example.com',
    content: 'Welcome Home About',
    title: null,
    description: null,
    headings: [],
    content_length: 18,
    fetched_at: '2024-01-15T10:30:00.000Z',
    ...overrides,
  };
}
