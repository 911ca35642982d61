/**
 * Completion Module
 *
 * Stateless text-in/text-out access to a language model. The pipeline only
 * sees the CompletionClient interface; AnthropicCompletionClient is the
 * production implementation on top of the Anthropic Messages API.
 *
 * Features:
 * - One attempt per call, no retry
 * - Failures raised as CompletionError with a typed code
 * - Token usage and latency reported through Logger / Metrics
 */

import Anthropic from '@anthropic-ai/sdk';
import { CompletionError } from '../errors/index.js';
import { createConsoleLogger, defaultMetrics, errorMessage, type Logger, type Metrics } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CompletionRequest {
  /** Role framing for the assistant */
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Text-completion capability
 *
 * Resolves with the generated text or rejects with a CompletionError.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * The subset of a Messages API response the client reads
 */
export interface MessageResponse {
  content: Array<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage?: { input_tokens: number; output_tokens: number };
}

export type MessageCreator = (params: Anthropic.MessageCreateParamsNonStreaming) => Promise<MessageResponse>;

export interface AnthropicCompletionConfig {
  apiKey: string;
  model: string;
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
}

export interface AnthropicCompletionOptions {
  /** Replaces the SDK call, for tests */
  createMessage?: MessageCreator;
  logger?: Logger;
  metrics?: Metrics;
}

const defaultLogger = createConsoleLogger('completion');

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Map an SDK error to a CompletionError
 */
export function classifyCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }

  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new CompletionError('COMPLETION_TIMEOUT', 'Completion request timed out', { cause: error });
  }

  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    if (status === 401 || status === 403) {
      return new CompletionError('COMPLETION_AUTH', `Completion request rejected: ${error.message}`, {
        status,
        cause: error,
      });
    }
    if (status === 429 || status === 529) {
      return new CompletionError('COMPLETION_QUOTA', `Completion quota exceeded: ${error.message}`, {
        status,
        cause: error,
      });
    }
    const options: { status?: number; cause: unknown } = { cause: error };
    if (status !== undefined) {
      options.status = status;
    }
    return new CompletionError('COMPLETION_UNKNOWN', error.message, options);
  }

  return new CompletionError('COMPLETION_UNKNOWN', errorMessage(error), { cause: error });
}

// ============================================================================
// Anthropic Client
// ============================================================================

export class AnthropicCompletionClient implements CompletionClient {
  private readonly model: string;
  private readonly createMessage: MessageCreator;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(config: AnthropicCompletionConfig, options: AnthropicCompletionOptions = {}) {
    this.model = config.model;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;

    if (options.createMessage) {
      this.createMessage = options.createMessage;
    } else {
      const client = new Anthropic({
        apiKey: config.apiKey,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
      this.createMessage = (params) => client.messages.create(params);
    }
  }

  async complete(request: CompletionRequest): Promise<string> {
    const startTime = Date.now();

    this.logger.debug('Calling completion API', {
      model: this.model,
      maxTokens: request.maxTokens,
      temperature: request.temperature,
      promptLength: request.prompt.length,
    });
    this.metrics.increment('completion.calls', { model: this.model });

    let response: MessageResponse;
    try {
      response = await this.createMessage({
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      });
    } catch (error) {
      const failure = classifyCompletionError(error);
      this.logger.warn('Completion call failed', { model: this.model, code: failure.code, error: failure.message });
      this.metrics.increment('completion.errors', { model: this.model, code: failure.code });
      throw failure;
    }

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || typeof textBlock.text !== 'string') {
      this.metrics.increment('completion.errors', { model: this.model, code: 'COMPLETION_MALFORMED' });
      throw new CompletionError('COMPLETION_MALFORMED', 'No text content in completion response');
    }

    const duration = Date.now() - startTime;
    this.logger.debug('Completion received', {
      model: this.model,
      inputTokens: response.usage?.input_tokens,
      outputTokens: response.usage?.output_tokens,
      stopReason: response.stop_reason,
      durationMs: duration,
    });
    this.metrics.timing('completion.duration', duration, { model: this.model });
    this.metrics.gauge('completion.output_tokens', response.usage?.output_tokens ?? 0, { model: this.model });

    return textBlock.text;
  }
}
