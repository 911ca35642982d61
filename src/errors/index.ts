/**
 * Error Module
 *
 * Error classes raised across module boundaries. Fetch failures are not
 * here: the Fetcher returns them inside a FetchResult instead of throwing.
 */

import type { CompletionErrorCode } from '../types/index.js';

/**
 * A single completion call failed
 */
export class CompletionError extends Error {
  readonly code: CompletionErrorCode;
  readonly status: number | undefined;

  constructor(code: CompletionErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CompletionError';
    this.code = code;
    this.status = options.status;
  }
}

/**
 * No API credential was supplied at startup
 */
export class MissingCredentialError extends Error {
  readonly variable: string;

  constructor(variable: string) {
    super(`${variable} is required. Set it in the environment before starting.`);
    this.name = 'MissingCredentialError';
    this.variable = variable;
  }
}

/**
 * Configuration values failed validation
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
