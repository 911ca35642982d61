/**
 * Configuration Module
 *
 * Reads the process environment once and validates it with zod. A missing
 * credential is a MissingCredentialError, any other invalid value is
 * collected into a single ConfigError.
 */

import { z } from 'zod';
import { DEFAULT_CACHE_TTL_MS } from '../cache/index.js';
import { ConfigError, MissingCredentialError } from '../errors/index.js';
import { DEFAULT_HEADINGS_LIMIT } from '../fetcher/extract.js';
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../fetcher/source.js';
import type { LogLevel } from '../logging/index.js';
import { DEFAULT_CONTENT_LIMIT } from '../normalizer/index.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_COMPLETION_TIMEOUT_MS = 60000;
export const DEFAULT_EXPORT_PREFIX = 'reports';
export const DEFAULT_AWS_REGION = 'us-east-1';

export type FetchMode = 'static' | 'browser';
export type BatteryName = 'standard' | 'extended';

export interface AppConfig {
  anthropic: {
    apiKey: string;
    model: string;
    timeoutMs: number;
  };
  fetch: {
    mode: FetchMode;
    timeoutMs: number;
    userAgent: string;
    cacheTtlMs: number;
    chromeExecutablePath?: string;
    headingsLimit: number;
  };
  analysis: {
    contentLimit: number;
    battery: BatteryName;
  };
  export: {
    s3Bucket?: string;
    s3Prefix: string;
    region: string;
  };
  logLevel: LogLevel;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z
  .object({
    ANTHROPIC_MODEL: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_MODEL)),
    COMPLETION_TIMEOUT_MS: positiveInt(DEFAULT_COMPLETION_TIMEOUT_MS),
    FETCH_MODE: z.preprocess(blankToUndefined, z.enum(['static', 'browser']).default('static')),
    FETCH_TIMEOUT_MS: positiveInt(DEFAULT_FETCH_TIMEOUT_MS),
    FETCH_USER_AGENT: z.preprocess(blankToUndefined, z.string().default(DEFAULT_USER_AGENT)),
    FETCH_CACHE_TTL_MS: positiveInt(DEFAULT_CACHE_TTL_MS),
    CHROME_EXECUTABLE_PATH: optionalText,
    CONTENT_LIMIT: positiveInt(DEFAULT_CONTENT_LIMIT),
    HEADINGS_LIMIT: positiveInt(DEFAULT_HEADINGS_LIMIT),
    ANALYSIS_BATTERY: z.preprocess(blankToUndefined, z.enum(['standard', 'extended']).default('standard')),
    EXPORT_S3_BUCKET: optionalText,
    EXPORT_S3_PREFIX: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_EXPORT_PREFIX)),
    AWS_REGION: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_AWS_REGION)),
    LOG_LEVEL: z.preprocess(
      (value) => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
      z.enum(['debug', 'info', 'warn', 'error']).default('info')
    ),
  })
  .superRefine((env, ctx) => {
    if (env.FETCH_MODE === 'browser' && !env.CHROME_EXECUTABLE_PATH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHROME_EXECUTABLE_PATH'],
        message: 'is required when FETCH_MODE is browser',
      });
    }
  });

/**
 * Build the application configuration from an environment map
 *
 * @throws MissingCredentialError when ANTHROPIC_API_KEY is absent
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env.ANTHROPIC_API_KEY?.trim();
  if (!apiKey) {
    throw new MissingCredentialError('ANTHROPIC_API_KEY');
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const values = parsed.data;
  const config: AppConfig = {
    anthropic: {
      apiKey,
      model: values.ANTHROPIC_MODEL,
      timeoutMs: values.COMPLETION_TIMEOUT_MS,
    },
    fetch: {
      mode: values.FETCH_MODE,
      timeoutMs: values.FETCH_TIMEOUT_MS,
      userAgent: values.FETCH_USER_AGENT,
      cacheTtlMs: values.FETCH_CACHE_TTL_MS,
      headingsLimit: values.HEADINGS_LIMIT,
    },
    analysis: {
      contentLimit: values.CONTENT_LIMIT,
      battery: values.ANALYSIS_BATTERY,
    },
    export: {
      s3Prefix: values.EXPORT_S3_PREFIX,
      region: values.AWS_REGION,
    },
    logLevel: values.LOG_LEVEL,
  };

  if (values.CHROME_EXECUTABLE_PATH) {
    config.fetch.chromeExecutablePath = values.CHROME_EXECUTABLE_PATH;
  }
  if (values.EXPORT_S3_BUCKET) {
    config.export.s3Bucket = values.EXPORT_S3_BUCKET;
  }

  return config;
}
