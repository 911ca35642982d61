/**
 * Wires configured collaborators for runPipeline.
 */

import type { AxiosInstance } from 'axios';
import { selectAnalysisBattery } from '../analyzer/index.js';
import { FetchCache } from '../cache/index.js';
import { AnthropicCompletionClient, type MessageCreator } from '../completion/index.js';
import type { AppConfig } from '../config/index.js';
import { ConfigError } from '../errors/index.js';
import { BrowserPageSource, Fetcher, StaticPageSource, type BrowserLauncher, type PageSource } from '../fetcher/index.js';
import type { Logger, Metrics } from '../logging/index.js';
import { createStorageAdapter, type StorageAdapter } from '../storage/index.js';
import type { PipelineDeps } from './index.js';

export interface ServiceOverrides {
  http?: AxiosInstance;
  launcher?: BrowserLauncher;
  createMessage?: MessageCreator;
  logger?: Logger;
  metrics?: Metrics;
}

export function createPageSource(config: AppConfig, overrides: ServiceOverrides = {}): PageSource {
  const { mode, timeoutMs, userAgent, chromeExecutablePath } = config.fetch;

  if (mode === 'browser') {
    if (!chromeExecutablePath) {
      throw new ConfigError(['CHROME_EXECUTABLE_PATH is required when FETCH_MODE is browser']);
    }
    return new BrowserPageSource({
      executablePath: chromeExecutablePath,
      timeoutMs,
      userAgent,
      launcher: overrides.launcher,
      logger: overrides.logger,
    });
  }

  return new StaticPageSource({ timeoutMs, userAgent, http: overrides.http });
}

/**
 * Fetcher, completion client and batteries for one process
 */
export function createPipelineDeps(config: AppConfig, overrides: ServiceOverrides = {}): PipelineDeps {
  const fetcher = new Fetcher({
    source: createPageSource(config, overrides),
    cache: new FetchCache({ ttlMs: config.fetch.cacheTtlMs }),
    timeoutMs: config.fetch.timeoutMs,
    headingsLimit: config.fetch.headingsLimit,
    logger: overrides.logger,
    metrics: overrides.metrics,
  });

  const client = new AnthropicCompletionClient(
    {
      apiKey: config.anthropic.apiKey,
      model: config.anthropic.model,
      timeoutMs: config.anthropic.timeoutMs,
    },
    { createMessage: overrides.createMessage, logger: overrides.logger, metrics: overrides.metrics }
  );

  return {
    fetcher,
    client,
    analysisBattery: selectAnalysisBattery(config.analysis.battery),
    contentLimit: config.analysis.contentLimit,
    logger: overrides.logger,
    metrics: overrides.metrics,
  };
}

/**
 * A local directory when one is given, else S3 when a bucket is configured
 */
export function createExportStorage(config: AppConfig, directory?: string): StorageAdapter | undefined {
  if (directory) {
    return createStorageAdapter({ type: 'local', directory });
  }
  if (config.export.s3Bucket) {
    return createStorageAdapter({
      type: 's3',
      bucket: config.export.s3Bucket,
      prefix: config.export.s3Prefix,
      region: config.export.region,
    });
  }
  return undefined;
}
