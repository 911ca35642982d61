/**
 * Pipeline Module
 *
 * One request, strictly in order:
 * Fetching -> (FetchFailed | Analyzing) -> Recommending -> Done.
 * Every stage is awaited before the next begins and nothing is retried.
 */

import { analyzeContent, isAnalysisFailure, STANDARD_ANALYSIS_BATTERY } from '../analyzer/index.js';
import { aggregate } from '../aggregator/index.js';
import type { CompletionClient } from '../completion/index.js';
import { createConsoleLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';
import { validateUrlInput } from '../normalizer/index.js';
import { generateRecommendations, RECOMMENDATION_BATTERY } from '../recommender/index.js';
import type {
  AnalysisField,
  BatteryQuestion,
  ExportBundle,
  FetchErrorCode,
  FetchResult,
  RecommendationCategory,
} from '../types/index.js';

export type PipelineStage = 'fetching' | 'analyzing' | 'recommending' | 'done' | 'fetch_failed';

export const STAGE_PROGRESS: Record<PipelineStage, number> = {
  fetching: 25,
  analyzing: 50,
  recommending: 75,
  done: 100,
  fetch_failed: 100,
};

export interface StageEvent {
  stage: PipelineStage;
  progress: number;
  url: string;
}

/**
 * Anything that turns a URL into a FetchResult without throwing
 */
export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
}

export interface PipelineDeps {
  fetcher: PageFetcher;
  client: CompletionClient;
  analysisBattery?: ReadonlyArray<BatteryQuestion<AnalysisField>>;
  recommendationBattery?: ReadonlyArray<BatteryQuestion<RecommendationCategory>>;
  contentLimit?: number;
  toolIdentity?: string;
  /** Generation-time clock for the bundle */
  now?: () => Date;
  onStage?: (event: StageEvent) => void;
  logger?: Logger;
  metrics?: Metrics;
}

export type PipelineOutcome =
  | { status: 'invalid_url'; error: string }
  | { status: 'fetch_failed'; url: string; error: string; error_kind: FetchErrorCode }
  | { status: 'done'; bundle: ExportBundle };

const defaultLogger = createConsoleLogger('pipeline');

/**
 * Run the whole pipeline for one raw URL
 *
 * @param rawUrl - URL as typed, scheme optional
 */
export async function runPipeline(rawUrl: string, deps: PipelineDeps): Promise<PipelineOutcome> {
  const logger = deps.logger ?? defaultLogger;
  const metrics = deps.metrics ?? defaultMetrics;
  const startTime = Date.now();

  const validated = validateUrlInput(rawUrl);
  if (!validated.success || validated.data === undefined) {
    const error = validated.error?.message ?? 'url is invalid';
    logger.warn('Rejected URL', { url: rawUrl, error });
    return { status: 'invalid_url', error };
  }
  const url = validated.data;

  const report = (stage: PipelineStage): void => {
    logger.debug('Pipeline stage', { url, stage });
    deps.onStage?.({ stage, progress: STAGE_PROGRESS[stage], url });
  };

  report('fetching');
  const fetchResult = await deps.fetcher.fetch(url);
  if (!fetchResult.success) {
    report('fetch_failed');
    metrics.increment('pipeline.fetch_failed', { code: fetchResult.error_kind });
    return { status: 'fetch_failed', url, error: fetchResult.error, error_kind: fetchResult.error_kind };
  }

  report('analyzing');
  const analysis = await analyzeContent(fetchResult, url, deps.analysisBattery ?? STANDARD_ANALYSIS_BATTERY, {
    client: deps.client,
    contentLimit: deps.contentLimit,
    logger,
    metrics,
  });
  if (isAnalysisFailure(analysis)) {
    // Not reachable after a successful fetch
    report('fetch_failed');
    return { status: 'fetch_failed', url, error: analysis.error, error_kind: 'FETCH_UNEXPECTED' };
  }

  report('recommending');
  const recommendations = await generateRecommendations(
    analysis,
    deps.recommendationBattery ?? RECOMMENDATION_BATTERY,
    { client: deps.client, logger, metrics }
  );

  const bundle = aggregate(url, analysis, recommendations, {
    now: deps.now ? deps.now() : new Date(),
    toolIdentity: deps.toolIdentity,
  });

  report('done');
  logger.info('Analysis complete', { url, reportId: bundle.reportId, durationMs: Date.now() - startTime });
  metrics.timing('pipeline.duration', Date.now() - startTime);

  return { status: 'done', bundle };
}

export { createPipelineDeps, createPageSource, createExportStorage, type ServiceOverrides } from './services.js';
