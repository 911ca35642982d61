/**
 * Recommender Module
 *
 * Turns the analysis answers into recommendation text per category.
 */

import { runBattery } from '../battery/index.js';
import type { CompletionClient } from '../completion/index.js';
import { createConsoleLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';
import type {
  AnalysisField,
  AnalysisRecord,
  BatteryQuestion,
  RecommendationCategory,
  RecommendationSet,
} from '../types/index.js';

export const CONSULTANT_SYSTEM_PROMPT =
  'You are a senior digital marketing consultant. Provide specific, actionable recommendations in bullet points.';
export const RECOMMENDATION_MAX_TOKENS = 400;
export const RECOMMENDATION_TEMPERATURE = 0.5;

export const RECOMMENDATION_BATTERY = [
  {
    key: 'SEO Improvements',
    prompt:
      'Based on this website analysis, provide 3 specific SEO improvement recommendations. Be actionable and specific:',
  },
  {
    key: 'Content Strategy',
    prompt: 'Suggest 3 content marketing strategies to improve engagement and reach:',
  },
  {
    key: 'User Experience',
    prompt: 'Recommend 3 UX improvements to enhance user experience and navigation:',
  },
  {
    key: 'Conversion Optimization',
    prompt: 'Provide 3 conversion rate optimization recommendations to improve results:',
  },
] as const satisfies ReadonlyArray<BatteryQuestion<RecommendationCategory>>;

export interface RecommenderDeps {
  client: CompletionClient;
  logger?: Logger;
  metrics?: Metrics;
}

const defaultLogger = createConsoleLogger('recommender');

/**
 * "Field: answer" lines for every answered analysis question.
 * Identity fields and failed answers are left out.
 */
export function buildAnalysisDigest(analysis: AnalysisRecord<AnalysisField>): string {
  return analysis.answers
    .flatMap((answer) => (answer.outcome.ok ? [`${answer.key}: ${answer.outcome.value}`] : []))
    .join('\n');
}

/**
 * Run a recommendation battery over an analysis record
 */
export async function generateRecommendations<C extends RecommendationCategory>(
  analysis: AnalysisRecord<AnalysisField>,
  battery: ReadonlyArray<BatteryQuestion<C>>,
  deps: RecommenderDeps
): Promise<RecommendationSet<C>> {
  const logger = deps.logger ?? defaultLogger;
  const metrics = deps.metrics ?? defaultMetrics;
  const startTime = Date.now();

  const digest = buildAnalysisDigest(analysis);
  logger.info('Generating recommendations', {
    url: analysis.URL,
    categories: battery.length,
    digestLength: digest.length,
  });

  const answers = await runBattery(
    battery,
    digest,
    deps.client,
    {
      system: CONSULTANT_SYSTEM_PROMPT,
      maxTokens: RECOMMENDATION_MAX_TOKENS,
      temperature: RECOMMENDATION_TEMPERATURE,
      composePrompt: (question, body) => `${question}\n\nWebsite Analysis:\n${body}`,
    },
    logger,
    metrics
  );

  metrics.timing('recommender.duration', Date.now() - startTime);
  return { answers };
}

/**
 * Run the four standard categories
 */
export function recommend(
  analysis: AnalysisRecord<AnalysisField>,
  deps: RecommenderDeps
): Promise<RecommendationSet<RecommendationCategory>> {
  return generateRecommendations(analysis, RECOMMENDATION_BATTERY, deps);
}
