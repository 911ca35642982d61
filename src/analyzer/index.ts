/**
 * Analyzer Module
 *
 * Asks the analysis battery about one fetched page.
 *
 * Responsibilities:
 * - Short-circuit on a failed fetch without any completion call
 * - Normalize and truncate the page text
 * - Build one structured body (URL, title, description, headings, content)
 * - Run every question of the battery against it, isolating failures
 *
 * Usage:
 * ```typescript
 * const outcome = await analyze(fetchResult, 'https://example.com', { client });
 * if (isAnalysisFailure(outcome)) console.error(outcome.error);
 * ```
 */

import { runBattery } from '../battery/index.js';
import type { CompletionClient } from '../completion/index.js';
import { createConsoleLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';
import { DEFAULT_CONTENT_LIMIT, normalizeContent } from '../normalizer/index.js';
import type {
  AnalysisField,
  AnalysisFailure,
  AnalysisOutcome,
  AnalysisRecord,
  BatteryQuestion,
  FetchResult,
  FetchSuccess,
} from '../types/index.js';

// ============================================================================
// Batteries
// ============================================================================

export const ANALYST_SYSTEM_PROMPT = 'You are a marketing analyst. Give concise, specific answers only.';
export const ANALYSIS_MAX_TOKENS = 250;
export const ANALYSIS_TEMPERATURE = 0.3;

export const STANDARD_ANALYSIS_BATTERY = [
  {
    key: 'SEO Keywords',
    prompt:
      'Extract the 8-10 most important SEO keywords from this website. Return only the keywords separated by commas, no explanations:',
  },
  {
    key: 'Marketing Strategy',
    prompt: 'Summarize the main marketing approach in 2-3 clear sentences:',
  },
  {
    key: 'Target Audience',
    prompt: 'Who is the primary target audience? Answer in 1-2 sentences:',
  },
  {
    key: 'Value Proposition',
    prompt: 'What is the unique value proposition? Answer in 1-2 sentences:',
  },
  {
    key: 'Call-to-Actions',
    prompt: 'List the main call-to-action phrases found on the site, separated by commas:',
  },
  {
    key: 'Content Themes',
    prompt: 'What are the 4-5 main content themes/topics? List them separated by commas:',
  },
] as const satisfies ReadonlyArray<BatteryQuestion<AnalysisField>>;

export const EXTENDED_ANALYSIS_BATTERY = [
  ...STANDARD_ANALYSIS_BATTERY,
  {
    key: 'Business Type',
    prompt:
      'What type of business is this (for example SaaS, e-commerce, agency, local service)? Answer in a short phrase:',
  },
] as const satisfies ReadonlyArray<BatteryQuestion<AnalysisField>>;

export function selectAnalysisBattery(name: 'standard' | 'extended'): ReadonlyArray<BatteryQuestion<AnalysisField>> {
  return name === 'extended' ? EXTENDED_ANALYSIS_BATTERY : STANDARD_ANALYSIS_BATTERY;
}

// ============================================================================
// Analysis
// ============================================================================

export interface AnalyzerDeps {
  client: CompletionClient;
  /** Truncation bound for the page text (default 4000) */
  contentLimit?: number;
  logger?: Logger;
  metrics?: Metrics;
}

const defaultLogger = createConsoleLogger('analyzer');

export function isAnalysisFailure<F extends AnalysisField>(outcome: AnalysisOutcome<F>): outcome is AnalysisFailure {
  return 'error' in outcome;
}

/**
 * Structured prompt body for one page
 */
export function buildContentBody(page: FetchSuccess, url: string, content: string): string {
  const lines = [`Website content from ${url}:`];
  if (page.title) {
    lines.push(`Title: ${page.title}`);
  }
  if (page.description) {
    lines.push(`Description: ${page.description}`);
  }
  if (page.headings.length > 0) {
    lines.push(`Headings: ${page.headings.join(' | ')}`);
  }
  lines.push(`Content: ${content}`);
  return lines.join('\n');
}

/**
 * Run an analysis battery against a fetch result
 *
 * @param url - The canonical URL the fetch was issued for
 * @returns `{ error }` when the fetch failed, else one answer per battery question
 */
export async function analyzeContent<F extends AnalysisField>(
  fetchResult: FetchResult,
  url: string,
  battery: ReadonlyArray<BatteryQuestion<F>>,
  deps: AnalyzerDeps
): Promise<AnalysisOutcome<F>> {
  if (!fetchResult.success) {
    return { error: fetchResult.error };
  }

  const logger = deps.logger ?? defaultLogger;
  const metrics = deps.metrics ?? defaultMetrics;
  const startTime = Date.now();

  const normalized = normalizeContent(fetchResult.content, deps.contentLimit ?? DEFAULT_CONTENT_LIMIT);
  const body = buildContentBody(fetchResult, url, normalized.text);

  logger.info('Analyzing content', {
    url,
    questions: battery.length,
    contentLength: normalized.fullLength,
    truncated: normalized.truncated,
  });

  const answers = await runBattery(
    battery,
    body,
    deps.client,
    {
      system: ANALYST_SYSTEM_PROMPT,
      maxTokens: ANALYSIS_MAX_TOKENS,
      temperature: ANALYSIS_TEMPERATURE,
      composePrompt: (question, content) => `${question}\n\n${content}`,
    },
    logger,
    metrics
  );

  metrics.timing('analyzer.duration', Date.now() - startTime);

  const record: AnalysisRecord<F> = {
    URL: url,
    Content_Length: normalized.fullLength,
    answers,
  };
  if (fetchResult.title) {
    record.Title = fetchResult.title;
  }
  return record;
}

/**
 * Run the standard battery
 */
export function analyze(
  fetchResult: FetchResult,
  url: string,
  deps: AnalyzerDeps
): Promise<AnalysisOutcome<(typeof STANDARD_ANALYSIS_BATTERY)[number]['key']>> {
  return analyzeContent(fetchResult, url, STANDARD_ANALYSIS_BATTERY, deps);
}
