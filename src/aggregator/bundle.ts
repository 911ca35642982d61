/**
 * ExportBundle construction and its flat, summary and file-name views.
 */

import { createHash } from 'crypto';
import type {
  AnalysisField,
  AnalysisRecord,
  BatteryAnswer,
  ExportBundle,
  ExportDocument,
  FieldOutcome,
  RecommendationCategory,
  RecommendationSet,
  ReportId,
} from '../types/index.js';

export const DEFAULT_TOOL_IDENTITY = 'Site Marketing Analyzer';

export const ANALYSIS_ERROR_PREFIX = 'Analysis error: ';
export const RECOMMENDATION_ERROR_PREFIX = 'Recommendation error: ';

export interface AggregateOptions {
  /** Generation time (default: now) */
  now?: Date;
  toolIdentity?: string;
}

// ============================================================================
// Report Id / Timestamps
// ============================================================================

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** YYYYMMDD_HHMMSS in UTC */
export function compactTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}

/** YYYY-MM-DD HH:MM:SS UTC */
export function formatExportTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/**
 * Report id: generation time plus the first 8 hex chars of sha256(url)
 */
export function generateReportId(url: string, date: Date): ReportId {
  const hash = createHash('sha256').update(url).digest('hex');
  return `${compactTimestamp(date)}_${hash.substring(0, 8)}`;
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Pure merge of one run into its export bundle
 */
export function aggregate(
  url: string,
  analysis: AnalysisRecord<AnalysisField>,
  recommendations: RecommendationSet<RecommendationCategory>,
  options: AggregateOptions = {}
): ExportBundle {
  const now = options.now ?? new Date();
  return {
    reportId: generateReportId(url, now),
    website_url: url,
    analysis,
    recommendations,
    timestamp: now.toISOString(),
    tool_identity: options.toolIdentity ?? DEFAULT_TOOL_IDENTITY,
  };
}

/**
 * Display text of an outcome: the answer, or the prefixed error message
 */
export function outcomeText(outcome: FieldOutcome, errorPrefix: string): string {
  return outcome.ok ? outcome.value : `${errorPrefix}${outcome.error.message}`;
}

/**
 * Flat analysis_results mapping: identity fields first, then answers in battery order
 */
export function flattenAnalysis(analysis: AnalysisRecord<AnalysisField>): Record<string, string | number> {
  const flat: Record<string, string | number> = { URL: analysis.URL };
  if (analysis.Title !== undefined) {
    flat.Title = analysis.Title;
  }
  flat.Content_Length = analysis.Content_Length;
  for (const answer of analysis.answers) {
    flat[answer.key] = outcomeText(answer.outcome, ANALYSIS_ERROR_PREFIX);
  }
  return flat;
}

export function flattenRecommendations(
  recommendations: RecommendationSet<RecommendationCategory>
): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const answer of recommendations.answers) {
    flat[answer.key] = outcomeText(answer.outcome, RECOMMENDATION_ERROR_PREFIX);
  }
  return flat;
}

/**
 * JSON export document of a bundle
 */
export function toExportDocument(bundle: ExportBundle): ExportDocument {
  return {
    website_url: bundle.website_url,
    analysis_results: flattenAnalysis(bundle.analysis),
    recommendations: flattenRecommendations(bundle.recommendations),
    analysis_timestamp: formatExportTimestamp(new Date(bundle.timestamp)),
    analyzed_by: bundle.tool_identity,
  };
}

// ============================================================================
// Summary Metrics
// ============================================================================

export interface AnalysisSummary {
  keywordCount: number;
  callToActionCount: number;
  contentLength: number;
}

/**
 * Comma-separated items of an answered field, blanks ignored; 0 when it failed or is absent
 */
export function countListItems<K extends string>(answers: ReadonlyArray<BatteryAnswer<K>>, key: K): number {
  const answer = answers.find((entry) => entry.key === key);
  if (!answer || !answer.outcome.ok) {
    return 0;
  }
  return answer.outcome.value.split(',').filter((item) => item.trim().length > 0).length;
}

export function summarizeAnalysis(analysis: AnalysisRecord<AnalysisField>): AnalysisSummary {
  return {
    keywordCount: countListItems<AnalysisField>(analysis.answers, 'SEO Keywords'),
    callToActionCount: countListItems<AnalysisField>(analysis.answers, 'Call-to-Actions'),
    contentLength: analysis.Content_Length,
  };
}

// ============================================================================
// Export File Names
// ============================================================================

export function jsonExportFileName(url: string): string {
  const slug = url.replace(/https:\/\//g, '').replace(/\//g, '_').slice(0, 50);
  return `marketing_analysis_${slug}.json`;
}

export function csvExportFileName(date: Date): string {
  return `analysis_data_${compactTimestamp(date)}.csv`;
}

export function markdownExportFileName(reportId: ReportId): string {
  return `marketing_report_${reportId}.md`;
}
