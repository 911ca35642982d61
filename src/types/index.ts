/**
 * Core type definitions for the site marketing analyzer
 *
 * This module exports the records that flow through the pipeline:
 * Fetcher -> Normalizer -> Analyzer -> Recommender -> Aggregator.
 */

/**
 * Identifier of one exported report
 * Format: YYYYMMDD_HHMMSS_<8 hex chars>
 */
export type ReportId = string;

// ============================================================================
// Fetcher Output
// ============================================================================

/**
 * Failure classes a fetch can end in
 */
export type FetchErrorCode =
  | 'FETCH_TIMEOUT'
  | 'FETCH_CONNECTION_ERROR'
  | 'FETCH_HTTP_ERROR'
  | 'FETCH_UNEXPECTED';

/**
 * Structural signals extracted from a page alongside its text
 */
export interface PageMetadata {
  title: string | null;
  description: string | null;
  /** h1/h2/h3 text in document order, capped */
  headings: string[];
}

export interface FetchSuccess extends PageMetadata {
  success: true;
  url: string;
  /** Visible text, whitespace collapsed to single spaces */
  content: string;
  content_length: number;
  fetched_at: string;
}

export interface FetchFailure {
  success: false;
  url: string;
  error: string;
  error_kind: FetchErrorCode;
  /** HTTP status, only for FETCH_HTTP_ERROR */
  status?: number;
}

/**
 * Result of one Fetcher invocation. Never thrown, always returned.
 */
export type FetchResult = FetchSuccess | FetchFailure;

// ============================================================================
// Batteries
// ============================================================================

export const ANALYSIS_FIELDS = [
  'SEO Keywords',
  'Marketing Strategy',
  'Target Audience',
  'Value Proposition',
  'Call-to-Actions',
  'Content Themes',
  'Business Type',
] as const;

export type AnalysisField = (typeof ANALYSIS_FIELDS)[number];

export const RECOMMENDATION_CATEGORIES = [
  'SEO Improvements',
  'Content Strategy',
  'User Experience',
  'Conversion Optimization',
] as const;

export type RecommendationCategory = (typeof RECOMMENDATION_CATEGORIES)[number];

/**
 * Failure classes of a single completion call
 */
export type CompletionErrorCode =
  | 'COMPLETION_TIMEOUT'
  | 'COMPLETION_AUTH'
  | 'COMPLETION_QUOTA'
  | 'COMPLETION_MALFORMED'
  | 'COMPLETION_UNKNOWN';

export interface FieldError {
  code: CompletionErrorCode;
  message: string;
}

/**
 * Outcome of one battery question: the answer text or the error that replaced it
 */
export type FieldOutcome =
  | { ok: true; value: string }
  | { ok: false; error: FieldError };

export interface BatteryAnswer<K extends string> {
  key: K;
  outcome: FieldOutcome;
}

/**
 * One question of a battery
 */
export interface BatteryQuestion<K extends string> {
  key: K;
  prompt: string;
}

// ============================================================================
// Analyzer / Recommender Output
// ============================================================================

/**
 * Answers to the analysis battery plus the page identity.
 * `answers` holds exactly one entry per battery question, in battery order.
 */
export interface AnalysisRecord<F extends AnalysisField = AnalysisField> {
  URL: string;
  Title?: string;
  /** Length of the normalized content before truncation */
  Content_Length: number;
  answers: Array<BatteryAnswer<F>>;
}

/**
 * Returned by the Analyzer when the fetch it was given had failed
 */
export interface AnalysisFailure {
  error: string;
}

export type AnalysisOutcome<F extends AnalysisField = AnalysisField> =
  | AnalysisRecord<F>
  | AnalysisFailure;

export interface RecommendationSet<C extends RecommendationCategory = RecommendationCategory> {
  answers: Array<BatteryAnswer<C>>;
}

// ============================================================================
// Aggregator Output
// ============================================================================

/**
 * Terminal snapshot of one analysis run
 */
export interface ExportBundle {
  reportId: ReportId;
  website_url: string;
  analysis: AnalysisRecord;
  recommendations: RecommendationSet;
  /** ISO-8601 generation time */
  timestamp: string;
  tool_identity: string;
}

/**
 * JSON export shape
 */
export interface ExportDocument {
  website_url: string;
  analysis_results: Record<string, string | number>;
  recommendations: Record<string, string>;
  /** YYYY-MM-DD HH:MM:SS UTC */
  analysis_timestamp: string;
  analyzed_by: string;
}

/**
 * Artifact metadata for export storage tracking
 */
export interface ArtifactMetadata {
  reportId: ReportId;
  artifactType: ExportArtifactType;
  fileName: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

export type ExportArtifactType = 'json' | 'csv' | 'markdown';

/**
 * Export sink for point-in-time reports
 */
export interface StorageAdapter {
  save(reportId: ReportId, artifactType: ExportArtifactType, content: string, metadata?: Record<string, string>): Promise<ArtifactMetadata>;
  load(reportId: ReportId, artifactType: ExportArtifactType): Promise<{ content: string; metadata: ArtifactMetadata }>;
  exists(reportId: ReportId, artifactType: ExportArtifactType): Promise<boolean>;
  list(reportId: ReportId): Promise<ArtifactMetadata[]>;
}

/**
 * Module result wrapper
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    module: string;
    timestamp: string;
    reportId?: ReportId;
    duration?: number;
  };
}
