/**
 * Site Marketing Analyzer - Main Entry Point
 *
 * Fetcher -> Normalizer -> Analyzer -> Recommender -> Aggregator, with
 * export sinks and the configuration that wires them.
 *
 * Every module is usable on its own; runPipeline strings them together for
 * one URL.
 */

// Core Types
export type * from './types/index.js';
export { ANALYSIS_FIELDS, RECOMMENDATION_CATEGORIES } from './types/index.js';

// Logging and Errors
export {
  createConsoleLogger,
  silentLogger,
  defaultMetrics,
  setLogLevel,
  getLogLevel,
  type Logger,
  type Metrics,
  type LogLevel,
} from './logging/index.js';
export { CompletionError, MissingCredentialError, ConfigError } from './errors/index.js';

// Configuration
export { loadConfig, type AppConfig, type FetchMode, type BatteryName } from './config/index.js';

// Normalizer Module - URL canonicalization and content truncation
export {
  normalize,
  normalizeContent,
  collapseWhitespace,
  canonicalizeUrl,
  validateUrlInput,
  ensureScheme,
  DEFAULT_CONTENT_LIMIT,
  TRUNCATION_MARKER,
  type NormalizedContent,
} from './normalizer/index.js';

// Fetcher Module
export {
  Fetcher,
  fetchPage,
  classifyFetchError,
  extractPage,
  StaticPageSource,
  BrowserPageSource,
  launchPuppeteer,
  HttpStatusError,
  type FetcherOptions,
  type PageSource,
  type BrowserLauncher,
} from './fetcher/index.js';
export { FetchCache, type FetchCacheOptions, type Clock } from './cache/index.js';

// Completion Module
export {
  AnthropicCompletionClient,
  classifyCompletionError,
  type CompletionClient,
  type CompletionRequest,
  type MessageCreator,
} from './completion/index.js';
export { runBattery, type BatterySettings } from './battery/index.js';

// Analyzer / Recommender
export {
  analyze,
  analyzeContent,
  isAnalysisFailure,
  selectAnalysisBattery,
  STANDARD_ANALYSIS_BATTERY,
  EXTENDED_ANALYSIS_BATTERY,
  type AnalyzerDeps,
} from './analyzer/index.js';
export {
  recommend,
  generateRecommendations,
  buildAnalysisDigest,
  RECOMMENDATION_BATTERY,
  type RecommenderDeps,
} from './recommender/index.js';

// Aggregator
export {
  aggregate,
  generateReportId,
  toExportDocument,
  summarizeAnalysis,
  serializeJson,
  serializeCsv,
  parseExportJson,
  renderMarkdown,
  jsonExportFileName,
  csvExportFileName,
  type AnalysisSummary,
} from './aggregator/index.js';

// Storage
export {
  S3StorageAdapter,
  LocalDirectoryStorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  saveReport,
  type S3Config,
  type StorageTarget,
} from './storage/index.js';

// Pipeline
export {
  runPipeline,
  createPipelineDeps,
  createExportStorage,
  STAGE_PROGRESS,
  type PipelineDeps,
  type PipelineOutcome,
  type PipelineStage,
  type StageEvent,
} from './pipeline/index.js';
