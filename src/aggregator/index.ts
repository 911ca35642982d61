/**
 * Result Aggregator Module
 *
 * Merges one run's analysis and recommendations into an ExportBundle and
 * derives every view of it: the flat JSON export document, the one-row CSV,
 * a Markdown report, summary metrics, the report id and export file names.
 */

export * from './bundle.js';
export { serializeJson, serializeCsv, escapeCsvValue, CSV_IDENTITY_COLUMNS, parseExportJson, ExportDocumentSchema } from './serialize.js';
export { renderMarkdown } from './markdown.js';
