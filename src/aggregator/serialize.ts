/**
 * JSON and CSV serializations of an ExportBundle, plus JSON export parsing.
 */

import { z } from 'zod';
import type { ExportBundle, ExportDocument, ModuleResult } from '../types/index.js';
import { flattenAnalysis, toExportDocument } from './bundle.js';

// ============================================================================
// JSON
// ============================================================================

export const ExportDocumentSchema = z.object({
  website_url: z.string().min(1),
  analysis_results: z.record(z.union([z.string(), z.number()])),
  recommendations: z.record(z.string()),
  analysis_timestamp: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} UTC$/),
  analyzed_by: z.string(),
});

/**
 * Full structured export, two-space indented
 */
export function serializeJson(bundle: ExportBundle): string {
  return JSON.stringify(toExportDocument(bundle), null, 2);
}

/**
 * Parse and validate a JSON export back into its document shape
 */
export function parseExportJson(text: string): ModuleResult<ExportDocument> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return {
      success: false,
      error: {
        code: 'INVALID_JSON',
        message: error instanceof Error ? error.message : String(error),
      },
      metadata: { module: 'aggregator', timestamp, duration: Date.now() - startTime },
    };
  }

  const parsed = ExportDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: {
        code: 'INVALID_EXPORT',
        message: 'Export document does not match the expected shape',
        details: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      },
      metadata: { module: 'aggregator', timestamp, duration: Date.now() - startTime },
    };
  }

  return {
    success: true,
    data: parsed.data,
    metadata: { module: 'aggregator', timestamp, duration: Date.now() - startTime },
  };
}

// ============================================================================
// CSV
// ============================================================================

/**
 * Quote a CSV cell when it holds a quote, comma or line break
 */
export function escapeCsvValue(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/** Leading CSV columns, present whether or not the page had a title */
export const CSV_IDENTITY_COLUMNS = ['URL', 'Title', 'Content_Length'] as const;

/**
 * One header row and one data row: the identity columns, then one column per battery question
 */
export function serializeCsv(bundle: ExportBundle): string {
  const row = flattenAnalysis(bundle.analysis);
  const columns = [...CSV_IDENTITY_COLUMNS, ...bundle.analysis.answers.map((answer) => answer.key)];
  const lines = [
    columns.map(escapeCsvValue).join(','),
    columns.map((column) => escapeCsvValue(row[column] ?? '')).join(','),
  ];
  return `${lines.join('\n')}\n`;
}
