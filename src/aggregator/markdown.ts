import type { ExportBundle } from '../types/index.js';
import { RECOMMENDATION_ERROR_PREFIX, formatExportTimestamp, outcomeText, summarizeAnalysis } from './bundle.js';

/**
 * Readable report of one run.
 *
 * Failed analysis fields are left out of the detail section; failed
 * recommendation categories show their error line.
 */
export function renderMarkdown(bundle: ExportBundle): string {
  const { analysis, recommendations } = bundle;
  const summary = summarizeAnalysis(analysis);
  const lines: string[] = [];

  lines.push(`# Marketing Analysis: ${analysis.Title ?? bundle.website_url}`);
  lines.push('');
  lines.push(`**Website:** ${bundle.website_url}`);
  lines.push(`**Report ID:** \`${bundle.reportId}\``);
  lines.push(`**Generated:** ${formatExportTimestamp(new Date(bundle.timestamp))}`);
  lines.push('');

  lines.push('## Key Metrics');
  lines.push('');
  lines.push(`- **SEO Keywords:** ${summary.keywordCount}`);
  lines.push(`- **Call-to-Actions:** ${summary.callToActionCount}`);
  lines.push(`- **Content Length:** ${summary.contentLength} characters`);
  lines.push('');

  lines.push('## Detailed Analysis');
  lines.push('');
  for (const answer of analysis.answers) {
    if (!answer.outcome.ok) continue;
    lines.push(`### ${answer.key}`);
    lines.push('');
    lines.push(answer.outcome.value);
    lines.push('');
  }

  lines.push('## Recommendations');
  lines.push('');
  for (const answer of recommendations.answers) {
    lines.push(`### ${answer.key}`);
    lines.push('');
    lines.push(outcomeText(answer.outcome, RECOMMENDATION_ERROR_PREFIX));
    lines.push('');
  }

  lines.push('---');
  lines.push(`*${bundle.tool_identity}*`);

  return lines.join('\n') + '\n';
}
