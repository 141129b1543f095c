/**
 * Report Formatter
 *
 * Plain-text rendering of rewrite and batch reports for terminal output.
 */

import type { BatchReport, RewriteReport, TransformationResult } from '@schemashift/core';

/**
 * Format the per-tag and per-log breakdown of one engine run
 */
export function formatRewriteReport(report: RewriteReport): string {
  const lines: string[] = [];
  const { document } = report;

  lines.push(`Document: ${document.status} (${document.matches} replacements)`);
  for (const tag of document.tags) {
    lines.push(
      `  <${tag.tag}> [${tag.tagClass}]: ${tag.scanned} found, ` +
        `${tag.transformed} changed, ${tag.replacements} replacements`
    );
  }

  if (report.logs.length > 0) {
    lines.push(`Logs: ${report.logs.length} files (${report.logMatches} replacements)`);
    for (const log of report.logs.filter((l) => l.matches > 0)) {
      lines.push(`  ${log.name}: ${log.matches} of ${log.scanned} references`);
    }
  }

  lines.push(`Total replacements: ${report.totalMatches}`);
  return lines.join('\n');
}

function formatResultLine(result: TransformationResult): string {
  return result.success
    ? `  OK   ${result.inputPath} (${result.transformationsApplied} replacements)`
    : `  FAIL ${result.inputPath} (${result.error ?? 'unknown error'})`;
}

/**
 * Format the summary of a multi-file run
 */
export function formatBatchReport(batch: BatchReport): string {
  const lines: string[] = [];

  lines.push('Batch summary');
  lines.push(`- Files processed: ${batch.results.length}`);
  lines.push(`- Succeeded: ${batch.succeeded}`);
  lines.push(`- Failed: ${batch.failed}`);
  lines.push(`- Total replacements: ${batch.totalTransformations}`);

  if (batch.results.length > 0) {
    lines.push('');
    for (const result of batch.results) {
      lines.push(formatResultLine(result));
    }
  }

  return lines.join('\n');
}
