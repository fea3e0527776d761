import type { RunReport } from '@todo-aggregator/aggregator-core';

/**
 * Human-readable run summary for the terminal
 */
export function formatReport(report: RunReport): string {
  const { summary } = report;
  const lines = [
    `Run ${report.runId}: ${report.status}`,
    `  content units: ${summary.contentUnits} (chat ${summary.unitsBySource.chat}, email ${summary.unitsBySource.email}, meeting ${summary.unitsBySource.meeting}, notes ${summary.unitsBySource['store-note']})`,
    `  created: ${summary.created}, duplicates skipped: ${summary.skippedDuplicates}`,
    `  completed: ${summary.completed}, needs review: ${summary.tentativelyCompleted}, unchanged: ${summary.unchanged}`,
    `  failed operations: ${summary.failedOperations}`,
  ];

  for (const warning of report.warnings) {
    lines.push(`  warning [${warning.stage}]: ${warning.message}`);
  }
  for (const failure of report.failures) {
    lines.push(`  error: ${failure.message}`);
  }
  for (const result of report.results) {
    if (result.status === 'failed') {
      lines.push(`  failed ${result.op.action}: ${result.error.message}`);
    }
  }
  return lines.join('\n');
}
