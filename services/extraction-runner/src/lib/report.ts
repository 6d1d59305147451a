/**
 * Plain-text summaries printed at the end of a run
 */

import type { Accuracy, EvaluationReport, StrategyComparison } from '@ledgerlens/shared';

export function formatAccuracy(accuracy: Accuracy): string {
  return accuracy === null ? 'undefined' : `${(accuracy * 100).toFixed(1)}%`;
}

export function formatEvaluationSummary(report: EvaluationReport): string {
  const lines = [
    `Evaluation${report.label ? ` (${report.label})` : ''}: ${formatAccuracy(report.totals.accuracy)} ` +
      `(${report.totals.matched}/${report.totals.compared} fields, ` +
      `${report.totals.evaluated}/${report.totals.documents} documents)`,
  ];

  for (const [field, totals] of Object.entries(report.perField)) {
    if (!totals) continue;
    lines.push(`  ${field}: ${formatAccuracy(totals.accuracy)} (${totals.matched}/${totals.compared})`);
  }

  for (const error of report.errors) {
    lines.push(`  ! ${error.documentId}: ${error.message}`);
  }

  for (const document of report.documents) {
    for (const warning of document.warnings) {
      lines.push(`  ? ${document.documentId}: ${warning}`);
    }
  }

  return lines.join('\n');
}

export function formatComparison(comparison: StrategyComparison): string {
  const header = ['field', ...comparison.labels].join(' | ');
  const rows = comparison.perField.map(({ field, accuracy }) =>
    [field, ...comparison.labels.map((label) => formatAccuracy(accuracy[label]))].join(' | ')
  );
  const overall = ['overall', ...comparison.labels.map((label) => formatAccuracy(comparison.overall[label]))].join(
    ' | '
  );

  const lines = [header, ...rows, overall];
  if (comparison.best) lines.push(`Best: ${comparison.best}`);
  return lines.join('\n');
}
