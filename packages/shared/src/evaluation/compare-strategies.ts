/**
 * Side-by-side summary of several evaluation reports
 */

import { RECORD_FIELDS } from '../fields';
import type { Accuracy, EvaluationReport, RecordField } from '../types';

export interface StrategyComparison {
  labels: string[];
  overall: Record<string, Accuracy>;
  perField: Array<{ field: RecordField; accuracy: Record<string, Accuracy> }>;
  /** Label with the highest overall accuracy; undefined when none is defined */
  best?: string;
}

export function compareStrategies(reports: readonly EvaluationReport[]): StrategyComparison {
  const labels = reports.map((report, i) => report.label ?? `report_${i + 1}`);

  const overall: Record<string, Accuracy> = {};
  reports.forEach((report, i) => {
    overall[labels[i]] = report.totals.accuracy;
  });

  const perField = RECORD_FIELDS.filter((field) =>
    reports.some((report) => report.perField[field] !== undefined)
  ).map((field) => {
    const accuracy: Record<string, Accuracy> = {};
    reports.forEach((report, i) => {
      accuracy[labels[i]] = report.perField[field]?.accuracy ?? null;
    });
    return { field, accuracy };
  });

  let best: string | undefined;
  let bestAccuracy = -1;
  for (const label of labels) {
    const accuracy = overall[label];
    if (accuracy !== null && accuracy > bestAccuracy) {
      best = label;
      bestAccuracy = accuracy;
    }
  }

  return { labels, overall, perField, best };
}
