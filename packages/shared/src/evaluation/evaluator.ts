/**
 * Evaluator
 *
 * Scores extracted records against reference records. A missing reference
 * is recorded as an EvaluationError for that document, an incomparable
 * reference cell as an EvaluationError for that field; everything else is
 * still scored.
 */

import { EvaluationError, type ErrorTag } from '../errors';
import { FIELD_DEFINITIONS } from '../fields';
import { logger } from '../logger';
import type {
  Accuracy,
  DocumentEvaluation,
  EvaluationReport,
  ExtractionOutcome,
  FieldComparison,
  FieldErrorTag,
  FieldTotals,
  RecordField,
  ReferenceRecord,
  Severity,
  StructuredRecord,
} from '../types';
import { compareField } from './compare-field';
import { checkMagnitude, checkSanityBounds } from './data-quality';
import { referenceKey, type ReferenceStore } from './reference-store';
import { DEFAULT_SEVERITY_THRESHOLDS, type SeverityThresholds } from './severity';

export interface EvaluationOptions {
  /** Relative error at or below which a numeric field matches */
  tolerance?: number;
  /** Match threshold for numeric fields whose reference is zero */
  absoluteTolerance?: number;
  label?: string;
}

export const DEFAULT_ABSOLUTE_TOLERANCE = 0.5;

/** A bare record, or an extraction outcome carrying its error tag */
export type EvaluationInput = StructuredRecord | ExtractionOutcome;

export function accuracyOf(matched: number, compared: number): Accuracy {
  return compared === 0 ? null : matched / compared;
}

function unpack(input: EvaluationInput): { record: StructuredRecord; extractionError?: ErrorTag } {
  if ('record' in input) {
    return { record: input.record, extractionError: input.error };
  }
  return { record: input };
}

function hasValue(value: string | number | undefined): value is string | number {
  return value !== undefined && String(value).trim() !== '';
}

function emptySeverities(): Record<Severity, number> {
  return { None: 0, Minor: 0, Moderate: 0, Major: 0 };
}

export function evaluateRecord(
  record: StructuredRecord,
  reference: ReferenceRecord,
  thresholds: SeverityThresholds,
  absoluteTolerance: number
): DocumentEvaluation {
  const fields: FieldComparison[] = [];
  const warnings: string[] = [];
  const fieldErrors: FieldErrorTag[] = [];

  for (const definition of FIELD_DEFINITIONS) {
    const referenceValue = reference.values[definition.name];
    if (!hasValue(referenceValue)) continue;

    const result = compareField(definition, record[definition.name], referenceValue, {
      thresholds,
      absoluteTolerance,
    });

    if (!result.comparable) {
      const error = new EvaluationError(`${definition.name}: ${result.reason}`).toTag();
      fieldErrors.push({ ...error, field: definition.name });
      continue;
    }

    const { comparison } = result;
    fields.push(comparison);

    if (typeof comparison.reference === 'number') {
      const boundsWarning = checkSanityBounds(definition, comparison.reference);
      if (boundsWarning) warnings.push(boundsWarning);
    }
    const magnitudeWarning = checkMagnitude(comparison);
    if (magnitudeWarning) warnings.push(magnitudeWarning);
  }

  const matched = fields.filter((f) => f.match).length;
  return {
    documentId: record.company_ticker,
    fields,
    matched,
    compared: fields.length,
    accuracy: accuracyOf(matched, fields.length),
    warnings,
    ...(fieldErrors.length > 0 ? { fieldErrors } : {}),
  };
}

export function evaluate(
  records: readonly EvaluationInput[],
  references: ReferenceStore,
  options: EvaluationOptions = {}
): EvaluationReport {
  const tolerance = options.tolerance ?? DEFAULT_SEVERITY_THRESHOLDS.none;
  const absoluteTolerance = options.absoluteTolerance ?? DEFAULT_ABSOLUTE_TOLERANCE;
  const thresholds: SeverityThresholds = { ...DEFAULT_SEVERITY_THRESHOLDS, none: tolerance };

  const documents: DocumentEvaluation[] = [];
  const errors: EvaluationReport['errors'] = [];
  const perField: Partial<Record<RecordField, FieldTotals>> = {};

  for (const input of records) {
    const { record, extractionError } = unpack(input);
    const reference = references.get(referenceKey(record.company_ticker));

    if (!reference) {
      const error = new EvaluationError(`No reference data for ${record.company_ticker}`).toTag();
      errors.push({ ...error, documentId: record.company_ticker });
      documents.push({
        documentId: record.company_ticker,
        fields: [],
        matched: 0,
        compared: 0,
        accuracy: null,
        warnings: [],
        error,
        extractionError,
      });
      continue;
    }

    const evaluation = evaluateRecord(record, reference, thresholds, absoluteTolerance);
    if (extractionError) evaluation.extractionError = extractionError;
    documents.push(evaluation);
    for (const fieldError of evaluation.fieldErrors ?? []) {
      errors.push({ ...fieldError, documentId: record.company_ticker });
    }

    for (const comparison of evaluation.fields) {
      const totals = (perField[comparison.field] ??= {
        matched: 0,
        compared: 0,
        accuracy: null,
        severities: emptySeverities(),
      });
      totals.compared += 1;
      if (comparison.match) totals.matched += 1;
      totals.severities[comparison.severity] += 1;
    }
  }

  for (const totals of Object.values(perField)) {
    if (totals) totals.accuracy = accuracyOf(totals.matched, totals.compared);
  }

  const matched = documents.reduce((sum, d) => sum + d.matched, 0);
  const compared = documents.reduce((sum, d) => sum + d.compared, 0);

  const report: EvaluationReport = {
    label: options.label,
    tolerance,
    documents,
    perField,
    totals: {
      documents: documents.length,
      evaluated: documents.filter((d) => !d.error).length,
      matched,
      compared,
      accuracy: accuracyOf(matched, compared),
    },
    errors,
  };

  logger.info('Evaluation complete', {
    label: options.label,
    documents: report.totals.documents,
    evaluated: report.totals.evaluated,
    matched,
    compared,
    accuracy: report.totals.accuracy,
    missing_references: errors.filter((e) => e.field === undefined).length,
    incomparable_fields: errors.filter((e) => e.field !== undefined).length,
  });

  return report;
}
