/**
 * Field Comparison
 *
 * Compares one extracted value with its reference value by field kind.
 */

import type { FieldDefinition } from '../fields';
import { coerceMillions, padIdentifier } from '../normalize';
import type { FieldComparison } from '../types';
import { classifySeverity, type SeverityThresholds } from './severity';

export interface ComparisonOptions {
  thresholds: SeverityThresholds;
  /** Match threshold used when the reference value is zero */
  absoluteTolerance: number;
}

/** Comparison, or the reason the reference value cannot be compared */
export type FieldComparisonResult =
  | { comparable: true; comparison: FieldComparison }
  | { comparable: false; reason: string };

/** Relative error rounded to 12 decimals so class boundaries are exact */
export function relativeErrorOf(absoluteError: number, reference: number): number {
  return Math.round((absoluteError / Math.abs(reference)) * 1e12) / 1e12;
}

function parseReferenceInteger(raw: string | number): number | null {
  if (typeof raw === 'number') return Number.isInteger(raw) ? raw : null;
  const trimmed = raw.trim();
  if (/^-?\d+(\.0+)?$/.test(trimmed)) return parseInt(trimmed, 10);
  return null;
}

function compareIdentifier(
  definition: FieldDefinition,
  extracted: unknown,
  reference: string | number
): FieldComparisonResult {
  const expected = padIdentifier(reference);
  if (expected === null) {
    return { comparable: false, reason: `reference value "${reference}" is not an identifier` };
  }

  const actual = padIdentifier(extracted);
  const match = actual !== null && actual === expected;
  return {
    comparable: true,
    comparison: {
      field: definition.name,
      kind: 'identifier',
      extracted: actual,
      reference: expected,
      match,
      absoluteError: null,
      relativeError: null,
      severity: match ? 'None' : 'Major',
      note: actual === null ? 'missing' : undefined,
    },
  };
}

function compareInteger(
  definition: FieldDefinition,
  extracted: unknown,
  reference: string | number
): FieldComparisonResult {
  const expected = parseReferenceInteger(reference);
  if (expected === null) {
    return { comparable: false, reason: `reference value "${reference}" is not an integer` };
  }

  const actual = typeof extracted === 'number' && Number.isInteger(extracted) ? extracted : null;
  const match = actual === expected;
  return {
    comparable: true,
    comparison: {
      field: definition.name,
      kind: 'integer',
      extracted: actual,
      reference: expected,
      match,
      absoluteError: actual === null ? null : Math.abs(actual - expected),
      relativeError: null,
      severity: match ? 'None' : 'Major',
      note: actual === null ? 'missing' : undefined,
    },
  };
}

function compareNumeric(
  definition: FieldDefinition,
  extracted: unknown,
  reference: string | number,
  options: ComparisonOptions
): FieldComparisonResult {
  const expected = coerceMillions(reference);
  if (expected === null) {
    return { comparable: false, reason: `reference value "${reference}" is not numeric` };
  }

  const actual = typeof extracted === 'number' && Number.isFinite(extracted) ? extracted : null;
  const base = { field: definition.name, kind: 'numeric' as const, extracted: actual, reference: expected };

  if (actual === null) {
    return {
      comparable: true,
      comparison: {
        ...base,
        match: false,
        absoluteError: null,
        relativeError: null,
        severity: 'Major',
        note: 'missing',
      },
    };
  }

  const absoluteError = Math.abs(actual - expected);

  if (expected === 0) {
    const match = absoluteError <= options.absoluteTolerance;
    return {
      comparable: true,
      comparison: {
        ...base,
        match,
        absoluteError,
        relativeError: null,
        severity: match ? 'None' : 'Major',
        note: 'zero reference, compared by absolute error',
      },
    };
  }

  const relativeError = relativeErrorOf(absoluteError, expected);
  const severity = classifySeverity(relativeError, options.thresholds);
  return {
    comparable: true,
    comparison: {
      ...base,
      match: severity === 'None',
      absoluteError,
      relativeError,
      severity,
    },
  };
}

export function compareField(
  definition: FieldDefinition,
  extracted: unknown,
  reference: string | number,
  options: ComparisonOptions
): FieldComparisonResult {
  switch (definition.kind) {
    case 'identifier':
      return compareIdentifier(definition, extracted, reference);
    case 'integer':
      return compareInteger(definition, extracted, reference);
    case 'numeric':
      return compareNumeric(definition, extracted, reference, options);
  }
}
