import type { Severity } from '../types';

/**
 * Upper bound (inclusive) of each class, as a relative error.
 * Anything above `moderate` is Major.
 */
export interface SeverityThresholds {
  none: number;
  minor: number;
  moderate: number;
}

export const DEFAULT_SEVERITY_THRESHOLDS: SeverityThresholds = {
  none: 0.01,
  minor: 0.1,
  moderate: 0.5,
};

export function classifySeverity(
  relativeError: number,
  thresholds: SeverityThresholds = DEFAULT_SEVERITY_THRESHOLDS
): Severity {
  if (Number.isNaN(relativeError)) return 'Major';
  if (relativeError <= thresholds.none) return 'None';
  if (relativeError <= thresholds.minor) return 'Minor';
  if (relativeError <= thresholds.moderate) return 'Moderate';
  return 'Major';
}
