/**
 * Data-Quality Checks
 *
 * Flags reference values outside a field's plausible range and extracted
 * values that differ from the reference by orders of magnitude (usually a
 * unit mismatch). Values are reported, never corrected.
 */

import type { FieldDefinition } from '../fields';
import type { FieldComparison } from '../types';

/** log10 distance at which two values are flagged */
export const MAGNITUDE_WARNING_THRESHOLD = 2.5;

export function checkSanityBounds(definition: FieldDefinition, reference: number): string | null {
  const bounds = definition.sanityBounds;
  if (!bounds) return null;

  const belowMin = bounds.min !== undefined && reference < bounds.min;
  const aboveMax = bounds.max !== undefined && reference > bounds.max;
  if (!belowMin && !aboveMax) return null;

  return `${definition.name}: reference value ${reference} is outside the plausible range [${bounds.min ?? '-inf'}, ${bounds.max ?? 'inf'}]`;
}

export function checkMagnitude(comparison: FieldComparison): string | null {
  if (comparison.kind !== 'numeric') return null;
  const { extracted, reference } = comparison;
  if (typeof extracted !== 'number' || typeof reference !== 'number') return null;
  if (extracted === 0 || reference === 0) return null;

  const distance = Math.abs(Math.log10(Math.abs(extracted) / Math.abs(reference)));
  if (distance < MAGNITUDE_WARNING_THRESHOLD) return null;

  return `${comparison.field}: extracted ${extracted} and reference ${reference} differ by 10^${distance.toFixed(1)}; check units`;
}
