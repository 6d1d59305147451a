/**
 * Field Normalization
 *
 * Pure coercions applied to model output and reference data before
 * they are stored or compared.
 */

import { IDENTIFIER_WIDTH } from './fields';
import type { StructuredRecord } from './types';

/**
 * Keep the digits of an identifier and left-pad them with zeros.
 * Returns null when there are no digits or more digits than the width.
 */
export function padIdentifier(raw: unknown, width: number = IDENTIFIER_WIDTH): string | null {
  if (typeof raw !== 'string' && typeof raw !== 'number') return null;
  if (typeof raw === 'number' && (!Number.isInteger(raw) || raw < 0)) return null;

  const digits = String(raw).replace(/\D/g, '');
  if (digits.length === 0 || digits.length > width) return null;

  return digits.padStart(width, '0');
}

const UNIT_MULTIPLIERS: Array<{ pattern: RegExp; multiplier: number }> = [
  { pattern: /(?<=[\d\s])(trillion|tn)$/, multiplier: 1_000_000 },
  { pattern: /(?<=[\d\s])(billion|bn|b)$/, multiplier: 1_000 },
  { pattern: /(?<=[\d\s])(million|mm|mn|m)$/, multiplier: 1 },
  { pattern: /(?<=[\d\s])(thousand|k)$/, multiplier: 0.001 },
];

/**
 * Coerce a reported amount to millions of USD.
 *
 * Numbers are taken as already in millions. Strings may carry `$`, thousands
 * separators, parentheses for negatives and a unit word ("1.2 billion").
 */
export function coerceMillions(raw: unknown): number | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== 'string') return null;

  let text = raw.trim().toLowerCase();
  if (text === '' || text === '-' || text === 'n/a' || text === 'null' || text === 'none') {
    return null;
  }

  let negative = false;
  if (/^\(.*\)$/.test(text)) {
    negative = true;
    text = text.slice(1, -1).trim();
  }

  text = text.replace(/usd|us\$|\$|,/g, '').trim();
  if (text.startsWith('-')) {
    negative = !negative;
    text = text.slice(1).trim();
  }

  let multiplier = 1;
  for (const unit of UNIT_MULTIPLIERS) {
    if (unit.pattern.test(text)) {
      multiplier = unit.multiplier;
      text = text.replace(unit.pattern, '').trim();
      break;
    }
  }

  if (!/^\d+(\.\d+)?$|^\.\d+$/.test(text)) return null;

  const value = parseFloat(text) * multiplier;
  return negative ? -value : value;
}

/**
 * Fiscal years are four-digit integers between 1900 and 2100
 */
export function coerceFiscalYear(raw: unknown): number | null {
  let value: number;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && /^\s*(fy\s*)?\d{4}\s*$/i.test(raw)) {
    value = parseInt(raw.replace(/\D/g, ''), 10);
  } else {
    return null;
  }

  if (!Number.isInteger(value) || value < 1900 || value > 2100) return null;
  return value;
}

/**
 * A record for the given key with every field absent
 */
export function emptyRecord(companyTicker: string): StructuredRecord {
  return {
    company_ticker: companyTicker,
    fiscal_year: null,
    cik: null,
    total_revenue: null,
    net_income: null,
    north_america_revenue: null,
    depreciation_amortization: null,
    lease_liabilities: null,
  };
}
