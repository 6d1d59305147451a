/**
 * Record Field Catalogue
 *
 * The fixed schema of fields extracted from each filing, with the
 * instructions used to ask for them and the bounds used to sanity-check
 * reference data.
 */

import type { FieldKind, RecordField } from './types';

export interface FieldDefinition {
  name: RecordField;
  kind: FieldKind;
  label: string;
  /** Where the value is found and how it is reported */
  instruction: string;
  /** Plausible range for reference values (millions of USD for numeric fields) */
  sanityBounds?: { min?: number; max?: number };
}

/** Canonical width of the SEC Central Index Key */
export const IDENTIFIER_WIDTH = 10;

export const FIELD_DEFINITIONS: readonly FieldDefinition[] = [
  {
    name: 'fiscal_year',
    kind: 'integer',
    label: 'Fiscal Year',
    instruction: 'Fiscal year the report covers, from the cover page (e.g. "For the fiscal year ended ...")',
    sanityBounds: { min: 1990, max: 2100 },
  },
  {
    name: 'cik',
    kind: 'identifier',
    label: 'CIK',
    instruction: 'Central Index Key of the registrant, a numeric code of up to 10 digits, usually on the cover page',
  },
  {
    name: 'total_revenue',
    kind: 'numeric',
    label: 'Total Revenue',
    instruction: 'Total revenue (net sales) for the most recent fiscal year, from the Consolidated Statements of Operations',
    sanityBounds: { min: 0, max: 2_000_000 },
  },
  {
    name: 'net_income',
    kind: 'numeric',
    label: 'Net Income',
    instruction: 'Net income (loss) for the most recent fiscal year, from the Consolidated Statements of Operations; negative for a loss',
    sanityBounds: { min: -500_000, max: 500_000 },
  },
  {
    name: 'north_america_revenue',
    kind: 'numeric',
    label: 'North America Revenue',
    instruction: 'Revenue attributed to North America (or the United States) from Segment Information or geographic revenue tables',
    sanityBounds: { min: 0, max: 2_000_000 },
  },
  {
    name: 'depreciation_amortization',
    kind: 'numeric',
    label: 'Depreciation & Amortization',
    instruction: 'Total depreciation and amortization from the Consolidated Statements of Cash Flows',
    sanityBounds: { min: 0, max: 200_000 },
  },
  {
    name: 'lease_liabilities',
    kind: 'numeric',
    label: 'Lease Liabilities',
    instruction: 'Total lease liabilities from the Balance Sheet; if split into current and non-current, their sum',
    sanityBounds: { min: 0, max: 500_000 },
  },
];

export const RECORD_FIELDS: readonly RecordField[] = FIELD_DEFINITIONS.map((f) => f.name);
