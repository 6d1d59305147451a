/**
 * Model Output Parsing
 *
 * Pure conversion of a raw backend response into a StructuredRecord.
 */

import { ValidationError, err, ok, type Result } from '../errors';
import { logger } from '../logger';
import { coerceFiscalYear, coerceMillions, padIdentifier } from '../normalize';
import { validateModelOutput } from '../schemas';
import type { StructuredRecord } from '../types';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the JSON object out of a response that may be wrapped in a Markdown
 * code fence or surrounded by prose.
 */
export function extractJsonText(raw: string): string {
  const trimmed = raw.trim();

  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  if (fenced) return fenced[1];

  if (!trimmed.startsWith('{')) {
    const first = trimmed.indexOf('{');
    const last = trimmed.lastIndexOf('}');
    if (first !== -1 && last > first) return trimmed.slice(first, last + 1);
  }

  return trimmed;
}

/**
 * Parse, validate and normalize a backend response.
 * The record key is always the document id, whatever the model returned.
 */
export function parseStructuredRecord(
  raw: string,
  documentId: string
): Result<StructuredRecord, ValidationError> {
  let data: unknown;
  try {
    data = JSON.parse(extractJsonText(raw));
  } catch (error) {
    return err(
      new ValidationError('Response is not valid JSON', [
        error instanceof Error ? error.message : String(error),
      ])
    );
  }

  if (!isPlainObject(data)) {
    return err(new ValidationError('Response is not a JSON object'));
  }

  const validation = validateModelOutput(data);
  if (!validation.valid) {
    return err(new ValidationError('Response does not match the record schema', validation.errors));
  }

  const reportedTicker = data.company_ticker;
  if (
    typeof reportedTicker === 'string' &&
    reportedTicker.trim() !== '' &&
    reportedTicker.trim().toUpperCase() !== documentId.toUpperCase()
  ) {
    logger.debug('Model reported a different ticker, keeping document id', {
      document_id: documentId,
      reported_ticker: reportedTicker,
    });
  }

  return ok({
    company_ticker: documentId,
    fiscal_year: coerceFiscalYear(data.fiscal_year),
    cik: padIdentifier(data.cik),
    total_revenue: coerceMillions(data.total_revenue),
    net_income: coerceMillions(data.net_income),
    north_america_revenue: coerceMillions(data.north_america_revenue),
    depreciation_amortization: coerceMillions(data.depreciation_amortization),
    lease_liabilities: coerceMillions(data.lease_liabilities),
  });
}
