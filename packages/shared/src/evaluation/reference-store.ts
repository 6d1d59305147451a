/**
 * Reference Store
 *
 * Ground-truth values read from a CSV file with a `ticker` column and one
 * column per record field. Empty cells are treated as absent.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { EvaluationError } from '../errors';
import { RECORD_FIELDS } from '../fields';
import { logger } from '../logger';
import type { RecordField, ReferenceRecord } from '../types';

/** Keyed by upper-case ticker */
export type ReferenceStore = ReadonlyMap<string, ReferenceRecord>;

const TICKER_COLUMNS = ['ticker', 'company_ticker'];

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function referenceKey(ticker: string): string {
  return ticker.trim().toUpperCase();
}

/**
 * Parse reference CSV content.
 *
 * @throws EvaluationError when the content has no ticker column
 */
export function parseReferenceCsv(content: string): ReferenceStore {
  const rows: unknown = parse(content, {
    columns: (header: string[]) => header.map((column) => column.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  const store = new Map<string, ReferenceRecord>();
  if (!Array.isArray(rows)) return store;

  for (const row of rows) {
    if (!isRow(row)) continue;

    const tickerColumn = TICKER_COLUMNS.find((column) => column in row);
    if (!tickerColumn) {
      throw new EvaluationError('Reference data has no ticker column');
    }

    const ticker = row[tickerColumn];
    if (typeof ticker !== 'string' || ticker === '') continue;

    const values: Partial<Record<RecordField, string>> = {};
    for (const field of RECORD_FIELDS) {
      const cell = row[field];
      if (typeof cell === 'string' && cell !== '') {
        values[field] = cell;
      }
    }

    const key = referenceKey(ticker);
    if (store.has(key)) {
      logger.warn('Duplicate reference row, keeping the last one', { ticker: key });
    }
    store.set(key, { ticker: key, values });
  }

  return store;
}

/**
 * Load the reference CSV once per evaluation.
 *
 * @throws EvaluationError when the file cannot be read or has no ticker column
 */
export function loadReferenceStore(csvPath: string): ReferenceStore {
  let content: string;
  try {
    content = fs.readFileSync(csvPath, 'utf-8');
  } catch (error) {
    throw new EvaluationError(
      `Cannot read reference data at ${csvPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const store = parseReferenceCsv(content);
  logger.info('Loaded reference data', { path: csvPath, companies: store.size });
  return store;
}
