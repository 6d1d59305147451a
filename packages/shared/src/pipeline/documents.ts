/**
 * Document Source
 *
 * Documents arrive as normalized text files named after their ticker, e.g.
 * `AAPL_10K_FY2023.html.txt`. The inner extension records which normalizer
 * produced the text.
 */

import fs from 'fs';
import path from 'path';
import { IngestionError } from '../errors';
import { logger } from '../logger';
import type { Document, DocumentFileType, DocumentRef } from '../types';

const DOCUMENT_EXTENSIONS = ['.txt', '.md'];

export interface ParsedDocumentName {
  id: string;
  fileType: DocumentFileType;
  fiscalYear?: number;
}

/**
 * Derive ticker, file type and fiscal year from a document file name.
 * Returns null for files that are not documents.
 */
export function parseDocumentFileName(fileName: string): ParsedDocumentName | null {
  const extension = path.extname(fileName).toLowerCase();
  if (!DOCUMENT_EXTENSIONS.includes(extension)) return null;

  const base = fileName.slice(0, -extension.length);
  const id = base.split(/[_.]/)[0].trim().toUpperCase();
  if (id === '') return null;

  const fileType: DocumentFileType = path.extname(base).toLowerCase() === '.pdf' ? 'pdf' : 'html';
  const fiscalYearMatch = /_FY(\d{4})(?=[_.]|$)/i.exec(base);

  return {
    id,
    fileType,
    fiscalYear: fiscalYearMatch ? parseInt(fiscalYearMatch[1], 10) : undefined,
  };
}

/**
 * List the documents in a directory, sorted by file name.
 * When two files share a ticker the first one is kept.
 *
 * @throws IngestionError when the directory cannot be read
 */
export function loadDocuments(dir: string): DocumentRef[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new IngestionError(`Document directory not found: ${dir}`);
  }

  const refs: DocumentRef[] = [];
  const seen = new Set<string>();

  for (const fileName of fs.readdirSync(dir).sort()) {
    const parsed = parseDocumentFileName(fileName);
    if (!parsed) continue;

    if (seen.has(parsed.id)) {
      logger.warn('Duplicate document for ticker, skipping', { ticker: parsed.id, file: fileName });
      continue;
    }
    seen.add(parsed.id);

    refs.push({ ...parsed, sourcePath: path.join(dir, fileName) });
  }

  logger.info('Located documents', { dir, count: refs.length });
  return refs;
}

/**
 * Read a document's text.
 *
 * @throws IngestionError when the file cannot be read
 */
export function getText(ref: DocumentRef): string {
  try {
    return fs.readFileSync(ref.sourcePath, 'utf-8');
  } catch (error) {
    throw new IngestionError(
      `Cannot read ${ref.sourcePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function loadDocument(ref: DocumentRef): Document {
  return {
    id: ref.id,
    text: getText(ref),
    fileType: ref.fileType,
    fiscalYear: ref.fiscalYear,
    sourcePath: ref.sourcePath,
  };
}
