/**
 * Segmentation Engine
 *
 * Two modes:
 * - 'flat': fixed windows over the whole document, no structural awareness
 * - 'structured': windows over the allow-listed 10-K sections only, with
 *   larger bounds; falls back to 'flat' when no such section is found
 */

import { IngestionError } from '../errors';
import { logger } from '../logger';
import type { Corpus, Document, Segment, SectionId, SegmentationMode } from '../types';
import { detectSections } from './sections';
import { windowText, type WindowOptions } from './windows';

export { windowText, reassembleSegments, validateWindowOptions, type WindowOptions } from './windows';
export { detectSections, classifyHeading, type Section } from './sections';

/** Sections that hold the fields of the record schema */
export const DEFAULT_SECTION_ALLOW_LIST: readonly SectionId[] = [
  'cover_page',
  'item_7',
  'item_8',
  'income_statement',
  'balance_sheet',
  'cash_flow_statement',
  'segment_information',
];

export const FLAT_WINDOW: WindowOptions = { windowSize: 1024, overlap: 0 };
export const STRUCTURED_WINDOW: WindowOptions = { windowSize: 4096, overlap: 256 };

export interface SegmentationOptions {
  window?: WindowOptions;
  /** Sections retained in 'structured' mode */
  allowList?: readonly SectionId[];
}

export interface SegmentationResult {
  corpus: Corpus;
  mode: SegmentationMode;
  /** True when 'structured' mode found no target section and windowed the whole text */
  fallback: boolean;
}

/**
 * Segment a document, reporting whether the structured fallback was taken.
 *
 * @throws IngestionError if the document text is empty
 */
export function segmentDocument(
  document: Document,
  mode: SegmentationMode,
  options: SegmentationOptions = {}
): SegmentationResult {
  if (document.text.trim().length === 0) {
    throw new IngestionError(`Document ${document.id} has no text`);
  }

  if (mode === 'flat') {
    const corpus = windowText(document.text, options.window ?? FLAT_WINDOW);
    return { corpus, mode, fallback: false };
  }

  const window = options.window ?? STRUCTURED_WINDOW;
  const allowList = new Set<SectionId>(options.allowList ?? DEFAULT_SECTION_ALLOW_LIST);
  const sections = detectSections(document.text);
  const retained = sections.filter(
    (s) => allowList.has(s.id) && document.text.slice(s.start, s.end).trim().length > 0
  );

  if (retained.length === 0) {
    logger.warn('No target sections found, falling back to flat segmentation', {
      document_id: document.id,
      detected_sections: sections.length,
    });
    return { corpus: windowText(document.text, window), mode, fallback: true };
  }

  const corpus: Segment[] = [];
  for (const section of retained) {
    corpus.push(
      ...windowText(
        document.text.slice(section.start, section.end),
        window,
        section.start,
        corpus.length,
        section.id
      )
    );
  }

  logger.debug('Structured segmentation', {
    document_id: document.id,
    detected_sections: sections.length,
    retained_sections: retained.map((s) => s.id),
    segment_count: corpus.length,
  });

  return { corpus, mode, fallback: false };
}

/**
 * Segment a document into an ordered, non-empty corpus.
 */
export function segment(
  document: Document,
  mode: SegmentationMode,
  options: SegmentationOptions = {}
): Corpus {
  return segmentDocument(document, mode, options).corpus;
}
