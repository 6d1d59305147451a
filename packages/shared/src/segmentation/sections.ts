/**
 * 10-K Section Detection
 *
 * Partitions filing text at heading lines: "Item N." headings and the titles
 * of the primary financial statements. Text before the first heading is the
 * cover page.
 */

import type { SectionId } from '../types';

export interface Section {
  id: SectionId;
  /** Heading line as it appears in the text */
  title: string;
  /** Absolute start offset (start of the heading line) */
  start: number;
  /** Absolute end offset (exclusive) */
  end: number;
}

const MAX_HEADING_LENGTH = 120;

const ITEM_IDS = new Set<string>([
  'item_1', 'item_1a', 'item_1b', 'item_1c', 'item_2', 'item_3', 'item_4',
  'item_5', 'item_6', 'item_7', 'item_7a', 'item_8', 'item_9', 'item_9a',
  'item_9b', 'item_9c', 'item_10', 'item_11', 'item_12', 'item_13', 'item_14',
  'item_15', 'item_16',
]);

function isSectionId(id: string): id is SectionId {
  return ITEM_IDS.has(id);
}

const STATEMENT_HEADINGS: Array<{ id: SectionId; pattern: RegExp }> = [
  { id: 'income_statement', pattern: /^consolidated\s+statements?\s+of\s+(operations|income|earnings)\b/i },
  { id: 'balance_sheet', pattern: /^consolidated\s+balance\s+sheets?\b/i },
  { id: 'cash_flow_statement', pattern: /^consolidated\s+statements?\s+of\s+cash\s+flows?\b/i },
  { id: 'segment_information', pattern: /^(note\s+\d+\s*[.:\-–—]?\s*)?segment\s+information\b/i },
];

const ITEM_HEADING = /^item\s+(\d{1,2})([a-c])?\s*(?:[.:\-–—]|\s|$)/i;

/** Strip Markdown heading and emphasis markers from a candidate heading line */
function cleanHeading(line: string): string {
  return line
    .trim()
    .replace(/^#{1,6}\s*/, '')
    .replace(/^[*_]+|[*_]+$/g, '')
    .trim();
}

/**
 * Classify a single line as a section heading.
 */
export function classifyHeading(line: string): SectionId | null {
  const heading = cleanHeading(line);
  if (heading.length === 0 || heading.length > MAX_HEADING_LENGTH) return null;

  const item = ITEM_HEADING.exec(heading);
  if (item) {
    const id = `item_${item[1]}${(item[2] || '').toLowerCase()}`;
    return isSectionId(id) ? id : null;
  }

  for (const { id, pattern } of STATEMENT_HEADINGS) {
    if (pattern.test(heading)) return id;
  }

  return null;
}

/**
 * Detect sections in document text.
 * Returns an empty list when the text has no recognizable headings.
 */
export function detectSections(text: string): Section[] {
  const headings: Array<{ id: SectionId; title: string; start: number }> = [];

  let lineStart = 0;
  while (lineStart <= text.length) {
    const newline = text.indexOf('\n', lineStart);
    const lineEnd = newline === -1 ? text.length : newline;
    const line = text.slice(lineStart, lineEnd);

    const id = classifyHeading(line);
    if (id) {
      headings.push({ id, title: cleanHeading(line), start: lineStart });
    }

    if (newline === -1) break;
    lineStart = newline + 1;
  }

  if (headings.length === 0) return [];

  const sections: Section[] = [];

  if (text.slice(0, headings[0].start).trim().length > 0) {
    sections.push({ id: 'cover_page', title: '', start: 0, end: headings[0].start });
  }

  headings.forEach((heading, i) => {
    const end = i + 1 < headings.length ? headings[i + 1].start : text.length;
    sections.push({ id: heading.id, title: heading.title, start: heading.start, end });
  });

  return sections;
}
