/**
 * Fixed-size windowing
 *
 * Splits text into character windows with a fixed overlap. A window end is
 * pulled back to the last whitespace in its second half so that words are
 * not cut, which keeps windows deterministic for a given text and size.
 */

import { IngestionError } from '../errors';
import type { Segment, SectionId } from '../types';

export interface WindowOptions {
  /** Maximum characters per segment */
  windowSize: number;
  /** Characters repeated at the start of each following segment */
  overlap: number;
}

export function validateWindowOptions(options: WindowOptions): void {
  const { windowSize, overlap } = options;
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new IngestionError(`windowSize must be a positive integer, got ${windowSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= windowSize) {
    throw new IngestionError(`overlap must be an integer in [0, windowSize), got ${overlap}`);
  }
}

/**
 * Window a span of text.
 *
 * @param text - The span to window
 * @param options - Window size and overlap
 * @param baseOffset - Absolute offset of the span within its document
 * @param startIndex - Corpus index of the first produced segment
 * @param tag - Section tag carried by every produced segment
 */
export function windowText(
  text: string,
  options: WindowOptions,
  baseOffset = 0,
  startIndex = 0,
  tag?: SectionId
): Segment[] {
  validateWindowOptions(options);
  const { windowSize, overlap } = options;
  const segments: Segment[] = [];
  const length = text.length;
  let start = 0;

  while (start < length) {
    let end = Math.min(start + windowSize, length);

    if (end < length) {
      const minEnd = start + Math.max(overlap + 1, Math.floor(windowSize / 2));
      for (let i = end - 1; i >= minEnd; i--) {
        if (/\s/.test(text[i])) {
          end = i + 1;
          break;
        }
      }
    }

    const segment: Segment = {
      index: startIndex + segments.length,
      offset: baseOffset + start,
      text: text.slice(start, end),
      ...(tag ? { tag } : {}),
    };
    segments.push(segment);

    if (end >= length) break;
    start = end - overlap;
  }

  return segments;
}

/**
 * Rebuild the text covered by contiguous segments, dropping the part of each
 * segment that repeats the previous one.
 */
export function reassembleSegments(segments: readonly Segment[]): string {
  let text = '';
  let coveredEnd: number | null = null;

  for (const segment of segments) {
    if (coveredEnd === null) {
      text = segment.text;
    } else {
      const repeated = Math.max(0, coveredEnd - segment.offset);
      text += segment.text.slice(repeated);
    }
    coveredEnd = segment.offset + segment.text.length;
  }

  return text;
}
