/**
 * Extraction Templates
 *
 * One template per strategy, plus the helpers that fill them in.
 */

import { FIELD_DEFINITIONS } from '../fields';
import type { RetrievedSegment } from '../types';
import type { ExtractionTemplate } from './types';

export type { ExtractionTemplate } from './types';
export { BASELINE_TEMPLATE } from './baseline.template';
export { REFINED_TEMPLATE } from './refined.template';
export { REFORMAT_INSTRUCTION } from './reformat.template';

/**
 * Numbered field list; also used as the retrieval query.
 */
export function buildFieldInstructions(): string {
  return FIELD_DEFINITIONS.map(
    (field, i) => `${i + 1}. ${field.name} (${field.label}): ${field.instruction}`
  ).join('\n');
}

/**
 * Render retrieved segments as prompt context.
 * Tagged segments are labelled with their section.
 */
export function formatContext(segments: readonly RetrievedSegment[]): string {
  return segments
    .map(({ segment }, i) => {
      const label = segment.tag ? ` [section: ${segment.tag}]` : '';
      return `--- Excerpt ${i + 1}${label} ---\n${segment.text}`;
    })
    .join('\n\n');
}

export interface PromptValues {
  companyTicker: string;
  fiscalYear?: number;
  context: string;
}

// Replacement functions keep `$` sequences in filing text literal
export function renderUserPrompt(template: ExtractionTemplate, values: PromptValues): string {
  return template.userPromptTemplate
    .replace('{{company_ticker}}', () => values.companyTicker)
    .replace('{{fiscal_year_hint}}', () =>
      values.fiscalYear !== undefined ? String(values.fiscalYear) : 'unknown'
    )
    .replace('{{field_instructions}}', () => buildFieldInstructions())
    .replace('{{context}}', () => values.context);
}
