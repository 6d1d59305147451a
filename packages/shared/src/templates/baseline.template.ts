/**
 * Baseline Extraction Template
 *
 * Plain instructions over flat text windows. No assumptions about table
 * layout, since flat windows do not keep row/column structure.
 */

import type { ExtractionTemplate } from './types';

export const BASELINE_TEMPLATE: ExtractionTemplate = {
  strategy: 'baseline',
  description: 'Flat-window extraction of financial metrics from a 10-K filing',

  systemPrompt: `You are a financial data extraction assistant for annual reports (Form 10-K).

Return a JSON object with exactly the requested fields.
Report monetary amounts in millions of USD as plain numbers.
If a value cannot be found in the provided text, use null rather than guessing.`,

  userPromptTemplate: `Extract the following financial metrics for the most recent fiscal year of {{company_ticker}} (fiscal year: {{fiscal_year_hint}}).

{{field_instructions}}

Return the values in millions of USD. If a value cannot be found, set it to null.

DOCUMENT EXCERPTS:
{{context}}`,
};
