/**
 * Extraction Template Types
 *
 * A template carries the strategy-specific instructions sent to the
 * generation backend along with the retrieved context.
 */

import type { StrategyKind } from '../types';

export interface ExtractionTemplate {
  /** The strategy this template belongs to */
  strategy: StrategyKind;

  /** Human-readable description of the template */
  description: string;

  /** System prompt with extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{company_ticker}}: The document identifier
   * - {{fiscal_year_hint}}: Known fiscal year, or "unknown"
   * - {{field_instructions}}: Numbered list of fields to populate
   * - {{context}}: Retrieved document segments
   */
  userPromptTemplate: string;
}
