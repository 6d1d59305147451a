/**
 * Shared TypeScript Types
 *
 * Types for the filing extraction and evaluation pipeline, matching JSON schemas in docs/contracts/
 */

import type { ErrorTag } from './errors';

// ============================================================================
// Documents
// ============================================================================

/** Upstream normalizer that produced the text. Informational only. */
export type DocumentFileType = 'pdf' | 'html';

/**
 * A located document whose text has not been read yet
 */
export interface DocumentRef {
  /** Ticker symbol; the record key */
  id: string;
  sourcePath: string;
  fileType: DocumentFileType;
  fiscalYear?: number;
}

export interface Document {
  readonly id: string;
  readonly text: string;
  readonly fileType: DocumentFileType;
  readonly fiscalYear?: number;
  readonly sourcePath?: string;
}

// ============================================================================
// Segmentation & Retrieval
// ============================================================================

export type SegmentationMode = 'flat' | 'structured';

export type SectionId =
  | 'cover_page'
  | 'item_1'
  | 'item_1a'
  | 'item_1b'
  | 'item_1c'
  | 'item_2'
  | 'item_3'
  | 'item_4'
  | 'item_5'
  | 'item_6'
  | 'item_7'
  | 'item_7a'
  | 'item_8'
  | 'item_9'
  | 'item_9a'
  | 'item_9b'
  | 'item_9c'
  | 'item_10'
  | 'item_11'
  | 'item_12'
  | 'item_13'
  | 'item_14'
  | 'item_15'
  | 'item_16'
  | 'income_statement'
  | 'balance_sheet'
  | 'cash_flow_statement'
  | 'segment_information';

export interface Segment {
  /** Position in the corpus */
  readonly index: number;
  /** Absolute character offset in the document text */
  readonly offset: number;
  readonly text: string;
  readonly tag?: SectionId;
}

/** Ordered segments of one document */
export type Corpus = readonly Segment[];

export interface RetrievedSegment {
  segment: Segment;
  score: number;
}

// ============================================================================
// Records
// ============================================================================

/**
 * Typed extraction output. Every field except the key is independently
 * present or null; a value that was not found is null, never a guess.
 */
export interface StructuredRecord {
  readonly company_ticker: string;
  readonly fiscal_year: number | null;
  readonly cik: string | null;
  readonly total_revenue: number | null;
  readonly net_income: number | null;
  readonly north_america_revenue: number | null;
  readonly depreciation_amortization: number | null;
  readonly lease_liabilities: number | null;
}

export type RecordField = Exclude<keyof StructuredRecord, 'company_ticker'>;

/**
 * Ground-truth row keyed by ticker. Absent columns and empty cells are undefined.
 */
export interface ReferenceRecord {
  ticker: string;
  values: Partial<Record<RecordField, string | number>>;
}

// ============================================================================
// Extraction outcomes
// ============================================================================

export type StrategyKind = 'baseline' | 'refined';

export interface ExtractionMetadata {
  strategy: StrategyKind;
  segmentationMode: SegmentationMode;
  /** Structured segmentation found no target sections and fell back to flat */
  segmentationFallback: boolean;
  segmentCount: number;
  retrievedCount: number;
  model?: string;
  requestId?: string;
  generationAttempts: number;
  durationMs: number;
}

/**
 * One document's result for one strategy. Failed documents keep their entry
 * with an all-null record and an error tag.
 */
export interface ExtractionOutcome {
  documentId: string;
  record: StructuredRecord;
  error?: ErrorTag;
  metadata: ExtractionMetadata;
}

// ============================================================================
// Evaluation
// ============================================================================

export type Severity = 'None' | 'Minor' | 'Moderate' | 'Major';

export type FieldKind = 'identifier' | 'integer' | 'numeric';

export interface FieldComparison {
  field: RecordField;
  kind: FieldKind;
  extracted: number | string | null;
  reference: number | string;
  match: boolean;
  absoluteError: number | null;
  /** null when undefined (categorical field, absent value, or zero reference) */
  relativeError: number | null;
  severity: Severity;
  note?: string;
}

/** Accuracy is null when no fields were compared */
export type Accuracy = number | null;

export interface DocumentEvaluation {
  documentId: string;
  fields: FieldComparison[];
  matched: number;
  compared: number;
  accuracy: Accuracy;
  warnings: string[];
  /** Missing reference for the whole document */
  error?: ErrorTag;
  /** Reference cells that could not be compared; the other fields are still scored */
  fieldErrors?: FieldErrorTag[];
  /** Error tag carried over from extraction, if the record came from a failed task */
  extractionError?: ErrorTag;
}

export type FieldErrorTag = ErrorTag & { field: RecordField };

export interface FieldTotals {
  matched: number;
  compared: number;
  accuracy: Accuracy;
  severities: Record<Severity, number>;
}

export interface EvaluationReport {
  label?: string;
  tolerance: number;
  documents: DocumentEvaluation[];
  perField: Partial<Record<RecordField, FieldTotals>>;
  totals: {
    documents: number;
    evaluated: number;
    matched: number;
    compared: number;
    accuracy: Accuracy;
  };
  errors: Array<ErrorTag & { documentId: string; field?: RecordField }>;
}
