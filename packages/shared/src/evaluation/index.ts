export { classifySeverity, DEFAULT_SEVERITY_THRESHOLDS, type SeverityThresholds } from './severity';
export { compareField, type ComparisonOptions, type FieldComparisonResult } from './compare-field';
export { checkMagnitude, checkSanityBounds, MAGNITUDE_WARNING_THRESHOLD } from './data-quality';
export {
  evaluate,
  evaluateRecord,
  accuracyOf,
  DEFAULT_ABSOLUTE_TOLERANCE,
  type EvaluationInput,
  type EvaluationOptions,
} from './evaluator';
export { compareStrategies, type StrategyComparison } from './compare-strategies';
export {
  loadReferenceStore,
  parseReferenceCsv,
  referenceKey,
  type ReferenceStore,
} from './reference-store';
