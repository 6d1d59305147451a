export {
  BASELINE_STRATEGY,
  REFINED_STRATEGY,
  STRATEGY_KINDS,
  getStrategy,
  isStrategyKind,
  parseStrategyMode,
  type BaselineStrategy,
  type RefinedStrategy,
  type StrategyDefinition,
} from './definitions';
export { extractDocument, type ExtractionDeps } from './extract';
