/**
 * Extraction Strategies
 *
 * A closed set of strategy variants. Each one fixes its segmentation mode,
 * window bounds, retrieval depth and prompt template; every stage downstream
 * of those choices is shared.
 */

import { FLAT_WINDOW, STRUCTURED_WINDOW, type WindowOptions } from '../segmentation';
import { BASELINE_TEMPLATE, REFINED_TEMPLATE, type ExtractionTemplate } from '../templates';
import type { SegmentationMode, StrategyKind } from '../types';

interface StrategyBase {
  segmentation: SegmentationMode;
  window: WindowOptions;
  /** Segments retrieved per query */
  topK: number;
  template: ExtractionTemplate;
}

export interface BaselineStrategy extends StrategyBase {
  kind: 'baseline';
  segmentation: 'flat';
}

export interface RefinedStrategy extends StrategyBase {
  kind: 'refined';
  segmentation: 'structured';
}

export type StrategyDefinition = BaselineStrategy | RefinedStrategy;

export const BASELINE_STRATEGY: BaselineStrategy = {
  kind: 'baseline',
  segmentation: 'flat',
  window: FLAT_WINDOW,
  topK: 5,
  template: BASELINE_TEMPLATE,
};

export const REFINED_STRATEGY: RefinedStrategy = {
  kind: 'refined',
  segmentation: 'structured',
  window: STRUCTURED_WINDOW,
  topK: 10,
  template: REFINED_TEMPLATE,
};

export const STRATEGY_KINDS: readonly StrategyKind[] = ['baseline', 'refined'];

const STRATEGIES: Record<StrategyKind, StrategyDefinition> = {
  baseline: BASELINE_STRATEGY,
  refined: REFINED_STRATEGY,
};

export function getStrategy(kind: StrategyKind): StrategyDefinition {
  return STRATEGIES[kind];
}

export function isStrategyKind(value: string): value is StrategyKind {
  return value === 'baseline' || value === 'refined';
}

/**
 * Resolve a run mode into the strategies to run: one kind, or 'both'.
 * Returns null for an unknown mode.
 */
export function parseStrategyMode(mode: string): StrategyDefinition[] | null {
  const normalized = mode.trim().toLowerCase();
  if (normalized === 'both') return STRATEGY_KINDS.map(getStrategy);
  if (isStrategyKind(normalized)) return [getStrategy(normalized)];
  return null;
}
