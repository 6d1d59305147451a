/**
 * Evaluation of saved outcomes, one report per strategy and run
 */

import path from 'path';
import {
  STRATEGY_KINDS,
  evaluate,
  writeEvaluationReport,
  type EvaluationReport,
  type ExtractionOutcome,
  type LoadedResults,
  type ReferenceStore,
} from '@ledgerlens/shared';

export interface EvaluateOptions {
  tolerance: number;
  absoluteTolerance: number;
  /** Reports are written here as evaluation_<label>.json when set */
  outputDir?: string;
  /** Prepended to each strategy label as "<prefix>/<strategy>" */
  labelPrefix?: string;
}

/** Report label as a file name part: "gpt-oss:20b/refined" -> "gpt-oss_20b_refined" */
export function reportFileName(label: string): string {
  return label.replace(/[^A-Za-z0-9._-]+/g, '_');
}

/**
 * One report per strategy present in the outcomes, in strategy order
 */
export function evaluateByStrategy(
  outcomes: readonly ExtractionOutcome[],
  references: ReferenceStore,
  options: EvaluateOptions
): EvaluationReport[] {
  const reports: EvaluationReport[] = [];

  for (const kind of STRATEGY_KINDS) {
    const selected = outcomes.filter((o) => o.metadata.strategy === kind);
    if (selected.length === 0) continue;

    const label = options.labelPrefix ? `${options.labelPrefix}/${kind}` : kind;
    const report = evaluate(selected, references, {
      tolerance: options.tolerance,
      absoluteTolerance: options.absoluteTolerance,
      label,
    });
    if (options.outputDir) writeEvaluationReport(options.outputDir, reportFileName(label), report);
    reports.push(report);
  }

  return reports;
}

/**
 * Generation model a set of results came from: the run metadata, else the
 * model recorded on an outcome, else the results path
 */
export function modelOf(results: LoadedResults): string {
  if (results.run) return results.run.generationModel;
  const recorded = results.outcomes.find((o) => o.metadata.model !== undefined);
  return recorded?.metadata.model ?? path.basename(results.source);
}

/**
 * Evaluate several runs side by side. A single run keeps plain strategy
 * labels; several runs are labelled "<model>/<strategy>", with "#2", "#3"
 * added when two runs share a model.
 */
export function evaluateRuns(
  runs: readonly LoadedResults[],
  references: ReferenceStore,
  options: Omit<EvaluateOptions, 'labelPrefix'>
): EvaluationReport[] {
  if (runs.length === 1) {
    return evaluateByStrategy(runs[0].outcomes, references, options);
  }

  const seen = new Map<string, number>();
  return runs.flatMap((run) => {
    const model = modelOf(run);
    const count = (seen.get(model) ?? 0) + 1;
    seen.set(model, count);
    const labelPrefix = count > 1 ? `${model}#${count}` : model;
    return evaluateByStrategy(run.outcomes, references, { ...options, labelPrefix });
  });
}
