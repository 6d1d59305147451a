/**
 * Result Artifacts
 *
 * extraction_results.json maps ticker -> strategy -> outcome, with run
 * metadata alongside. Worker runs write one outcome file per job instead;
 * both layouts load back into a flat list of outcomes.
 */

import fs from 'fs';
import path from 'path';
import { IngestionError } from '../errors';
import { logger } from '../logger';
import { isExtractionOutcome, validateExtractionOutcome } from '../schemas';
import type { EvaluationReport, ExtractionOutcome, StrategyKind } from '../types';

export const RESULTS_FILE_NAME = 'extraction_results.json';

export interface RunMetadata {
  runId: string;
  startedAt: string;
  finishedAt: string;
  backend: string;
  generationModel: string;
  embeddingModel: string;
  strategies: StrategyKind[];
  documentCount: number;
}

export type ResultsByTicker = Record<string, Partial<Record<StrategyKind, ExtractionOutcome>>>;

export interface ExtractionResultsFile {
  run: RunMetadata;
  results: ResultsByTicker;
}

/** Outcomes loaded from one results path */
export interface LoadedResults {
  source: string;
  /** Set when the path holds an extraction_results.json file */
  run?: RunMetadata;
  outcomes: ExtractionOutcome[];
}

function writeJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
}

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new IngestionError(
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRunMetadata(value: unknown): value is RunMetadata {
  return (
    isObject(value) &&
    typeof value.runId === 'string' &&
    typeof value.generationModel === 'string' &&
    typeof value.embeddingModel === 'string' &&
    Array.isArray(value.strategies)
  );
}

export function groupOutcomes(outcomes: readonly ExtractionOutcome[]): ResultsByTicker {
  const results: ResultsByTicker = {};
  for (const outcome of outcomes) {
    validateExtractionOutcome(outcome);
    const byStrategy = (results[outcome.documentId] ??= {});
    byStrategy[outcome.metadata.strategy] = outcome;
  }
  return results;
}

export function writeExtractionResults(
  filePath: string,
  run: RunMetadata,
  outcomes: readonly ExtractionOutcome[]
): ExtractionResultsFile {
  const file: ExtractionResultsFile = { run, results: groupOutcomes(outcomes) };
  writeJson(filePath, file);
  logger.info('Wrote extraction results', { path: filePath, outcomes: outcomes.length });
  return file;
}

export function outcomeFileName(outcome: ExtractionOutcome): string {
  return `${outcome.documentId}.${outcome.metadata.strategy}.json`;
}

/**
 * Write a single job's outcome into a results directory
 */
export function writeOutcomeFile(outputDir: string, outcome: ExtractionOutcome): string {
  validateExtractionOutcome(outcome);
  const filePath = path.join(outputDir, outcomeFileName(outcome));
  writeJson(filePath, outcome);
  return filePath;
}

function runFromResultsFile(data: unknown): RunMetadata | undefined {
  const run = isObject(data) ? data.run : undefined;
  return isRunMetadata(run) ? run : undefined;
}

function outcomesFromResultsFile(filePath: string, data: unknown): ExtractionOutcome[] {
  const results = isObject(data) ? data.results : undefined;
  if (!isObject(results)) {
    throw new IngestionError(`${filePath} is not an extraction results file`);
  }

  const outcomes: ExtractionOutcome[] = [];
  for (const [ticker, byStrategy] of Object.entries(results)) {
    if (!isObject(byStrategy)) continue;
    for (const [strategy, outcome] of Object.entries(byStrategy)) {
      if (isExtractionOutcome(outcome)) {
        outcomes.push(outcome);
      } else {
        logger.warn('Skipping malformed outcome', { path: filePath, ticker, strategy });
      }
    }
  }
  return outcomes;
}

/**
 * Load outcomes, and run metadata where there is any, from an
 * extraction_results.json file or a directory of per-job outcome files.
 *
 * @throws IngestionError when the path cannot be read
 */
export function loadExtractionResults(resultsPath: string): LoadedResults {
  if (!fs.existsSync(resultsPath)) {
    throw new IngestionError(`Results not found: ${resultsPath}`);
  }

  if (!fs.statSync(resultsPath).isDirectory()) {
    const data = readJson(resultsPath);
    return {
      source: resultsPath,
      run: runFromResultsFile(data),
      outcomes: outcomesFromResultsFile(resultsPath, data),
    };
  }

  const loaded: LoadedResults = { source: resultsPath, outcomes: [] };
  for (const fileName of fs.readdirSync(resultsPath).sort()) {
    if (!fileName.endsWith('.json') || fileName.startsWith('evaluation_')) continue;
    const filePath = path.join(resultsPath, fileName);
    const data = readJson(filePath);

    if (fileName === RESULTS_FILE_NAME) {
      loaded.run = runFromResultsFile(data);
      loaded.outcomes.push(...outcomesFromResultsFile(filePath, data));
    } else if (isExtractionOutcome(data)) {
      loaded.outcomes.push(data);
    } else {
      logger.warn('Skipping file that is not an extraction outcome', { path: filePath });
    }
  }
  return loaded;
}

/**
 * Write an evaluation report as evaluation_<name>.json
 */
export function writeEvaluationReport(outputDir: string, name: string, report: EvaluationReport): string {
  const filePath = path.join(outputDir, `evaluation_${name}.json`);
  writeJson(filePath, report);
  logger.info('Wrote evaluation report', { path: filePath, accuracy: report.totals.accuracy });
  return filePath;
}
