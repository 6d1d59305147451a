/**
 * Extraction Runner
 *
 * Runs every document x strategy task on a bounded in-process pool. A task
 * never throws: failures become all-null records with an error tag. Each
 * task has its own deadline and correlation id.
 */

import { ulid } from 'ulid';
import { runInChildContext, runWithContextAsync } from '../context';
import { ConfigurationError, GenerationError, RunError, toErrorTag, type ErrorTag } from '../errors';
import { logger } from '../logger';
import { documentTasksCounter, extractionDurationHistogram } from '../metrics';
import { emptyRecord } from '../normalize';
import { STRATEGY_KINDS, extractDocument, type ExtractionDeps, type StrategyDefinition } from '../strategies';
import type { DocumentRef, ExtractionOutcome } from '../types';
import { loadDocument } from './documents';
import { mapWithConcurrency } from './pool';

export type RunDeps = Omit<ExtractionDeps, 'signal'>;

export interface TaskOptions {
  taskTimeoutMs: number;
  /** Correlation id for the task; a fresh one when omitted */
  correlationId?: string;
}

export interface RunOptions extends TaskOptions {
  concurrency: number;
}

export interface RunResult {
  runId: string;
  startedAt: string;
  finishedAt: string;
  outcomes: ExtractionOutcome[];
  /** Set when every task failed with an unreachable backend */
  fatal?: RunError;
}

function failedOutcome(
  ref: DocumentRef,
  strategy: StrategyDefinition,
  error: ErrorTag,
  durationMs: number
): ExtractionOutcome {
  return {
    documentId: ref.id,
    record: emptyRecord(ref.id),
    error,
    metadata: {
      strategy: strategy.kind,
      segmentationMode: strategy.segmentation,
      segmentationFallback: false,
      segmentCount: 0,
      retrievedCount: 0,
      generationAttempts: 0,
      durationMs,
    },
  };
}

async function extractRef(
  ref: DocumentRef,
  strategy: StrategyDefinition,
  deps: ExtractionDeps
): Promise<ExtractionOutcome> {
  const startTime = Date.now();
  try {
    return await extractDocument(loadDocument(ref), strategy, deps);
  } catch (error) {
    logger.error('Document could not be loaded', error, { document_id: ref.id });
    return failedOutcome(ref, strategy, toErrorTag(error), Date.now() - startTime);
  }
}

/**
 * Run one document through one strategy under a deadline.
 * On timeout in-flight backend calls are aborted and a GenerationError is recorded.
 */
export async function runDocumentTask(
  ref: DocumentRef,
  strategy: StrategyDefinition,
  deps: RunDeps,
  options: TaskOptions
): Promise<ExtractionOutcome> {
  const fields = {
    correlationId: options.correlationId,
    documentId: ref.id,
    strategy: strategy.kind,
  };

  return runInChildContext(fields, async () => {
    const controller = new AbortController();
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<ExtractionOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        const error = new GenerationError(
          `Task exceeded ${options.taskTimeoutMs}ms deadline`,
          'timeout'
        ).toTag();
        resolve(failedOutcome(ref, strategy, error, Date.now() - startTime));
      }, options.taskTimeoutMs);
    });

    logger.info('Task started', { document_id: ref.id, strategy: strategy.kind });

    try {
      const outcome = await Promise.race([
        extractRef(ref, strategy, { ...deps, signal: controller.signal }),
        deadline,
      ]);

      const status = outcome.error ? 'error' : 'success';
      documentTasksCounter.inc({ strategy: strategy.kind, status });
      extractionDurationHistogram.observe({ strategy: strategy.kind }, outcome.metadata.durationMs / 1000);

      logger.info('Task finished', {
        document_id: ref.id,
        strategy: strategy.kind,
        status,
        error_kind: outcome.error?.kind,
        duration_ms: outcome.metadata.durationMs,
      });

      return outcome;
    } finally {
      clearTimeout(timer);
    }
  });
}

function isUnreachable(outcome: ExtractionOutcome): boolean {
  return outcome.error?.kind === 'GenerationError' && outcome.error.reason === 'unreachable';
}

export function sortOutcomes(outcomes: readonly ExtractionOutcome[]): ExtractionOutcome[] {
  return [...outcomes].sort(
    (a, b) =>
      a.documentId.localeCompare(b.documentId) ||
      STRATEGY_KINDS.indexOf(a.metadata.strategy) - STRATEGY_KINDS.indexOf(b.metadata.strategy)
  );
}

/**
 * Run every document through every strategy.
 *
 * @throws RunError when there are no documents
 * @throws ConfigurationError when no strategy is selected
 */
export async function runExtraction(
  documents: readonly DocumentRef[],
  strategies: readonly StrategyDefinition[],
  deps: RunDeps,
  options: RunOptions
): Promise<RunResult> {
  if (documents.length === 0) {
    throw new RunError('No input documents', 'no_documents');
  }
  if (strategies.length === 0) {
    throw new ConfigurationError('No extraction strategy selected');
  }

  const runId = options.correlationId ?? ulid();
  return runWithContextAsync({ correlationId: runId, runId }, () =>
    runTasks(documents, strategies, deps, options, runId)
  );
}

async function runTasks(
  documents: readonly DocumentRef[],
  strategies: readonly StrategyDefinition[],
  deps: RunDeps,
  options: RunOptions,
  runId: string
): Promise<RunResult> {
  const startedAt = new Date().toISOString();
  const tasks = documents.flatMap((ref) => strategies.map((strategy) => ({ ref, strategy })));

  logger.info('Run started', {
    documents: documents.length,
    strategies: strategies.map((s) => s.kind),
    tasks: tasks.length,
    concurrency: options.concurrency,
  });

  const outcomes = await mapWithConcurrency(tasks, options.concurrency, ({ ref, strategy }) =>
    runDocumentTask(ref, strategy, deps, { taskTimeoutMs: options.taskTimeoutMs })
  );

  const result: RunResult = {
    runId,
    startedAt,
    finishedAt: new Date().toISOString(),
    outcomes: sortOutcomes(outcomes),
  };

  if (outcomes.every(isUnreachable)) {
    result.fatal = new RunError('Generation backend unreachable for every task', 'backend_unreachable');
    logger.error('Run failed', result.fatal);
  }

  logger.info('Run finished', {
    tasks: outcomes.length,
    failed: outcomes.filter((o) => o.error).length,
  });

  return result;
}
