/**
 * extract_document job handling, kept free of BullMQ so it can be tested
 */

import {
  GenerationError,
  getStrategy,
  isTransientReason,
  logger,
  runDocumentTask,
  writeOutcomeFile,
  type ExtractDocumentJob,
  type ExtractionOutcome,
  type RunDeps,
} from '@ledgerlens/shared';

export interface HandlerOptions {
  taskTimeoutMs: number;
  /** 1-based attempt number of this job */
  attempt: number;
  maxAttempts: number;
}

export interface HandledJob {
  outcome: ExtractionOutcome;
  outputPath: string;
}

/**
 * Run one document x strategy job and write its outcome file.
 *
 * A transient backend failure is thrown while the job has attempts left, so
 * the queue retries it; on the last attempt the failure is recorded instead.
 */
export async function handleExtractDocument(
  data: ExtractDocumentJob,
  deps: RunDeps,
  options: HandlerOptions
): Promise<HandledJob> {
  const strategy = getStrategy(data.strategy);

  const outcome = await runDocumentTask(
    {
      id: data.document_id,
      sourcePath: data.source_path,
      fileType: data.file_type,
      fiscalYear: data.fiscal_year,
    },
    strategy,
    deps,
    { taskTimeoutMs: options.taskTimeoutMs, correlationId: data.correlation_id }
  );

  const error = outcome.error;
  const reason = error?.kind === 'GenerationError' ? error.reason : undefined;
  if (error && isTransientReason(reason) && options.attempt < options.maxAttempts) {
    logger.warn('Transient backend failure, job will be retried', {
      document_id: data.document_id,
      strategy: data.strategy,
      attempt: options.attempt,
      max_attempts: options.maxAttempts,
      reason,
    });
    throw new GenerationError(error.message, reason, options.attempt);
  }

  const outputPath = writeOutcomeFile(data.output_dir, outcome);
  return { outcome, outputPath };
}
