/**
 * Extraction Worker
 *
 * Consumes extract_document jobs (one document x one strategy each) and
 * writes one outcome file per job.
 */

import { Job } from 'bullmq';
import {
  logger,
  loadConfig,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  QUEUE_NAMES,
  OpenAiEmbeddingService,
  OpenAiGenerationBackend,
  jobsProcessedCounter,
  type ExtractDocumentJob,
} from '@ledgerlens/shared';
import { handleExtractDocument } from './lib/handler';

const config = loadConfig();

const deps = {
  embeddings: new OpenAiEmbeddingService(config),
  backend: new OpenAiGenerationBackend(config),
};

/**
 * Process extract_document job
 */
async function processExtractDocument(job: Job<ExtractDocumentJob, void>): Promise<void> {
  const { correlation_id, document_id, strategy } = job.data;

  const context = { correlationId: correlation_id, documentId: document_id, strategy, jobId: job.id };

  return runWithContextAsync(context, async () => {
    logger.info('Processing extract_document', {
      document_id,
      strategy,
      attempt: job.attemptsMade + 1,
    });

    try {
      const { outcome, outputPath } = await handleExtractDocument(job.data, deps, {
        taskTimeoutMs: config.taskTimeoutMs,
        attempt: job.attemptsMade + 1,
        maxAttempts: job.opts.attempts ?? config.maxJobAttempts,
      });

      jobsProcessedCounter.inc({
        queue: QUEUE_NAMES.EXTRACT_DOCUMENT,
        status: outcome.error ? 'recorded_error' : 'success',
      });
      logger.info('Wrote outcome', { document_id, strategy, path: outputPath });
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'failed' });
      throw error;
    }
  });
}

// Create and start the worker
const worker = createWorker<ExtractDocumentJob, void>(
  QUEUE_NAMES.EXTRACT_DOCUMENT,
  processExtractDocument,
  config
);
const metricsServer = serveMetrics(config.metricsPort);

logger.info('Extraction worker started', {
  backend: config.generationBackend,
  model: config.generationModel,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
