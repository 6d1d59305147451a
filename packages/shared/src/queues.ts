/**
 * BullMQ Queue Definitions
 *
 * Queue names, job interfaces, and queue factory functions.
 */

import { Queue, Worker, type Job, type ConnectionOptions } from 'bullmq';
import type { Config } from './config';
import { logger } from './logger';
import type { DocumentFileType, StrategyKind } from './types';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  EXTRACT_DOCUMENT: 'extract_document',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * document.extract - Enqueued by the runner, one job per document x strategy
 */
export interface ExtractDocumentJob {
  event_type: 'document.extract';
  correlation_id: string;
  document_id: string;
  source_path: string;
  file_type: DocumentFileType;
  fiscal_year?: number;
  strategy: StrategyKind;
  /** Directory the outcome file is written to */
  output_dir: string;
  enqueued_at: string;
}

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(config: Readonly<Config>): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (error) {
      logger.warn('Invalid REDIS_URL, using host/port', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

export function createQueue<TData, TResult>(
  queueName: QueueName,
  config: Readonly<Config>
): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(config),
    defaultJobOptions: {
      attempts: config.maxJobAttempts,
      backoff: {
        type: 'exponential',
        delay: config.backoffBaseMs,
      },
      removeOnComplete: 100, // Keep last 100 completed jobs
      removeOnFail: 1000, // Keep last 1000 failed jobs
    },
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  config: Readonly<Config>
): Worker<TData, TResult> {
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(config),
    concurrency: config.workerConcurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      queue: queueName,
      jobId: job.id,
    });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', {
    queue: queueName,
    concurrency: config.workerConcurrency,
  });

  return worker;
}
