/**
 * Prometheus Metrics
 *
 * Metrics for backend calls, document tasks and queue jobs.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Backend Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'ledgerlens_llm_requests_total',
  help: 'Total number of generation requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'ledgerlens_llm_request_duration_seconds',
  help: 'Duration of generation requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const embeddingRequestsCounter = new promClient.Counter({
  name: 'ledgerlens_embedding_requests_total',
  help: 'Total number of embedding requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentTasksCounter = new promClient.Counter({
  name: 'ledgerlens_document_tasks_total',
  help: 'Total number of document extraction tasks',
  labelNames: ['strategy', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'ledgerlens_extraction_duration_seconds',
  help: 'Duration of document extraction',
  labelNames: ['strategy'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120, 300],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'ledgerlens_jobs_processed_total',
  help: 'Total number of queue jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Default process metrics are collected from this point on.
 */
export function serveMetrics(port: number): http.Server {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (error) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((error: unknown) => {
          logger.error('Failed to render metrics', error);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
