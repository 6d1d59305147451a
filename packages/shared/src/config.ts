/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables. The config is
 * built once at process start with loadConfig() and passed explicitly to every
 * component that talks to a backend.
 */

import { ConfigurationError } from './errors';

export type GenerationBackendKind = 'openai' | 'ollama';

export interface Config {
  // Backend selection
  generationBackend: GenerationBackendKind;
  openaiApiKey: string;
  openaiBaseUrl: string | undefined;
  ollamaBaseUrl: string;

  // Models
  generationModel: string;
  embeddingModel: string;

  // Backend calls
  llmRequestTimeoutMs: number;
  maxBackendAttempts: number;
  backoffBaseMs: number;
  embeddingBatchSize: number;

  // Tasks
  workerConcurrency: number;
  taskTimeoutMs: number;

  // Evaluation
  evaluationTolerance: number;
  absoluteTolerance: number;

  // Redis / BullMQ
  redisHost: string;
  redisPort: number;
  redisUrl: string;
  maxJobAttempts: number;

  // Observability
  metricsPort: number;
}

export type Env = Record<string, string | undefined>;

const DEFAULT_MODELS: Record<GenerationBackendKind, { generation: string; embedding: string }> = {
  openai: { generation: 'gpt-4o', embedding: 'text-embedding-3-small' },
  ollama: { generation: 'gpt-oss:20b', embedding: 'nomic-embed-text' },
};

function parseInteger(env: Env, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parseRatio(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

function parseBackend(env: Env): GenerationBackendKind {
  const raw = (env.GENERATION_BACKEND || '').toLowerCase();
  if (raw === '') {
    // Same rule as the local tooling: no cloud key means the local model server
    if (env.USE_OLLAMA === 'true' || !env.OPENAI_API_KEY) return 'ollama';
    return 'openai';
  }
  if (raw === 'openai' || raw === 'ollama') return raw;
  throw new ConfigurationError(`GENERATION_BACKEND must be "openai" or "ollama", got "${raw}"`);
}

/**
 * Build the process configuration from environment variables.
 * The returned object is frozen.
 */
export function loadConfig(env: Env = process.env): Readonly<Config> {
  const generationBackend = parseBackend(env);
  const openaiApiKey = env.OPENAI_API_KEY || '';

  if (generationBackend === 'openai' && !openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is required when GENERATION_BACKEND=openai');
  }

  const models = DEFAULT_MODELS[generationBackend];

  const config: Config = {
    generationBackend,
    openaiApiKey,
    openaiBaseUrl: env.OPENAI_BASE_URL || undefined,
    ollamaBaseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434/v1',

    generationModel: env.LLM_MODEL || env.OLLAMA_MODEL || models.generation,
    embeddingModel: env.EMBEDDING_MODEL || models.embedding,

    llmRequestTimeoutMs: parseInteger(env, 'LLM_REQUEST_TIMEOUT_MS', 60000),
    maxBackendAttempts: parseInteger(env, 'MAX_BACKEND_ATTEMPTS', 3),
    backoffBaseMs: parseInteger(env, 'BACKOFF_BASE_MS', 1000, 0),
    embeddingBatchSize: parseInteger(env, 'EMBEDDING_BATCH_SIZE', 96),

    workerConcurrency: parseInteger(env, 'WORKER_CONCURRENCY', 4),
    taskTimeoutMs: parseInteger(env, 'TASK_TIMEOUT_MS', 300000),

    evaluationTolerance: parseRatio(env, 'EVALUATION_TOLERANCE', 0.01),
    absoluteTolerance: parseRatio(env, 'ABSOLUTE_TOLERANCE', 0.5),

    redisHost: env.REDIS_HOST || 'localhost',
    redisPort: parseInteger(env, 'REDIS_PORT', 6379),
    redisUrl: env.REDIS_URL || 'redis://localhost:6379',
    maxJobAttempts: parseInteger(env, 'BULLMQ_DEFAULT_ATTEMPTS', 3),

    metricsPort: parseInteger(env, 'METRICS_PORT', 9464),
  };

  return Object.freeze(config);
}
