/**
 * OpenAI-compatible client
 *
 * Both backends speak the OpenAI wire format: the cloud API directly and the
 * local model server (Ollama) through its /v1 endpoint. SDK retries are
 * disabled; retries happen in callWithRetry().
 */

import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  RateLimitError,
} from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { setTimeout as delay } from 'node:timers/promises';
import type { Config } from './config';
import { GenerationError, err, type Result } from './errors';
import { logger } from './logger';

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ChatCompletionResult {
  id: string;
  model: string;
  choices: Array<{ message: { content: string | null } }>;
  usage?: { total_tokens: number };
}

/** The part of the SDK client the generation backend calls */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: RequestOptions): Promise<ChatCompletionResult>;
    };
  };
}

export interface EmbeddingResult {
  data: Array<{ index: number; embedding: number[] }>;
}

/** The part of the SDK client the embedding service calls */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[] }, options?: RequestOptions): Promise<EmbeddingResult>;
  };
}

export function createLlmClient(config: Readonly<Config>): OpenAI {
  const local = config.generationBackend === 'ollama';

  return new OpenAI({
    // The local server ignores the key but the SDK requires one
    apiKey: local ? 'ollama' : config.openaiApiKey,
    baseURL: local ? config.ollamaBaseUrl : config.openaiBaseUrl,
    timeout: config.llmRequestTimeoutMs,
    maxRetries: 0,
  });
}

/**
 * Map an SDK or network failure to a GenerationError
 */
export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;

  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof APIUserAbortError) {
    return new GenerationError(`Request aborted: ${message}`, 'aborted');
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new GenerationError(`Request timed out: ${message}`, 'timeout');
  }
  if (error instanceof APIConnectionError) {
    return new GenerationError(`Backend unreachable: ${message}`, 'unreachable');
  }
  if (error instanceof RateLimitError) {
    return new GenerationError(`Rate limited: ${message}`, 'rate_limit');
  }
  if (error instanceof APIError && error.status !== undefined && error.status >= 500) {
    return new GenerationError(`Backend error ${error.status}: ${message}`, 'unreachable');
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new GenerationError(`Request aborted: ${message}`, 'aborted');
  }

  return new GenerationError(message, 'bad_response');
}

export interface RetryOptions {
  /** Name of the call, for logs */
  operation: string;
  maxAttempts: number;
  backoffBaseMs: number;
  signal?: AbortSignal;
}

/**
 * Call a backend operation until it succeeds, fails permanently, or runs out
 * of attempts. Transient failures (timeout, rate limit, unreachable) back off
 * exponentially: base, 2x base, 4x base, ...
 */
export async function callWithRetry<T>(
  call: (attempt: number) => Promise<Result<T, GenerationError>>,
  options: RetryOptions
): Promise<Result<T, GenerationError>> {
  const { operation, maxAttempts, backoffBaseMs, signal } = options;
  let lastError = new GenerationError(`${operation} was not attempted`, 'aborted', 0);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return err(new GenerationError(`${operation} aborted`, 'aborted', attempt - 1));
    }

    const result = await call(attempt);
    if (result.ok) return result;

    lastError = new GenerationError(result.error.message, result.error.reason, attempt);
    if (!result.error.transient || attempt === maxAttempts) {
      return err(lastError);
    }

    const backoffMs = backoffBaseMs * 2 ** (attempt - 1);
    logger.warn('Transient backend failure, retrying', {
      operation,
      attempt,
      max_attempts: maxAttempts,
      reason: result.error.reason,
      backoff_ms: backoffMs,
    });

    if (backoffMs > 0) {
      try {
        await delay(backoffMs, undefined, { signal });
      } catch {
        return err(new GenerationError(`${operation} aborted during backoff`, 'aborted', attempt));
      }
    }
  }

  return err(lastError);
}
