/**
 * Embedding Service
 *
 * embed(texts) -> vectors, one per input in input order. The same
 * implementation serves the cloud API and the local model server.
 */

import type { Config } from '../config';
import { GenerationError, err, ok, type Result } from '../errors';
import { callWithRetry, createLlmClient, toGenerationError, type EmbeddingsClient } from '../llm-client';
import { embeddingRequestsCounter } from '../metrics';

export interface EmbeddingService {
  readonly model: string;
  embed(texts: readonly string[], signal?: AbortSignal): Promise<Result<number[][], GenerationError>>;
}

export class OpenAiEmbeddingService implements EmbeddingService {
  readonly model: string;
  private readonly client: EmbeddingsClient;
  private readonly config: Readonly<Config>;

  constructor(config: Readonly<Config>, client: EmbeddingsClient = createLlmClient(config)) {
    this.config = config;
    this.client = client;
    this.model = config.embeddingModel;
  }

  async embed(
    texts: readonly string[],
    signal?: AbortSignal
  ): Promise<Result<number[][], GenerationError>> {
    const vectors: number[][] = [];
    const batchSize = this.config.embeddingBatchSize;

    for (let start = 0; start < texts.length; start += batchSize) {
      const batch = texts.slice(start, start + batchSize);
      const result = await callWithRetry((attempt) => this.embedBatch(batch, attempt, signal), {
        operation: 'embed',
        maxAttempts: this.config.maxBackendAttempts,
        backoffBaseMs: this.config.backoffBaseMs,
        signal,
      });
      if (!result.ok) return result;
      vectors.push(...result.value);
    }

    return ok(vectors);
  }

  private async embedBatch(
    batch: string[],
    attempt: number,
    signal?: AbortSignal
  ): Promise<Result<number[][], GenerationError>> {
    try {
      const response = await this.client.embeddings.create(
        { model: this.model, input: batch },
        { signal }
      );
      embeddingRequestsCounter.inc({ model: this.model, status: 'success' });

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        return err(
          new GenerationError(
            `Embedding response has ${ordered.length} vectors for ${batch.length} inputs`,
            'bad_response',
            attempt
          )
        );
      }
      return ok(ordered.map((d) => d.embedding));
    } catch (error) {
      embeddingRequestsCounter.inc({ model: this.model, status: 'error' });
      return err(toGenerationError(error));
    }
  }
}
