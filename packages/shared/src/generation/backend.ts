/**
 * Generation Backend
 *
 * generate(prompt, schema) -> raw response text. The OpenAI-compatible
 * implementation serves the cloud API and the local model server alike.
 */

import type { Config } from '../config';
import { GenerationError, err, ok, type Result } from '../errors';
import { callWithRetry, createLlmClient, toGenerationError, type ChatCompletionsClient } from '../llm-client';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter } from '../metrics';
import type { ResponseSchema } from './response-schema';

export interface GenerationPrompt {
  system: string;
  user: string;
  schema: ResponseSchema;
}

export interface GenerationResponse {
  content: string;
  model: string;
  requestId: string;
}

export interface GenerationBackend {
  readonly model: string;
  generate(
    prompt: GenerationPrompt,
    signal?: AbortSignal
  ): Promise<Result<GenerationResponse, GenerationError>>;
}

export class OpenAiGenerationBackend implements GenerationBackend {
  readonly model: string;
  private readonly client: ChatCompletionsClient;
  private readonly config: Readonly<Config>;

  constructor(config: Readonly<Config>, client: ChatCompletionsClient = createLlmClient(config)) {
    this.config = config;
    this.client = client;
    this.model = config.generationModel;
  }

  async generate(
    prompt: GenerationPrompt,
    signal?: AbortSignal
  ): Promise<Result<GenerationResponse, GenerationError>> {
    return callWithRetry((attempt) => this.complete(prompt, attempt, signal), {
      operation: 'generate',
      maxAttempts: this.config.maxBackendAttempts,
      backoffBaseMs: this.config.backoffBaseMs,
      signal,
    });
  }

  private async complete(
    prompt: GenerationPrompt,
    attempt: number,
    signal?: AbortSignal
  ): Promise<Result<GenerationResponse, GenerationError>> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: prompt.schema,
          },
          temperature: 0,
        },
        { signal }
      );

      const durationMs = Date.now() - startTime;
      llmRequestDurationHistogram.observe({ model: this.model }, durationMs / 1000);

      const content = response.choices[0]?.message?.content;
      if (!content) {
        llmRequestsCounter.inc({ model: this.model, status: 'empty' });
        return err(new GenerationError('Empty response from backend', 'bad_response', attempt));
      }

      llmRequestsCounter.inc({ model: this.model, status: 'success' });
      logger.info('Generation complete', {
        model: this.model,
        request_id: response.id,
        attempt,
        duration_ms: durationMs,
        tokens_used: response.usage?.total_tokens,
      });

      return ok({
        content,
        model: response.model || this.model,
        requestId: response.id || `req_${Date.now()}`,
      });
    } catch (error) {
      llmRequestsCounter.inc({ model: this.model, status: 'error' });
      const failure = toGenerationError(error);
      logger.error('Generation request failed', error, {
        model: this.model,
        attempt,
        reason: failure.reason,
        duration_ms: Date.now() - startTime,
      });
      return err(failure);
    }
  }
}
