/**
 * Configuration Tests
 */

import { ConfigurationError, loadConfig } from '@ledgerlens/shared';

describe('loadConfig', () => {
  it('defaults to the local model server without a cloud key', () => {
    const config = loadConfig({});

    expect(config.generationBackend).toBe('ollama');
    expect(config.generationModel).toBe('gpt-oss:20b');
    expect(config.embeddingModel).toBe('nomic-embed-text');
    expect(config.ollamaBaseUrl).toBe('http://localhost:11434/v1');
    expect(config.maxBackendAttempts).toBe(3);
    expect(config.workerConcurrency).toBe(4);
    expect(config.evaluationTolerance).toBe(0.01);
    expect(config.absoluteTolerance).toBe(0.5);
  });

  it('selects the cloud backend when a key is present', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

    expect(config.generationBackend).toBe('openai');
    expect(config.generationModel).toBe('gpt-4o');
    expect(config.embeddingModel).toBe('text-embedding-3-small');
  });

  it('lets USE_OLLAMA override a present key', () => {
    expect(loadConfig({ OPENAI_API_KEY: 'test-secret', USE_OLLAMA: 'true' }).generationBackend).toBe('ollama');
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      GENERATION_BACKEND: 'ollama',
      OLLAMA_MODEL: 'llama3.1:8b',
      WORKER_CONCURRENCY: '8',
      BACKOFF_BASE_MS: '0',
      EVALUATION_TOLERANCE: '0.05',
      REDIS_URL: 'redis://cache:6380',
    });

    expect(config.generationModel).toBe('llama3.1:8b');
    expect(config.workerConcurrency).toBe(8);
    expect(config.backoffBaseMs).toBe(0);
    expect(config.evaluationTolerance).toBe(0.05);
    expect(config.redisUrl).toBe('redis://cache:6380');
  });

  it('rejects integers with trailing characters', () => {
    expect(() => loadConfig({ TASK_TIMEOUT_MS: '12abc' })).toThrow(
      'TASK_TIMEOUT_MS must be an integer >= 1, got "12abc"'
    );
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it.each([
    [{ GENERATION_BACKEND: 'openai' }],
    [{ GENERATION_BACKEND: 'anthropic' }],
    [{ WORKER_CONCURRENCY: '0' }],
    [{ LLM_REQUEST_TIMEOUT_MS: 'soon' }],
    [{ TASK_TIMEOUT_MS: '12abc' }],
    [{ MAX_BACKEND_ATTEMPTS: '2.5' }],
    [{ EVALUATION_TOLERANCE: '-0.1' }],
  ])('rejects %p', (env) => {
    expect(() => loadConfig(env)).toThrow(ConfigurationError);
  });
});
