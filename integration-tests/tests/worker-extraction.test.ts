/**
 * Extraction Worker Handler Tests
 */

import * as fs from 'fs';
import * as path from 'path';
import { GenerationError, type ExtractDocumentJob } from '@ledgerlens/shared';
import { handleExtractDocument } from '../../services/worker-extraction/src/lib/handler';
import {
  HashingEmbeddingService,
  SAMPLE_FILING_PATH,
  SAMPLE_RESPONSE,
  ScriptedBackend,
  makeTempDir,
  removeDir,
} from './helpers';

describe('handleExtractDocument', () => {
  let outputDir: string;

  function job(overrides: Partial<ExtractDocumentJob> = {}): ExtractDocumentJob {
    return {
      event_type: 'document.extract',
      correlation_id: 'corr-1',
      document_id: 'EXMP',
      source_path: SAMPLE_FILING_PATH,
      file_type: 'html',
      fiscal_year: 2023,
      strategy: 'refined',
      output_dir: outputDir,
      enqueued_at: '2024-01-01T00:00:00.000Z',
      ...overrides,
    };
  }

  beforeEach(() => {
    outputDir = makeTempDir();
  });

  afterEach(() => removeDir(outputDir));

  it('writes one outcome file per job', async () => {
    const { outcome, outputPath } = await handleExtractDocument(
      job(),
      { embeddings: new HashingEmbeddingService(), backend: new ScriptedBackend([SAMPLE_RESPONSE]) },
      { taskTimeoutMs: 5000, attempt: 1, maxAttempts: 3 }
    );

    expect(outputPath).toBe(path.join(outputDir, 'EXMP.refined.json'));
    expect(outcome.record.lease_liabilities).toBe(300);
    expect(JSON.parse(fs.readFileSync(outputPath, 'utf-8'))).toEqual(outcome);
  });

  it('throws a transient failure while attempts remain', async () => {
    const backend = new ScriptedBackend([new GenerationError('Rate limited', 'rate_limit', 3)]);

    await expect(
      handleExtractDocument(
        job(),
        { embeddings: new HashingEmbeddingService(), backend },
        { taskTimeoutMs: 5000, attempt: 1, maxAttempts: 3 }
      )
    ).rejects.toMatchObject({ name: 'GenerationError', reason: 'rate_limit', attempts: 1 });
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('keeps the timeout reason on the rethrown failure', async () => {
    const backend = new ScriptedBackend([new GenerationError('Request timed out', 'timeout', 3)]);

    await expect(
      handleExtractDocument(
        job(),
        { embeddings: new HashingEmbeddingService(), backend },
        { taskTimeoutMs: 5000, attempt: 2, maxAttempts: 3 }
      )
    ).rejects.toMatchObject({ message: 'Request timed out', reason: 'timeout', attempts: 2 });
  });

  it('records a non-transient failure without throwing', async () => {
    const backend = new ScriptedBackend([new GenerationError('Empty response from backend', 'bad_response')]);

    const { outcome } = await handleExtractDocument(
      job(),
      { embeddings: new HashingEmbeddingService(), backend },
      { taskTimeoutMs: 5000, attempt: 1, maxAttempts: 3 }
    );

    expect(outcome.error).toEqual({
      kind: 'GenerationError',
      message: 'Empty response from backend',
      reason: 'bad_response',
    });
  });

  it('records the failure on the last attempt', async () => {
    const backend = new ScriptedBackend([new GenerationError('Rate limited', 'rate_limit', 3)]);

    const { outcome, outputPath } = await handleExtractDocument(
      job({ strategy: 'baseline' }),
      { embeddings: new HashingEmbeddingService(), backend },
      { taskTimeoutMs: 5000, attempt: 3, maxAttempts: 3 }
    );

    expect(outputPath).toBe(path.join(outputDir, 'EXMP.baseline.json'));
    expect(outcome.error).toEqual({ kind: 'GenerationError', message: 'Rate limited', reason: 'rate_limit' });
  });

  it('records permanent failures without retrying', async () => {
    const { outcome } = await handleExtractDocument(
      job({ source_path: path.join(outputDir, 'missing.txt') }),
      { embeddings: new HashingEmbeddingService(), backend: new ScriptedBackend([SAMPLE_RESPONSE]) },
      { taskTimeoutMs: 5000, attempt: 1, maxAttempts: 3 }
    );

    expect(outcome.error?.kind).toBe('IngestionError');
    expect(fs.existsSync(path.join(outputDir, 'EXMP.refined.json'))).toBe(true);
  });
});
