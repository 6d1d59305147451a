/**
 * Extraction Strategy Tests
 */

import {
  BASELINE_STRATEGY,
  BASELINE_TEMPLATE,
  REFINED_STRATEGY,
  REFINED_TEMPLATE,
  STRATEGY_KINDS,
  extractDocument,
  getStrategy,
  parseStrategyMode,
  type Document,
} from '@ledgerlens/shared';
import {
  HashingEmbeddingService,
  SAMPLE_RESPONSE,
  ScriptedBackend,
  UnreachableEmbeddingService,
  readSampleFiling,
} from './helpers';

function sampleDocument(text = readSampleFiling()): Document {
  return { id: 'EXMP', text, fileType: 'html', fiscalYear: 2023 };
}

describe('strategy definitions', () => {
  it('fixes segmentation, window bounds and retrieval depth per strategy', () => {
    expect(getStrategy('baseline')).toMatchObject({
      kind: 'baseline',
      segmentation: 'flat',
      window: { windowSize: 1024, overlap: 0 },
      topK: 5,
    });
    expect(getStrategy('refined')).toMatchObject({
      kind: 'refined',
      segmentation: 'structured',
      window: { windowSize: 4096, overlap: 256 },
      topK: 10,
    });
  });

  it('carries its prompt template on each strategy', () => {
    expect(getStrategy('baseline').template).toBe(BASELINE_TEMPLATE);
    expect(getStrategy('refined').template).toBe(REFINED_TEMPLATE);
    expect(STRATEGY_KINDS.map((kind) => getStrategy(kind).template.strategy)).toEqual([...STRATEGY_KINDS]);
  });

  it('parses run modes', () => {
    expect(parseStrategyMode('both')?.map((s) => s.kind)).toEqual([...STRATEGY_KINDS]);
    expect(parseStrategyMode('Refined')).toEqual([REFINED_STRATEGY]);
    expect(parseStrategyMode('baseline')).toEqual([BASELINE_STRATEGY]);
    expect(parseStrategyMode('hybrid')).toBeNull();
  });
});

describe('extractDocument', () => {
  it('runs the baseline pipeline over flat windows', async () => {
    const text = readSampleFiling();
    const backend = new ScriptedBackend([SAMPLE_RESPONSE]);
    const embeddings = new HashingEmbeddingService();

    const outcome = await extractDocument(sampleDocument(text), BASELINE_STRATEGY, { embeddings, backend });
    const segmentCount = Math.ceil(text.length / 1024);

    expect(outcome.error).toBeUndefined();
    expect(outcome.documentId).toBe('EXMP');
    expect(outcome.record.total_revenue).toBe(4210);
    expect(outcome.record.cik).toBe('0000123456');
    expect(outcome.metadata).toMatchObject({
      strategy: 'baseline',
      segmentationMode: 'flat',
      segmentationFallback: false,
      retrievedCount: Math.min(5, outcome.metadata.segmentCount),
      model: 'test-model',
      requestId: 'req_1',
      generationAttempts: 1,
    });
    expect(outcome.metadata.segmentCount).toBeGreaterThanOrEqual(segmentCount);
    expect(embeddings.calls).toHaveLength(2);
    expect(backend.prompts[0].user).not.toContain('[section:');
    expect(backend.prompts[0].user).toContain('(fiscal year: 2023)');
  });

  it('runs the refined pipeline over tagged sections', async () => {
    const backend = new ScriptedBackend([SAMPLE_RESPONSE]);
    const outcome = await extractDocument(sampleDocument(), REFINED_STRATEGY, {
      embeddings: new HashingEmbeddingService(),
      backend,
    });

    expect(outcome.error).toBeUndefined();
    expect(outcome.metadata).toMatchObject({
      strategy: 'refined',
      segmentationMode: 'structured',
      segmentationFallback: false,
      segmentCount: 7,
      retrievedCount: 7,
    });
    expect(backend.prompts[0].user).toContain('[section: balance_sheet]');
    expect(backend.prompts[0].user).not.toContain('Item 1A. Risk Factors');
  });

  it('still produces a record when no target section exists', async () => {
    const text = 'Revenue for the year was 880.5 million dollars. '.repeat(5);
    const outcome = await extractDocument(sampleDocument(text), REFINED_STRATEGY, {
      embeddings: new HashingEmbeddingService(),
      backend: new ScriptedBackend(['{"total_revenue": 880.5}']),
    });

    expect(outcome.error).toBeUndefined();
    expect(outcome.metadata.segmentationFallback).toBe(true);
    expect(outcome.metadata.segmentCount).toBe(1);
    expect(outcome.record.total_revenue).toBe(880.5);
  });

  it('records an IngestionError for an empty document', async () => {
    const backend = new ScriptedBackend([SAMPLE_RESPONSE]);
    const outcome = await extractDocument(sampleDocument('   '), BASELINE_STRATEGY, {
      embeddings: new HashingEmbeddingService(),
      backend,
    });

    expect(outcome.error?.kind).toBe('IngestionError');
    expect(outcome.record.total_revenue).toBeNull();
    expect(outcome.metadata.segmentCount).toBe(0);
    expect(backend.prompts).toHaveLength(0);
  });

  it('records a GenerationError when the embedding backend is unreachable', async () => {
    const outcome = await extractDocument(sampleDocument(), BASELINE_STRATEGY, {
      embeddings: new UnreachableEmbeddingService(),
      backend: new ScriptedBackend([SAMPLE_RESPONSE]),
    });

    expect(outcome.error).toEqual({
      kind: 'GenerationError',
      message: 'connect ECONNREFUSED 127.0.0.1:11434',
      reason: 'unreachable',
    });
    expect(outcome.record.company_ticker).toBe('EXMP');
    expect(outcome.record.net_income).toBeNull();
  });

  it('gives the same record for the same document and response', async () => {
    const run = () =>
      extractDocument(sampleDocument(), REFINED_STRATEGY, {
        embeddings: new HashingEmbeddingService(),
        backend: new ScriptedBackend([SAMPLE_RESPONSE]),
      });

    const [first, second] = [await run(), await run()];
    expect(second.record).toEqual(first.record);
  });
});
