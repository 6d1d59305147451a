/**
 * Result Artifact Tests
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  IngestionError,
  RESULTS_FILE_NAME,
  emptyRecord,
  evaluate,
  loadExtractionResults,
  parseReferenceCsv,
  writeEvaluationReport,
  writeExtractionResults,
  writeOutcomeFile,
  type ExtractionOutcome,
  type RunMetadata,
  type StrategyKind,
} from '@ledgerlens/shared';
import { makeTempDir, removeDir } from './helpers';

function outcome(ticker: string, strategy: StrategyKind, totalRevenue: number | null): ExtractionOutcome {
  return {
    documentId: ticker,
    record: { ...emptyRecord(ticker), total_revenue: totalRevenue, cik: '0000123456' },
    metadata: {
      strategy,
      segmentationMode: strategy === 'baseline' ? 'flat' : 'structured',
      segmentationFallback: false,
      segmentCount: 3,
      retrievedCount: 3,
      model: 'test-model',
      requestId: 'req_1',
      generationAttempts: 1,
      durationMs: 42,
    },
  };
}

const RUN: RunMetadata = {
  runId: 'run-1',
  startedAt: '2024-01-01T00:00:00.000Z',
  finishedAt: '2024-01-01T00:01:00.000Z',
  backend: 'ollama',
  generationModel: 'test-model',
  embeddingModel: 'test-embedding',
  strategies: ['baseline', 'refined'],
  documentCount: 2,
};

describe('result artifacts', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => removeDir(dir));

  it('writes outcomes grouped by ticker and strategy', () => {
    const filePath = path.join(dir, 'nested', RESULTS_FILE_NAME);
    const outcomes = [outcome('AAA', 'baseline', 100), outcome('AAA', 'refined', 101), outcome('BBB', 'baseline', null)];

    writeExtractionResults(filePath, RUN, outcomes);
    const written: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));

    expect(written).toEqual({
      run: RUN,
      results: {
        AAA: { baseline: outcomes[0], refined: outcomes[1] },
        BBB: { baseline: outcomes[2] },
      },
    });
    expect(loadExtractionResults(filePath).outcomes).toEqual(outcomes);
  });

  it('loads per-job outcome files from a directory, skipping other files', () => {
    const failed: ExtractionOutcome = {
      ...outcome('BBB', 'refined', null),
      error: { kind: 'GenerationError', message: 'Task exceeded 50ms deadline', reason: 'timeout' },
    };

    expect(writeOutcomeFile(dir, outcome('AAA', 'baseline', 100))).toBe(path.join(dir, 'AAA.baseline.json'));
    writeOutcomeFile(dir, failed);
    fs.writeFileSync(path.join(dir, 'notes.json'), '{"hello": "world"}');
    fs.writeFileSync(path.join(dir, 'evaluation_baseline.json'), '{}');

    expect(loadExtractionResults(dir).outcomes).toEqual([outcome('AAA', 'baseline', 100), failed]);
  });

  it('keeps the run metadata of a results file', () => {
    const filePath = path.join(dir, RESULTS_FILE_NAME);
    writeExtractionResults(filePath, RUN, [outcome('AAA', 'baseline', 100)]);
    writeOutcomeFile(path.join(dir, 'jobs'), outcome('AAA', 'refined', 101));

    expect(loadExtractionResults(filePath)).toEqual({
      source: filePath,
      run: RUN,
      outcomes: [outcome('AAA', 'baseline', 100)],
    });
    expect(loadExtractionResults(dir).run).toEqual(RUN);
    expect(loadExtractionResults(path.join(dir, 'jobs'))).toEqual({
      source: path.join(dir, 'jobs'),
      outcomes: [outcome('AAA', 'refined', 101)],
    });
  });

  it('raises IngestionError for missing or malformed results', () => {
    expect(() => loadExtractionResults(path.join(dir, 'missing.json'))).toThrow(IngestionError);

    const bad = path.join(dir, 'bad.json');
    fs.writeFileSync(bad, '{"not": "results"}');
    expect(() => loadExtractionResults(bad)).toThrow(IngestionError);

    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{');
    expect(() => loadExtractionResults(broken)).toThrow(IngestionError);
  });

  it('writes evaluation reports as evaluation_<name>.json', () => {
    const references = parseReferenceCsv('ticker,total_revenue\nAAA,100\n');
    const report = evaluate([outcome('AAA', 'baseline', 100)], references, { label: 'baseline' });

    const filePath = writeEvaluationReport(dir, 'baseline', report);

    expect(filePath).toBe(path.join(dir, 'evaluation_baseline.json'));
    const written: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    expect(written).toMatchObject({ label: 'baseline', totals: { matched: 1, compared: 1, accuracy: 1 } });
  });
});
