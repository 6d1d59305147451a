/**
 * Document Loading and Runner Tests
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  BASELINE_STRATEGY,
  GenerationError,
  IngestionError,
  REFINED_STRATEGY,
  RunError,
  loadDocument,
  loadDocuments,
  mapWithConcurrency,
  parseDocumentFileName,
  runDocumentTask,
  runExtraction,
  type DocumentRef,
} from '@ledgerlens/shared';
import {
  HangingBackend,
  HashingEmbeddingService,
  SAMPLE_RESPONSE,
  ScriptedBackend,
  UnreachableEmbeddingService,
  makeTempDir,
  readSampleFiling,
  removeDir,
  sleep,
} from './helpers';

describe('parseDocumentFileName', () => {
  it.each([
    ['EXMP_10K_FY2023.html.txt', { id: 'EXMP', fileType: 'html', fiscalYear: 2023 }],
    ['abc.pdf.md', { id: 'ABC', fileType: 'pdf', fiscalYear: undefined }],
    ['ZZZ.txt', { id: 'ZZZ', fileType: 'html', fiscalYear: undefined }],
    ['QQQ_fy2021.txt', { id: 'QQQ', fileType: 'html', fiscalYear: 2021 }],
  ])('parses %s', (fileName, expected) => {
    expect(parseDocumentFileName(fileName)).toEqual(expected);
  });

  it.each([['notes.json'], ['EXMP.html'], ['_.txt']])('ignores %s', (fileName) => {
    expect(parseDocumentFileName(fileName)).toBeNull();
  });
});

describe('loadDocuments', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    fs.writeFileSync(path.join(dir, 'BBB_10K.pdf.txt'), 'Item 7. MD&A\nRevenue was 10 million.');
    fs.writeFileSync(path.join(dir, 'AAA_10K_FY2022.html.txt'), 'Cover page text.');
    fs.writeFileSync(path.join(dir, 'AAA_10K.pdf.txt'), 'Duplicate filing.');
    fs.writeFileSync(path.join(dir, 'README.json'), '{}');
  });

  afterEach(() => removeDir(dir));

  it('lists documents sorted by file name, keeping the first file per ticker', () => {
    const refs = loadDocuments(dir);

    expect(refs).toEqual([
      { id: 'AAA', fileType: 'pdf', fiscalYear: undefined, sourcePath: path.join(dir, 'AAA_10K.pdf.txt') },
      { id: 'BBB', fileType: 'pdf', fiscalYear: undefined, sourcePath: path.join(dir, 'BBB_10K.pdf.txt') },
    ]);
  });

  it('reads a document on demand', () => {
    const [, bbb] = loadDocuments(dir);
    expect(loadDocument(bbb)).toEqual({
      id: 'BBB',
      text: 'Item 7. MD&A\nRevenue was 10 million.',
      fileType: 'pdf',
      fiscalYear: undefined,
      sourcePath: path.join(dir, 'BBB_10K.pdf.txt'),
    });
  });

  it('raises IngestionError for a missing directory or file', () => {
    expect(() => loadDocuments(path.join(dir, 'nope'))).toThrow(IngestionError);
    expect(() =>
      loadDocument({ id: 'X', fileType: 'html', sourcePath: path.join(dir, 'X.txt') })
    ).toThrow(IngestionError);
  });
});

describe('mapWithConcurrency', () => {
  it('never runs more than the limit at once and returns every result', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (n) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight -= 1;
      return n * 10;
    });

    expect(peak).toBe(2);
    expect([...results].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50, 60]);
  });

  it('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async (n: number) => n)).toEqual([]);
  });
});

describe('runExtraction', () => {
  let dir: string;
  let refs: DocumentRef[];

  beforeEach(() => {
    dir = makeTempDir();
    fs.writeFileSync(path.join(dir, 'EXMP_10K_FY2023.html.txt'), readSampleFiling());
    fs.writeFileSync(path.join(dir, 'EMPTY_10K.html.txt'), '');
    refs = loadDocuments(dir);
  });

  afterEach(() => removeDir(dir));

  it('runs every document through every strategy and sorts the outcomes', async () => {
    const result = await runExtraction(
      refs,
      [BASELINE_STRATEGY, REFINED_STRATEGY],
      { embeddings: new HashingEmbeddingService(), backend: new ScriptedBackend([SAMPLE_RESPONSE]) },
      { concurrency: 3, taskTimeoutMs: 5000 }
    );

    expect(result.fatal).toBeUndefined();
    expect(result.outcomes.map((o) => [o.documentId, o.metadata.strategy])).toEqual([
      ['EMPTY', 'baseline'],
      ['EMPTY', 'refined'],
      ['EXMP', 'baseline'],
      ['EXMP', 'refined'],
    ]);
    expect(result.outcomes[0].error?.kind).toBe('IngestionError');
    expect(result.outcomes[0].record.company_ticker).toBe('EMPTY');
    expect(result.outcomes[2].error).toBeUndefined();
    expect(result.outcomes[3].record.net_income).toBe(512);
  });

  it('refuses to start without documents', async () => {
    await expect(
      runExtraction([], [BASELINE_STRATEGY], {
        embeddings: new HashingEmbeddingService(),
        backend: new ScriptedBackend([SAMPLE_RESPONSE]),
      }, { concurrency: 1, taskTimeoutMs: 1000 })
    ).rejects.toMatchObject({ kind: 'RunError', reason: 'no_documents' });
  });

  it('reports a fatal error when the backend is unreachable for every task', async () => {
    const exmp = refs.filter((r) => r.id === 'EXMP');
    const result = await runExtraction(
      exmp,
      [BASELINE_STRATEGY, REFINED_STRATEGY],
      { embeddings: new UnreachableEmbeddingService(), backend: new ScriptedBackend([SAMPLE_RESPONSE]) },
      { concurrency: 2, taskTimeoutMs: 1000 }
    );

    expect(result.outcomes).toHaveLength(2);
    expect(result.fatal).toBeInstanceOf(RunError);
    expect(result.fatal?.reason).toBe('backend_unreachable');
  });

  it('does not treat one unreachable generation as fatal when others succeed', async () => {
    const result = await runExtraction(
      refs.filter((r) => r.id === 'EXMP'),
      [BASELINE_STRATEGY, REFINED_STRATEGY],
      {
        embeddings: new HashingEmbeddingService(),
        backend: new ScriptedBackend([new GenerationError('down', 'unreachable'), SAMPLE_RESPONSE]),
      },
      { concurrency: 1, taskTimeoutMs: 1000 }
    );

    expect(result.fatal).toBeUndefined();
    expect(result.outcomes.filter((o) => o.error?.reason === 'unreachable')).toHaveLength(1);
  });
});

describe('runDocumentTask', () => {
  let dir: string;
  let ref: DocumentRef;

  beforeEach(() => {
    dir = makeTempDir();
    fs.writeFileSync(path.join(dir, 'EXMP_10K_FY2023.html.txt'), readSampleFiling());
    [ref] = loadDocuments(dir);
  });

  afterEach(() => removeDir(dir));

  it('aborts a task that exceeds its deadline and records a GenerationError', async () => {
    const outcome = await runDocumentTask(
      ref,
      BASELINE_STRATEGY,
      { embeddings: new HashingEmbeddingService(), backend: new HangingBackend() },
      { taskTimeoutMs: 50 }
    );

    expect(outcome.error).toEqual({
      kind: 'GenerationError',
      message: 'Task exceeded 50ms deadline',
      reason: 'timeout',
    });
    expect(outcome.record.total_revenue).toBeNull();
    expect(outcome.metadata.strategy).toBe('baseline');
  });
});
