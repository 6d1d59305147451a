/**
 * Test Helpers
 *
 * In-process stand-ins for the embedding service and generation backend.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  GenerationError,
  err,
  ok,
  type EmbeddingService,
  type GenerationBackend,
  type GenerationPrompt,
  type GenerationResponse,
  type Result,
} from '@ledgerlens/shared';

export const FIXTURES_DIR = path.join(__dirname, '..', 'fixtures');
export const SAMPLE_FILING_PATH = path.join(FIXTURES_DIR, 'filings', 'EXMP_10K_FY2023.html.txt');
export const REFERENCE_CSV_PATH = path.join(FIXTURES_DIR, 'reference.csv');

export function readSampleFiling(): string {
  return fs.readFileSync(SAMPLE_FILING_PATH, 'utf-8');
}

export function makeTempDir(prefix = 'ledgerlens-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

function hashToken(token: string): number {
  let hash = 5381;
  for (let i = 0; i < token.length; i++) {
    hash = ((hash << 5) + hash + token.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * Bag-of-words vector: each lower-cased token adds 1 to a hashed bucket
 */
export function embedText(text: string, dimension = 64): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    vector[hashToken(token) % dimension] += 1;
  }
  return vector;
}

export class HashingEmbeddingService implements EmbeddingService {
  readonly model = 'test-embedding';
  readonly calls: string[][] = [];

  async embed(texts: readonly string[]): Promise<Result<number[][], GenerationError>> {
    this.calls.push([...texts]);
    return ok(texts.map((text) => embedText(text)));
  }
}

export class UnreachableEmbeddingService implements EmbeddingService {
  readonly model = 'test-embedding';

  async embed(): Promise<Result<number[][], GenerationError>> {
    return err(new GenerationError('connect ECONNREFUSED 127.0.0.1:11434', 'unreachable', 3));
  }
}

/**
 * Replies with the scripted responses in order, repeating the last one.
 * A GenerationError entry is returned as a failed call.
 */
export class ScriptedBackend implements GenerationBackend {
  readonly model = 'test-model';
  readonly prompts: GenerationPrompt[] = [];
  private readonly responses: Array<string | GenerationError>;

  constructor(responses: Array<string | GenerationError>) {
    this.responses = [...responses];
  }

  async generate(prompt: GenerationPrompt): Promise<Result<GenerationResponse, GenerationError>> {
    this.prompts.push(prompt);
    const next = this.responses.length > 1 ? this.responses.shift() : this.responses[0];

    if (next === undefined) {
      return err(new GenerationError('No scripted response', 'bad_response'));
    }
    if (next instanceof GenerationError) {
      return err(next);
    }
    return ok({ content: next, model: this.model, requestId: `req_${this.prompts.length}` });
  }
}

/**
 * Never answers until the call is aborted
 */
export class HangingBackend implements GenerationBackend {
  readonly model = 'test-model';

  generate(_prompt: GenerationPrompt, signal?: AbortSignal): Promise<Result<GenerationResponse, GenerationError>> {
    return new Promise((resolve) => {
      signal?.addEventListener('abort', () => {
        resolve(err(new GenerationError('Request aborted', 'aborted')));
      });
    });
  }
}

export const SAMPLE_RESPONSE = JSON.stringify({
  company_ticker: 'EXMP',
  fiscal_year: 2023,
  cik: '123456',
  total_revenue: 4210,
  net_income: 512,
  north_america_revenue: 2530,
  depreciation_amortization: 305,
  lease_liabilities: 300,
});

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
