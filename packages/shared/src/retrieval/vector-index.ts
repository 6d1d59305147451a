/**
 * Retrieval Index
 *
 * In-memory cosine-similarity index over a corpus. Every segment is embedded
 * exactly once at build time; each query embeds its text once.
 */

import { RetrievalError } from '../errors';
import { logger } from '../logger';
import type { Corpus, RetrievedSegment } from '../types';
import type { EmbeddingService } from './embeddings';

export interface RetrievalIndex {
  readonly corpus: Corpus;
  readonly vectors: readonly (readonly number[])[];
  readonly embeddings: EmbeddingService;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RetrievalError(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Rank corpus segments against a query vector.
 * Highest score first; equal scores keep corpus order. k is clamped to the corpus size.
 */
export function rankSegments(
  corpus: Corpus,
  vectors: readonly (readonly number[])[],
  queryVector: readonly number[],
  k: number
): RetrievedSegment[] {
  if (!Number.isInteger(k) || k < 1) {
    throw new RetrievalError(`k must be a positive integer, got ${k}`);
  }

  const scored = corpus.map((segment, position) => ({
    segment,
    position,
    score: cosineSimilarity(vectors[position], queryVector),
  }));

  scored.sort((a, b) => b.score - a.score || a.position - b.position);

  return scored.slice(0, Math.min(k, corpus.length)).map(({ segment, score }) => ({ segment, score }));
}

/**
 * Embed every segment of a corpus.
 *
 * @throws RetrievalError for an empty corpus or a malformed embedding response
 * @throws GenerationError when the embedding backend fails
 */
export async function buildIndex(
  corpus: Corpus,
  embeddings: EmbeddingService,
  signal?: AbortSignal
): Promise<RetrievalIndex> {
  if (corpus.length === 0) {
    throw new RetrievalError('Cannot build an index over an empty corpus');
  }

  const result = await embeddings.embed(
    corpus.map((s) => s.text),
    signal
  );
  if (!result.ok) throw result.error;

  const vectors = result.value;
  if (vectors.length !== corpus.length) {
    throw new RetrievalError(`Expected ${corpus.length} vectors, got ${vectors.length}`);
  }

  const dimension = vectors[0].length;
  if (dimension === 0 || vectors.some((v) => v.length !== dimension)) {
    throw new RetrievalError('Embedding vectors have inconsistent dimensions');
  }

  logger.debug('Built retrieval index', {
    segment_count: corpus.length,
    dimension,
    embedding_model: embeddings.model,
  });

  return { corpus, vectors, embeddings };
}

/**
 * Return the k segments most similar to the query text.
 */
export async function queryIndex(
  index: RetrievalIndex,
  text: string,
  k: number,
  signal?: AbortSignal
): Promise<RetrievedSegment[]> {
  if (!Number.isInteger(k) || k < 1) {
    throw new RetrievalError(`k must be a positive integer, got ${k}`);
  }

  const result = await index.embeddings.embed([text], signal);
  if (!result.ok) throw result.error;

  const [queryVector] = result.value;
  if (!queryVector) {
    throw new RetrievalError('Embedding service returned no vector for the query');
  }

  return rankSegments(index.corpus, index.vectors, queryVector, k);
}
