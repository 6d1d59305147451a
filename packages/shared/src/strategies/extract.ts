/**
 * Document Extraction
 *
 * segment -> build index -> query -> generate, for one document and one
 * strategy. Stage failures are caught here and become an all-null record
 * with an error tag; nothing escapes to the caller.
 */

import { toErrorTag, type ErrorTag } from '../errors';
import { generateRecord, type GenerationBackend } from '../generation';
import { logger } from '../logger';
import { emptyRecord } from '../normalize';
import { buildIndex, queryIndex, type EmbeddingService } from '../retrieval';
import { segmentDocument } from '../segmentation';
import { buildFieldInstructions } from '../templates';
import type { Document, ExtractionMetadata, ExtractionOutcome } from '../types';
import type { StrategyDefinition } from './definitions';

export interface ExtractionDeps {
  embeddings: EmbeddingService;
  backend: GenerationBackend;
  /** Aborts in-flight backend calls for this document */
  signal?: AbortSignal;
}

export async function extractDocument(
  document: Document,
  strategy: StrategyDefinition,
  deps: ExtractionDeps
): Promise<ExtractionOutcome> {
  const startTime = Date.now();
  const metadata: ExtractionMetadata = {
    strategy: strategy.kind,
    segmentationMode: strategy.segmentation,
    segmentationFallback: false,
    segmentCount: 0,
    retrievedCount: 0,
    generationAttempts: 0,
    durationMs: 0,
  };

  const finish = (outcome: Omit<ExtractionOutcome, 'metadata'>): ExtractionOutcome => {
    metadata.durationMs = Date.now() - startTime;
    return { ...outcome, metadata };
  };

  try {
    const { corpus, fallback } = segmentDocument(document, strategy.segmentation, {
      window: strategy.window,
    });
    metadata.segmentCount = corpus.length;
    metadata.segmentationFallback = fallback;

    const index = await buildIndex(corpus, deps.embeddings, deps.signal);
    const retrieved = await queryIndex(index, buildFieldInstructions(), strategy.topK, deps.signal);
    metadata.retrievedCount = retrieved.length;

    const generation = await generateRecord(
      retrieved,
      { documentId: document.id, fiscalYear: document.fiscalYear, template: strategy.template },
      deps.backend,
      deps.signal
    );
    metadata.generationAttempts = generation.attempts;
    metadata.model = generation.model ?? deps.backend.model;
    metadata.requestId = generation.requestId;

    if (generation.error) {
      logger.warn('Extraction recorded an error', {
        document_id: document.id,
        strategy: strategy.kind,
        error_kind: generation.error.kind,
        error_message: generation.error.message,
      });
    }

    return finish({ documentId: document.id, record: generation.record, error: generation.error });
  } catch (error) {
    const tag: ErrorTag = toErrorTag(error);
    logger.error('Extraction failed', error, {
      document_id: document.id,
      strategy: strategy.kind,
      error_kind: tag.kind,
    });
    return finish({ documentId: document.id, record: emptyRecord(document.id), error: tag });
  }
}
