/**
 * Schema-Constrained Generator
 *
 * Sends one instruction with the retrieved context to the backend and turns
 * the response into a StructuredRecord. A response that fails validation is
 * retried once with a stricter reformatting instruction; a second failure
 * yields an all-null record tagged with a ValidationError.
 */

import type { ErrorTag } from '../errors';
import { logger } from '../logger';
import { emptyRecord } from '../normalize';
import {
  REFORMAT_INSTRUCTION,
  formatContext,
  renderUserPrompt,
  type ExtractionTemplate,
} from '../templates';
import type { RetrievedSegment, StructuredRecord } from '../types';
import type { GenerationBackend } from './backend';
import { parseStructuredRecord } from './parse';
import { FINANCIAL_METRICS_SCHEMA, type ResponseSchema } from './response-schema';

export interface GenerationRequest {
  documentId: string;
  fiscalYear?: number;
  template: ExtractionTemplate;
}

export interface GenerationOutcome {
  record: StructuredRecord;
  error?: ErrorTag;
  /** Generation rounds used (1, or 2 after a reformat retry) */
  attempts: number;
  model?: string;
  requestId?: string;
}

function requiredKeys(schema: ResponseSchema): string {
  const required = schema.schema.required;
  return Array.isArray(required) ? required.join(', ') : '';
}

export async function generateRecord(
  context: readonly RetrievedSegment[],
  request: GenerationRequest,
  backend: GenerationBackend,
  signal?: AbortSignal,
  schema: ResponseSchema = FINANCIAL_METRICS_SCHEMA
): Promise<GenerationOutcome> {
  const { documentId, fiscalYear, template } = request;

  const userPrompt = renderUserPrompt(template, {
    companyTicker: documentId,
    fiscalYear,
    context: formatContext(context),
  });

  logger.info('Generating structured record', {
    document_id: documentId,
    strategy: template.strategy,
    model: backend.model,
    context_segments: context.length,
    prompt_length: userPrompt.length,
  });

  const first = await backend.generate({ system: template.systemPrompt, user: userPrompt, schema }, signal);
  if (!first.ok) {
    return { record: emptyRecord(documentId), error: first.error.toTag(), attempts: 1 };
  }

  const parsed = parseStructuredRecord(first.value.content, documentId);
  if (parsed.ok) {
    return {
      record: parsed.value,
      attempts: 1,
      model: first.value.model,
      requestId: first.value.requestId,
    };
  }

  logger.warn('Response failed validation, retrying with reformat instruction', {
    document_id: documentId,
    issues: parsed.error.issues,
  });

  const retryPrompt = `${userPrompt}\n\n${REFORMAT_INSTRUCTION}\nKeys: ${requiredKeys(schema)}`;
  const second = await backend.generate({ system: template.systemPrompt, user: retryPrompt, schema }, signal);
  if (!second.ok) {
    return { record: emptyRecord(documentId), error: second.error.toTag(), attempts: 2 };
  }

  const reparsed = parseStructuredRecord(second.value.content, documentId);
  if (reparsed.ok) {
    return {
      record: reparsed.value,
      attempts: 2,
      model: second.value.model,
      requestId: second.value.requestId,
    };
  }

  logger.warn('Response failed validation after retry, recording empty record', {
    document_id: documentId,
    issues: reparsed.error.issues,
  });

  return {
    record: emptyRecord(documentId),
    error: {
      kind: reparsed.error.kind,
      message: [reparsed.error.message, ...reparsed.error.issues].join('; '),
    },
    attempts: 2,
    model: second.value.model,
    requestId: second.value.requestId,
  };
}
