/**
 * Pipeline Error Taxonomy
 *
 * Every failure the pipeline records carries a `kind` so that it can be
 * serialized into a result artifact and counted in metrics.
 */

export type PipelineErrorKind =
  | 'IngestionError'
  | 'RetrievalError'
  | 'GenerationError'
  | 'ValidationError'
  | 'EvaluationError'
  | 'ConfigurationError'
  | 'RunError'
  | 'InternalError';

/**
 * Serializable error tag attached to records and evaluations
 */
export interface ErrorTag {
  kind: PipelineErrorKind;
  message: string;
  reason?: string;
}

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  toTag(): ErrorTag {
    return { kind: this.kind, message: this.message };
  }
}

/** Empty or unreadable document text */
export class IngestionError extends PipelineError {
  readonly kind = 'IngestionError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'IngestionError';
    Object.setPrototypeOf(this, IngestionError.prototype);
  }
}

/** Empty corpus at index build time or an unusable query */
export class RetrievalError extends PipelineError {
  readonly kind = 'RetrievalError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'RetrievalError';
    Object.setPrototypeOf(this, RetrievalError.prototype);
  }
}

export type GenerationFailureReason =
  | 'timeout'
  | 'rate_limit'
  | 'unreachable'
  | 'bad_response'
  | 'aborted';

export type TransientFailureReason = Extract<GenerationFailureReason, 'timeout' | 'rate_limit' | 'unreachable'>;

/** Whether another attempt may succeed after a failure with this reason */
export function isTransientReason(reason: string | undefined): reason is TransientFailureReason {
  return reason === 'timeout' || reason === 'rate_limit' || reason === 'unreachable';
}

/** Backend unreachable, timed out, or returned no usable content */
export class GenerationError extends PipelineError {
  readonly kind = 'GenerationError' as const;
  readonly reason: GenerationFailureReason;
  readonly attempts: number;

  constructor(message: string, reason: GenerationFailureReason, attempts = 1) {
    super(message);
    this.name = 'GenerationError';
    this.reason = reason;
    this.attempts = attempts;
    Object.setPrototypeOf(this, GenerationError.prototype);
  }

  /** Whether another attempt may succeed */
  get transient(): boolean {
    return isTransientReason(this.reason);
  }

  toTag(): ErrorTag {
    return { kind: this.kind, message: this.message, reason: this.reason };
  }
}

/** Model output that does not satisfy the record schema */
export class ValidationError extends PipelineError {
  readonly kind = 'ValidationError' as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** Missing reference key or incomparable field */
export class EvaluationError extends PipelineError {
  readonly kind = 'EvaluationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
    Object.setPrototypeOf(this, EvaluationError.prototype);
  }
}

/** Invalid process configuration, raised at startup */
export class ConfigurationError extends PipelineError {
  readonly kind = 'ConfigurationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export type RunFailureReason = 'no_documents' | 'backend_unreachable';

/** Run-level fatal condition reported to the caller */
export class RunError extends PipelineError {
  readonly kind = 'RunError' as const;
  readonly reason: RunFailureReason;

  constructor(message: string, reason: RunFailureReason) {
    super(message);
    this.name = 'RunError';
    this.reason = reason;
    Object.setPrototypeOf(this, RunError.prototype);
  }

  toTag(): ErrorTag {
    return { kind: this.kind, message: this.message, reason: this.reason };
  }
}

// ============================================================================
// Result type for backend calls
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Convert anything thrown into an error tag.
 * Errors outside the taxonomy are tagged InternalError.
 */
export function toErrorTag(error: unknown): ErrorTag {
  if (error instanceof PipelineError) {
    return error.toTag();
  }
  return {
    kind: 'InternalError',
    message: error instanceof Error ? error.message : String(error),
  };
}
