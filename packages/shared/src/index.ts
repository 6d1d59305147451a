/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  runInChildContext,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { loadConfig, type Config, type Env, type GenerationBackendKind } from './config';

// Errors
export {
  PipelineError,
  IngestionError,
  RetrievalError,
  GenerationError,
  ValidationError,
  EvaluationError,
  ConfigurationError,
  RunError,
  ok,
  err,
  toErrorTag,
  isTransientReason,
  type ErrorTag,
  type PipelineErrorKind,
  type GenerationFailureReason,
  type TransientFailureReason,
  type RunFailureReason,
  type Result,
} from './errors';

// Types
export * from './types';

// Fields & normalization
export {
  FIELD_DEFINITIONS,
  RECORD_FIELDS,
  IDENTIFIER_WIDTH,
  type FieldDefinition,
} from './fields';
export { padIdentifier, coerceMillions, coerceFiscalYear, emptyRecord } from './normalize';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractDocumentJob,
  getRedisConnection,
  createQueue,
  createWorker,
} from './queues';

// Metrics
export {
  register,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  embeddingRequestsCounter,
  documentTasksCounter,
  extractionDurationHistogram,
  jobsProcessedCounter,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateModelOutput,
  validateExtractionOutcome,
  isExtractionOutcome,
  type ValidationResult,
} from './schemas';

// Backend client
export {
  createLlmClient,
  toGenerationError,
  callWithRetry,
  type RetryOptions,
  type RequestOptions,
  type ChatCompletionsClient,
  type ChatCompletionResult,
  type EmbeddingsClient,
  type EmbeddingResult,
} from './llm-client';

// Templates
export {
  BASELINE_TEMPLATE,
  REFINED_TEMPLATE,
  REFORMAT_INSTRUCTION,
  buildFieldInstructions,
  formatContext,
  renderUserPrompt,
  type ExtractionTemplate,
  type PromptValues,
} from './templates';

// Segmentation
export {
  segment,
  segmentDocument,
  windowText,
  reassembleSegments,
  validateWindowOptions,
  detectSections,
  classifyHeading,
  DEFAULT_SECTION_ALLOW_LIST,
  FLAT_WINDOW,
  STRUCTURED_WINDOW,
  type Section,
  type SegmentationOptions,
  type SegmentationResult,
  type WindowOptions,
} from './segmentation';

// Retrieval
export {
  OpenAiEmbeddingService,
  buildIndex,
  queryIndex,
  rankSegments,
  cosineSimilarity,
  type EmbeddingService,
  type RetrievalIndex,
} from './retrieval';

// Generation
export {
  OpenAiGenerationBackend,
  generateRecord,
  parseStructuredRecord,
  extractJsonText,
  FINANCIAL_METRICS_SCHEMA,
  type GenerationBackend,
  type GenerationPrompt,
  type GenerationResponse,
  type GenerationOutcome,
  type GenerationRequest,
  type ResponseSchema,
} from './generation';

// Strategies
export {
  BASELINE_STRATEGY,
  REFINED_STRATEGY,
  STRATEGY_KINDS,
  getStrategy,
  isStrategyKind,
  parseStrategyMode,
  extractDocument,
  type StrategyDefinition,
  type ExtractionDeps,
} from './strategies';

// Evaluation
export * from './evaluation';

// Pipeline
export * from './pipeline';
