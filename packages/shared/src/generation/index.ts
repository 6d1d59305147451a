export {
  OpenAiGenerationBackend,
  type GenerationBackend,
  type GenerationPrompt,
  type GenerationResponse,
} from './backend';
export { generateRecord, type GenerationOutcome, type GenerationRequest } from './generator';
export { parseStructuredRecord, extractJsonText } from './parse';
export { FINANCIAL_METRICS_SCHEMA, type ResponseSchema } from './response-schema';
