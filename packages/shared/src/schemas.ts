/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for model output and persisted outcomes.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { ExtractionOutcome } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});
addFormats(ajv);

const compiled = new Map<string, ValidateFunction>();

function loadSchema(schemaName: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (typeof parsed === 'object' && parsed !== null) {
        return parsed;
      }
    }
  }

  // Permissive schema if the contract is not shipped alongside the code
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getValidator(schemaName: string): ValidateFunction {
  let validate = compiled.get(schemaName);
  if (!validate) {
    validate = ajv.compile(loadSchema(schemaName));
    compiled.set(schemaName, validate);
  }
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function runValidation(schemaName: string, data: unknown): ValidationResult {
  const validate = getValidator(schemaName);
  if (validate(data)) {
    return { valid: true };
  }
  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  return { valid: false, errors };
}

/**
 * Validate raw model output against financial_metrics.schema.json
 */
export function validateModelOutput(data: unknown): ValidationResult {
  return runValidation('financial_metrics.schema.json', data);
}

/**
 * Validate a persisted ExtractionOutcome against extraction_outcome.schema.json
 */
export function validateExtractionOutcome(data: unknown): ValidationResult {
  const result = runValidation('extraction_outcome.schema.json', data);
  if (!result.valid) {
    logger.warn('ExtractionOutcome validation failed', { errors: result.errors });
  }
  return result;
}

/**
 * Type guard for outcomes read back from result artifacts
 */
export function isExtractionOutcome(data: unknown): data is ExtractionOutcome {
  return runValidation('extraction_outcome.schema.json', data).valid;
}
