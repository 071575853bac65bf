/**
 * Configuration Validator
 *
 * Validates configuration data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import type { LlvmSwitchConfig } from './types.js';
import configSchema from './schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with config or failure with errors
 */
export type ValidationResult =
  | { valid: true; config: LlvmSwitchConfig }
  | { valid: false; errors: ValidationError[] };

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
});
addFormats.default(ajv);

// Compile the schema once
const validate = ajv.compile<LlvmSwitchConfig>(configSchema);

/**
 * Validate configuration data against the JSON Schema.
 *
 * @param data - Parsed YAML data to validate
 * @returns Validation result with either the typed config or detailed errors
 */
export function validateConfig(data: unknown): ValidationResult {
  if (validate(data)) {
    return { valid: true, config: data };
  }

  const errors: ValidationError[] = (validate.errors ?? []).map(
    (error: ErrorObject) => ({
      path: error.instancePath || '/',
      message: error.message ?? 'Unknown validation error',
      params: { ...error.params },
    })
  );

  return { valid: false, errors };
}
