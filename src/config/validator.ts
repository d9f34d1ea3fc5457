/**
 * Configuration Validator
 *
 * Validates configuration data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';

import configSchema from './schema.json' with { type: 'json' };
import type { BenchquietConfig } from './types.js';

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
  | { valid: true; config: BenchquietConfig }
  | { valid: false; errors: ValidationError[] };

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
});

const validate = ajv.compile<BenchquietConfig>(configSchema);

/**
 * Validate configuration data against the JSON Schema.
 *
 * On top of the schema, a configured slow-teardown service must be one of
 * the catalog services, or its wait could never trigger.
 *
 * @param data - Parsed YAML data to validate
 * @returns The typed config, or every schema error found
 */
export function validateConfig(data: unknown): ValidationResult {
  if (!validate(data)) {
    const errors: ValidationError[] = (validate.errors ?? []).map(
      (error: ErrorObject) => ({
        path: error.instancePath || '/',
        message: error.message ?? 'Unknown validation error',
        params: error.params,
      })
    );
    return { valid: false, errors };
  }

  const slow = data.slow_teardown?.service;
  if (slow !== undefined && !data.services.includes(slow)) {
    return {
      valid: false,
      errors: [
        {
          path: '/slow_teardown/service',
          message: `must name a service listed under services (got '${slow}')`,
          params: { service: slow },
        },
      ],
    };
  }

  return { valid: true, config: data };
}

/**
 * Format validation errors into human-readable messages.
 *
 * @returns One `  - path: message` line per error
 */
export function formatValidationErrors(
  errors: ReadonlyArray<Pick<ValidationError, 'path' | 'message'> & Partial<Pick<ValidationError, 'params'>>>
): string {
  return errors.map((error) => `  - ${error.path || '/'}: ${error.message}`).join('\n');
}
