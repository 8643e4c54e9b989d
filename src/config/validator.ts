/**
 * Semantic validation for configuration values.
 *
 * Checks what field types cannot express:
 * - URLs use http or https
 * - Timeouts are positive integers
 * - The model name is not blank
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/** Upper bound for any timeout, one hour. */
const MAX_TIMEOUT_MS = 3600000;

function validateHttpUrl(
  value: string,
  fieldPath: string,
  errors: ValidationError[],
  allowEmpty: boolean
): void {
  if (value === '') {
    if (!allowEmpty) {
      errors.push({ field: fieldPath, value, message: `'${fieldPath}' must not be empty` });
    }
    return;
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    errors.push({ field: fieldPath, value, message: `'${fieldPath}' is not a valid URL` });
    return;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must use http or https, got '${url.protocol}'`,
    });
  }
}

/**
 * Validates that a timeout is a positive integer within a sane ceiling.
 */
function validateTimeout(value: number, fieldPath: string, errors: ValidationError[]): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive integer, got ${String(value)}`,
    });
    return;
  }
  if (value > MAX_TIMEOUT_MS) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' exceeds reasonable maximum of ${String(MAX_TIMEOUT_MS)} (1 hour)`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  if (config.model.name.trim() === '') {
    errors.push({ field: 'model.name', value: config.model.name, message: "'model.name' must not be empty" });
  }
  validateHttpUrl(config.model.base_url, 'model.base_url', errors, false);
  validateTimeout(config.model.timeout_ms, 'model.timeout_ms', errors);

  validateHttpUrl(config.telemetry.webhook_url, 'telemetry.webhook_url', errors, true);
  validateTimeout(config.telemetry.timeout_ms, 'telemetry.timeout_ms', errors);

  if (config.export.path.trim() === '') {
    errors.push({ field: 'export.path', value: config.export.path, message: "'export.path' must not be empty" });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
