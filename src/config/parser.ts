/**
 * TOML configuration parser for blueprint.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG } from './defaults.js';
import {
  REASONING_EFFORTS,
  type AccessConfig,
  type Config,
  type ExportConfig,
  type LoggingConfig,
  type ModelConfig,
  type ReasoningEffort,
  type TelemetryConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Untyped configuration tables keyed by section, as read from TOML or the
 * environment before field validation.
 */
export type RawConfig = Record<string, unknown>;

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

function isReasoningEffort(value: string): value is ReasoningEffort {
  return REASONING_EFFORTS.some((effort) => effort === value);
}

function validateReasoningEffort(value: unknown, fieldPath: string): ReasoningEffort {
  const effort = validateString(value, fieldPath).trim().toLowerCase();
  if (!isReasoningEffort(effort)) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${REASONING_EFFORTS.map((e) => `'${e}'`).join(', ')}, got '${effort}'`
    );
  }
  return effort;
}

/**
 * Returns the named section table, or undefined when absent.
 *
 * @throws ConfigParseError if the section is present but not a table.
 */
function sectionOf(raw: RawConfig, name: keyof Config): Record<string, unknown> | undefined {
  const value = raw[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(
      `Invalid type for '${name}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

function parseModel(raw: Record<string, unknown> | undefined, base: ModelConfig): ModelConfig {
  const result: ModelConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('name' in raw) {
    result.name = validateString(raw.name, 'model.name');
  }
  if ('reasoning_effort' in raw) {
    result.reasoning_effort = validateReasoningEffort(
      raw.reasoning_effort,
      'model.reasoning_effort'
    );
  }
  if ('base_url' in raw) {
    result.base_url = validateString(raw.base_url, 'model.base_url');
  }
  if ('timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw.timeout_ms, 'model.timeout_ms');
  }

  return result;
}

function parseTelemetry(
  raw: Record<string, unknown> | undefined,
  base: TelemetryConfig
): TelemetryConfig {
  const result: TelemetryConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('webhook_url' in raw) {
    result.webhook_url = validateString(raw.webhook_url, 'telemetry.webhook_url');
  }
  if ('timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw.timeout_ms, 'telemetry.timeout_ms');
  }

  return result;
}

function parseAccess(raw: Record<string, unknown> | undefined, base: AccessConfig): AccessConfig {
  const result: AccessConfig = { ...base };
  if (raw !== undefined && 'code' in raw) {
    result.code = validateString(raw.code, 'access.code');
  }
  return result;
}

function parseExport(raw: Record<string, unknown> | undefined, base: ExportConfig): ExportConfig {
  const result: ExportConfig = { ...base };
  if (raw !== undefined && 'path' in raw) {
    result.path = validateString(raw.path, 'export.path');
  }
  return result;
}

function parseLogging(
  raw: Record<string, unknown> | undefined,
  base: LoggingConfig
): LoggingConfig {
  const result: LoggingConfig = { ...base };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Merges raw section tables over a base configuration, type-checking every
 * field that is present. Unknown sections and fields are ignored.
 *
 * @param base - Configuration to start from.
 * @param raw - Section tables from TOML or environment overrides.
 * @returns A new configuration; `base` is not modified.
 * @throws ConfigParseError for fields of the wrong type.
 */
export function mergeRawConfig(base: Config, raw: RawConfig): Config {
  return {
    model: parseModel(sectionOf(raw, 'model'), base.model),
    telemetry: parseTelemetry(sectionOf(raw, 'telemetry'), base.telemetry),
    access: parseAccess(sectionOf(raw, 'access'), base.access),
    export: parseExport(sectionOf(raw, 'export'), base.export),
    logging: parseLogging(sectionOf(raw, 'logging'), base.logging),
  };
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [model]
 * name = "gpt-4o"
 * reasoning_effort = "low"
 * `);
 * console.log(config.model.name); // "gpt-4o"
 * console.log(config.telemetry.timeout_ms); // 3000
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: RawConfig;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return mergeRawConfig(DEFAULT_CONFIG, parsed);
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return mergeRawConfig(DEFAULT_CONFIG, {});
}
