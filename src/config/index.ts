/**
 * Configuration module for blueprint.toml parsing and validation.
 *
 * Provides typed configuration parsing with sensible defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, mergeRawConfig, parseConfig } from './parser.js';
export type { RawConfig } from './parser.js';
export { REASONING_EFFORTS } from './types.js';
export type {
  AccessConfig,
  Config,
  ExportConfig,
  LoggingConfig,
  ModelConfig,
  ReasoningEffort,
  RuntimeSettings,
  TelemetryConfig,
} from './types.js';
export {
  DEFAULT_ACCESS,
  DEFAULT_CONFIG,
  DEFAULT_EXPORT,
  DEFAULT_LOGGING,
  DEFAULT_MODEL,
  DEFAULT_TELEMETRY,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  readApiKey,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { CONFIG_FILE_NAME, loadSettings } from './loader.js';
export type { LoadSettingsOptions } from './loader.js';
