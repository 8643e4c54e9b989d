/**
 * Default configuration values for blueprint.toml.
 *
 * @packageDocumentation
 */

import type {
  AccessConfig,
  Config,
  ExportConfig,
  LoggingConfig,
  ModelConfig,
  TelemetryConfig,
} from './types.js';

/**
 * Default provider settings.
 */
export const DEFAULT_MODEL: ModelConfig = {
  name: 'gpt-4o-mini',
  reasoning_effort: '',
  base_url: 'https://api.openai.com/v1',
  timeout_ms: 60000,
};

/**
 * Default telemetry configuration (disabled).
 */
export const DEFAULT_TELEMETRY: TelemetryConfig = {
  webhook_url: '',
  timeout_ms: 3000,
};

/**
 * Default access configuration (no gate).
 */
export const DEFAULT_ACCESS: AccessConfig = {
  code: '',
};

export const DEFAULT_EXPORT: ExportConfig = {
  path: 'blueprint.md',
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  model: DEFAULT_MODEL,
  telemetry: DEFAULT_TELEMETRY,
  access: DEFAULT_ACCESS,
  export: DEFAULT_EXPORT,
  logging: DEFAULT_LOGGING,
};
