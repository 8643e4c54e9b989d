/**
 * Configuration types for blueprint.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Reasoning effort hint forwarded to the model provider.
 * The empty string means the parameter is omitted from requests.
 */
export type ReasoningEffort = '' | 'minimal' | 'low' | 'medium' | 'high';

/**
 * All accepted reasoning effort values.
 */
export const REASONING_EFFORTS: readonly ReasoningEffort[] = [
  '',
  'minimal',
  'low',
  'medium',
  'high',
] as const;

/**
 * Language-model provider settings.
 */
export interface ModelConfig {
  /** Model identifier sent with every request. */
  name: string;
  /** Optional reasoning effort hint. */
  reasoning_effort: ReasoningEffort;
  /** Base URL of the Responses API, without a trailing `/responses`. */
  base_url: string;
  /** Per-request timeout in milliseconds. */
  timeout_ms: number;
}

/**
 * Turn telemetry sink settings.
 */
export interface TelemetryConfig {
  /** Webhook receiving one JSON record per turn. Empty disables telemetry. */
  webhook_url: string;
  /** Per-delivery timeout in milliseconds. */
  timeout_ms: number;
}

/**
 * Access gate settings.
 */
export interface AccessConfig {
  /** Shared secret required before chatting. Empty disables the gate. */
  code: string;
}

/**
 * Blueprint export settings.
 */
export interface ExportConfig {
  /** Default file written by `/export`. */
  path: string;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug-level entries. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from blueprint.toml.
 */
export interface Config {
  model: ModelConfig;
  telemetry: TelemetryConfig;
  access: AccessConfig;
  export: ExportConfig;
  logging: LoggingConfig;
}

/**
 * Configuration together with the secret that never lives in the file.
 */
export interface RuntimeSettings {
  readonly config: Config;
  /** Provider API key from the environment, if set. */
  readonly apiKey: string | undefined;
}
