/**
 * Environment variable overrides for configuration.
 *
 * Supports BLUEPRINT_<SECTION>_<FIELD> variables plus a few short aliases
 * shared with other tooling (OPENAI_MODEL, ACCESS_CODE, ...).
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { mergeRawConfig, type RawConfig } from './parser.js';
import type { Config } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvValueType = 'string' | 'number' | 'boolean';

interface EnvMapping {
  readonly section: keyof Config;
  readonly field: string;
  readonly type: EnvValueType;
  readonly description: string;
}

/**
 * Mapping from environment variable names to config paths.
 *
 * Order matters: when an alias and a full name are both set, the entry
 * listed later wins, so full names come last.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  // Aliases
  OPENAI_MODEL: {
    section: 'model',
    field: 'name',
    type: 'string',
    description: 'Model identifier (alias of BLUEPRINT_MODEL_NAME)',
  },
  OPENAI_REASONING_EFFORT: {
    section: 'model',
    field: 'reasoning_effort',
    type: 'string',
    description: 'Reasoning effort (alias of BLUEPRINT_MODEL_REASONING_EFFORT)',
  },
  OPENAI_BASE_URL: {
    section: 'model',
    field: 'base_url',
    type: 'string',
    description: 'Responses API base URL (alias of BLUEPRINT_MODEL_BASE_URL)',
  },
  GSHEET_WEBHOOK_URL: {
    section: 'telemetry',
    field: 'webhook_url',
    type: 'string',
    description: 'Telemetry webhook URL (alias of BLUEPRINT_TELEMETRY_WEBHOOK_URL)',
  },
  ACCESS_CODE: {
    section: 'access',
    field: 'code',
    type: 'string',
    description: 'Shared access code (alias of BLUEPRINT_ACCESS_CODE)',
  },

  // Full paths
  BLUEPRINT_MODEL_NAME: {
    section: 'model',
    field: 'name',
    type: 'string',
    description: 'Model identifier sent with every request',
  },
  BLUEPRINT_MODEL_REASONING_EFFORT: {
    section: 'model',
    field: 'reasoning_effort',
    type: 'string',
    description: 'Reasoning effort: minimal, low, medium, high (empty to omit)',
  },
  BLUEPRINT_MODEL_BASE_URL: {
    section: 'model',
    field: 'base_url',
    type: 'string',
    description: 'Responses API base URL',
  },
  BLUEPRINT_MODEL_TIMEOUT_MS: {
    section: 'model',
    field: 'timeout_ms',
    type: 'number',
    description: 'Model request timeout in milliseconds',
  },
  BLUEPRINT_TELEMETRY_WEBHOOK_URL: {
    section: 'telemetry',
    field: 'webhook_url',
    type: 'string',
    description: 'Webhook receiving per-turn telemetry records',
  },
  BLUEPRINT_TELEMETRY_TIMEOUT_MS: {
    section: 'telemetry',
    field: 'timeout_ms',
    type: 'number',
    description: 'Telemetry delivery timeout in milliseconds',
  },
  BLUEPRINT_ACCESS_CODE: {
    section: 'access',
    field: 'code',
    type: 'string',
    description: 'Shared access code required before chatting',
  },
  BLUEPRINT_EXPORT_PATH: {
    section: 'export',
    field: 'path',
    type: 'string',
    description: 'Default file written by /export',
  },
  BLUEPRINT_LOGGING_DEBUG: {
    section: 'logging',
    field: 'debug',
    type: 'boolean',
    description: 'Enable debug logging (true/false)',
  },
};

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off',
 * case-insensitively.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceValue(value: string, type: EnvValueType, envVar: string): string | number | boolean {
  switch (type) {
    case 'string':
      return value.trim();
    case 'number':
      return coerceToNumber(value, envVar);
    case 'boolean':
      return coerceToBoolean(value, envVar);
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Section tables with values from environment variables. */
  overrides: Record<string, Record<string, string | number | boolean>>;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty variables are treated as unset.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Overrides, the variables applied and any collected errors.
 * @throws EnvCoercionError on the first bad value unless `collectErrors` is set.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ BLUEPRINT_MODEL_TIMEOUT_MS: '5000' });
 * // result.overrides => { model: { timeout_ms: 5000 } }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: Record<string, Record<string, string | number | boolean>> = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      const coerced = coerceValue(value, mapping.type, envVar);
      const section = overrides[mapping.section] ?? {};
      section[mapping.field] = coerced;
      overrides[mapping.section] = section;
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 * @throws ConfigParseError if a coerced value is not acceptable for its field.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  const raw: RawConfig = overrides;
  return mergeRawConfig(config, raw);
}

/**
 * Reads the provider API key. It is never taken from the config file.
 *
 * @returns The trimmed key, or undefined when unset or blank.
 */
export function readApiKey(env: EnvRecord = process.env): string | undefined {
  const key = env.OPENAI_API_KEY?.trim();
  return key !== undefined && key !== '' ? key : undefined;
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {
    OPENAI_API_KEY: { description: 'Provider API key (required for chat)', type: 'string' },
  };
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
