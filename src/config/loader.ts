/**
 * Resolves runtime settings: defaults, then blueprint.toml, then environment.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import { applyEnvOverrides, readApiKey, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config, RuntimeSettings } from './types.js';
import { assertConfigValid } from './validator.js';

/** Config file looked up in the working directory. */
export const CONFIG_FILE_NAME = 'blueprint.toml';

/**
 * Options for {@link loadSettings}.
 */
export interface LoadSettingsOptions {
  /** Path of the TOML file. Defaults to blueprint.toml. */
  readonly path?: string;
  /** Environment to read overrides and the API key from. */
  readonly env?: EnvRecord;
  /** File reader, replaceable in tests. */
  readonly readText?: (path: string) => Promise<string>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function loadFileConfig(
  path: string,
  readText: (path: string) => Promise<string>
): Promise<Config> {
  let content: string;
  try {
    content = await readText(path);
  } catch (error) {
    if (isMissingFile(error)) {
      return getDefaultConfig();
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Cannot read config file '${path}': ${cause.message}`, cause);
  }
  return parseConfig(content);
}

/**
 * Loads and validates settings.
 *
 * A missing config file is not an error; defaults apply.
 *
 * @throws ConfigParseError for unreadable files, bad TOML or mistyped fields.
 * @throws EnvCoercionError for environment values that cannot be coerced.
 * @throws ConfigValidationError when the merged configuration is invalid.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<RuntimeSettings> {
  const env = options.env ?? process.env;
  const readText = options.readText ?? ((path: string) => readFile(path, 'utf8'));

  const fileConfig = await loadFileConfig(options.path ?? CONFIG_FILE_NAME, readText);
  const config = applyEnvOverrides(fileConfig, env);
  assertConfigValid(config);

  return { config, apiKey: readApiKey(env) };
}
