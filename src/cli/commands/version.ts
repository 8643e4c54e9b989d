/**
 * Version command handler for the blueprint CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { readFileSync } from 'node:fs';
import type { CliCommandResult } from '../types.js';

const PACKAGE_JSON_URL = new URL('../../../package.json', import.meta.url);

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(readText: (url: URL) => string = readPackageJson): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readText(PACKAGE_JSON_URL));
  } catch {
    return '(unknown)';
  }
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return typeof parsed.version === 'string' ? parsed.version : '(unknown)';
  }
  return '(unknown)';
}

function readPackageJson(url: URL): string {
  return readFileSync(url, 'utf-8');
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(): CliCommandResult {
  const version = getVersionFromPackageJson();
  console.log(`blueprint v${version}`);
  return { exitCode: 0 };
}
