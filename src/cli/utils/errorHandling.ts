/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers, reducing code duplication.
 */

import { classifyError, formatErrorWithSuggestions } from '../errors.js';
import type { DisplayOptions } from '../format.js';
import type { CliCommandResult } from '../types.js';

/**
 * Runs a command handler and converts a thrown error into printed
 * suggestions and exit code 1.
 *
 * @param fn - The function to run (sync or async).
 * @param display - Display options for the error text.
 * @param printError - Error sink. Defaults to console.error.
 */
export async function runCommand(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  display: DisplayOptions,
  printError: (text: string) => void = (text) => {
    console.error(text);
  }
): Promise<CliCommandResult> {
  try {
    return await fn();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    printError(formatErrorWithSuggestions(message, { errorType: classifyError(error) }, display));
    return { exitCode: 1 };
  }
}

/**
 * Wraps a command handler with standard error handling and exits the
 * process with the command's exit code.
 *
 * @param fn - The function to wrap (sync or async).
 * @param display - Display options for the error text.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  display: DisplayOptions
): void {
  void runCommand(fn, display).then((result) => {
    process.exit(result.exitCode);
  });
}
