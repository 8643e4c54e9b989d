/**
 * Error suggestion system for the chat CLI.
 *
 * Provides contextual suggestions based on error kinds to help users
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError } from '../config/parser.js';
import { EnvCoercionError } from '../config/env.js';
import { ConfigValidationError } from '../config/validator.js';
import type { ProviderError } from '../gateway/types.js';
import { SessionError } from '../session/errors.js';
import { paint, type DisplayOptions } from './format.js';

/**
 * Error types the CLI can explain.
 */
export type ErrorType =
  | 'authentication'
  | 'network'
  | 'timeout'
  | 'rate_limit'
  | 'model'
  | 'malformed_response'
  | 'configuration'
  | 'access_denied'
  | 'turn_in_progress'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  readonly text: string;
  /** Command or action to take (optional). */
  readonly action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  readonly errorType: ErrorType;
  /** Retry time in milliseconds (for rate limits). */
  readonly retryAfterMs?: number;
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  authentication: [
    {
      text: 'Check that your API key is set',
      action: 'export OPENAI_API_KEY=<your key>',
    },
    { text: 'Make sure the key has access to the configured model' },
  ],
  network: [
    { text: 'Check network connectivity and try the message again' },
    {
      text: 'Verify the provider URL',
      action: 'BLUEPRINT_MODEL_BASE_URL or [model] base_url in blueprint.toml',
    },
  ],
  timeout: [
    { text: 'Send the message again; nothing was changed' },
    {
      text: 'Allow the model more time',
      action: 'BLUEPRINT_MODEL_TIMEOUT_MS=120000',
    },
  ],
  rate_limit: [
    { text: 'Wait a moment, then send the message again' },
    { text: 'Check the usage limits on your provider account' },
  ],
  model: [
    { text: 'Send the message again; the provider may recover' },
    {
      text: 'Check the configured model name',
      action: 'BLUEPRINT_MODEL_NAME or [model] name in blueprint.toml',
    },
  ],
  malformed_response: [
    { text: 'Send the message again; the reply did not match the expected format' },
    {
      text: 'Run with debug logging to see the failing fields',
      action: 'BLUEPRINT_LOGGING_DEBUG=true',
    },
  ],
  configuration: [
    { text: 'Fix the value named in the message' },
    {
      text: 'List the supported settings',
      action: 'blueprint help',
    },
  ],
  access_denied: [{ text: 'Ask the organiser for the current access code' }],
  turn_in_progress: [{ text: 'Wait for the current reply before sending another message' }],
  unknown: [
    {
      text: 'Run with debug logging for more detail',
      action: 'BLUEPRINT_LOGGING_DEBUG=true blueprint chat',
    },
  ],
};

/**
 * Maps a provider error to the CLI error type.
 */
export function errorTypeForProviderError(error: ProviderError): ErrorType {
  switch (error.kind) {
    case 'AuthenticationError':
      return 'authentication';
    case 'NetworkError':
      return 'network';
    case 'TimeoutError':
      return 'timeout';
    case 'RateLimitError':
      return 'rate_limit';
    case 'ModelError':
      return 'model';
    case 'MalformedResponse':
      return 'malformed_response';
    default: {
      const exhaustiveCheck: never = error;
      return exhaustiveCheck;
    }
  }
}

/**
 * Classifies a thrown error.
 */
export function classifyError(error: unknown): ErrorType {
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'configuration';
  }
  if (error instanceof SessionError) {
    switch (error.code) {
      case 'ACCESS_DENIED':
        return 'access_denied';
      case 'TURN_IN_PROGRESS':
        return 'turn_in_progress';
      case 'EMPTY_MESSAGE':
        return 'unknown';
    }
  }
  return 'unknown';
}

/**
 * Gets suggestions for a given error type.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const prefix = paint(`${String(index)}.`, 'YELLOW', options);
  const actionText =
    suggestion.action !== undefined ? `\n    ${paint(suggestion.action, 'DIM', options)}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @example
 * ```typescript
 * formatErrorWithSuggestions('Request timeout after 60000ms', { errorType: 'timeout' }, { colors: false });
 * // Error: Request timeout after 60000ms
 * //
 * // Suggestions:
 * //   1. Send the message again; nothing was changed
 * //   ...
 * ```
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: ErrorContext,
  options: DisplayOptions
): string {
  let result = `${paint('Error:', 'RED', options)} ${errorMessage}`;

  if (context.retryAfterMs !== undefined) {
    const waitSeconds = Math.ceil(context.retryAfterMs / 1000);
    result += `\n  ${paint('Wait:', 'YELLOW', options)} ${String(waitSeconds)}s before retrying`;
  }

  result += `\n\n${paint('Suggestions:', 'BOLD', options)}`;
  getSuggestions(context.errorType).forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Formats a provider failure for the chat.
 */
export function formatProviderError(error: ProviderError, options: DisplayOptions): string {
  const errorType = errorTypeForProviderError(error);
  const context: ErrorContext =
    error.kind === 'RateLimitError' && error.retryAfterMs !== undefined
      ? { errorType, retryAfterMs: error.retryAfterMs }
      : { errorType };
  return formatErrorWithSuggestions(error.message, context, options);
}
