/**
 * Model gateway types.
 *
 * The gateway is the only component that talks to the language-model
 * provider. Every call resolves to a {@link GatewayResult}; failures are
 * {@link ProviderError} values, never thrown exceptions.
 *
 * @packageDocumentation
 */

import type { ConversationState } from '../conversation/types.js';

/**
 * Token usage reported by the provider.
 */
export interface ModelUsage {
  /** Number of tokens in the prompt. */
  inputTokens: number;
  /** Number of tokens in the completion. */
  outputTokens: number;
  /** Total tokens used. */
  totalTokens: number;
}

/**
 * What the caller carries between turns.
 */
export interface ConversationContext {
  /**
   * Identifier of the previous provider response. When present the request
   * continues that thread instead of re-seeding the system prompt.
   */
  readonly continuationId: string | undefined;
}

/**
 * Parsed reply to a conversation turn.
 */
export interface TurnReply {
  /** Message shown to the user. */
  readonly assistantText: string;
  /** State the model reports after this turn. */
  readonly newState: ConversationState;
  /** Blueprint Markdown, present only when the model emitted one. */
  readonly blueprintMarkdown?: string;
  /** Identifier to continue the thread with on the next turn. */
  readonly continuationId: string;
  /** Token usage, when the provider reported it. */
  readonly usage?: ModelUsage;
}

/**
 * Parsed reply to a critique request.
 */
export interface CritiqueReply {
  /** Concrete issues in the order the model listed them. */
  readonly issues: readonly string[];
}

/**
 * Discriminant of provider failures.
 */
export type ProviderErrorKind =
  | 'NetworkError'
  | 'AuthenticationError'
  | 'TimeoutError'
  | 'RateLimitError'
  | 'ModelError'
  | 'MalformedResponse';

/**
 * Fields shared by every provider failure.
 */
export interface ProviderErrorBase {
  /** Discriminant for error type. */
  readonly kind: ProviderErrorKind;
  /** Human-readable error message. */
  readonly message: string;
  /** Whether sending the same turn again may succeed. */
  readonly retryable: boolean;
  /** Optional underlying error. */
  readonly cause?: Error;
}

/**
 * The provider could not be reached.
 */
export interface NetworkError extends ProviderErrorBase {
  readonly kind: 'NetworkError';
  /** The endpoint that failed. */
  readonly endpoint?: string;
  readonly retryable: true;
}

/**
 * The provider rejected the credentials (or none were configured).
 */
export interface AuthenticationError extends ProviderErrorBase {
  readonly kind: 'AuthenticationError';
  /** HTTP status, when the provider answered. */
  readonly status?: number;
  readonly retryable: false;
}

/**
 * The request exceeded its time budget.
 */
export interface TimeoutError extends ProviderErrorBase {
  readonly kind: 'TimeoutError';
  /** The timeout duration in milliseconds. */
  readonly timeoutMs: number;
  readonly retryable: true;
}

/**
 * The provider throttled the request.
 */
export interface RateLimitError extends ProviderErrorBase {
  readonly kind: 'RateLimitError';
  /** Milliseconds to wait before retrying, from Retry-After. */
  readonly retryAfterMs?: number;
  readonly retryable: true;
}

/**
 * The provider answered with an error of its own.
 */
export interface ModelError extends ProviderErrorBase {
  readonly kind: 'ModelError';
  /** HTTP status, when there was one. */
  readonly status?: number;
  /** Error code from the provider body. */
  readonly errorCode?: string;
}

/**
 * The provider answered, but not with a payload matching the reply schema.
 */
export interface MalformedResponse extends ProviderErrorBase {
  readonly kind: 'MalformedResponse';
  /** Schema paths that failed validation. */
  readonly invalidFields?: readonly string[];
  readonly retryable: true;
}

/**
 * Union type of all provider failures.
 */
export type ProviderError =
  | NetworkError
  | AuthenticationError
  | TimeoutError
  | RateLimitError
  | ModelError
  | MalformedResponse;

/**
 * Result type for gateway operations.
 */
export type GatewayResult<T> =
  | { readonly success: true; readonly response: T }
  | { readonly success: false; readonly error: ProviderError };

/**
 * Boundary wrapping the language-model provider.
 */
export interface ModelGateway {
  /**
   * Sends one user turn and returns the structured reply.
   *
   * @param context - Continuation identifier from the previous turn, if any.
   * @param userText - The user's message.
   */
  continueConversation(
    context: ConversationContext,
    userText: string
  ): Promise<GatewayResult<TurnReply>>;

  /**
   * Asks the model to list concrete contradictions in a document.
   *
   * @param documentText - Full blueprint Markdown.
   */
  critique(documentText: string): Promise<GatewayResult<CritiqueReply>>;
}

export function createNetworkError(
  message: string,
  options: { endpoint?: string; cause?: Error } = {}
): NetworkError {
  const { endpoint, cause } = options;
  return {
    kind: 'NetworkError',
    message,
    retryable: true,
    ...(endpoint !== undefined ? { endpoint } : {}),
    ...(cause !== undefined ? { cause } : {}),
  };
}

export function createAuthenticationError(
  message: string,
  options: { status?: number; cause?: Error } = {}
): AuthenticationError {
  const { status, cause } = options;
  return {
    kind: 'AuthenticationError',
    message,
    retryable: false,
    ...(status !== undefined ? { status } : {}),
    ...(cause !== undefined ? { cause } : {}),
  };
}

export function createTimeoutError(
  message: string,
  timeoutMs: number,
  options: { cause?: Error } = {}
): TimeoutError {
  const { cause } = options;
  return {
    kind: 'TimeoutError',
    message,
    timeoutMs,
    retryable: true,
    ...(cause !== undefined ? { cause } : {}),
  };
}

export function createRateLimitError(
  message: string,
  options: { retryAfterMs?: number; cause?: Error } = {}
): RateLimitError {
  const { retryAfterMs, cause } = options;
  return {
    kind: 'RateLimitError',
    message,
    retryable: true,
    ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
    ...(cause !== undefined ? { cause } : {}),
  };
}

/**
 * Creates a ModelError. Server-side statuses (5xx) are retryable.
 */
export function createModelError(
  message: string,
  options: { status?: number; errorCode?: string; cause?: Error } = {}
): ModelError {
  const { status, errorCode, cause } = options;
  return {
    kind: 'ModelError',
    message,
    retryable: status !== undefined && status >= 500,
    ...(status !== undefined ? { status } : {}),
    ...(errorCode !== undefined ? { errorCode } : {}),
    ...(cause !== undefined ? { cause } : {}),
  };
}

export function createMalformedResponse(
  message: string,
  options: { invalidFields?: readonly string[]; cause?: Error } = {}
): MalformedResponse {
  const { invalidFields, cause } = options;
  return {
    kind: 'MalformedResponse',
    message,
    retryable: true,
    ...(invalidFields !== undefined ? { invalidFields } : {}),
    ...(cause !== undefined ? { cause } : {}),
  };
}

/**
 * Creates a successful result.
 */
export function createSuccessResult<T>(response: T): Extract<GatewayResult<T>, { success: true }> {
  return { success: true, response };
}

/**
 * Creates a failure result.
 */
export function createFailureResult<T>(
  error: ProviderError
): Extract<GatewayResult<T>, { success: false }> {
  return { success: false, error };
}
