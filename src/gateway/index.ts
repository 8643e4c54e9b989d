/**
 * Model gateway: the boundary to the language-model provider.
 *
 * @packageDocumentation
 */

export {
  createAuthenticationError,
  createFailureResult,
  createMalformedResponse,
  createModelError,
  createNetworkError,
  createRateLimitError,
  createSuccessResult,
  createTimeoutError,
} from './types.js';
export type {
  AuthenticationError,
  ConversationContext,
  CritiqueReply,
  GatewayResult,
  MalformedResponse,
  ModelError,
  ModelGateway,
  ModelUsage,
  NetworkError,
  ProviderError,
  ProviderErrorKind,
  RateLimitError,
  TimeoutError,
  TurnReply,
} from './types.js';
export { OpenAIGateway, extractJsonObject, parseResponsesBody } from './openai-gateway.js';
export type { OpenAIGatewayOptions, ResponsesRequestBody } from './openai-gateway.js';
export { compileReplySchemas, loadReplySchemas } from './schema.js';
export type { ReplySchema, ReplySchemas, SchemaCheck, WireCritique, WireTurnResponse } from './schema.js';
export { INTENT_LOCK_QUESTION, createCritiqueInstructions, createSystemInstructions } from './prompts.js';
