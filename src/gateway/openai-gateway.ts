/**
 * Model gateway backed by the OpenAI Responses API.
 *
 * Each call is a single POST to `{baseUrl}/responses` with a strict JSON
 * schema as the output format. There are no retries; a failed turn is
 * reported and the user decides whether to send it again.
 *
 * @packageDocumentation
 */

import type { SchemaObject } from 'ajv';
import type { ReasoningEffort } from '../config/types.js';
import type { ConversationState } from '../conversation/types.js';
import { Logger } from '../utils/logger.js';
import { createCritiqueInstructions, createSystemInstructions } from './prompts.js';
import type { ReplySchema, ReplySchemas, WireTurnResponse } from './schema.js';
import {
  createAuthenticationError,
  createFailureResult,
  createMalformedResponse,
  createModelError,
  createNetworkError,
  createRateLimitError,
  createSuccessResult,
  createTimeoutError,
  type ConversationContext,
  type CritiqueReply,
  type GatewayResult,
  type ModelGateway,
  type ModelUsage,
  type ProviderError,
  type TurnReply,
} from './types.js';

/**
 * Options for {@link OpenAIGateway}.
 */
export interface OpenAIGatewayOptions {
  /** Bearer token. When absent every call fails with AuthenticationError. */
  readonly apiKey: string | undefined;
  /** Model identifier. */
  readonly model: string;
  /** Reasoning effort; the empty string omits the parameter. */
  readonly reasoningEffort: ReasoningEffort;
  /** API base URL, e.g. `https://api.openai.com/v1`. */
  readonly baseUrl: string;
  /** Per-request timeout in milliseconds. */
  readonly timeoutMs: number;
  /** Compiled reply schemas. */
  readonly schemas: ReplySchemas;
  readonly logger?: Logger;
  /** Fetch implementation; defaults to the global one. */
  readonly fetch?: typeof fetch;
}

interface InputMessage {
  readonly role: 'system' | 'user';
  readonly content: string;
}

/**
 * Request body for `POST /responses`.
 */
export interface ResponsesRequestBody {
  model: string;
  input: InputMessage[];
  instructions?: string;
  previous_response_id?: string;
  reasoning?: { effort: Exclude<ReasoningEffort, ''> };
  text: {
    format: { type: 'json_schema'; name: string; schema: SchemaObject; strict: true };
  };
}

/**
 * The parts of a Responses API reply the gateway uses.
 */
interface ParsedResponse {
  readonly id: string;
  readonly outputText: string;
  readonly refusal: string | undefined;
  readonly usage: ModelUsage | undefined;
}

type Operation = 'continueConversation' | 'critique';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Extracts the JSON object from model text, which may be wrapped in a
 * Markdown code fence.
 */
export function extractJsonObject(text: string): string | undefined {
  const match = /\{[\s\S]*\}/.exec(text);
  return match?.[0];
}

function parseUsage(raw: unknown): ModelUsage | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const { input_tokens: inputTokens, output_tokens: outputTokens, total_tokens: totalTokens } = raw;
  if (
    typeof inputTokens !== 'number' ||
    typeof outputTokens !== 'number' ||
    typeof totalTokens !== 'number'
  ) {
    return undefined;
  }
  return { inputTokens, outputTokens, totalTokens };
}

/**
 * Pulls the response id, concatenated output text and any refusal out of a
 * decoded Responses API body.
 *
 * @returns The parsed parts, or undefined when the body has no id.
 */
export function parseResponsesBody(body: unknown): ParsedResponse | undefined {
  if (!isRecord(body) || typeof body.id !== 'string' || body.id === '') {
    return undefined;
  }

  let outputText = '';
  let refusal: string | undefined;
  const output = Array.isArray(body.output) ? body.output : [];

  for (const item of output) {
    if (!isRecord(item) || item.type !== 'message' || !Array.isArray(item.content)) {
      continue;
    }
    for (const part of item.content) {
      if (!isRecord(part)) {
        continue;
      }
      if (part.type === 'output_text' && typeof part.text === 'string') {
        outputText += part.text;
      } else if (part.type === 'refusal' && typeof part.refusal === 'string') {
        refusal = part.refusal;
      }
    }
  }

  return { id: body.id, outputText, refusal, usage: parseUsage(body.usage) };
}

function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.round(seconds * 1000) : undefined;
}

function describeApiError(body: unknown): { message: string | undefined; code: string | undefined } {
  if (!isRecord(body) || !isRecord(body.error)) {
    return { message: undefined, code: undefined };
  }
  const { message, code } = body.error;
  return {
    message: typeof message === 'string' ? message : undefined,
    code: typeof code === 'string' ? code : undefined,
  };
}

function errorForStatus(status: number, body: unknown, retryAfter: string | null): ProviderError {
  const { message, code } = describeApiError(body);
  const detail = message ?? `HTTP ${String(status)}`;

  if (status === 401 || status === 403) {
    return createAuthenticationError(`Provider rejected the API key: ${detail}`, { status });
  }
  if (status === 429) {
    const retryAfterMs = parseRetryAfter(retryAfter);
    return createRateLimitError(
      `Provider rate limit reached: ${detail}`,
      retryAfterMs !== undefined ? { retryAfterMs } : {}
    );
  }
  return createModelError(
    `Provider error (${String(status)}): ${detail}`,
    code !== undefined ? { status, errorCode: code } : { status }
  );
}

function toConversationState(wire: WireTurnResponse['state']): ConversationState {
  return {
    mode: wire.mode,
    convergenceReady: wire.convergence_ready,
    confidence: Object.fromEntries(wire.confidence.map((entry) => [entry.topic, entry.score])),
    directionThesis: wire.direction_thesis,
    nextUserPrompt: wire.next_user_prompt,
  };
}

/**
 * {@link ModelGateway} implementation for the OpenAI Responses API.
 *
 * @example
 * ```typescript
 * const gateway = new OpenAIGateway({
 *   apiKey: process.env.OPENAI_API_KEY,
 *   model: 'gpt-4o-mini',
 *   reasoningEffort: '',
 *   baseUrl: 'https://api.openai.com/v1',
 *   timeoutMs: 60000,
 *   schemas: await loadReplySchemas(),
 * });
 * const result = await gateway.continueConversation({ continuationId: undefined }, 'Hi');
 * ```
 */
export class OpenAIGateway implements ModelGateway {
  private readonly options: OpenAIGatewayOptions;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly systemInstructions = createSystemInstructions();
  private readonly critiqueInstructions = createCritiqueInstructions();

  constructor(options: OpenAIGatewayOptions) {
    this.options = options;
    this.logger = options.logger ?? new Logger({ component: 'ModelGateway' });
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  /**
   * Builds the request body for a conversation turn. A continuation id
   * always wins over re-seeding the system prompt.
   */
  buildTurnRequest(context: ConversationContext, userText: string): ResponsesRequestBody {
    const base = this.baseRequest(this.options.schemas.turn);
    if (context.continuationId !== undefined) {
      return {
        ...base,
        previous_response_id: context.continuationId,
        instructions: this.systemInstructions,
        input: [{ role: 'user', content: userText }],
      };
    }
    return {
      ...base,
      input: [
        { role: 'system', content: this.systemInstructions },
        { role: 'user', content: userText },
      ],
    };
  }

  /**
   * Builds the request body for a critique call.
   */
  buildCritiqueRequest(documentText: string): ResponsesRequestBody {
    return {
      ...this.baseRequest(this.options.schemas.critique),
      input: [
        { role: 'system', content: this.critiqueInstructions },
        { role: 'user', content: documentText },
      ],
    };
  }

  async continueConversation(
    context: ConversationContext,
    userText: string
  ): Promise<GatewayResult<TurnReply>> {
    const result = await this.send(
      'continueConversation',
      this.buildTurnRequest(context, userText),
      this.options.schemas.turn
    );
    if (!result.success) {
      return result;
    }

    const { value, parsed } = result.response;
    const blueprint = value.blueprint_md?.trim() ?? '';
    const reply: TurnReply = {
      assistantText: value.assistant_message,
      newState: toConversationState(value.state),
      continuationId: parsed.id,
      ...(blueprint !== '' ? { blueprintMarkdown: value.blueprint_md ?? '' } : {}),
      ...(parsed.usage !== undefined ? { usage: parsed.usage } : {}),
    };
    return createSuccessResult(reply);
  }

  async critique(documentText: string): Promise<GatewayResult<CritiqueReply>> {
    const result = await this.send(
      'critique',
      this.buildCritiqueRequest(documentText),
      this.options.schemas.critique
    );
    if (!result.success) {
      return result;
    }
    return createSuccessResult({ issues: [...result.response.value.issues] });
  }

  private baseRequest<T>(schema: ReplySchema<T>): Omit<ResponsesRequestBody, 'input'> {
    const { model, reasoningEffort } = this.options;
    return {
      model,
      ...(reasoningEffort !== '' ? { reasoning: { effort: reasoningEffort } } : {}),
      text: {
        format: { type: 'json_schema', name: schema.name, schema: schema.schema, strict: true },
      },
    };
  }

  private async send<T>(
    operation: Operation,
    body: ResponsesRequestBody,
    schema: ReplySchema<T>
  ): Promise<GatewayResult<{ value: T; parsed: ParsedResponse }>> {
    const { apiKey, baseUrl, timeoutMs } = this.options;

    if (apiKey === undefined || apiKey === '') {
      return this.fail(operation, createAuthenticationError('OPENAI_API_KEY is not set'));
    }

    const endpoint = `${baseUrl.replace(/\/+$/, '')}/responses`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, timeoutMs);
    const startedAt = Date.now();

    this.logger.debug('request_sent', {
      operation,
      model: body.model,
      continued: body.previous_response_id !== undefined,
    });

    let status: number;
    let rawBody: unknown;
    let retryAfter: string | null;
    try {
      const response = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      status = response.status;
      retryAfter = response.headers.get('retry-after');
      const text = await response.text();
      try {
        rawBody = text === '' ? undefined : JSON.parse(text);
      } catch (error) {
        if (response.ok) {
          return this.fail(
            operation,
            createMalformedResponse('Provider returned a body that is not JSON', {
              cause: toError(error),
            })
          );
        }
        rawBody = undefined;
      }
    } catch (error) {
      const cause = toError(error);
      if (cause.name === 'AbortError' || controller.signal.aborted) {
        return this.fail(
          operation,
          createTimeoutError(`Request timeout after ${String(timeoutMs)}ms`, timeoutMs, { cause })
        );
      }
      return this.fail(
        operation,
        createNetworkError(`Cannot reach provider: ${cause.message}`, { endpoint, cause })
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (status < 200 || status >= 300) {
      return this.fail(operation, errorForStatus(status, rawBody, retryAfter));
    }

    const apiError = describeApiError(rawBody);
    if (apiError.message !== undefined) {
      return this.fail(
        operation,
        createModelError(
          `Provider error: ${apiError.message}`,
          apiError.code !== undefined ? { errorCode: apiError.code } : {}
        )
      );
    }

    const parsed = parseResponsesBody(rawBody);
    if (parsed === undefined) {
      return this.fail(operation, createMalformedResponse('Provider response has no id'));
    }
    if (parsed.refusal !== undefined && parsed.outputText === '') {
      return this.fail(operation, createModelError(`Model refused: ${parsed.refusal}`));
    }

    const jsonText = extractJsonObject(parsed.outputText);
    if (jsonText === undefined) {
      return this.fail(operation, createMalformedResponse('Model reply contains no JSON object'));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(jsonText);
    } catch (error) {
      return this.fail(
        operation,
        createMalformedResponse('Model reply is not valid JSON', { cause: toError(error) })
      );
    }

    const checked = schema.check(payload);
    if (!checked.valid) {
      return this.fail(
        operation,
        createMalformedResponse(`Model reply does not match the '${schema.name}' schema`, {
          invalidFields: checked.errors,
        })
      );
    }

    this.logger.info('response_received', {
      operation,
      latencyMs: Date.now() - startedAt,
      ...(parsed.usage !== undefined ? { usage: parsed.usage } : {}),
    });

    return createSuccessResult({ value: checked.value, parsed });
  }

  private fail(
    operation: Operation,
    error: ProviderError
  ): { readonly success: false; readonly error: ProviderError } {
    this.logger.warn('request_failed', {
      operation,
      kind: error.kind,
      message: error.message,
    });
    return createFailureResult(error);
  }
}
