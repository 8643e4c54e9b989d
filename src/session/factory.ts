/**
 * Wires a session from runtime settings.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type { RuntimeSettings } from '../config/types.js';
import { OpenAIGateway } from '../gateway/openai-gateway.js';
import { loadReplySchemas, type ReplySchemas } from '../gateway/schema.js';
import { TelemetryRecorder } from '../telemetry/recorder.js';
import { WebhookSender } from '../telemetry/webhook.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { BlueprintSession } from './session.js';

/**
 * Options for createBlueprintSession.
 */
export interface CreateSessionOptions {
  readonly logger?: Logger;
  /** Fetch used for both the provider and the telemetry webhook. */
  readonly fetch?: typeof fetch;
  /** Pre-compiled schemas; loaded from the schemas/ directory when omitted. */
  readonly schemas?: ReplySchemas;
  readonly sessionId?: string;
}

/**
 * Creates a session backed by the OpenAI gateway, with telemetry when a
 * webhook URL is configured.
 *
 * @throws Error if the bundled reply schemas cannot be loaded.
 */
export async function createBlueprintSession(
  settings: RuntimeSettings,
  options: CreateSessionOptions = {}
): Promise<BlueprintSession> {
  const { config, apiKey } = settings;
  const log = options.logger ?? defaultLogger;
  const schemas = options.schemas ?? (await loadReplySchemas());
  const fetchOption = options.fetch !== undefined ? { fetch: options.fetch } : {};

  const gateway = new OpenAIGateway({
    apiKey,
    model: config.model.name,
    reasoningEffort: config.model.reasoning_effort,
    baseUrl: config.model.base_url,
    timeoutMs: config.model.timeout_ms,
    schemas,
    logger: log,
    ...fetchOption,
  });

  const sessionId = options.sessionId ?? randomUUID();
  const telemetry =
    config.telemetry.webhook_url === ''
      ? undefined
      : new TelemetryRecorder({
          webhookUrl: config.telemetry.webhook_url,
          sessionId,
          sender: new WebhookSender({
            timeoutMs: config.telemetry.timeout_ms,
            logger: log,
            ...fetchOption,
          }),
          logger: log,
        });

  return new BlueprintSession({
    gateway,
    sessionId,
    logger: log,
    ...(telemetry !== undefined ? { telemetry } : {}),
  });
}
