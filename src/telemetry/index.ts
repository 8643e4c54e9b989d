/**
 * Telemetry: per-turn records posted to an optional webhook.
 *
 * @packageDocumentation
 */

export { DEFAULT_WEBHOOK_TIMEOUT_MS, WebhookSender } from './webhook.js';
export type { WebhookSenderOptions } from './webhook.js';
export { TelemetryRecorder } from './recorder.js';
export type { TelemetryRecorderOptions } from './recorder.js';
export type { TelemetryRecord, WebhookSendResult } from './types.js';
