/**
 * Webhook sender for telemetry records.
 *
 * Sends HTTP POST requests with a bounded timeout. A failed send is
 * reported in the result and logged at debug level; it never throws.
 *
 * @packageDocumentation
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { TelemetryRecord, WebhookSendResult } from './types.js';

/**
 * Default timeout for a webhook request.
 */
export const DEFAULT_WEBHOOK_TIMEOUT_MS = 3000;

/**
 * Configuration for webhook sender.
 */
export interface WebhookSenderOptions {
  /** Timeout in milliseconds (default: 3000ms). */
  readonly timeoutMs?: number;
  readonly logger?: Logger;
  /** Fetch implementation; defaults to the global fetch. */
  readonly fetch?: typeof fetch;
}

/**
 * Sends telemetry records to a webhook endpoint.
 */
export class WebhookSender {
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WebhookSenderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS;
    this.log = (options.logger ?? defaultLogger).child('Telemetry');
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  /**
   * POSTs a record as JSON.
   *
   * @example
   * ```typescript
   * const sender = new WebhookSender({ timeoutMs: 1000 });
   * const result = await sender.send('https://hooks.example.com/turns', {
   *   timestamp_utc: '2026-01-01T00:00:00.000Z',
   *   session_id: 'a1',
   *   role: 'user',
   *   message: 'I want to sell bottles',
   * });
   * ```
   */
  async send(endpoint: string, record: TelemetryRecord): Promise<WebhookSendResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(record),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = `HTTP ${String(response.status)}: ${response.statusText}`;
        this.log.debug('webhook_failed', { endpoint, error });
        return { success: false, error };
      }

      return { success: true, statusCode: response.status };
    } catch (error) {
      let errorMessage = 'Unknown error';

      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          errorMessage = `Request timeout after ${String(this.timeoutMs)}ms`;
        } else {
          errorMessage = error.message;
        }
      }

      this.log.debug('webhook_failed', { endpoint, error: errorMessage });
      return { success: false, error: errorMessage };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
