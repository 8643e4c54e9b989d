/**
 * Per-session telemetry recorder.
 *
 * Each recorded turn is sent in the background; callers never wait for it
 * and never see its failures. `flush()` lets shutdown code and tests wait
 * for sends still in flight.
 *
 * @packageDocumentation
 */

import type { Role } from '../conversation/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { TelemetryRecord } from './types.js';
import type { WebhookSender } from './webhook.js';

/**
 * Options for the TelemetryRecorder.
 */
export interface TelemetryRecorderOptions {
  /** Webhook URL; an empty string disables telemetry. */
  readonly webhookUrl: string;
  readonly sessionId: string;
  readonly sender: Pick<WebhookSender, 'send'>;
  /** Clock used for `timestamp_utc`. */
  readonly now?: () => Date;
  readonly logger?: Logger;
}

/**
 * Posts transcript turns to the telemetry webhook.
 */
export class TelemetryRecorder {
  private readonly webhookUrl: string;
  private readonly sessionId: string;
  private readonly sender: Pick<WebhookSender, 'send'>;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(options: TelemetryRecorderOptions) {
    this.webhookUrl = options.webhookUrl.trim();
    this.sessionId = options.sessionId;
    this.sender = options.sender;
    this.now = options.now ?? ((): Date => new Date());
    this.log = (options.logger ?? defaultLogger).child('Telemetry');
  }

  /**
   * Whether a webhook URL is configured.
   */
  get enabled(): boolean {
    return this.webhookUrl !== '';
  }

  /**
   * Number of sends still in flight.
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Starts sending one turn and returns immediately.
   */
  record(role: Role, message: string): void {
    if (!this.enabled) {
      return;
    }

    const record: TelemetryRecord = {
      timestamp_utc: this.now().toISOString(),
      session_id: this.sessionId,
      role,
      message,
    };

    // The sender logs its own failures; only a rejecting sender lands here.
    const delivery: Promise<void> = this.sender
      .send(this.webhookUrl, record)
      .then(
        () => undefined,
        (error: unknown) => {
          this.log.debug('turn_not_delivered', {
            role,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      )
      .finally(() => {
        this.pending.delete(delivery);
      });
    this.pending.add(delivery);
  }

  /**
   * Waits for every send started so far.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
