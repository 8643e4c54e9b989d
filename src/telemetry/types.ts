/**
 * Telemetry types.
 *
 * @packageDocumentation
 */

import type { Role } from '../conversation/types.js';

/**
 * One transcript turn as posted to the telemetry webhook.
 */
export interface TelemetryRecord {
  /** ISO 8601 UTC time the turn was recorded. */
  readonly timestamp_utc: string;
  readonly session_id: string;
  readonly role: Role;
  readonly message: string;
}

/**
 * Result of a single webhook send attempt.
 */
export type WebhookSendResult =
  | {
      readonly success: true;
      readonly statusCode: number;
    }
  | {
      readonly success: false;
      readonly error: string;
    };
