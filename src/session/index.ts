/**
 * Blueprint sessions: turn orchestration, access gate and wiring.
 *
 * @packageDocumentation
 */

export { BlueprintSession } from './session.js';
export type { BlueprintSessionOptions, TurnOutcome } from './session.js';
export { createBlueprintSession } from './factory.js';
export type { CreateSessionOptions } from './factory.js';
export { AccessGate } from './access.js';
export {
  AccessDeniedError,
  EmptyMessageError,
  SessionError,
  TurnInProgressError,
} from './errors.js';
export type { SessionErrorCode } from './errors.js';
