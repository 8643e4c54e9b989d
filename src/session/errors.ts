/**
 * Errors raised by a blueprint session.
 *
 * @packageDocumentation
 */

/**
 * Error codes for session failures.
 */
export type SessionErrorCode = 'TURN_IN_PROGRESS' | 'EMPTY_MESSAGE' | 'ACCESS_DENIED';

/**
 * Base class for session errors.
 */
export class SessionError extends Error {
  /** Error code for programmatic handling. */
  public readonly code: SessionErrorCode;

  constructor(message: string, code: SessionErrorCode) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
  }
}

/**
 * Thrown when a message is submitted while the previous turn is still
 * waiting on the model.
 */
export class TurnInProgressError extends SessionError {
  constructor() {
    super(
      'A turn is already in progress; wait for the reply before sending another message',
      'TURN_IN_PROGRESS'
    );
    this.name = 'TurnInProgressError';
  }
}

/**
 * Thrown when a message is blank.
 */
export class EmptyMessageError extends SessionError {
  constructor() {
    super('Message is empty', 'EMPTY_MESSAGE');
    this.name = 'EmptyMessageError';
  }
}

/**
 * Thrown when the access code does not match.
 */
export class AccessDeniedError extends SessionError {
  constructor() {
    super('Access code is not valid', 'ACCESS_DENIED');
    this.name = 'AccessDeniedError';
  }
}
