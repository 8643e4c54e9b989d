/**
 * Shared-secret gate checked before a chat starts.
 *
 * @packageDocumentation
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { AccessDeniedError } from './errors.js';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Allows or denies access against a configured code. An empty code
 * disables the gate.
 */
export class AccessGate {
  private readonly expected: Buffer | undefined;

  constructor(code: string) {
    const trimmed = code.trim();
    this.expected = trimmed === '' ? undefined : digest(trimmed);
  }

  /** Whether a code must be entered. */
  get required(): boolean {
    return this.expected !== undefined;
  }

  /**
   * Checks an entered code. Comparison runs in constant time over digests
   * so the code length is not observable either.
   */
  check(attempt: string): boolean {
    if (this.expected === undefined) {
      return true;
    }
    return timingSafeEqual(digest(attempt.trim()), this.expected);
  }

  /**
   * @throws AccessDeniedError if the code does not match.
   */
  assert(attempt: string): void {
    if (!this.check(attempt)) {
      throw new AccessDeniedError();
    }
  }
}
