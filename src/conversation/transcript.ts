/**
 * Append-only record of the turns in one session.
 *
 * @packageDocumentation
 */

import type { Role, Turn } from './types.js';

export class Transcript {
  private turns: Turn[] = [];

  /**
   * Records a turn. The stored value is frozen.
   */
  append(turn: Turn): void {
    this.turns.push(Object.freeze({ role: turn.role, text: turn.text }));
  }

  /** Convenience for `append({ role, text })`. */
  record(role: Role, text: string): void {
    this.append({ role, text });
  }

  /** All turns in the order they were appended. */
  all(): readonly Turn[] {
    return [...this.turns];
  }

  get length(): number {
    return this.turns.length;
  }

  /** Drops every turn. Only a session reset calls this. */
  clear(): void {
    this.turns = [];
  }
}
