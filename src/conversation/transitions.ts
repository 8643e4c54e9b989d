/**
 * Mode transition guard and the per-session state holder.
 *
 * The model decides when to converge, lock intent and start building; this
 * module only enforces that the reported mode never moves backwards.
 *
 * @packageDocumentation
 */

import {
  createInitialConversationState,
  getModeIndex,
  type ConversationState,
  type Mode,
} from './types.js';

/**
 * Error codes for transition failures.
 */
export type TransitionErrorCode = 'INVALID_TRANSITION';

/**
 * Error returned when a proposed state is rejected.
 */
export interface TransitionError {
  /** Error code for programmatic handling. */
  readonly code: TransitionErrorCode;
  /** Human-readable error message. */
  readonly message: string;
  /** Mode the conversation was in. */
  readonly fromMode: Mode;
  /** Mode the model reported. */
  readonly toMode: Mode;
}

/**
 * Result of a transition attempt.
 */
export type TransitionResult =
  | { readonly success: true; readonly state: ConversationState; readonly modeChanged: boolean }
  | { readonly success: false; readonly error: TransitionError };

/**
 * Checks whether moving between two modes keeps the progression order.
 * Staying in the same mode is always allowed.
 *
 * @param from - Current mode.
 * @param to - Proposed mode.
 * @returns True unless `to` comes before `from`.
 */
export function isValidModeTransition(from: Mode, to: Mode): boolean {
  return getModeIndex(to) >= getModeIndex(from);
}

function copyState(state: ConversationState): ConversationState {
  return {
    mode: state.mode,
    convergenceReady: state.convergenceReady,
    confidence: Object.freeze({ ...state.confidence }),
    directionThesis: state.directionThesis,
    nextUserPrompt: state.nextUserPrompt,
  };
}

/**
 * Validates a model-proposed state against the current one.
 *
 * On success the proposed fields are taken verbatim into a fresh object; the
 * inputs are never modified.
 *
 * @param current - The state before the turn.
 * @param proposed - The state reported by the model.
 * @returns The accepted state, or an INVALID_TRANSITION error.
 *
 * @example
 * ```typescript
 * const result = transition(builderState, { ...builderState, mode: 'DISCOVERY' });
 * if (!result.success) {
 *   console.log(result.error.message);
 *   // "Cannot move from 'BUILDER' back to 'DISCOVERY' without a reset"
 * }
 * ```
 */
export function transition(
  current: ConversationState,
  proposed: ConversationState
): TransitionResult {
  if (!isValidModeTransition(current.mode, proposed.mode)) {
    return {
      success: false,
      error: {
        code: 'INVALID_TRANSITION',
        message: `Cannot move from '${current.mode}' back to '${proposed.mode}' without a reset`,
        fromMode: current.mode,
        toMode: proposed.mode,
      },
    };
  }

  return {
    success: true,
    state: copyState(proposed),
    modeChanged: proposed.mode !== current.mode,
  };
}

/**
 * Holds one session's conversation state.
 */
export class ConversationStateMachine {
  private state: ConversationState = createInitialConversationState();

  /** The current state. */
  get current(): ConversationState {
    return this.state;
  }

  /**
   * Applies a model-proposed state. A rejected proposal leaves the current
   * state untouched.
   */
  apply(proposed: ConversationState): TransitionResult {
    const result = transition(this.state, proposed);
    if (result.success) {
      this.state = result.state;
    }
    return result;
  }

  /** Returns to the initial state. */
  reset(): void {
    this.state = createInitialConversationState();
  }
}
