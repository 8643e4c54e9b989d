/**
 * Conversation state types.
 *
 * A conversation moves through three modes, never backwards except through
 * an explicit reset:
 * - DISCOVERY: the assistant proposes directions and contrasts them
 * - INTENT_LOCK: a direction has converged and is restated for confirmation
 * - BUILDER: the blueprint is drafted and refined
 *
 * @packageDocumentation
 */

/**
 * Stage of the conversation.
 */
export type Mode = 'DISCOVERY' | 'INTENT_LOCK' | 'BUILDER';

/**
 * All modes in progression order.
 */
export const MODES: readonly Mode[] = ['DISCOVERY', 'INTENT_LOCK', 'BUILDER'] as const;

/**
 * Prompt hint shown before the first user turn.
 */
export const INITIAL_NEXT_USER_PROMPT = 'Share your idea in plain words.';

/**
 * Snapshot of the conversation, replaced wholesale after each accepted turn.
 */
export interface ConversationState {
  /** Current stage. */
  readonly mode: Mode;
  /** Whether the model judges the direction to have converged. */
  readonly convergenceReady: boolean;
  /**
   * Model-reported confidence per topic. Diagnostic only; no decision
   * reads it.
   */
  readonly confidence: Readonly<Record<string, number>>;
  /** One-line statement of the emerging direction, empty until one exists. */
  readonly directionThesis: string;
  /** Hint for what the user should answer next. */
  readonly nextUserPrompt: string;
}

/**
 * Speaker of a transcript turn.
 */
export type Role = 'user' | 'assistant';

/**
 * One message in the session transcript.
 */
export interface Turn {
  readonly role: Role;
  readonly text: string;
}

/**
 * Checks if a string is a valid Mode.
 *
 * @param value - The string to check.
 * @returns True if the value is a valid Mode.
 */
export function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

/**
 * Gets the position of a mode in the progression order.
 *
 * @param mode - The mode to look up.
 * @returns The zero-based index of the mode.
 */
export function getModeIndex(mode: Mode): number {
  return MODES.indexOf(mode);
}

/**
 * Creates the state every session starts from and returns to on reset.
 */
export function createInitialConversationState(): ConversationState {
  return {
    mode: 'DISCOVERY',
    convergenceReady: false,
    confidence: {},
    directionThesis: '',
    nextUserPrompt: INITIAL_NEXT_USER_PROMPT,
  };
}
