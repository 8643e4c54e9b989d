/**
 * Conversation state, mode transitions and the session transcript.
 *
 * @packageDocumentation
 */

export {
  MODES,
  INITIAL_NEXT_USER_PROMPT,
  createInitialConversationState,
  getModeIndex,
  isMode,
} from './types.js';
export type { ConversationState, Mode, Role, Turn } from './types.js';
export { ConversationStateMachine, isValidModeTransition, transition } from './transitions.js';
export type { TransitionError, TransitionErrorCode, TransitionResult } from './transitions.js';
export { Transcript } from './transcript.js';
