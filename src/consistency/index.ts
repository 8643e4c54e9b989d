/**
 * Consistency check appended to synthesized blueprints.
 *
 * @packageDocumentation
 */

export {
  CHECK_UNAVAILABLE_SENTENCE,
  CONSISTENCY_HEADING,
  ConsistencyChecker,
  NO_CONTRADICTIONS_SENTENCE,
  getConsistencyIssues,
  normalizeIssues,
  renderConsistencySection,
} from './checker.js';
export type { ConsistencyCheckerOptions, ConsistencyOutcome } from './checker.js';
