/**
 * Consistency checker for synthesized blueprints.
 *
 * Asks the gateway to scan a blueprint for internal contradictions and
 * turns the answer into the `Consistency check (auto)` section. A failed
 * critique never blocks delivery of the blueprint: it becomes the
 * `unavailable` outcome.
 *
 * @packageDocumentation
 */

import type { ModelGateway } from '../gateway/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/**
 * Heading of the section appended to every checked blueprint.
 */
export const CONSISTENCY_HEADING = 'Consistency check (auto)';

/**
 * Body of the section when the critique found nothing.
 */
export const NO_CONTRADICTIONS_SENTENCE = 'No internal contradictions detected.';

/**
 * Body of the section when the critique call failed.
 */
export const CHECK_UNAVAILABLE_SENTENCE = 'Consistency check could not be completed.';

/**
 * Result of one consistency pass.
 */
export type ConsistencyOutcome =
  | { readonly status: 'issues'; readonly issues: readonly string[] }
  | { readonly status: 'clean' }
  | { readonly status: 'unavailable'; readonly reason: string };

/**
 * Options for the consistency checker.
 */
export interface ConsistencyCheckerOptions {
  /** Gateway used for the critique call. */
  readonly gateway: Pick<ModelGateway, 'critique'>;
  readonly logger?: Logger;
}

/**
 * Collapses whitespace in each issue, keeping every entry in received order.
 */
export function normalizeIssues(issues: readonly string[]): string[] {
  return issues.map((issue) => issue.replace(/\s+/g, ' ').trim());
}

/**
 * Issues carried by an outcome; empty for clean and unavailable outcomes.
 */
export function getConsistencyIssues(outcome: ConsistencyOutcome | undefined): readonly string[] {
  return outcome?.status === 'issues' ? outcome.issues : [];
}

/**
 * Renders the consistency section as Markdown.
 *
 * @example
 * ```typescript
 * renderConsistencySection({ status: 'issues', issues: ['Price contradicts margin plan'] });
 * // '## Consistency check (auto)\n\n1. Price contradicts margin plan'
 * ```
 */
export function renderConsistencySection(outcome: ConsistencyOutcome): string {
  const lines = [`## ${CONSISTENCY_HEADING}`, ''];

  switch (outcome.status) {
    case 'issues':
      outcome.issues.forEach((issue, index) => {
        lines.push(`${String(index + 1)}. ${issue}`.trimEnd());
      });
      break;
    case 'clean':
      lines.push(NO_CONTRADICTIONS_SENTENCE);
      break;
    case 'unavailable':
      lines.push(CHECK_UNAVAILABLE_SENTENCE);
      break;
  }

  return lines.join('\n');
}

/**
 * Runs the critique pass over blueprint text.
 */
export class ConsistencyChecker {
  private readonly gateway: Pick<ModelGateway, 'critique'>;
  private readonly log: Logger;

  constructor(options: ConsistencyCheckerOptions) {
    this.gateway = options.gateway;
    this.log = (options.logger ?? defaultLogger).child('Consistency');
  }

  /**
   * Critiques a blueprint and classifies the result.
   *
   * Never rejects: a gateway failure is logged and reported as the
   * `unavailable` outcome.
   */
  async evaluate(blueprintText: string): Promise<ConsistencyOutcome> {
    const result = await this.gateway.critique(blueprintText);

    if (!result.success) {
      this.log.warn('critique_unavailable', {
        kind: result.error.kind,
        message: result.error.message,
      });
      return { status: 'unavailable', reason: result.error.message };
    }

    const issues = normalizeIssues(result.response.issues);
    this.log.info('critique_completed', { issueCount: issues.length });
    return issues.length === 0 ? { status: 'clean' } : { status: 'issues', issues };
  }

  /**
   * Ordered list of issues found in the blueprint. A failed critique yields
   * an empty list.
   */
  async check(blueprintText: string): Promise<string[]> {
    return [...getConsistencyIssues(await this.evaluate(blueprintText))];
  }
}
