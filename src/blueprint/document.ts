/**
 * Blueprint document value and its Markdown rendering.
 *
 * A document is never edited in place: synthesis creates one and the
 * consistency outcome is attached by creating another.
 *
 * @packageDocumentation
 */

import {
  getConsistencyIssues,
  renderConsistencySection,
  type ConsistencyOutcome,
} from '../consistency/checker.js';
import { BLUEPRINT_TITLE, type SectionLabel } from './sections.js';

/**
 * One of the eleven fixed sections.
 */
export interface BlueprintSection {
  /** 1-based position in the layout. */
  readonly number: number;
  readonly label: SectionLabel;
  /** Markdown body without the heading. */
  readonly body: string;
  /** False when the body is the missing-section placeholder. */
  readonly covered: boolean;
}

/**
 * A synthesized blueprint.
 */
export interface BlueprintDocument {
  /** Text the model wrote before the first section, without its title. */
  readonly preamble: string;
  /** Always the eleven sections in layout order. */
  readonly sections: readonly BlueprintSection[];
  /** Undefined until the consistency check has run. */
  readonly consistency: ConsistencyOutcome | undefined;
}

/**
 * Returns a new document carrying the consistency outcome.
 */
export function withConsistency(
  document: BlueprintDocument,
  consistency: ConsistencyOutcome
): BlueprintDocument {
  return { ...document, consistency };
}

/**
 * Issues recorded by the consistency check; empty before it runs.
 */
export function getDocumentIssues(document: BlueprintDocument): readonly string[] {
  return getConsistencyIssues(document.consistency);
}

/**
 * Renders the document as Markdown.
 *
 * Sections are numbered `## N. Label`; the consistency section, when
 * present, comes last.
 */
export function renderBlueprint(document: BlueprintDocument): string {
  const blocks: string[] = [`# ${BLUEPRINT_TITLE}`];

  if (document.preamble !== '') {
    blocks.push(document.preamble);
  }

  for (const section of document.sections) {
    blocks.push(`## ${String(section.number)}. ${section.label}`, section.body);
  }

  if (document.consistency !== undefined) {
    blocks.push(renderConsistencySection(document.consistency));
  }

  return blocks.join('\n\n') + '\n';
}
