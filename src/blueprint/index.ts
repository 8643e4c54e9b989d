/**
 * Blueprint synthesis: the fixed section layout, document values and
 * rendering.
 *
 * @packageDocumentation
 */

export {
  BLUEPRINT_SECTIONS,
  BLUEPRINT_TITLE,
  MISSING_SECTION_BODY,
  matchSectionLabel,
  normalizeHeading,
  parseSectionHeading,
} from './sections.js';
export type { SectionHeading, SectionLabel } from './sections.js';
export { getDocumentIssues, renderBlueprint, withConsistency } from './document.js';
export type { BlueprintDocument, BlueprintSection } from './document.js';
export { BlueprintSynthesizer, countTags, synthesizeBlueprint } from './synthesizer.js';
export type {
  BlueprintSynthesizerOptions,
  SynthesisDiagnostics,
  SynthesisResult,
} from './synthesizer.js';
