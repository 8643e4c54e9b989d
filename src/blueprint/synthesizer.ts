/**
 * Blueprint synthesizer.
 *
 * Fits the Markdown the model wrote in BUILDER mode onto the fixed
 * eleven-section layout. Headings are matched loosely (numbering, emphasis
 * and parenthetical qualifiers are ignored), repeated sections are merged,
 * and sections the model left out get an Open (WIP) placeholder. Tagging
 * (Assumed / Open (WIP)) is counted for diagnostics but never enforced.
 *
 * @packageDocumentation
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { BlueprintDocument, BlueprintSection } from './document.js';
import {
  BLUEPRINT_SECTIONS,
  MISSING_SECTION_BODY,
  normalizeHeading,
  parseSectionHeading,
  type SectionLabel,
} from './sections.js';

/**
 * What synthesis observed about the model's text.
 */
export interface SynthesisDiagnostics {
  /** Occurrences of the `Assumed` tag. */
  readonly assumedTags: number;
  /** Occurrences of the `Open (WIP)` tag. */
  readonly openTags: number;
  /** Sections absent or empty in the model's text, in layout order. */
  readonly missingSections: readonly SectionLabel[];
  /** Sections whose heading appeared more than once. */
  readonly mergedSections: readonly SectionLabel[];
}

/**
 * Result of fitting model text onto the layout.
 */
export interface SynthesisResult {
  readonly document: BlueprintDocument;
  readonly diagnostics: SynthesisDiagnostics;
}

/**
 * Options for the BlueprintSynthesizer.
 */
export interface BlueprintSynthesizerOptions {
  readonly logger?: Logger;
}

const ATX_HEADING = /^ {0,3}#{1,6}\s+\S/;
const TITLE_HEADING = /^ {0,3}#\s+\S/;
const BOLD_LINE = /^\s*\*\*[^*]+\*\*:?\s*$/;
const NUMBERED_LINE = /^\s*\d+[.)]\s+\S/;
const FENCE = /^\s*(```|~~~)/;

/**
 * Counts the Assumed and Open (WIP) tags in a text.
 */
export function countTags(text: string): { assumed: number; open: number } {
  return {
    assumed: (text.match(/\bAssumed\b/g) ?? []).length,
    open: (text.match(/Open \(WIP\)/g) ?? []).length,
  };
}

function trimBlankLines(lines: readonly string[]): string {
  let start = 0;
  let end = lines.length;
  while (start < end && (lines[start] ?? '').trim() === '') {
    start++;
  }
  while (end > start && (lines[end - 1] ?? '').trim() === '') {
    end--;
  }
  return lines
    .slice(start, end)
    .map((line) => line.trimEnd())
    .join('\n');
}

/**
 * Removes a code fence wrapped around the whole text.
 */
function unwrapFence(markdown: string): string {
  const lines = markdown.trim().split(/\r?\n/);
  const first = lines[0] ?? '';
  const last = lines[lines.length - 1] ?? '';
  if (lines.length >= 2 && FENCE.test(first) && last.trim() === first.trim().slice(0, 3)) {
    return lines.slice(1, -1).join('\n');
  }
  return markdown;
}

function isConsistencyHeading(line: string): boolean {
  return normalizeHeading(line).startsWith('consistency check');
}

/**
 * Fits model Markdown onto the eleven-section layout.
 *
 * The model's title line is dropped (the rendered document has its own)
 * and any consistency section the model wrote itself is discarded, since
 * the checker appends the authoritative one.
 *
 * @example
 * ```typescript
 * const { document, diagnostics } = synthesizeBlueprint('## 1. Business summary\nRefills by post.');
 * document.sections.length; // 11
 * diagnostics.missingSections.length; // 10
 * ```
 */
export function synthesizeBlueprint(markdown: string): SynthesisResult {
  const preamble: string[] = [];
  const chunks = new Map<SectionLabel, string[][]>();
  const merged = new Set<SectionLabel>();

  let target: string[] | undefined = preamble;
  let inFence = false;

  for (const line of unwrapFence(markdown).split(/\r?\n/)) {
    if (FENCE.test(line)) {
      inFence = !inFence;
      target?.push(line);
      continue;
    }

    const atx = ATX_HEADING.test(line);
    if (!inFence && (atx || BOLD_LINE.test(line) || NUMBERED_LINE.test(line))) {
      const heading = parseSectionHeading(line);
      // Once a section is open, a list item naming a section with more text
      // after it is body content.
      if (heading !== undefined && (atx || heading.remainder === '' || chunks.size === 0)) {
        const { label } = heading;
        const existing = chunks.get(label);
        const chunk: string[] = heading.remainder === '' ? [] : [heading.remainder];
        if (existing === undefined) {
          chunks.set(label, [chunk]);
        } else {
          merged.add(label);
          existing.push(chunk);
        }
        target = chunk;
        continue;
      }

      if (atx && isConsistencyHeading(line)) {
        target = undefined;
        continue;
      }

      if (target === preamble && TITLE_HEADING.test(line)) {
        continue;
      }
    }

    target?.push(line);
  }

  const missing: SectionLabel[] = [];
  const sections: BlueprintSection[] = BLUEPRINT_SECTIONS.map((label, index) => {
    const body = (chunks.get(label) ?? [])
      .map(trimBlankLines)
      .filter((text) => text !== '')
      .join('\n\n');
    if (body === '') {
      missing.push(label);
    }
    return {
      number: index + 1,
      label,
      body: body === '' ? MISSING_SECTION_BODY : body,
      covered: body !== '',
    };
  });

  const tags = countTags(markdown);

  return {
    document: {
      preamble: trimBlankLines(preamble),
      sections,
      consistency: undefined,
    },
    diagnostics: {
      assumedTags: tags.assumed,
      openTags: tags.open,
      missingSections: missing,
      mergedSections: BLUEPRINT_SECTIONS.filter((label) => merged.has(label)),
    },
  };
}

/**
 * Synthesizer that logs what it observed about each draft.
 */
export class BlueprintSynthesizer {
  private readonly log: Logger;

  constructor(options: BlueprintSynthesizerOptions = {}) {
    this.log = (options.logger ?? defaultLogger).child('Synthesizer');
  }

  /**
   * Builds a document from model Markdown.
   */
  synthesize(markdown: string): SynthesisResult {
    const result = synthesizeBlueprint(markdown);
    const { diagnostics } = result;

    this.log.info('blueprint_synthesized', {
      assumedTags: diagnostics.assumedTags,
      openTags: diagnostics.openTags,
      missingSections: diagnostics.missingSections,
    });
    if (diagnostics.mergedSections.length > 0) {
      this.log.debug('sections_merged', { sections: diagnostics.mergedSections });
    }

    return result;
  }
}
