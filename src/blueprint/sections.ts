/**
 * The fixed section layout of a business blueprint.
 *
 * @packageDocumentation
 */

/**
 * Section labels in document order.
 */
export const BLUEPRINT_SECTIONS = [
  'Business summary',
  'Customer and problem',
  'Value proposition and differentiation',
  'Product scope',
  'Go-to-market hypothesis',
  'Tech and build direction',
  'Operations and risks',
  'Revenue and pricing logic',
  '90-day execution plan',
  'Open items',
  'Reality checks & risks',
] as const;

/**
 * One of the eleven blueprint section labels.
 */
export type SectionLabel = (typeof BLUEPRINT_SECTIONS)[number];

/**
 * Title line of every rendered blueprint.
 */
export const BLUEPRINT_TITLE = 'Business Blueprint';

/**
 * Body emitted for a section the model did not write.
 */
export const MISSING_SECTION_BODY = 'Open (WIP): not covered in this draft.';

/**
 * Reduces a heading to a comparable key.
 *
 * Strips Markdown heading marks, list numbering, emphasis, trailing
 * parentheticals and colons; lowercases; spells `&` as `and`; treats
 * hyphens and dashes as spaces.
 *
 * @example
 * ```typescript
 * normalizeHeading('## 4. **Product scope (MVP, included vs excluded)**'); // 'product scope'
 * normalizeHeading('Reality Checks and Risks'); // 'reality checks and risks'
 * ```
 */
export function normalizeHeading(heading: string): string {
  return heading
    .replace(/^\s*#{1,6}\s*/, '')
    .replace(/[*_`]/g, '')
    .replace(/^\s*\d+\s*[.)]\s*/, '')
    .replace(/\s*\([^)]*\)\s*$/, '')
    .replace(/\s*:\s*$/, '')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[-\u2010-\u2015]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

const LABELS_BY_KEY: ReadonlyMap<string, SectionLabel> = new Map<string, SectionLabel>(
  BLUEPRINT_SECTIONS.map((label) => [normalizeHeading(label), label])
);

/**
 * Finds the section a heading names.
 *
 * Tries the whole heading first, then the part before a colon
 * (`Business summary: refill club`).
 *
 * @returns The matching label, or undefined for headings outside the layout.
 */
export function matchSectionLabel(heading: string): SectionLabel | undefined {
  const key = normalizeHeading(heading);
  const exact = LABELS_BY_KEY.get(key);
  if (exact !== undefined) {
    return exact;
  }

  const colon = key.indexOf(':');
  return colon > 0 ? LABELS_BY_KEY.get(key.slice(0, colon).trim()) : undefined;
}

/**
 * A heading recognised as a section, with any text written after the
 * label's colon.
 */
export interface SectionHeading {
  readonly label: SectionLabel;
  /** Text after the colon with emphasis marks removed; empty when none. */
  readonly remainder: string;
}

/**
 * Splits a heading into its section label and the text after the colon.
 *
 * @example
 * ```typescript
 * parseSectionHeading('## Business summary: refill club');
 * // { label: 'Business summary', remainder: 'refill club' }
 * ```
 */
export function parseSectionHeading(heading: string): SectionHeading | undefined {
  const label = matchSectionLabel(heading);
  if (label === undefined) {
    return undefined;
  }
  if (LABELS_BY_KEY.has(normalizeHeading(heading))) {
    return { label, remainder: '' };
  }

  const colon = heading.indexOf(':');
  const remainder = heading.slice(colon + 1).replace(/^[\s*_]+|[\s*_]+$/g, '');
  return { label, remainder };
}
