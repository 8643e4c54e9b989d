/**
 * Tests for blueprint synthesis and rendering.
 */

import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { getDocumentIssues, renderBlueprint, withConsistency } from './document.js';
import { BLUEPRINT_SECTIONS, MISSING_SECTION_BODY } from './sections.js';
import { BlueprintSynthesizer, countTags, synthesizeBlueprint } from './synthesizer.js';
import { Logger } from '../utils/logger.js';

const PROMPT_HEADINGS = [
  'Business summary',
  'Customer and problem',
  'Value proposition and differentiation',
  'Product scope (MVP, included vs excluded)',
  'Go-to-market hypothesis',
  'Tech and build direction',
  'Operations and risks',
  'Revenue and pricing logic',
  '90-day execution plan',
  'Open items (WIP, mandatory)',
  'Reality checks & risks',
];

function fullDraft(): string {
  const bodies = PROMPT_HEADINGS.map((_, index) => `Body of section ${String(index + 1)}.`);
  bodies[1] = 'Urban commuters who refill daily. Assumed: they buy online.';
  bodies[9] = 'Open (WIP): supplier shortlist.';
  return [
    '# Eco Bottles',
    '',
    'Reusable bottles sold direct to commuters.',
    '',
    ...PROMPT_HEADINGS.flatMap((heading, index) => [
      `## ${String(index + 1)}. ${heading}`,
      '',
      bodies[index] ?? '',
      '',
    ]),
  ].join('\n');
}

function headingLines(markdown: string): string[] {
  return markdown.split('\n').filter((line) => line.startsWith('## '));
}

describe('countTags', () => {
  it('should count whole-word Assumed and literal Open (WIP)', () => {
    expect(countTags('Assumed: a. Assumedly b. Open (WIP): c. Open (WIP) d. open (wip)')).toEqual({
      assumed: 1,
      open: 2,
    });
  });
});

describe('synthesizeBlueprint', () => {
  it('should map a complete draft onto the eleven sections', () => {
    const { document, diagnostics } = synthesizeBlueprint(fullDraft());

    expect(document.sections.map((s) => s.label)).toEqual([...BLUEPRINT_SECTIONS]);
    expect(document.sections.every((s) => s.covered)).toBe(true);
    expect(document.sections[1]?.body).toBe(
      'Urban commuters who refill daily. Assumed: they buy online.'
    );
    expect(document.preamble).toBe('Reusable bottles sold direct to commuters.');
    expect(document.consistency).toBeUndefined();
    expect(diagnostics).toEqual({
      assumedTags: 1,
      openTags: 1,
      missingSections: [],
      mergedSections: [],
    });
  });

  it('should fill missing sections with the placeholder', () => {
    const { document, diagnostics } = synthesizeBlueprint(
      '## Business summary\nRefills by post.\n\n## Open items\n'
    );

    expect(document.sections[0]?.body).toBe('Refills by post.');
    expect(document.sections[9]).toEqual({
      number: 10,
      label: 'Open items',
      body: MISSING_SECTION_BODY,
      covered: false,
    });
    expect(diagnostics.missingSections).toHaveLength(10);
    expect(diagnostics.missingSections).not.toContain('Business summary');
    expect(diagnostics.missingSections).toContain('Open items');
  });

  it('should produce all placeholders for text with no recognised headings', () => {
    const { document, diagnostics } = synthesizeBlueprint('Just a paragraph.');

    expect(document.preamble).toBe('Just a paragraph.');
    expect(document.sections.every((s) => s.body === MISSING_SECTION_BODY)).toBe(true);
    expect(diagnostics.missingSections).toEqual([...BLUEPRINT_SECTIONS]);
  });

  it('should merge repeated sections in order of appearance', () => {
    const { document, diagnostics } = synthesizeBlueprint(
      '## Business summary\nFirst.\n## Product scope\nScope.\n## 1. Business Summary\nSecond.'
    );

    expect(document.sections[0]?.body).toBe('First.\n\nSecond.');
    expect(diagnostics.mergedSections).toEqual(['Business summary']);
  });

  it('should keep unknown sub-headings inside the current section', () => {
    const { document } = synthesizeBlueprint(
      '## Revenue and pricing logic\n### Tiers\n- Basic\n- Plus'
    );

    expect(document.sections[7]?.body).toBe('### Tiers\n- Basic\n- Plus');
  });

  it('should accept bold and numbered section lines', () => {
    const { document } = synthesizeBlueprint(
      '**Business summary**\nBold heading.\n\n3. Value proposition & differentiation\nNumbered heading.'
    );

    expect(document.sections[0]?.body).toBe('Bold heading.');
    expect(document.sections[2]?.body).toBe('Numbered heading.');
  });

  it('should keep list items that name a section inside the current body', () => {
    const openItems = [
      '1. Supplier choice: Open (WIP)',
      '2. Product scope: decide whether lids ship separately. Open (WIP)',
      '3. Pricing tier for schools. Open (WIP)',
    ].join('\n');
    const draft = BLUEPRINT_SECTIONS.map((label, index) => {
      const body = index === 9 ? openItems : `Body ${String(index + 1)}.`;
      return `## ${String(index + 1)}. ${label}\n\n${body}`;
    }).join('\n\n');

    const { document, diagnostics } = synthesizeBlueprint(draft);

    expect(document.sections[9]?.body).toBe(openItems);
    expect(document.sections[3]?.body).toBe('Body 4.');
    expect(diagnostics.mergedSections).toEqual([]);
    expect(renderBlueprint(document)).toContain(
      '2. Product scope: decide whether lids ship separately. Open (WIP)'
    );
  });

  it('should keep the text after a heading colon as the start of the body', () => {
    const { document } = synthesizeBlueprint(
      '## Business summary: refill club for commuters\nBody.'
    );

    expect(document.sections[0]?.body).toBe('refill club for commuters\nBody.');
  });

  it('should accept a numbered heading with text after the colon before any section', () => {
    const { document } = synthesizeBlueprint(
      '1. Business summary: refill club\nMore detail.\n\n## Product scope\nScope.'
    );

    expect(document.sections[0]?.body).toBe('refill club\nMore detail.');
    expect(document.sections[3]?.body).toBe('Scope.');
  });

  it('should drop a consistency section written by the model', () => {
    const { document } = synthesizeBlueprint(
      '## Business summary\nSummary.\n## Consistency check (auto)\n1. Made up\n## Open items\nOpen (WIP): legal.'
    );

    expect(document.sections[0]?.body).toBe('Summary.');
    expect(document.sections[9]?.body).toBe('Open (WIP): legal.');
    expect(renderBlueprint(document)).not.toContain('Made up');
  });

  it('should unwrap a fenced draft and ignore headings inside inner fences', () => {
    const { document } = synthesizeBlueprint(
      '```markdown\n## Tech and build direction\n~~~\n## Business summary\n~~~\n```'
    );

    expect(document.sections[5]?.body).toBe('~~~\n## Business summary\n~~~');
    expect(document.sections[0]?.covered).toBe(false);
  });

  it('should always render the eleven headers in order once each', () => {
    const headingArb = fc.constantFrom(
      ...PROMPT_HEADINGS.map((heading) => `## ${heading}`),
      '### Notes',
      '## Consistency check (auto)'
    );
    const blockArb = fc.tuple(headingArb, fc.constantFrom('Text.', '', '- item', 'Assumed: x'));

    fc.assert(
      fc.property(fc.array(blockArb, { maxLength: 25 }), (blocks) => {
        const markdown = blocks.map(([heading, body]) => `${heading}\n${body}`).join('\n');
        const rendered = renderBlueprint(synthesizeBlueprint(markdown).document);

        expect(headingLines(rendered)).toEqual(
          BLUEPRINT_SECTIONS.map((label, index) => `## ${String(index + 1)}. ${label}`)
        );
      })
    );
  });
});

describe('renderBlueprint', () => {
  it('should render title, preamble, sections and consistency last', () => {
    const { document } = synthesizeBlueprint('Intro line.\n## Business summary\nSummary.');
    const rendered = renderBlueprint(withConsistency(document, { status: 'clean' }));

    expect(
      rendered.startsWith(
        '# Business Blueprint\n\nIntro line.\n\n## 1. Business summary\n\nSummary.\n\n## 2. Customer and problem\n\n'
      )
    ).toBe(true);
    expect(
      rendered.endsWith('## Consistency check (auto)\n\nNo internal contradictions detected.\n')
    ).toBe(true);
  });

  it('should render twelve sections with one numbered issue for a checked full draft', () => {
    const { document, diagnostics } = synthesizeBlueprint(fullDraft());
    const checked = withConsistency(document, {
      status: 'issues',
      issues: ['Daily refills contradict the postal delivery plan'],
    });
    const rendered = renderBlueprint(checked);

    expect(diagnostics.assumedTags).toBe(1);
    expect(diagnostics.openTags).toBe(1);
    expect(headingLines(rendered)).toHaveLength(12);
    expect(headingLines(rendered)[11]).toBe('## Consistency check (auto)');
    expect(rendered.split('\n').filter((line) => /^\d+\. /.test(line))).toEqual([
      '1. Daily refills contradict the postal delivery plan',
    ]);
    expect(getDocumentIssues(checked)).toEqual([
      'Daily refills contradict the postal delivery plan',
    ]);
    expect(document.consistency).toBeUndefined();
  });
});

describe('BlueprintSynthesizer', () => {
  it('should log tag counts and missing sections', () => {
    const lines: string[] = [];
    const synthesizer = new BlueprintSynthesizer({
      logger: new Logger({ component: 'test', write: (line) => lines.push(line) }),
    });

    synthesizer.synthesize('## Business summary\nAssumed: online only.');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'info',
      component: 'Synthesizer',
      event: 'blueprint_synthesized',
      data: { assumedTags: 1, openTags: 0 },
    });
  });
});
