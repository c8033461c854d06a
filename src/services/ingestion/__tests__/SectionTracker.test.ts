import { describe, it, expect } from 'vitest';
import { pageModel, textBlock, toc } from '../../../__fixtures__/pages.js';
import { StructureExtractor } from '../../structure/StructureExtractor.js';
import { SectionTracker } from '../SectionTracker.js';

const structure = new StructureExtractor().extract(
  toc([1, 'Foreword', 2], [1, '1 Scope', 3], [1, '2 Interfaces', 4], [2, '2.1 Bus', 5]),
  { source: 'controller-spec.pdf', version: '2.1', totalPages: 10 }
);

const titleOf = (tracker: SectionTracker): string | undefined => tracker.current?.title;

describe('SectionTracker', () => {
  it('switches at the heading when it appears on the section start page', () => {
    const tracker = new SectionTracker(structure);
    const scopeHeading = textBlock(0, [72, 80, 300, 100], '1 Scope');
    const scopeText = textBlock(1, [72, 120, 520, 140], 'This document covers the controller.');

    tracker.beginPage(pageModel(3, { blocks: [scopeHeading, scopeText] }));
    expect(tracker.observe(scopeHeading)).toMatchObject({ level: 1 });
    expect(titleOf(tracker)).toBe('Scope');

    const carried = textBlock(0, [72, 80, 520, 100], 'and the host interface it exposes.');
    const heading = textBlock(1, [72, 120, 300, 140], '2 Interfaces');
    tracker.beginPage(pageModel(4, { blocks: [carried, heading] }));

    expect(titleOf(tracker)).toBe('Scope');
    expect(tracker.observe(carried)).toBeNull();
    expect(titleOf(tracker)).toBe('Scope');
    expect(tracker.observe(heading)).toMatchObject({ level: 1 });
    expect(titleOf(tracker)).toBe('Interfaces');
  });

  it('matches a heading run together with its first sentence', () => {
    const tracker = new SectionTracker(structure);
    const block = textBlock(0, [72, 80, 520, 120], '2 Interfaces This clause lists the interfaces.');

    tracker.beginPage(pageModel(4, { blocks: [block] }));
    expect(tracker.observe(block)?.section?.title).toBe('Interfaces');
  });

  it('applies the mapped section from the top when no heading is found', () => {
    const tracker = new SectionTracker(structure);
    const body = textBlock(0, [72, 80, 520, 100], 'Bus timing is described below.');

    expect(tracker.beginPage(pageModel(5, { blocks: [body] }))?.title).toBe('Bus');
    expect(tracker.beginPage(pageModel(6, { blocks: [body] }))?.title).toBe('Bus');
  });

  it('detects numbered subheadings the TOC does not list', () => {
    const tracker = new SectionTracker(structure);
    const bold = textBlock(0, [72, 80, 300, 100], '2.1.3 Arbitration', { bold: true });
    tracker.beginPage(pageModel(6, { blocks: [bold] }));

    expect(tracker.observe(bold)).toEqual({ section: null, level: 3 });
    expect(titleOf(tracker)).toBe('Bus');
    expect(tracker.observe(bold, { tocOnly: true })).toBeNull();
  });

  it('uses font size against the page median', () => {
    const tracker = new SectionTracker(structure);
    const body = [0, 1, 2].map(i => textBlock(i, [72, 120 + i * 40, 520, 140 + i * 40], 'Body text.', { fontSize: 10 }));
    const large = textBlock(3, [72, 80, 300, 100], '2.1.4 Parking', { fontSize: 12 });
    const small = textBlock(4, [72, 300, 300, 320], '2.1.5 Release', { fontSize: 10 });

    tracker.beginPage(pageModel(6, { blocks: [large, ...body, small] }));

    expect(tracker.matchHeading(large)).toEqual({ section: null, level: 3 });
    expect(tracker.matchHeading(small)).toBeNull();
  });

  it('falls back to line shape without font hints', () => {
    const tracker = new SectionTracker(structure);
    tracker.beginPage(pageModel(6));

    expect(tracker.matchHeading(textBlock(0, [72, 80, 300, 100], '2.1.6 Idle state'))).toEqual({
      section: null,
      level: 3,
    });
    expect(tracker.matchHeading(textBlock(0, [72, 80, 300, 100], '2.1.6 The bus then idles.'))).toBeNull();
  });

  it('treats numbers listed elsewhere in the TOC as cross references', () => {
    const tracker = new SectionTracker(structure);
    tracker.beginPage(pageModel(7));

    expect(tracker.matchHeading(textBlock(0, [72, 80, 300, 100], '2.1 Bus', { bold: true }))).toBeNull();
  });
});
