import { describe, it, expect } from 'vitest';
import { sectionCtx } from '../../../__fixtures__/pages.js';
import { ChunkFactory } from '../ChunkFactory.js';
import { DefinitionChunker, findInlineDefinitions, termBefore } from '../DefinitionChunker.js';

const factory = new ChunkFactory({
  documentId: 'doc-test',
  source: 'controller-spec.pdf',
  version: '2.1',
  title: 'Controller Spec',
});

const terms = sectionCtx({
  key: 's3',
  path: ['3'],
  title: 'Terms and definitions',
  level: 1,
  label: '3 Terms and definitions',
});

describe('termBefore', () => {
  it('skips relative pronouns before the defining phrase', () => {
    expect(termBefore('The SWITCH_THRESHOLD which ')).toBe('SWITCH_THRESHOLD');
  });

  it('stops at articles and clause punctuation', () => {
    expect(termBefore('In this clause, a lane ')).toBe('lane');
    expect(termBefore('the link partner')).toBe('link partner');
    expect(termBefore('Here, retry timer')).toBe('retry timer');
  });
});

describe('findInlineDefinitions', () => {
  it('finds one definition per sentence', () => {
    expect(
      findInlineDefinitions(
        'The SWITCH_THRESHOLD which is defined as the alpha value. In this clause, a lane refers to a set of pairs.'
      )
    ).toEqual([
      { term: 'SWITCH_THRESHOLD', definition: 'the alpha value' },
      { term: 'lane', definition: 'a set of pairs' },
    ]);
  });

  it('skips phrases without a noun phrase or with a short definition', () => {
    expect(findInlineDefinitions('This is done by means of a retry.')).toEqual([]);
    expect(findInlineDefinitions('X means ok.')).toEqual([]);
  });
});

describe('DefinitionChunker', () => {
  it('parses colon, dash and numbered term forms', () => {
    const chunker = new DefinitionChunker(factory);
    chunker.consume({
      text: 'For the purposes of this document the following terms apply.',
      section: terms,
      page: 4,
      order: 1,
    });
    chunker.consume({ text: 'ABC: means something', section: terms, page: 4, order: 2 });
    chunker.consume({ text: 'DLL - data link layer that\ncarries packets', section: terms, page: 4, order: 3 });
    chunker.consume({ text: '3.1.4 Lane\nA set of differential pairs.', section: terms, page: 5, order: 0 });
    chunker.consume({ text: '3.1.5 Orphan', section: terms, page: 5, order: 1 });

    const drafts = chunker.flush();

    expect(drafts.map(draft => [draft.contentType, draft.term, draft.definition])).toEqual([
      ['definition', 'ABC', 'means something'],
      ['definition', 'DLL', 'data link layer that carries packets'],
      ['definition', 'Lane', 'A set of differential pairs.'],
      ['text', undefined, undefined],
    ]);
    expect(drafts[2]).toMatchObject({
      pageStart: 5,
      anchor: 0,
      rawText: 'Lane: A set of differential pairs.',
      text: '[Controller Spec 2.1 | 3 Terms and definitions | Page 5]\nLane: A set of differential pairs.',
    });
    expect(drafts[3]).toMatchObject({
      pageStart: 4,
      pageEnd: 5,
      anchor: 1,
      rawText: 'For the purposes of this document the following terms apply.\n3.1.5 Orphan',
    });
  });

  it('flushes when the section changes', () => {
    const chunker = new DefinitionChunker(factory);
    chunker.consume({ text: 'ABC: means something', section: terms, page: 4, order: 0 });

    const emitted = chunker.consume({
      text: 'XYZ: another thing',
      section: sectionCtx({ key: 's4', path: ['3', '3.2'], label: '3.2 Abbreviations' }),
      page: 6,
      order: 0,
    });

    expect(emitted.map(draft => draft.term)).toEqual(['ABC']);
    expect(chunker.state?.lines.map(line => line.text)).toEqual(['XYZ: another thing']);
  });

  it('derives inline definitions from a prose chunk', () => {
    const chunker = new DefinitionChunker(factory);
    const source = factory.create({
      contentType: 'text',
      section: sectionCtx(),
      headingLevel: 2,
      pageStart: 7,
      pageEnd: 8,
      anchor: 4,
      rawText: 'In this clause, a lane refers to a set of pairs.',
    });

    const [draft, ...rest] = chunker.extractInline(source);

    expect(rest).toEqual([]);
    expect(draft).toMatchObject({
      contentType: 'definition',
      term: 'lane',
      definition: 'a set of pairs',
      pageStart: 7,
      pageEnd: 8,
      anchor: 4,
      rawText: 'lane: a set of pairs',
    });
    expect(draft.chunkId).not.toBe(source.chunkId);
  });
});
