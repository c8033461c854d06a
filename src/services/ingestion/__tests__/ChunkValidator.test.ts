import { describe, it, expect } from 'vitest';
import type { Chunk } from '../../../domain/entities/Chunk.js';
import { chunkStats, contentLength, searchableChunks, validateChunk } from '../ChunkValidator.js';

const chunk = (overrides: Partial<Chunk> = {}): Chunk => ({
  chunkId: 'chunk-1',
  documentId: 'doc-test',
  source: 'controller-spec.pdf',
  version: '2.1',
  pageStart: 5,
  pageEnd: 5,
  sectionPath: ['4', '4.2'],
  sectionTitle: 'Command Set',
  headingLevel: 2,
  contentType: 'text',
  isFrontMatter: false,
  chunkIndex: 0,
  text: '',
  rawText: 'The controller queues every command it accepts.',
  ...overrides,
});

describe('contentLength', () => {
  it('ignores page markers and continuation lines', () => {
    expect(contentLength('Page 3 of 10\n(continued)\n  Real content here  \n-----')).toBe(17);
  });
});

describe('validateChunk', () => {
  it('applies the minimum for the content type', () => {
    expect(validateChunk(chunk({ rawText: 'Short' }))).toEqual({
      valid: false,
      reason: 'text content 5 chars, minimum 20',
    });
    expect(validateChunk(chunk({ rawText: 'x'.repeat(20) }))).toEqual({ valid: true });
    expect(validateChunk(chunk({ contentType: 'definition', rawText: 'ABC: a b' }))).toEqual({ valid: true });
  });

  it('rejects chunks that are only noise', () => {
    expect(validateChunk(chunk({ rawText: 'Page 7\n---' }))).toEqual({
      valid: false,
      reason: 'empty after noise removal',
    });
  });

  it('uses the row-chunk minimum for row groups', () => {
    const rawText = 'x'.repeat(30);
    expect(validateChunk(chunk({ contentType: 'table', rawText })).valid).toBe(false);
    expect(validateChunk(chunk({ contentType: 'table', rawText, isRowChunk: true, parentChunkId: 'p' })).valid).toBe(
      true
    );
  });
});

describe('searchableChunks', () => {
  it('drops front matter, invalid chunks and full tables that have row chunks', () => {
    const table = chunk({ chunkId: 'table', contentType: 'table', rawText: 'y'.repeat(100) });
    const row = chunk({ chunkId: 'row', contentType: 'table', rawText: 'z'.repeat(30), isRowChunk: true, parentChunkId: 'table' });
    const front = chunk({ chunkId: 'front', isFrontMatter: true, headingLevel: 0 });
    const tiny = chunk({ chunkId: 'tiny', rawText: 'Tiny' });
    const prose = chunk({ chunkId: 'prose' });

    expect(searchableChunks([table, row, front, tiny, prose]).map(item => item.chunkId)).toEqual(['row', 'prose']);
  });
});

describe('chunkStats', () => {
  it('summarizes a chunk set', () => {
    const stats = chunkStats([
      chunk({ chunkId: 'a', rawText: 'x'.repeat(40), hasInlineDefinition: true }),
      chunk({ chunkId: 'b', contentType: 'definition', rawText: 'lane: a set of pairs' }),
      chunk({ chunkId: 'c', rawText: 'Tiny', isFrontMatter: true }),
    ]);

    expect(stats).toEqual({
      total: 3,
      searchable: 2,
      invalid: 1,
      frontMatter: 1,
      inlineDefinitionSources: 1,
      rowChunks: 0,
      byType: { text: 2, table: 0, figure: 0, bitmap: 0, definition: 1, register: 0 },
      averageChars: 21,
    });
  });
});
