import { describe, it, expect } from 'vitest';
import { Glossary, glossaryKey, glossaryRecordSchema } from '../Glossary.js';

const entry = (term: string, definition: string, chunkId = 'chunk-1', page = 4) => ({
  term,
  definition,
  chunkId,
  page,
  sectionPath: ['3'],
});

describe('Glossary', () => {
  it('normalizes keys to lowercase with single spaces', () => {
    expect(glossaryKey('  Link   Partner ')).toBe('link partner');
  });

  it('looks terms up case-insensitively', () => {
    const glossary = new Glossary();
    glossary.add(entry('DLL', 'data link layer'));

    expect(glossary.has('dll')).toBe(true);
    expect(glossary.get('Dll')?.definition).toBe('data link layer');
    expect(glossary.get('PHY')).toBeUndefined();
  });

  it('lets a later entry replace an earlier one', () => {
    const glossary = new Glossary();
    glossary.add(entry('lane', 'a set of pairs', 'chunk-1'));
    glossary.add(entry('DLL', 'data link layer', 'chunk-2'));
    glossary.add(entry('Lane', 'a differential pair set', 'chunk-3', 9));

    expect(glossary.size).toBe(2);
    expect(glossary.terms()).toEqual(['DLL', 'Lane']);
    expect(glossary.get('lane')).toMatchObject({ definition: 'a differential pair set', page: 9 });
  });

  it('ignores blank terms', () => {
    const glossary = new Glossary();
    glossary.add(entry('   ', 'nothing'));
    expect(glossary.size).toBe(0);
  });

  it('serializes to a record keyed by normalized term', () => {
    const glossary = new Glossary();
    glossary.add(entry('Link Partner', 'the device at the far end', 'chunk-7', 12));

    const record = glossary.toRecord();

    expect(record).toEqual({
      'link partner': {
        term: 'Link Partner',
        definition: 'the device at the far end',
        chunk_id: 'chunk-7',
        page: 12,
        section_path: ['3'],
      },
    });
    expect(glossaryRecordSchema.safeParse(record).success).toBe(true);
  });
});
