import { describe, it, expect } from 'vitest';
import { deriveVersion, documentStem } from '../documentIdentity.js';

describe('documentStem', () => {
  it('strips directories and document extensions', () => {
    expect(documentStem('/data/specs/ctrl-spec_v2.1.pdf')).toBe('ctrl-spec_v2.1');
    expect(documentStem('ctrl-spec.tables.json')).toBe('ctrl-spec');
    expect(documentStem('ctrl-spec.json')).toBe('ctrl-spec');
  });
});

describe('deriveVersion', () => {
  it.each([
    ['ctrl-spec_v2.1.pdf', '2.1'],
    ['controller spec version 3_2.pdf', '3.2'],
    ['PHY_B51.pdf', '5.1'],
    ['link-layer 4.0.2 final.pdf', '4.0.2'],
    ['overview.pdf', 'unknown'],
  ])('%s -> %s', (fileName, version) => {
    expect(deriveVersion(fileName)).toBe(version);
  });
});
