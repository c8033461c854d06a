import { describe, it, expect } from 'vitest';
import { CharTokenCounter, TiktokenCounter } from '../TokenCounter.js';
import { TokenSplitter } from '../TokenSplitter.js';

describe('TokenSplitter', () => {
  const counter = new CharTokenCounter();

  it('returns short text as one piece', () => {
    expect(new TokenSplitter(counter, 10).split('Short text.')).toEqual(['Short text.']);
    expect(new TokenSplitter(counter, 10).split('   ')).toEqual([]);
  });

  it('packs sentences under the ceiling', () => {
    const splitter = new TokenSplitter(counter, 10);
    expect(splitter.split('First sentence here. Second sentence here. Third one.')).toEqual([
      'First sentence here.',
      'Second sentence here. Third one.',
    ]);
  });

  it('falls back to character windows for unbroken text', () => {
    const pieces = new TokenSplitter(counter, 10).split('x'.repeat(100));
    expect(pieces.map(piece => piece.length)).toEqual([40, 40, 20]);
  });
});

describe('TokenCounter', () => {
  it('counts four characters per token', () => {
    const chars = new CharTokenCounter();
    expect(chars.count('abcde')).toBe(2);
    expect(chars.count('')).toBe(0);
  });

  it('counts cl100k tokens', () => {
    const tiktoken = new TiktokenCounter();
    try {
      expect(tiktoken.count('hello world')).toBe(2);
    } finally {
      tiktoken.dispose();
    }
  });
});
