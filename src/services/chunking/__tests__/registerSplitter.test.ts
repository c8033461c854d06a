import { describe, it, expect } from 'vitest';
import { registerLayout, splitRegister } from '../registerSplitter.js';
import { CharTokenCounter } from '../TokenCounter.js';

const counter = new CharTokenCounter();

const register = [
  'CFG register',
  '[7:4] PRESCALE divides the input clock',
  '[3:2] MODE selects the operating mode',
  '[1:0] EN enables the block output',
].join('\n');

describe('registerLayout', () => {
  it('groups lines under each bit range', () => {
    expect(registerLayout('CTRL register\n[1:0] MODE\n0: off\n1: on\n[2] EN')).toEqual({
      header: 'CTRL register',
      groups: ['CTRL register', '[1:0] MODE\n0: off\n1: on', '[2] EN'],
    });
  });

  it('cuts single-line descriptions before each bit range after the first', () => {
    expect(registerLayout('STATUS [0] READY [1] BUSY').groups).toEqual(['STATUS [0] READY', '[1] BUSY']);
  });
});

describe('splitRegister', () => {
  it('returns a register under the ceiling unchanged', () => {
    expect(splitRegister(register, counter, 31)).toEqual([register]);
  });

  it('repeats the register header on every later fragment', () => {
    expect(splitRegister(register, counter, 30)).toEqual([
      'CFG register\n[7:4] PRESCALE divides the input clock\n[3:2] MODE selects the operating mode',
      'CFG register (continued)\n[1:0] EN enables the block output',
    ]);
  });

  it('keeps every fragment within the ceiling', () => {
    const fragments = splitRegister(register, counter, 16);
    expect(fragments.length).toBeGreaterThan(2);
    expect(fragments.every(fragment => counter.count(fragment) <= 16)).toBe(true);
    expect(fragments.slice(1).every(fragment => fragment.startsWith('CFG register (continued)\n'))).toBe(true);
  });
});
