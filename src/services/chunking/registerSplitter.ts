import { logger } from '../../utils/logger.js';
import { TokenSplitter } from './TokenSplitter.js';
import type { TokenCounter } from './types.js';

const SUBGROUP_LINE = /^\s*(?:bits?\s*)?\[\d+(?::\d+)?\]/i;
const INLINE_BIT_RANGE = /(?:\bbits?\s*)?\[\d+(?::\d+)?\]/gi;
const VALUE_LINE = /^\s*(?:0x[0-9a-f]+|0b[01]+|\d+)\s*[:=]/i;
const CONTINUED_SUFFIX = /\s*\(continued\)$/i;

/** Whether a register block picks up a description already in progress. */
export function continuesRegister(text: string): boolean {
  return SUBGROUP_LINE.test(text) || VALUE_LINE.test(text);
}

/** Header line for a fragment of the register whose description starts with `text`. */
export function continuedHeader(text: string): string {
  const header = text.split('\n')[0].trim().replace(CONTINUED_SUFFIX, '');
  return `${header} (continued)`;
}

export interface RegisterLayout {
  /** First line of the register description, naming the register. */
  header: string;
  /** Bit-field sub-groups in document order; the first one carries the header. */
  groups: string[];
}

export function registerLayout(text: string): RegisterLayout {
  const lines = text.split('\n');
  const header = lines[0].trim();

  const groups: string[][] = [[lines[0]]];
  for (const line of lines.slice(1)) {
    if (SUBGROUP_LINE.test(line)) groups.push([line]);
    else groups[groups.length - 1].push(line);
  }

  if (groups.length > 1) {
    return { header, groups: groups.map(group => group.join('\n')) };
  }

  // Single-line descriptions: cut before every bit range after the first
  const starts = [...text.matchAll(INLINE_BIT_RANGE)].map(match => match.index ?? 0).slice(1);
  const bounds = [0, ...starts, text.length];
  const inline = bounds
    .slice(0, -1)
    .map((start, i) => text.slice(start, bounds[i + 1]).trim())
    .filter(group => group.length > 0);

  return { header, groups: inline.length > 0 ? inline : [text] };
}

/**
 * Splits a register description that exceeds the ceiling at bit-field
 * sub-group boundaries. Every fragment after the first repeats the register
 * header.
 */
export function splitRegister(text: string, counter: TokenCounter, ceiling: number): string[] {
  if (counter.count(text) <= ceiling) return [text];

  const { header, groups } = registerLayout(text);
  const continued = continuedHeader(header);
  const withHeader = (fragment: string, index: number): string =>
    index === 0 ? fragment : `${continued}\n${fragment}`;

  const fragments: string[] = [];
  let current = '';
  for (const group of groups) {
    const candidate = current ? `${current}\n${group}` : group;
    if (current && counter.count(withHeader(candidate, fragments.length)) > ceiling) {
      fragments.push(current);
      current = group;
    } else {
      current = candidate;
    }
  }
  if (current) fragments.push(current);

  const headerTokens = counter.count(`${continued}\n`);
  return fragments.flatMap((fragment, index) => {
    const framed = withHeader(fragment, index);
    if (counter.count(framed) <= ceiling) return [framed];

    logger.warn(
      { register: header, tokens: counter.count(framed), ceiling },
      'Register sub-group exceeds ceiling, splitting by lines'
    );
    const splitter = new TokenSplitter(counter, Math.max(1, ceiling - headerTokens));
    return splitter
      .split(fragment)
      .map((piece, pieceIndex) => (index === 0 && pieceIndex === 0 ? piece : `${continued}\n${piece}`));
  });
}
