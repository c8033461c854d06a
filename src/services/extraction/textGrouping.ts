import { bbox } from '../../domain/geometry.js';
import type { RawTextBlock } from './types.js';

/** A positioned run of text, top-left origin. */
export interface PositionedText {
  text: string;
  x: number;
  top: number;
  bottom: number;
  width: number;
  fontSize: number;
}

interface Line {
  x0: number;
  x1: number;
  top: number;
  bottom: number;
  fontSize: number;
  text: string;
}

interface OpenBlock {
  lines: Line[];
  x0: number;
  x1: number;
  top: number;
  bottom: number;
  fontSize: number;
}

const joinRuns = (runs: PositionedText[]): string => {
  let text = '';
  let lastEnd = Number.NEGATIVE_INFINITY;
  for (const run of runs) {
    const gap = run.x - lastEnd;
    if (text && gap > run.fontSize * 0.15 && !text.endsWith(' ') && !run.text.startsWith(' ')) {
      text += ' ';
    }
    text += run.text;
    lastEnd = run.x + run.width;
  }
  return text.trim();
};

/**
 * Groups runs into lines (shared baseline, split at wide horizontal gaps so
 * two columns never share a line) and lines into blocks (tight vertical
 * spacing, overlapping horizontal extent, similar font size).
 */
export function groupIntoBlocks(runs: readonly PositionedText[]): RawTextBlock[] {
  const sorted = runs
    .filter(run => run.text.trim().length > 0)
    .sort((a, b) => a.top - b.top || a.x - b.x);

  const rows: PositionedText[][] = [];
  for (const run of sorted) {
    const row = rows.find(candidate => {
      const head = candidate[0];
      return Math.abs(head.top - run.top) <= Math.max(2, head.fontSize * 0.3);
    });
    if (row) row.push(run);
    else rows.push([run]);
  }

  const lines: Line[] = [];
  for (const row of rows) {
    row.sort((a, b) => a.x - b.x);
    let segment: PositionedText[] = [];
    const emit = (): void => {
      if (segment.length === 0) return;
      lines.push({
        x0: segment[0].x,
        x1: Math.max(...segment.map(run => run.x + run.width)),
        top: Math.min(...segment.map(run => run.top)),
        bottom: Math.max(...segment.map(run => run.bottom)),
        fontSize: Math.max(...segment.map(run => run.fontSize)),
        text: joinRuns(segment),
      });
      segment = [];
    };

    for (const run of row) {
      const previous = segment[segment.length - 1];
      if (previous && run.x - (previous.x + previous.width) > previous.fontSize * 3) emit();
      segment.push(run);
    }
    emit();
  }

  lines.sort((a, b) => a.top - b.top || a.x0 - b.x0);

  const blocks: OpenBlock[] = [];
  for (const line of lines) {
    const target = [...blocks].reverse().find(
      block =>
        line.top - block.bottom <= block.fontSize * 0.8 &&
        line.top >= block.top &&
        line.x0 < block.x1 &&
        line.x1 > block.x0 &&
        Math.abs(line.fontSize - block.fontSize) <= 1.5
    );

    if (target) {
      target.lines.push(line);
      target.x0 = Math.min(target.x0, line.x0);
      target.x1 = Math.max(target.x1, line.x1);
      target.bottom = Math.max(target.bottom, line.bottom);
    } else {
      blocks.push({ lines: [line], ...line });
    }
  }

  return blocks.map(block => ({
    bbox: bbox(block.x0, block.top, block.x1, block.bottom),
    text: block.lines.map(line => line.text).join('\n'),
    fontSize: block.fontSize,
  }));
}
