import type { TableCell } from '../../domain/entities/PageModel.js';

export type GridRow = ReadonlyArray<TableCell>;

export interface NormalizedTable {
  header: string[];
  body: string[][];
  notes: string[];
}

/** Cell text with in-cell line breaks joined by a space. */
export const cellText = (cell: TableCell | undefined): string =>
  (cell ?? '').replace(/\s+/g, ' ').trim();

export const columnCount = (rows: readonly GridRow[]): number =>
  rows.reduce((max, row) => Math.max(max, row.length), 0);

const filledCount = (row: GridRow): number => row.filter(cell => cellText(cell).length > 0).length;

/** A row with a key cell and at least half of its cells populated. */
export function isCompleteRow(row: GridRow, columns: number): boolean {
  return cellText(row[0]).length > 0 && filledCount(row) >= Math.ceil(columns / 2);
}

/**
 * Number of leading header rows: the explicit count when the extractor gave
 * one, otherwise every row before the first complete data row (at least one).
 */
export function headerRowCount(rows: readonly GridRow[], explicit?: number): number {
  if (rows.length === 0) return 0;
  if (explicit !== undefined && explicit >= 1) return Math.min(explicit, rows.length);

  const columns = columnCount(rows);
  for (let i = 1; i < rows.length; i++) {
    if (isCompleteRow(rows[i], columns)) return i;
  }
  return 1;
}

export function hasDataRows(rows: readonly GridRow[], explicit?: number): boolean {
  if (columnCount(rows) === 0) return false;
  return rows.slice(headerRowCount(rows, explicit)).some(row => filledCount(row) > 0);
}

/**
 * Rejects wide regions that are really page layout picked up as a grid: a
 * lone-cell first or last row, or a sparse fill.
 */
export function isPlausibleTable(rows: readonly GridRow[]): boolean {
  const columns = columnCount(rows);
  if (columns <= 8) return true;
  if (filledCount(rows[0]) === 1 || filledCount(rows[rows.length - 1]) === 1) return false;

  const filled = rows.reduce((sum, row) => sum + filledCount(row), 0);
  return filled / (rows.length * columns) >= 0.4;
}

/** Joins the header zone per column, fragments separated by a space. */
export function mergeHeader(rows: readonly GridRow[], columns: number): string[] {
  return Array.from({ length: columns }, (_, col) =>
    rows
      .map(row => cellText(row[col]))
      .filter(text => text.length > 0)
      .join(' ')
  );
}

export const headerSignature = (header: readonly string[]): string =>
  header.map(cell => cell.toLowerCase()).join('|');

function isNoteRow(row: readonly string[], markers: readonly RegExp[]): boolean {
  const [first, ...rest] = row;
  return markers.some(marker => marker.test(first ?? '')) && rest.every(cell => cell.length === 0);
}

/** Splits trailing note rows off the body, bottom up. */
export function splitNotes(
  body: readonly string[][],
  noteMarkers: readonly string[]
): { body: string[][]; notes: string[] } {
  const markers = noteMarkers.map(
    marker => new RegExp(`^${marker.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\b`, 'i')
  );
  const rows = body.map(row => [...row]);
  const notes: string[] = [];

  while (rows.length > 0 && isNoteRow(rows[rows.length - 1], markers)) {
    const row = rows.pop();
    if (row) notes.unshift(row[0]);
  }

  return { body: rows, notes };
}

/**
 * Copies a key down into following rows whose key cell is empty but which
 * have other populated cells.
 */
export function forwardFillKey(body: readonly string[][]): string[][] {
  let lastKey = '';
  return body.map(row => {
    const [key, ...rest] = row;
    if (key) {
      lastKey = key;
      return [...row];
    }
    if (lastKey && rest.some(cell => cell.length > 0)) {
      return [lastKey, ...rest];
    }
    return [...row];
  });
}

/** Consecutive rows sharing the same key. */
export function keyGroups(body: readonly string[][]): string[][][] {
  const groups: string[][][] = [];
  for (const row of body) {
    const current = groups[groups.length - 1];
    if (current && current[0][0] === row[0]) {
      current.push(row);
    } else {
      groups.push([row]);
    }
  }
  return groups;
}

export function normalizeTable(
  rows: readonly GridRow[],
  options: { headerRows?: number; noteMarkers: readonly string[] }
): NormalizedTable {
  const columns = columnCount(rows);
  const headerCount = headerRowCount(rows, options.headerRows);
  const header = mergeHeader(rows.slice(0, headerCount), columns);

  const body = rows
    .slice(headerCount)
    .map(row => Array.from({ length: columns }, (_, col) => cellText(row[col])))
    .filter(row => row.some(cell => cell.length > 0));

  const split = splitNotes(body, options.noteMarkers);
  return { header, body: forwardFillKey(split.body), notes: split.notes };
}

const escapeCell = (cell: string): string => cell.replace(/\|/g, '\\|');

export function toMarkdown(header: readonly string[], body: readonly string[][]): string {
  const line = (cells: readonly string[]): string => `| ${cells.map(escapeCell).join(' | ')} |`;
  const separator = `| ${header.map(cell => '-'.repeat(Math.max(cell.length, 3))).join(' | ')} |`;
  return [line(header), separator, ...body.map(line)].join('\n');
}
