import { config } from '../../config/index.js';
import type { TableConfig } from '../../config/validation.js';
import { verticalGap } from '../../domain/geometry.js';
import type { TableCell, TableRegion, TextBlock } from '../../domain/entities/PageModel.js';
import { logger } from '../../utils/logger.js';
import { generateId } from '../../utils/ids.js';
import type { ChunkFactory } from './ChunkFactory.js';
import {
  columnCount,
  headerRowCount,
  headerSignature,
  keyGroups,
  mergeHeader,
  normalizeTable,
  toMarkdown,
} from './tableGrid.js';
import type { ChunkDraft, SectionContext } from './types.js';

const TABLE_CAPTION = /^Table\s+[A-Z]?[\d.-]*\d\s*[-:\u2013\u2014]\s*\S.{3,}/i;
const REGISTER_KEY_COLUMN = /\b(bits?|index|byte|offset)\b/i;

export interface TableContext {
  page: number;
  section: SectionContext;
  order: number;
  /** All text blocks of the page, for caption lookup. */
  pageBlocks: readonly TextBlock[];
  /** Whether this is the first table region on its page. */
  firstOnPage: boolean;
}

/** A logical table still open for continuation onto the next page. */
interface PendingTable {
  section: SectionContext;
  pageStart: number;
  pageEnd: number;
  anchor: number;
  x0: number;
  x1: number;
  columns: number;
  headerRows: number;
  header: string[];
  rows: TableCell[][];
  caption: string | null;
  regions: number;
}

export function findCaption(
  region: { bbox: TableRegion['bbox'] },
  blocks: readonly TextBlock[],
  pattern: RegExp,
  margin: number
): string | null {
  let best: { text: string; distance: number } | null = null;

  for (const block of blocks) {
    const line = block.text
      .split('\n')
      .map(candidate => candidate.trim())
      .find(candidate => pattern.test(candidate));
    if (!line) continue;

    const distance = verticalGap(region.bbox, block.bbox);
    if (distance > margin) continue;
    if (!best || distance < best.distance) best = { text: line, distance };
  }

  return best?.text ?? null;
}

/**
 * Builds one logical table per table region, joining regions that continue
 * onto the next page, and serializes it as Markdown.
 */
export class TableChunker {
  private pending: PendingTable | null = null;
  private readonly options: TableConfig;

  constructor(private readonly factory: ChunkFactory, options: Partial<TableConfig> = {}) {
    this.options = { ...config.table, ...options };
  }

  /** Emits the pending table when the new page cannot continue it. */
  beginPage(page: number): ChunkDraft[] {
    if (this.pending && this.pending.pageEnd < page - 1) return this.flush();
    return [];
  }

  consume(region: TableRegion, context: TableContext): ChunkDraft[] {
    if (this.pending && this.continues(this.pending, region, context)) {
      this.append(this.pending, region, context.page);
      return [];
    }

    const emitted = this.flush();
    const columns = columnCount(region.rows);
    const headerRows = headerRowCount(region.rows, region.headerRows);

    this.pending = {
      section: context.section,
      pageStart: context.page,
      pageEnd: context.page,
      anchor: context.order,
      x0: region.bbox.x0,
      x1: region.bbox.x1,
      columns,
      headerRows,
      header: mergeHeader(region.rows.slice(0, headerRows), columns),
      rows: region.rows.map(row => [...row]),
      caption: findCaption(region, context.pageBlocks, TABLE_CAPTION, this.options.captionMarginPt),
      regions: 1,
    };
    return emitted;
  }

  flush(): ChunkDraft[] {
    const table = this.pending;
    this.pending = null;
    if (!table) return [];
    return this.serialize(table);
  }

  private continues(pending: PendingTable, region: TableRegion, context: TableContext): boolean {
    const tolerance = this.options.edgeTolerancePt;
    return (
      context.firstOnPage &&
      pending.pageEnd === context.page - 1 &&
      columnCount(region.rows) === pending.columns &&
      Math.abs(region.bbox.x0 - pending.x0) <= tolerance &&
      Math.abs(region.bbox.x1 - pending.x1) <= tolerance
    );
  }

  private append(pending: PendingTable, region: TableRegion, page: number): void {
    const repeated = region.rows.slice(0, pending.headerRows);
    const repeatsHeader =
      region.rows.length > pending.headerRows &&
      headerSignature(mergeHeader(repeated, pending.columns)) === headerSignature(pending.header);

    const rows = repeatsHeader ? region.rows.slice(pending.headerRows) : region.rows;
    pending.rows.push(...rows.map(row => [...row]));
    pending.pageEnd = page;
    pending.regions += 1;

    logger.debug(
      { pageStart: pending.pageStart, page, droppedHeader: repeatsHeader, rows: rows.length },
      'Table continues onto next page'
    );
  }

  private serialize(table: PendingTable): ChunkDraft[] {
    const { header, body, notes } = normalizeTable(table.rows, {
      headerRows: table.headerRows,
      noteMarkers: this.options.noteMarkers,
    });

    const registerTable = REGISTER_KEY_COLUMN.test(header[0] ?? '');
    const preamble = [
      table.caption,
      registerTable ? `Register context: ${table.caption ?? table.section.label}` : null,
    ].filter((line): line is string => line !== null);

    const notesText = notes.length > 0 ? `Notes:\n${notes.join('\n')}` : '';
    const groups = keyGroups(body);
    const parts = this.partition(header, groups, preamble, notesText);

    const base = {
      contentType: 'table' as const,
      section: table.section,
      headingLevel: table.section.level,
      pageStart: table.pageStart,
      pageEnd: table.pageEnd,
      anchor: table.anchor,
    };

    const drafts = parts.map((rows, index) => {
      const markdown = toMarkdown(header, rows);
      const last = index === parts.length - 1;
      const rawText = last && notesText ? `${markdown}\n\n${notesText}` : markdown;
      return this.factory.create({
        ...base,
        rawText,
        body: [...preamble, rawText].join('\n'),
        tableMarkdown: markdown,
        ...(last && notes.length > 0 ? { tableNotes: notes.join('\n') } : {}),
      });
    });

    if (parts.length > 1) {
      logger.debug(
        { pageStart: table.pageStart, parts: parts.length, rows: body.length },
        'Large table split at key boundaries'
      );
    }

    if (this.options.rowGroupChunks && drafts.length > 0) {
      const parentChunkId = drafts[0].chunkId;
      for (const group of groups) {
        const markdown = toMarkdown(header, group);
        drafts.push(
          this.factory.create({
            ...base,
            chunkId: generateId('chunk'),
            rawText: markdown,
            body: [...preamble, markdown].join('\n'),
            tableMarkdown: markdown,
            parentChunkId,
            isRowChunk: true,
          })
        );
      }
    }

    return drafts;
  }

  /** Packs key groups into parts under the size limit; groups are never cut. */
  private partition(
    header: string[],
    groups: string[][][],
    preamble: string[],
    notesText: string
  ): string[][][] {
    const fixed = preamble.join('\n').length + notesText.length + 2;
    const fits = (rows: string[][]): boolean =>
      fixed + toMarkdown(header, rows).length <= this.options.maxChars;

    const all = groups.flat();
    if (fits(all)) return [all];

    const parts: string[][][] = [];
    let current: string[][] = [];
    for (const group of groups) {
      if (current.length > 0 && !fits([...current, ...group])) {
        parts.push(current);
        current = [];
      }
      if (current.length === 0 && !fits(group)) {
        logger.warn(
          { key: group[0][0], rows: group.length, maxChars: this.options.maxChars },
          'Table row group exceeds size limit on its own'
        );
      }
      current.push(...group);
    }
    if (current.length > 0) parts.push(current);
    return parts;
  }
}
