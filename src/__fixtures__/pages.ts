import type {
  DrawingRegion,
  ImageRegion,
  PageModel,
  TableCell,
  TableRegion,
  TextBlock,
} from '../domain/entities/PageModel.js';
import { bbox } from '../domain/geometry.js';
import type { TocEntry } from '../domain/entities/Section.js';
import type { ExtractionDumpInput } from '../services/extraction/dump.schema.js';
import type { SectionContext } from '../services/chunking/types.js';

type Box = [number, number, number, number];

export const PAGE_WIDTH = 600;
export const PAGE_HEIGHT = 800;

export function textBlock(
  index: number,
  box: Box,
  text: string,
  hints: { fontSize?: number; bold?: boolean } = {}
): TextBlock {
  return { index, bbox: bbox(...box), text, ...hints };
}

export function tableRegion(index: number, box: Box, rows: TableCell[][], headerRows?: number): TableRegion {
  return headerRows === undefined
    ? { index, bbox: bbox(...box), rows }
    : { index, bbox: bbox(...box), rows, headerRows };
}

export function drawingRegion(index: number, box: Box, elementCount = 1): DrawingRegion {
  const region = bbox(...box);
  return {
    index,
    bbox: region,
    area: (region.x1 - region.x0) * (region.y1 - region.y0),
    elementCount,
  };
}

export function imageRegion(index: number, box: Box): ImageRegion {
  const region = bbox(...box);
  return { index, bbox: region, width: region.x1 - region.x0, height: region.y1 - region.y0 };
}

export function pageModel(pageNumber: number, content: Partial<Omit<PageModel, 'pageNumber'>> = {}): PageModel {
  return {
    pageNumber,
    width: content.width ?? PAGE_WIDTH,
    height: content.height ?? PAGE_HEIGHT,
    blocks: content.blocks ?? [],
    tables: content.tables ?? [],
    drawings: content.drawings ?? [],
    images: content.images ?? [],
  };
}

export function sectionCtx(overrides: Partial<SectionContext> = {}): SectionContext {
  return {
    key: 's1',
    path: ['4', '4.2'],
    title: 'Command Set',
    level: 2,
    label: '4.2 Command Set',
    isFrontMatter: false,
    ...overrides,
  };
}

export const toc = (...entries: Array<[number, string, number]>): TocEntry[] =>
  entries.map(([level, title, page]) => ({ level, title, page }));

type DumpPageInput = ExtractionDumpInput['pages'][number];

/** A single-column text page for extraction dumps; blocks are stacked 40pt apart. */
export function dumpPage(page: number, texts: string[], extra: Partial<DumpPageInput> = {}): DumpPageInput {
  return {
    page,
    width: PAGE_WIDTH,
    height: PAGE_HEIGHT,
    blocks: texts.map((text, i) => ({ bbox: [72, 80 + i * 40, 520, 100 + i * 40], text, font_size: 10 })),
    ...extra,
  };
}
