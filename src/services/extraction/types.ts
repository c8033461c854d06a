import type { BBox } from '../../domain/geometry.js';
import type { TableCell } from '../../domain/entities/PageModel.js';
import type { TocEntry } from '../../domain/entities/Section.js';

export interface RawTextBlock {
  bbox: BBox;
  text: string;
  fontSize?: number;
  bold?: boolean;
}

export interface RawImage {
  bbox: BBox;
  width?: number;
  height?: number;
}

export interface RawTable {
  bbox: BBox;
  rows: TableCell[][];
  headerRows?: number;
}

export interface RawPageContent {
  width: number;
  height: number;
  blocks: RawTextBlock[];
  /** Individual vector drawing elements, not yet clustered. */
  drawings: BBox[];
  images: RawImage[];
}

/** Text, drawing and image extraction capability for one document. */
export interface PageContentReader {
  readPage(pageNumber: number): Promise<RawPageContent>;
}

/** Table-geometry extraction capability for one document. */
export interface TableGeometryReader {
  readTables(pageNumber: number): Promise<RawTable[]>;
}

export interface DocumentSource {
  readonly documentId: string;
  /** File name of the source document. */
  readonly source: string;
  /** Version tag when the source carries one. */
  readonly version?: string;
  readonly pageCount: number;
  readonly pages: PageContentReader;
  readonly tables: TableGeometryReader;
  readToc(): Promise<TocEntry[]>;
  close(): Promise<void>;
}

export const noTables: TableGeometryReader = {
  readTables: async () => [],
};
