import type { BBox } from '../geometry.js';

export interface TextBlock {
  readonly index: number;
  readonly bbox: BBox;
  readonly text: string;
  readonly fontSize?: number;
  readonly bold?: boolean;
}

export type TableCell = string | null;

export interface TableRegion {
  readonly index: number;
  readonly bbox: BBox;
  readonly rows: ReadonlyArray<ReadonlyArray<TableCell>>;
  /** Header row count when the table extractor knows it. */
  readonly headerRows?: number;
}

export interface DrawingRegion {
  readonly index: number;
  readonly bbox: BBox;
  readonly area: number;
  readonly elementCount: number;
}

export interface ImageRegion {
  readonly index: number;
  readonly bbox: BBox;
  readonly width: number;
  readonly height: number;
}

/** One page's extracted content. Never modified after the extractor returns it. */
export interface PageModel {
  readonly pageNumber: number;
  readonly width: number;
  readonly height: number;
  readonly blocks: readonly TextBlock[];
  readonly tables: readonly TableRegion[];
  readonly drawings: readonly DrawingRegion[];
  readonly images: readonly ImageRegion[];
}
