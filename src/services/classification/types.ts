import type { BBox } from '../../domain/geometry.js';
import type {
  DrawingRegion,
  ImageRegion,
  PageModel,
  TableRegion,
  TextBlock,
} from '../../domain/entities/PageModel.js';

interface Ordered {
  /** Position in the page's reading order. */
  readonly order: number;
}

export interface ClassifiedTable extends Ordered {
  readonly contentType: 'table';
  readonly region: TableRegion;
}

export interface ClassifiedFigure extends Ordered {
  readonly contentType: 'figure';
  readonly region: DrawingRegion;
  readonly annotations: readonly TextBlock[];
}

export interface ClassifiedBitmap extends Ordered {
  readonly contentType: 'bitmap';
  readonly region: ImageRegion;
}

export interface ClassifiedBlock extends Ordered {
  readonly contentType: 'text' | 'register' | 'definition';
  readonly block: TextBlock;
}

export type ClassifiedItem = ClassifiedTable | ClassifiedFigure | ClassifiedBitmap | ClassifiedBlock;

export interface LowConfidenceNote {
  readonly pageNumber: number;
  readonly blockIndex: number;
  readonly assignedTo: 'table' | 'figure';
  readonly regionBBox: BBox;
  readonly reason: string;
}

export interface ClassifiedPage {
  readonly page: PageModel;
  readonly items: readonly ClassifiedItem[];
  readonly twoColumn: boolean;
  readonly demotedTables: number;
  readonly lowConfidence: readonly LowConfidenceNote[];
}
