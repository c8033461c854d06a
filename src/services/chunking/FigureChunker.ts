import { config } from '../../config/index.js';
import type { FigureConfig } from '../../config/validation.js';
import type { DrawingRegion, ImageRegion, TextBlock } from '../../domain/entities/PageModel.js';
import { logger } from '../../utils/logger.js';
import type { ChunkFactory } from './ChunkFactory.js';
import { findCaption } from './TableChunker.js';
import type { ChunkDraft, SectionContext } from './types.js';

const FIGURE_CAPTION = /^Figure\s+[A-Z]?[\d.-]*\d\s*[-:\u2013\u2014]\s*\S.{3,}/i;
const NO_CAPTION = '[Figure without caption]';

export interface FigureContext {
  page: number;
  section: SectionContext;
  order: number;
  pageBlocks: readonly TextBlock[];
}

/** Emits figures and bitmaps as caption-led chunks. Holds no state across pages. */
export class FigureChunker {
  private readonly options: FigureConfig;

  constructor(private readonly factory: ChunkFactory, options: Partial<FigureConfig> = {}) {
    this.options = { ...config.figure, ...options };
  }

  figure(region: DrawingRegion, annotations: readonly TextBlock[], context: FigureContext): ChunkDraft[] {
    const caption = this.caption(region, context.pageBlocks);
    const labels = [...annotations]
      .sort((a, b) => a.bbox.y0 - b.bbox.y0 || a.bbox.x0 - b.bbox.x0)
      .map(block => block.text.trim())
      .filter(text => text.length > 0);

    if (caption === null && labels.length === 0) {
      logger.debug({ page: context.page, figure: region.index }, 'Figure without caption or annotations dropped');
      return [];
    }

    const rawText = [caption ?? NO_CAPTION, ...labels].join('\n');
    return [this.draft('figure', rawText, caption, context)];
  }

  bitmap(region: ImageRegion, context: FigureContext): ChunkDraft[] {
    const caption = this.caption(region, context.pageBlocks);
    if (caption === null) {
      logger.debug({ page: context.page, image: region.index }, 'Bitmap without caption dropped');
      return [];
    }
    return [this.draft('bitmap', caption, caption, context)];
  }

  private caption(region: DrawingRegion | ImageRegion, blocks: readonly TextBlock[]): string | null {
    return findCaption(region, blocks, FIGURE_CAPTION, this.options.captionMarginPt);
  }

  private draft(
    contentType: 'figure' | 'bitmap',
    rawText: string,
    caption: string | null,
    context: FigureContext
  ): ChunkDraft {
    const fields = {
      contentType,
      section: context.section,
      headingLevel: context.section.level,
      pageStart: context.page,
      pageEnd: context.page,
      anchor: context.order,
      rawText,
    };
    return this.factory.create(caption === null ? fields : { ...fields, figureCaption: caption });
  }
}
