import { config } from '../../config/index.js';
import type { ExtractionConfig } from '../../config/validation.js';
import type { PageModel, TableRegion, TextBlock } from '../../domain/entities/PageModel.js';
import { PageExtractionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { clusterDrawings } from './drawingClusters.js';
import { TextCleaner } from './TextCleaner.js';
import type { DocumentSource, RawPageContent, RawTable } from './types.js';

export class PageExtractor {
  private readonly options: ExtractionConfig;
  private readonly cleaner: TextCleaner;

  constructor(private readonly source: DocumentSource, options: Partial<ExtractionConfig> = {}) {
    this.options = { ...config.extraction, ...options };
    this.cleaner = new TextCleaner(this.options.noisePatterns);
  }

  async extract(pageNumber: number): Promise<PageModel> {
    let content: RawPageContent;
    let tables: RawTable[];

    try {
      [content, tables] = await Promise.all([
        this.source.pages.readPage(pageNumber),
        this.source.tables.readTables(pageNumber),
      ]);
    } catch (error) {
      if (error instanceof PageExtractionError) throw error;
      throw new PageExtractionError(
        error instanceof Error ? error.message : 'Page extraction failed',
        pageNumber,
        error
      );
    }

    const page: PageModel = {
      pageNumber,
      width: content.width,
      height: content.height,
      blocks: this.buildBlocks(content),
      tables: this.buildTables(tables),
      drawings: clusterDrawings(content.drawings, this.options.clusterPaddingPt),
      images: content.images.map((image, index) => ({
        index,
        bbox: image.bbox,
        width: image.width ?? image.bbox.x1 - image.bbox.x0,
        height: image.height ?? image.bbox.y1 - image.bbox.y0,
      })),
    };

    logger.trace(
      {
        pageNumber,
        blocks: page.blocks.length,
        tables: page.tables.length,
        drawings: page.drawings.length,
        images: page.images.length,
      },
      'Page extracted'
    );

    return page;
  }

  private buildBlocks(content: RawPageContent): TextBlock[] {
    const { headerMarginPt, footerMarginPt } = this.options;
    const blocks: TextBlock[] = [];

    for (const raw of content.blocks) {
      if (headerMarginPt > 0 && raw.bbox.y1 <= headerMarginPt) continue;
      if (footerMarginPt > 0 && raw.bbox.y0 >= content.height - footerMarginPt) continue;

      const text = this.cleaner.clean(raw.text);
      if (!text) continue;

      blocks.push({
        index: blocks.length,
        bbox: raw.bbox,
        text,
        fontSize: raw.fontSize,
        bold: raw.bold,
      });
    }

    return blocks;
  }

  private buildTables(tables: RawTable[]): TableRegion[] {
    const regions: TableRegion[] = [];

    for (const table of tables) {
      const rows = table.rows
        .map(row => row.map(cell => this.cleaner.cleanCell(cell)))
        .filter(row => row.some(cell => cell !== null));

      if (rows.length === 0) continue;

      regions.push({
        index: regions.length,
        bbox: table.bbox,
        rows,
        headerRows: table.headerRows,
      });
    }

    return regions;
  }
}
