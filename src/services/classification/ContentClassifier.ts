import { config } from '../../config/index.js';
import type { ClassificationConfig } from '../../config/validation.js';
import { center, containsPoint, isNearBoundary, type BBox } from '../../domain/geometry.js';
import type { PageModel, TableRegion, TextBlock } from '../../domain/entities/PageModel.js';
import type { SectionNode } from '../../domain/entities/Section.js';
import { logger } from '../../utils/logger.js';
import { cellText, hasDataRows, isPlausibleTable } from '../chunking/tableGrid.js';
import { isRegisterText } from './registerSignature.js';
import type {
  ClassifiedBlock,
  ClassifiedItem,
  ClassifiedPage,
  LowConfidenceNote,
} from './types.js';

type Unordered<T> = T extends ClassifiedItem ? Omit<T, 'order'> : never;

/**
 * Assigns every piece of page content exactly one content type. Rules are
 * evaluated in priority order and the first match wins:
 *
 * 1. table regions with data rows (interior blocks are suppressed)
 * 2. drawing clusters above the figure area threshold (interior blocks become annotations)
 * 3. image regions
 * 4. blocks in a terminology section
 * 5. blocks with a register bit-field signature
 * 6. everything else is prose
 *
 * Containment is judged by the block's geometric center, with a tolerance
 * band around each region.
 */
export class ContentClassifier {
  private readonly options: ClassificationConfig;

  constructor(options: Partial<ClassificationConfig> = {}) {
    this.options = { ...config.classification, ...options };
  }

  isDefinitionSection(section: SectionNode | null | undefined): boolean {
    if (!section) return false;
    const title = section.title.toLowerCase();
    return this.options.definitionSectionKeywords.some(keyword => title.includes(keyword.toLowerCase()));
  }

  /** Rules 5 and 6 for a single block. */
  classifyBlockText(block: TextBlock): 'register' | 'text' {
    return isRegisterText(block.text) ? 'register' : 'text';
  }

  classify(page: PageModel, section: SectionNode | null): ClassifiedPage {
    const tolerance = this.options.containmentTolerancePt;
    const lowConfidence: LowConfidenceNote[] = [];
    const items: Array<Unordered<ClassifiedItem>> = [];

    const note = (block: TextBlock, assignedTo: 'table' | 'figure', region: BBox): void => {
      if (!isNearBoundary(region, center(block.bbox), tolerance)) return;
      const entry: LowConfidenceNote = {
        pageNumber: page.pageNumber,
        blockIndex: block.index,
        assignedTo,
        regionBBox: region,
        reason: 'block center within tolerance of region edge',
      };
      lowConfidence.push(entry);
      logger.debug(entry, 'Low-confidence classification');
    };

    // Rule 1
    const claimedTables: TableRegion[] = [];
    const demotedTables: TableRegion[] = [];
    for (const table of page.tables) {
      if (hasDataRows(table.rows, table.headerRows) && isPlausibleTable(table.rows)) {
        claimedTables.push(table);
        items.push({ contentType: 'table', region: table });
      } else {
        demotedTables.push(table);
      }
    }

    const remaining: TextBlock[] = [];
    for (const block of page.blocks) {
      const table = claimedTables.find(t => containsPoint(t.bbox, center(block.bbox), tolerance));
      if (table) {
        note(block, 'table', table.bbox);
      } else {
        remaining.push(block);
      }
    }

    for (const table of demotedTables) {
      const covered = remaining.some(block => containsPoint(table.bbox, center(block.bbox), tolerance));
      logger.debug(
        { pageNumber: page.pageNumber, tableIndex: table.index, covered },
        'Malformed table region demoted to text'
      );
      if (covered) continue;
      const text = table.rows
        .map(row => row.map(cellText).filter(cell => cell.length > 0).join(' '))
        .filter(line => line.length > 0)
        .join('\n');
      if (text) {
        remaining.push({ index: page.blocks.length + table.index, bbox: table.bbox, text });
      }
    }

    // Rule 2
    const figures = page.drawings.filter(
      drawing =>
        drawing.area >= this.options.minFigureArea &&
        !claimedTables.some(t => containsPoint(t.bbox, center(drawing.bbox), tolerance))
    );
    const annotations = new Map<number, TextBlock[]>(figures.map(figure => [figure.index, []]));
    const flowing: TextBlock[] = [];
    for (const block of remaining) {
      const figure = figures.find(f => containsPoint(f.bbox, center(block.bbox), tolerance));
      if (figure) {
        note(block, 'figure', figure.bbox);
        annotations.get(figure.index)?.push(block);
      } else {
        flowing.push(block);
      }
    }
    for (const figure of figures) {
      items.push({ contentType: 'figure', region: figure, annotations: annotations.get(figure.index) ?? [] });
    }

    // Rule 3
    for (const image of page.images) {
      items.push({ contentType: 'bitmap', region: image });
    }

    // Rules 4-6
    const terminology = this.isDefinitionSection(section);
    for (const block of flowing) {
      const contentType: ClassifiedBlock['contentType'] = terminology
        ? 'definition'
        : this.classifyBlockText(block);
      items.push({ contentType, block });
    }

    const twoColumn = this.isTwoColumn(page);
    const ordered = this.readingOrder(items, page, twoColumn);

    return {
      page,
      items: ordered,
      twoColumn,
      demotedTables: demotedTables.length,
      lowConfidence,
    };
  }

  private isTwoColumn(page: PageModel): boolean {
    const midline = page.width / 2;
    const left = page.blocks.filter(block => block.bbox.x1 <= midline).length;
    const right = page.blocks.filter(block => block.bbox.x0 >= midline).length;
    return left >= this.options.minColumnBlocks && right >= this.options.minColumnBlocks;
  }

  private readingOrder(
    items: Array<Unordered<ClassifiedItem>>,
    page: PageModel,
    twoColumn: boolean
  ): ClassifiedItem[] {
    const midline = page.width / 2;
    const boxOf = (item: Unordered<ClassifiedItem>): BBox =>
      'region' in item ? item.region.bbox : item.block.bbox;
    const column = (box: BBox): number => (twoColumn && center(box).x > midline ? 1 : 0);

    return items
      .map((item, position) => ({ item, box: boxOf(item), position }))
      .sort(
        (a, b) =>
          column(a.box) - column(b.box) ||
          a.box.y0 - b.box.y0 ||
          a.box.x0 - b.box.x0 ||
          a.position - b.position
      )
      .map(({ item }, order) => ({ ...item, order }));
  }
}
