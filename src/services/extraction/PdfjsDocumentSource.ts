import { readFile } from 'fs/promises';
import { basename } from 'path';
import {
  getDocument,
  GlobalWorkerOptions,
  OPS,
  type PDFDocumentProxy,
  type PDFPageProxy,
} from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TocEntry } from '../../domain/entities/Section.js';
import { DocumentUnavailableError, PageExtractionError } from '../../utils/errors.js';
import { contentId } from '../../utils/ids.js';
import { logger } from '../../utils/logger.js';
import { collectGraphicRegions, type OperatorCodes, type ViewBox } from './graphicRegions.js';
import { groupIntoBlocks, type PositionedText } from './textGrouping.js';
import {
  noTables,
  type DocumentSource,
  type PageContentReader,
  type RawPageContent,
  type TableGeometryReader,
} from './types.js';

GlobalWorkerOptions.workerSrc = import.meta.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs');

const OPERATOR_CODES: OperatorCodes = {
  save: OPS.save,
  restore: OPS.restore,
  transform: OPS.transform,
  constructPath: OPS.constructPath,
  stroke: OPS.stroke,
  closeStroke: OPS.closeStroke,
  fill: OPS.fill,
  eoFill: OPS.eoFill,
  fillStroke: OPS.fillStroke,
  eoFillStroke: OPS.eoFillStroke,
  closeFillStroke: OPS.closeFillStroke,
  closeEOFillStroke: OPS.closeEOFillStroke,
  endPath: OPS.endPath,
  paintImageXObject: OPS.paintImageXObject,
  paintInlineImageXObject: OPS.paintInlineImageXObject,
  paintImageMaskXObject: OPS.paintImageMaskXObject,
};

interface OutlineItem {
  title: string;
  dest: string | unknown[] | null;
  items: OutlineItem[];
}

function isRef(value: unknown): value is { num: number; gen: number } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'num' in value &&
    'gen' in value &&
    typeof value.num === 'number' &&
    typeof value.gen === 'number'
  );
}

export interface PdfjsSourceOptions {
  /** Table geometry for the document; PDFs carry none that pdf.js exposes. */
  tables?: TableGeometryReader;
}

/**
 * Reads text blocks, vector drawing bounds, image placements and the outline
 * of a PDF with pdf.js.
 */
export class PdfjsDocumentSource implements DocumentSource {
  readonly pages: PageContentReader;
  readonly tables: TableGeometryReader;

  private constructor(
    private readonly doc: PDFDocumentProxy,
    readonly source: string,
    readonly documentId: string,
    tables: TableGeometryReader
  ) {
    this.pages = { readPage: pageNumber => this.readPage(pageNumber) };
    this.tables = tables;
  }

  static async open(filePath: string, options: PdfjsSourceOptions = {}): Promise<PdfjsDocumentSource> {
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(filePath));
    } catch (error) {
      throw new DocumentUnavailableError(`Cannot read PDF: ${filePath}`, error);
    }

    const documentId = contentId('doc', data);

    try {
      const doc = await getDocument({
        data,
        isEvalSupported: false,
        disableFontFace: true,
        useSystemFonts: false,
        verbosity: 0,
      }).promise;

      logger.debug({ file: basename(filePath), pages: doc.numPages }, 'Opened PDF');
      return new PdfjsDocumentSource(doc, basename(filePath), documentId, options.tables ?? noTables);
    } catch (error) {
      throw new DocumentUnavailableError(`Cannot open PDF: ${filePath}`, error);
    }
  }

  get pageCount(): number {
    return this.doc.numPages;
  }

  async readToc(): Promise<TocEntry[]> {
    const outline: OutlineItem[] = (await this.doc.getOutline()) ?? [];
    const entries: TocEntry[] = [];

    const walk = async (items: OutlineItem[], level: number): Promise<void> => {
      for (const item of items) {
        const page = await this.resolvePage(item.dest);
        if (page === null) {
          logger.warn({ title: item.title }, 'Outline entry without a resolvable destination');
        } else {
          entries.push({ level, title: item.title.trim(), page });
        }
        await walk(item.items, level + 1);
      }
    };

    await walk(outline, 1);
    return entries;
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }

  private async resolvePage(dest: string | unknown[] | null): Promise<number | null> {
    try {
      const explicit = typeof dest === 'string' ? await this.doc.getDestination(dest) : dest;
      if (!explicit || explicit.length === 0) return null;

      const target = explicit[0];
      if (typeof target === 'number') return target + 1;
      if (isRef(target)) return (await this.doc.getPageIndex(target)) + 1;
      return null;
    } catch (error) {
      logger.debug({ error }, 'Outline destination lookup failed');
      return null;
    }
  }

  private async readPage(pageNumber: number): Promise<RawPageContent> {
    let page: PDFPageProxy;
    try {
      page = await this.doc.getPage(pageNumber);
    } catch (error) {
      throw new PageExtractionError('pdf.js could not load the page', pageNumber, error);
    }

    try {
      const viewport = page.getViewport({ scale: 1 });
      const [vx0, vy0, vx1, vy1] = viewport.viewBox;
      const viewBox: ViewBox = [vx0, vy0, vx1, vy1];

      const [textContent, operatorList] = await Promise.all([
        page.getTextContent(),
        page.getOperatorList(),
      ]);

      const runs: PositionedText[] = [];
      for (const item of textContent.items) {
        if (!('str' in item) || !item.str.trim()) continue;
        const [, , c, d, e, f] = item.transform;
        const fontSize = Math.hypot(Number(c), Number(d)) || item.height || 1;
        const baseline = vy1 - Number(f);
        runs.push({
          text: item.str,
          x: Number(e) - vx0,
          top: baseline - fontSize,
          bottom: baseline + fontSize * 0.2,
          width: item.width,
          fontSize,
        });
      }

      const graphics = collectGraphicRegions(
        operatorList.fnArray,
        operatorList.argsArray,
        OPERATOR_CODES,
        viewBox
      );

      return {
        width: viewport.width,
        height: viewport.height,
        blocks: groupIntoBlocks(runs),
        drawings: graphics.drawings,
        images: graphics.images,
      };
    } finally {
      page.cleanup();
    }
  }
}
