import { readFile } from 'fs/promises';
import { basename } from 'path';
import { ZodError } from 'zod';
import { bbox } from '../../domain/geometry.js';
import type { TocEntry } from '../../domain/entities/Section.js';
import { DocumentUnavailableError, PageExtractionError, ValidationError } from '../../utils/errors.js';
import { contentId } from '../../utils/ids.js';
import { logger } from '../../utils/logger.js';
import {
  extractionDumpSchema,
  type DumpPage,
  type ExtractionDump,
  type ExtractionDumpInput,
} from './dump.schema.js';
import type {
  DocumentSource,
  PageContentReader,
  RawPageContent,
  RawTable,
  TableGeometryReader,
} from './types.js';

/**
 * Document source backed by a JSON dump written by an external extractor
 * (one entry per page with blocks, tables, drawing elements and images).
 */
export class ExtractionDumpSource implements DocumentSource {
  readonly pages: PageContentReader;
  readonly tables: TableGeometryReader;
  private readonly byPage: Map<number, DumpPage>;

  private constructor(private readonly dump: ExtractionDump, readonly documentId: string) {
    this.byPage = new Map(dump.pages.map(page => [page.page, page]));
    this.pages = { readPage: async pageNumber => this.readPage(pageNumber) };
    this.tables = { readTables: async pageNumber => this.readTables(pageNumber) };
  }

  static async open(filePath: string): Promise<ExtractionDumpSource> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new DocumentUnavailableError(`Cannot read extraction dump: ${filePath}`, error);
    }

    try {
      const source = ExtractionDumpSource.fromDump(JSON.parse(content), contentId('doc', content));
      logger.debug(
        { file: basename(filePath), pages: source.pageCount, tocEntries: source.dump.toc.length },
        'Opened extraction dump'
      );
      return source;
    } catch (error) {
      throw new DocumentUnavailableError(`Invalid extraction dump: ${filePath}`, error);
    }
  }

  static fromDump(input: ExtractionDumpInput, documentId?: string): ExtractionDumpSource {
    try {
      const dump = extractionDumpSchema.parse(input);
      return new ExtractionDumpSource(dump, documentId ?? contentId('doc', JSON.stringify(input)));
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ValidationError('Extraction dump does not match the expected shape', error.issues);
      }
      throw error;
    }
  }

  get source(): string {
    return this.dump.source;
  }

  get version(): string | undefined {
    return this.dump.version;
  }

  get pageCount(): number {
    return this.dump.page_count;
  }

  async readToc(): Promise<TocEntry[]> {
    return this.dump.toc.map(entry => ({ ...entry }));
  }

  async close(): Promise<void> {
    this.byPage.clear();
  }

  private pageOrThrow(pageNumber: number): DumpPage {
    const page = this.byPage.get(pageNumber);
    if (!page) {
      throw new PageExtractionError('Page missing from extraction dump', pageNumber);
    }
    if (page.error) {
      throw new PageExtractionError(page.error, pageNumber);
    }
    return page;
  }

  private readPage(pageNumber: number): RawPageContent {
    const page = this.pageOrThrow(pageNumber);
    return {
      width: page.width,
      height: page.height,
      blocks: page.blocks.map(block => ({
        bbox: bbox(...block.bbox),
        text: block.text,
        fontSize: block.font_size,
        bold: block.bold,
      })),
      drawings: page.drawings.map(box => bbox(...box)),
      images: page.images.map(image => ({
        bbox: bbox(...image.bbox),
        width: image.width,
        height: image.height,
      })),
    };
  }

  private readTables(pageNumber: number): RawTable[] {
    return this.pageOrThrow(pageNumber).tables.map(table => ({
      bbox: bbox(...table.bbox),
      rows: table.rows.map(row => [...row]),
      headerRows: table.header_rows,
    }));
  }
}
