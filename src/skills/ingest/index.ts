import type { Stats } from 'fs';
import { access, readdir, stat } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import { CONTENT_TYPES, type ContentType } from '../../domain/entities/Chunk.js';
import type { DocumentSource, TableGeometryReader } from '../../services/extraction/types.js';
import { ExtractionDumpSource } from '../../services/extraction/ExtractionDumpSource.js';
import { PdfjsDocumentSource } from '../../services/extraction/PdfjsDocumentSource.js';
import { chunkStats, searchableChunks } from '../../services/ingestion/ChunkValidator.js';
import { IngestionPipeline } from '../../services/ingestion/IngestionPipeline.js';
import { documentStem } from '../../services/structure/documentIdentity.js';
import { DocumentUnavailableError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ProgressReporter } from './reporters/ProgressReporter.js';
import { OutputWriter } from './reporters/OutputWriter.js';
import type { DocumentSummary, FileInfo, IngestConfig, IngestRunResult } from './types.js';

const TABLES_SUFFIX = '.tables.json';

const exists = async (path: string): Promise<boolean> =>
  access(path).then(
    () => true,
    () => false
  );

function supportedExtension(name: string): FileInfo['extension'] | null {
  if (name.toLowerCase().endsWith(TABLES_SUFFIX)) return null;
  const extension = extname(name).toLowerCase();
  return extension === '.pdf' || extension === '.json' ? extension : null;
}

/** Finds documents, runs the pipeline over each and writes the output files. */
export class DocumentIngestor {
  async scan(input: string): Promise<FileInfo[]> {
    let info: Stats;
    try {
      info = await stat(input);
    } catch (error) {
      throw new DocumentUnavailableError(`Input not found: ${input}`, error);
    }

    const paths = info.isDirectory()
      ? (await readdir(input)).sort().map(name => join(input, name))
      : [input];

    const files: FileInfo[] = [];
    for (const path of paths) {
      const name = basename(path);
      const extension = supportedExtension(name);
      if (!extension) {
        if (!info.isDirectory()) throw new DocumentUnavailableError(`Unsupported input type: ${name}`);
        continue;
      }

      const file: FileInfo = { path, name, extension };
      const tablesPath = join(dirname(path), `${documentStem(name)}${TABLES_SUFFIX}`);
      if (extension === '.pdf' && (await exists(tablesPath))) file.tablesPath = tablesPath;
      files.push(file);
    }

    logger.info({ input, files: files.length }, 'Input scanned');
    return files;
  }

  async open(file: FileInfo, tablesOverride?: string): Promise<DocumentSource> {
    if (file.extension === '.json') return ExtractionDumpSource.open(file.path);

    const tablesPath = tablesOverride ?? file.tablesPath;
    let tables: TableGeometryReader | undefined;
    if (tablesPath) {
      tables = (await ExtractionDumpSource.open(tablesPath)).tables;
      logger.debug({ file: file.name, tables: basename(tablesPath) }, 'Using table geometry dump');
    }
    return PdfjsDocumentSource.open(file.path, { tables });
  }

  async run(config: IngestConfig, reporter: ProgressReporter, signal?: AbortSignal): Promise<IngestRunResult> {
    reporter.update({ phase: 'scanning', current: 0, total: 0 });
    const files = await this.scan(config.input);
    reporter.complete(`Found ${files.length} documents`);

    const pipeline = new IngestionPipeline({ version: config.version });
    const writer = new OutputWriter(config.output);
    const documents: DocumentSummary[] = [];
    const byType: Record<ContentType, number> = { text: 0, table: 0, figure: 0, bitmap: 0, definition: 0, register: 0 };
    // An explicit table dump only makes sense for a single document
    const tablesOverride = files.length === 1 ? config.tables : undefined;

    for (let i = 0; i < files.length; i++) {
      const file = files[i];
      if (signal?.aborted) break;

      let source: DocumentSource | null = null;
      try {
        source = await this.open(file, tablesOverride);
        const result = await pipeline.run(source, {
          signal,
          maxPages: config.maxPages,
          onPage: progress =>
            reporter.update({
              phase: 'ingesting',
              current: i + 1,
              total: files.length,
              currentFile: file.name,
              page: progress.pageNumber,
              lastPage: progress.lastPage,
            }),
        });

        reporter.update({ phase: 'writing', current: i + 1, total: files.length, currentFile: file.name });
        const outputs = await writer.write(result);

        const stats = chunkStats(result.chunks);
        for (const type of CONTENT_TYPES) byType[type] += stats.byType[type];

        documents.push({
          fileName: file.name,
          status: result.coverage.cancelled ? 'cancelled' : 'processed',
          documentId: result.documentId,
          version: result.version,
          pages: result.coverage.lastPage,
          chunks: result.chunks.length,
          searchable: searchableChunks(result.chunks).length,
          glossaryTerms: result.glossary.size,
          gaps: result.coverage.gaps.length,
          outputs,
        });

        if (result.coverage.gaps.length > 0) {
          reporter.warn(`${file.name}: ${result.coverage.gaps.length} unreadable pages skipped`);
        }
        reporter.complete(`${file.name}: ${result.chunks.length} chunks`);
      } catch (error) {
        logger.error({ file: file.name, error }, 'Document ingestion failed');
        reporter.error(`${file.name}: ${error instanceof Error ? error.message : String(error)}`);
        documents.push({
          fileName: file.name,
          status: 'failed',
          error: error instanceof Error ? error.message : String(error),
        });
      } finally {
        await source?.close();
      }
    }

    return {
      config,
      documents,
      summary: {
        total: files.length,
        processed: documents.filter(doc => doc.status === 'processed').length,
        cancelled: documents.filter(doc => doc.status === 'cancelled').length,
        failed: documents.filter(doc => doc.status === 'failed').length,
        chunks: documents.reduce((sum, doc) => sum + (doc.chunks ?? 0), 0),
        byType,
      },
    };
  }
}
