import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { chunkRecordSchema, toChunkRecord } from '../../../domain/entities/Chunk.js';
import type { IngestionResult } from '../../../services/ingestion/IngestionPipeline.js';
import { chunkStats } from '../../../services/ingestion/ChunkValidator.js';
import { documentStem } from '../../../services/structure/documentIdentity.js';
import { logger } from '../../../utils/logger.js';
import type { OutputFiles } from '../types.js';

export function reportRecord(result: IngestionResult) {
  return {
    document_id: result.documentId,
    source: result.source,
    title: result.title,
    version: result.version,
    total_pages: result.totalPages,
    body_start_page: result.bodyStartPage,
    coverage: {
      processed_pages: result.coverage.processedPages,
      structural_pages: result.coverage.structuralPages,
      gaps: result.coverage.gaps,
      cancelled: result.coverage.cancelled,
      last_page: result.coverage.lastPage,
    },
    low_confidence: result.lowConfidence.map(note => ({
      page: note.pageNumber,
      block_index: note.blockIndex,
      assigned_to: note.assignedTo,
      region_bbox: [note.regionBBox.x0, note.regionBBox.y0, note.regionBBox.x1, note.regionBBox.y1],
      reason: note.reason,
    })),
    stats: chunkStats(result.chunks),
  };
}

/** Writes `<stem>_chunks.jsonl`, `<stem>_glossary.json` and `<stem>_report.json`. */
export class OutputWriter {
  constructor(private readonly dir: string) {}

  async write(result: IngestionResult): Promise<OutputFiles> {
    await mkdir(this.dir, { recursive: true });
    const stem = documentStem(result.source);
    const files: OutputFiles = {
      chunks: join(this.dir, `${stem}_chunks.jsonl`),
      glossary: join(this.dir, `${stem}_glossary.json`),
      report: join(this.dir, `${stem}_report.json`),
    };

    const lines = result.chunks.map(chunk => JSON.stringify(chunkRecordSchema.parse(toChunkRecord(chunk))));
    await writeFile(files.chunks, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf-8');
    await writeFile(files.glossary, JSON.stringify(result.glossary.toRecord(), null, 2), 'utf-8');
    await writeFile(files.report, JSON.stringify(reportRecord(result), null, 2), 'utf-8');

    logger.info({ documentId: result.documentId, ...files }, 'Output written');
    return files;
  }
}
