import type { ContentType } from '../../domain/entities/Chunk.js';

export interface IngestConfig {
  /** A .pdf or .json extraction dump, or a folder of them. */
  input: string;
  output: string;
  /** Table geometry dump for a single PDF input. */
  tables?: string;
  version?: string;
  maxPages?: number;
  format: 'table' | 'json';
}

export interface FileInfo {
  path: string;
  name: string;
  extension: '.pdf' | '.json';
  /** Sibling `<stem>.tables.json` for a PDF, when present. */
  tablesPath?: string;
}

export interface IngestProgress {
  phase: 'scanning' | 'ingesting' | 'writing';
  current: number;
  total: number;
  currentFile?: string;
  page?: number;
  lastPage?: number;
}

export interface OutputFiles {
  chunks: string;
  glossary: string;
  report: string;
}

export interface DocumentSummary {
  fileName: string;
  status: 'processed' | 'cancelled' | 'failed';
  documentId?: string;
  version?: string;
  pages?: number;
  chunks?: number;
  searchable?: number;
  glossaryTerms?: number;
  gaps?: number;
  outputs?: OutputFiles;
  error?: string;
}

export interface IngestRunResult {
  config: IngestConfig;
  documents: DocumentSummary[];
  summary: {
    total: number;
    processed: number;
    cancelled: number;
    failed: number;
    chunks: number;
    byType: Record<ContentType, number>;
  };
}
