export { config } from './config/index.js';
export type { Config } from './config/validation.js';
export * from './domain/entities/index.js';
export * from './domain/geometry.js';
export { ExtractionDumpSource } from './services/extraction/ExtractionDumpSource.js';
export { PdfjsDocumentSource, type PdfjsSourceOptions } from './services/extraction/PdfjsDocumentSource.js';
export { PageExtractor } from './services/extraction/PageExtractor.js';
export type { DocumentSource, PageContentReader, TableGeometryReader } from './services/extraction/types.js';
export { StructureExtractor, isTableOfContentsPage } from './services/structure/StructureExtractor.js';
export { ContentClassifier } from './services/classification/ContentClassifier.js';
export { createTokenCounter, CharTokenCounter, TiktokenCounter } from './services/chunking/TokenCounter.js';
export {
  IngestionPipeline,
  type Coverage,
  type IngestionResult,
  type PipelineOptions,
  type RunOptions,
} from './services/ingestion/IngestionPipeline.js';
export { Glossary, type GlossaryEntry } from './services/ingestion/Glossary.js';
export { chunkStats, searchableChunks, validateChunk } from './services/ingestion/ChunkValidator.js';
export * from './utils/errors.js';
