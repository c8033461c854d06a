import type { ContentType } from '../../domain/entities/Chunk.js';

/** The section a chunk belongs to, flattened so builder state stays serializable. */
export interface SectionContext {
  /** Stable identity: 'front-matter' or 's<section id>'. */
  readonly key: string;
  readonly path: readonly string[];
  readonly title: string;
  readonly level: number;
  readonly label: string;
  readonly isFrontMatter: boolean;
}

/** A chunk as a builder emits it; the orchestrator finalizes ordering and indexes. */
export interface ChunkDraft {
  readonly chunkId: string;
  readonly contentType: ContentType;
  readonly section: SectionContext;
  readonly headingLevel: number;
  readonly pageStart: number;
  readonly pageEnd: number;
  /** Reading-order position on the start page. */
  readonly anchor: number;
  readonly text: string;
  readonly rawText: string;
  readonly tableMarkdown?: string;
  readonly tableNotes?: string;
  readonly figureCaption?: string;
  readonly term?: string;
  readonly definition?: string;
  readonly hasInlineDefinition?: boolean;
  readonly parentChunkId?: string;
  readonly isRowChunk?: boolean;
}

export interface TokenCounter {
  count(text: string): number;
  dispose(): void;
}
