import { z } from 'zod';

export const CONTENT_TYPES = ['text', 'table', 'figure', 'bitmap', 'definition', 'register'] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export interface Chunk {
  readonly chunkId: string;
  readonly documentId: string;
  readonly source: string;
  readonly version: string;
  readonly pageStart: number;
  readonly pageEnd: number;
  readonly sectionPath: readonly string[];
  readonly sectionTitle: string;
  /** 0 for front matter. */
  readonly headingLevel: number;
  readonly contentType: ContentType;
  readonly isFrontMatter: boolean;
  /** Position of the chunk within its section. */
  readonly chunkIndex: number;
  /** Context header plus body: what gets embedded. */
  readonly text: string;
  /** Body without the context header. */
  readonly rawText: string;
  readonly tableMarkdown?: string;
  readonly tableNotes?: string;
  readonly figureCaption?: string;
  readonly term?: string;
  readonly hasInlineDefinition?: boolean;
  readonly parentChunkId?: string;
  readonly isRowChunk?: boolean;
}

export const chunkRecordSchema = z.object({
  chunk_id: z.string().min(1),
  document_id: z.string().min(1),
  source: z.string(),
  version: z.string(),
  page_start: z.number().int().positive(),
  page_end: z.number().int().positive(),
  section_path: z.array(z.string()),
  section_title: z.string(),
  heading_level: z.number().int().nonnegative(),
  content_type: z.enum(CONTENT_TYPES),
  is_front_matter: z.boolean(),
  chunk_index: z.number().int().nonnegative(),
  text: z.string(),
  raw_text: z.string(),
  table_markdown: z.string().optional(),
  table_notes: z.string().optional(),
  figure_caption: z.string().optional(),
  term: z.string().optional(),
  has_inline_definition: z.boolean().optional(),
  parent_chunk_id: z.string().optional(),
  is_row_chunk: z.boolean().optional(),
});

export type ChunkRecord = z.infer<typeof chunkRecordSchema>;

export function toChunkRecord(chunk: Chunk): ChunkRecord {
  const record: ChunkRecord = {
    chunk_id: chunk.chunkId,
    document_id: chunk.documentId,
    source: chunk.source,
    version: chunk.version,
    page_start: chunk.pageStart,
    page_end: chunk.pageEnd,
    section_path: [...chunk.sectionPath],
    section_title: chunk.sectionTitle,
    heading_level: chunk.headingLevel,
    content_type: chunk.contentType,
    is_front_matter: chunk.isFrontMatter,
    chunk_index: chunk.chunkIndex,
    text: chunk.text,
    raw_text: chunk.rawText,
  };

  if (chunk.tableMarkdown !== undefined) record.table_markdown = chunk.tableMarkdown;
  if (chunk.tableNotes !== undefined) record.table_notes = chunk.tableNotes;
  if (chunk.figureCaption !== undefined) record.figure_caption = chunk.figureCaption;
  if (chunk.term !== undefined) record.term = chunk.term;
  if (chunk.hasInlineDefinition !== undefined) record.has_inline_definition = chunk.hasInlineDefinition;
  if (chunk.parentChunkId !== undefined) record.parent_chunk_id = chunk.parentChunkId;
  if (chunk.isRowChunk !== undefined) record.is_row_chunk = chunk.isRowChunk;

  return record;
}
