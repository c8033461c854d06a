import type { Chunk, ContentType } from '../../domain/entities/Chunk.js';

/** Minimum body characters, after noise removal, for a chunk to be worth retrieving. */
const MIN_CONTENT_CHARS: Record<ContentType, number> = {
  text: 20,
  table: 80,
  figure: 30,
  bitmap: 30,
  definition: 8,
  register: 40,
};
const MIN_ROW_CHUNK_CHARS = 25;

const NOISE_LINES = [
  /^\(?cont(?:'|\u2019)?d\.?\)?$/i,
  /^\(?continued\)?$/i,
  /^page \d+( of \d+)?$/i,
  /^[-_=.\s]+$/,
];

export type ChunkVerdict = { valid: true } | { valid: false; reason: string };

export interface ChunkStats {
  total: number;
  searchable: number;
  invalid: number;
  frontMatter: number;
  inlineDefinitionSources: number;
  rowChunks: number;
  byType: Record<ContentType, number>;
  averageChars: number;
}

export function contentLength(rawText: string): number {
  return rawText
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !NOISE_LINES.some(pattern => pattern.test(line)))
    .join('\n').length;
}

export function validateChunk(chunk: Chunk): ChunkVerdict {
  const minimum = chunk.isRowChunk ? MIN_ROW_CHUNK_CHARS : MIN_CONTENT_CHARS[chunk.contentType];
  const length = contentLength(chunk.rawText);
  if (length === 0) return { valid: false, reason: 'empty after noise removal' };
  if (length < minimum) {
    return { valid: false, reason: `${chunk.contentType} content ${length} chars, minimum ${minimum}` };
  }
  return { valid: true };
}

/**
 * Chunks worth indexing: body content only, valid, and with full tables left
 * out where their row-group chunks exist.
 */
export function searchableChunks(chunks: readonly Chunk[]): Chunk[] {
  const parents = new Set(
    chunks.map(chunk => chunk.parentChunkId).filter((id): id is string => id !== undefined)
  );
  return chunks.filter(
    chunk => !chunk.isFrontMatter && !parents.has(chunk.chunkId) && validateChunk(chunk).valid
  );
}

export function chunkStats(chunks: readonly Chunk[]): ChunkStats {
  const byType: Record<ContentType, number> = { text: 0, table: 0, figure: 0, bitmap: 0, definition: 0, register: 0 };
  let invalid = 0;
  let chars = 0;

  for (const chunk of chunks) {
    byType[chunk.contentType] += 1;
    chars += chunk.rawText.length;
    if (!validateChunk(chunk).valid) invalid += 1;
  }

  return {
    total: chunks.length,
    searchable: searchableChunks(chunks).length,
    invalid,
    frontMatter: chunks.filter(chunk => chunk.isFrontMatter).length,
    inlineDefinitionSources: chunks.filter(chunk => chunk.hasInlineDefinition === true).length,
    rowChunks: chunks.filter(chunk => chunk.isRowChunk === true).length,
    byType,
    averageChars: chunks.length > 0 ? Math.round(chars / chunks.length) : 0,
  };
}
