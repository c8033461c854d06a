import { sectionLabel, type SectionNode } from '../../domain/entities/Section.js';
import { generateId } from '../../utils/ids.js';
import type { ChunkDraft, SectionContext } from './types.js';

export interface DocumentContext {
  readonly documentId: string;
  readonly source: string;
  readonly version: string;
  /** Document name shown in context headers. */
  readonly title: string;
}

export type DraftFields = Omit<ChunkDraft, 'chunkId' | 'text'> & {
  chunkId?: string;
  /** Text after the context header when it differs from rawText. */
  body?: string;
};

export function sectionContext(section: SectionNode | null | undefined, bodyStartPage: number): SectionContext {
  if (!section) {
    return { key: 'front-matter', path: [], title: '', level: 0, label: sectionLabel(null), isFrontMatter: true };
  }

  const isFrontMatter = section.pageStart < bodyStartPage;
  return {
    key: `s${section.id}`,
    path: section.path,
    title: section.title,
    level: isFrontMatter ? 0 : section.level,
    label: sectionLabel(section),
    isFrontMatter,
  };
}

export class ChunkFactory {
  constructor(readonly document: DocumentContext) {}

  /** `[<title> <version> | <section label> | Page <n>]` */
  contextHeader(section: SectionContext, page: number): string {
    const { title, version } = this.document;
    const name = version && version !== 'unknown' ? `${title} ${version}` : title;
    return `[${name} | ${section.label} | Page ${page}]`;
  }

  create(fields: DraftFields): ChunkDraft {
    const { body, chunkId, ...rest } = fields;
    return {
      ...rest,
      chunkId: chunkId ?? generateId('chunk'),
      text: `${this.contextHeader(fields.section, fields.pageStart)}\n${body ?? fields.rawText}`,
    };
  }
}
