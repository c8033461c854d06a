import { logger } from '../../utils/logger.js';
import type { ChunkFactory } from './ChunkFactory.js';
import type { ChunkDraft, SectionContext } from './types.js';

const TERM_COLON = /^([A-Za-z][A-Za-z0-9_/.+\-]{0,30}(?: [A-Za-z0-9_/.+\-]+){0,3})\s*:\s+(.{2,})$/;
const TERM_DASH = /^([A-Z][A-Za-z0-9_/.+\-]{0,30})\s+[-\u2013\u2014]\s+(.{2,})$/;
const NUMBERED_TERM = /^\d+(?:\.\d+)+\.?\s+(\S.{0,79})$/;

const INLINE_PHRASE = /\b(?:means|is defined as|refers to)\b/i;
const SENTENCE_BREAK = /(?<=[.!?])\s+/;
const MAX_TERM_WORDS = 4;
const MIN_DEFINITION_LENGTH = 5;

/** Words that end a noun phrase when walking back from the defining phrase. */
const PHRASE_BOUNDARY = new Set([
  'the', 'a', 'an', 'this', 'that', 'these', 'those', 'it', 'its', 'their',
  'in', 'of', 'for', 'to', 'with', 'by', 'on', 'at', 'as', 'and', 'or',
  'term', 'word', 'phrase', 'expression', 'where', 'here',
]);
/** Relative pronouns and adverbs between a term and its defining phrase. */
const TRAILING_FILLER = new Set([
  'which', 'that', 'who', 'also', 'herein', 'simply', 'then', 'therefore',
  'usually', 'typically', 'generally', 'always', 'thus',
]);

export interface DefinitionItem {
  text: string;
  section: SectionContext;
  page: number;
  order: number;
}

interface DefinitionLine {
  text: string;
  page: number;
  order: number;
}

interface TermEntry {
  term: string;
  parts: string[];
  page: number;
  pageEnd: number;
  order: number;
  /** The line that opened the entry, kept for entries that never get a definition. */
  opener: DefinitionLine;
}

/** Lines of a terminology section awaiting parsing. Plain data. */
export interface DefinitionBuffer {
  readonly section: SectionContext;
  readonly lines: readonly DefinitionLine[];
}

function cleanTerm(words: string[]): string {
  return words.join(' ').replace(/^\W+|\W+$/g, '');
}

/**
 * Noun phrase immediately before a defining phrase: trailing relative pronouns
 * are skipped, then up to four words are taken back to the nearest article,
 * preposition or clause punctuation.
 */
export function termBefore(prefix: string): string {
  const words = prefix.trim().split(/\s+/).filter(word => word.length > 0);
  while (words.length > 0 && TRAILING_FILLER.has(words[words.length - 1].toLowerCase())) words.pop();

  const phrase: string[] = [];
  for (let i = words.length - 1; i >= 0 && phrase.length < MAX_TERM_WORDS; i--) {
    const word = words[i];
    if (PHRASE_BOUNDARY.has(word.toLowerCase())) break;
    if (phrase.length > 0 && /[,;:()]$/.test(word)) break;
    phrase.unshift(word);
  }
  return cleanTerm(phrase);
}

export interface InlineDefinition {
  term: string;
  definition: string;
}

export function findInlineDefinitions(text: string): InlineDefinition[] {
  const found: InlineDefinition[] = [];
  for (const raw of text.split(SENTENCE_BREAK)) {
    const sentence = raw.replace(/\s+/g, ' ').trim();
    const match = INLINE_PHRASE.exec(sentence);
    if (!match) continue;

    const term = termBefore(sentence.slice(0, match.index));
    const definition = sentence
      .slice(match.index + match[0].length)
      .trim()
      .replace(/[.;:]+$/, '');
    if (!/[A-Za-z]/.test(term) || definition.length < MIN_DEFINITION_LENGTH) continue;
    found.push({ term, definition });
  }
  return found;
}

/**
 * Extracts term/definition pairs, both from terminology sections (line forms
 * `TERM: text`, `TERM - text`, or a numbered term heading followed by its
 * definition) and from inline phrasing in ordinary prose.
 */
export class DefinitionChunker {
  private buffer: DefinitionBuffer | null = null;

  constructor(private readonly factory: ChunkFactory) {}

  get state(): DefinitionBuffer | null {
    return this.buffer;
  }

  consume(item: DefinitionItem): ChunkDraft[] {
    const emitted = this.buffer && this.buffer.section.key !== item.section.key ? this.flush() : [];
    const lines = item.text
      .split('\n')
      .map(text => text.trim())
      .filter(text => text.length > 0)
      .map(text => ({ text, page: item.page, order: item.order }));

    this.buffer = {
      section: item.section,
      lines: [...(this.buffer?.lines ?? []), ...lines],
    };
    return emitted;
  }

  flush(): ChunkDraft[] {
    const buffer = this.buffer;
    this.buffer = null;
    if (!buffer || buffer.lines.length === 0) return [];

    const entries: TermEntry[] = [];
    const leftovers: DefinitionLine[] = [];
    let current: TermEntry | null = null;

    for (const line of buffer.lines) {
      const inline = TERM_COLON.exec(line.text) ?? TERM_DASH.exec(line.text);
      const heading = inline ? null : NUMBERED_TERM.exec(line.text);

      if (inline || heading) {
        current = {
          term: inline ? inline[1].trim() : (heading?.[1] ?? '').trim(),
          parts: inline ? [inline[2].trim()] : [],
          page: line.page,
          pageEnd: line.page,
          order: line.order,
          opener: line,
        };
        entries.push(current);
      } else if (current) {
        current.parts.push(line.text);
        current.pageEnd = line.page;
      } else {
        leftovers.push(line);
      }
    }

    const drafts: ChunkDraft[] = [];
    for (const entry of entries) {
      if (entry.parts.length === 0) {
        leftovers.push(entry.opener);
        continue;
      }
      const definition = entry.parts.join(' ');
      drafts.push(
        this.factory.create({
          contentType: 'definition',
          section: buffer.section,
          headingLevel: buffer.section.level,
          pageStart: entry.page,
          pageEnd: entry.pageEnd,
          anchor: entry.order,
          rawText: `${entry.term}: ${definition}`,
          term: entry.term,
          definition,
        })
      );
    }

    if (leftovers.length > 0) {
      leftovers.sort((a, b) => a.page - b.page || a.order - b.order);
      drafts.push(
        this.factory.create({
          contentType: 'text',
          section: buffer.section,
          headingLevel: buffer.section.level,
          pageStart: leftovers[0].page,
          pageEnd: leftovers[leftovers.length - 1].page,
          anchor: leftovers[0].order,
          rawText: leftovers.map(line => line.text).join('\n'),
        })
      );
    }

    logger.debug(
      { section: buffer.section.label, terms: entries.length, leftoverLines: leftovers.length },
      'Terminology section parsed'
    );
    return drafts;
  }

  /** Definition chunks for every inline definition in a prose chunk. */
  extractInline(source: ChunkDraft): ChunkDraft[] {
    return findInlineDefinitions(source.rawText).map(({ term, definition }) =>
      this.factory.create({
        contentType: 'definition',
        section: source.section,
        headingLevel: source.headingLevel,
        pageStart: source.pageStart,
        pageEnd: source.pageEnd,
        anchor: source.anchor,
        rawText: `${term}: ${definition}`,
        term,
        definition,
      })
    );
  }
}
