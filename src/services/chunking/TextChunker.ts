import { config } from '../../config/index.js';
import type { ChunkingConfig } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import type { ChunkFactory } from './ChunkFactory.js';
import { continuedHeader, continuesRegister, splitRegister } from './registerSplitter.js';
import { TokenSplitter } from './TokenSplitter.js';
import type { ChunkDraft, SectionContext, TokenCounter } from './types.js';

export interface TextItem {
  text: string;
  contentType: 'text' | 'register';
  section: SectionContext;
  page: number;
  order: number;
  /** Heading level when the block is a heading, null for body text. */
  headingLevel: number | null;
}

export interface SizedTextItem extends TextItem {
  size: number;
}

/** Accumulated prose or register text. Plain data, safe to serialize. */
export interface TextBuffer {
  readonly section: SectionContext;
  readonly contentType: 'text' | 'register';
  readonly headingLevel: number;
  readonly pageStart: number;
  readonly pageEnd: number;
  readonly anchor: number;
  readonly parts: readonly string[];
  readonly size: number;
}

export type FlushReason =
  | 'section-change'
  | 'heading-level-change'
  | 'content-type-change'
  | 'high-water'
  | 'register-ceiling'
  | 'end-of-input';

export type FlushLimits = Pick<ChunkingConfig, 'highWaterTokens' | 'registerCeilingTokens'>;

const SENTENCE_END = /[.!?:;)\]"']$/;
const PARAGRAPH_START = /^(?:[A-Z0-9("'[]|[*\-]\s)/;
const CONTINUATION_END = /[A-Za-z0-9,\-]$/;
const CONTINUATION_START = /^[a-z]/;

export function startsNewParagraph(previous: string, next: string): boolean {
  return SENTENCE_END.test(previous.trimEnd()) && PARAGRAPH_START.test(next.trimStart());
}

/** Parts that continue a sentence are joined with a space, others with a line break. */
export function joinParts(parts: readonly string[]): string {
  return parts.reduce((text, part, i) => {
    if (i === 0) return part;
    const joiner = CONTINUATION_END.test(text) && CONTINUATION_START.test(part) ? ' ' : '\n';
    return text + joiner + part;
  }, '');
}

/**
 * Whether the buffer must be emitted before `next` is added. Page boundaries
 * are never a reason.
 */
export function decideFlush(
  buffer: TextBuffer | null,
  next: SizedTextItem,
  limits: FlushLimits
): FlushReason | null {
  if (!buffer) return null;
  if (next.section.key !== buffer.section.key) return 'section-change';
  if (next.headingLevel !== null && next.headingLevel !== buffer.headingLevel) return 'heading-level-change';
  if (next.contentType !== buffer.contentType) return 'content-type-change';

  if (buffer.contentType === 'register') {
    return buffer.size + next.size > limits.registerCeilingTokens ? 'register-ceiling' : null;
  }

  const last = buffer.parts[buffer.parts.length - 1] ?? '';
  if (buffer.size >= limits.highWaterTokens && startsNewParagraph(last, next.text)) {
    return 'high-water';
  }
  return null;
}

export function appendToBuffer(buffer: TextBuffer | null, next: SizedTextItem): TextBuffer {
  if (!buffer) {
    return {
      section: next.section,
      contentType: next.contentType,
      headingLevel: next.headingLevel ?? next.section.level,
      pageStart: next.page,
      pageEnd: next.page,
      anchor: next.order,
      parts: [next.text],
      size: next.size,
    };
  }
  return {
    ...buffer,
    pageEnd: Math.max(buffer.pageEnd, next.page),
    parts: [...buffer.parts, next.text],
    size: buffer.size + next.size,
  };
}

/**
 * Accumulates prose and register blocks across pages and emits chunks when a
 * flush rule fires.
 */
export class TextChunker {
  private buffer: TextBuffer | null = null;
  private readonly options: ChunkingConfig;
  private readonly splitter: TokenSplitter;

  constructor(
    private readonly factory: ChunkFactory,
    private readonly counter: TokenCounter,
    options: Partial<ChunkingConfig> = {}
  ) {
    this.options = { ...config.chunking, ...options };
    this.splitter = new TokenSplitter(counter, this.options.textCeilingTokens, this.options.overlapTokens);
  }

  get state(): TextBuffer | null {
    return this.buffer;
  }

  consume(item: TextItem): ChunkDraft[] {
    const next: SizedTextItem = { ...item, size: this.counter.count(item.text) };
    const reason = decideFlush(this.buffer, next, this.options);
    const carried = reason === 'register-ceiling' ? this.carryRegisterHeader(next) : next;
    const emitted = reason ? this.emit(reason) : [];
    this.buffer = appendToBuffer(this.buffer, carried);
    return emitted;
  }

  flush(): ChunkDraft[] {
    return this.emit('end-of-input');
  }

  /** A register cut at the ceiling keeps its header on the next fragment. */
  private carryRegisterHeader(next: SizedTextItem): SizedTextItem {
    const first = this.buffer?.parts[0];
    if (first === undefined || !continuesRegister(next.text)) return next;

    const text = `${continuedHeader(first)}\n${next.text}`;
    return { ...next, text, size: this.counter.count(text) };
  }

  private emit(reason: FlushReason): ChunkDraft[] {
    const buffer = this.buffer;
    this.buffer = null;
    if (!buffer) return [];

    const text = joinParts(buffer.parts);
    const pieces =
      buffer.contentType === 'register'
        ? splitRegister(text, this.counter, this.options.registerCeilingTokens)
        : this.splitter.split(text);

    logger.trace(
      { reason, section: buffer.section.label, pages: [buffer.pageStart, buffer.pageEnd], pieces: pieces.length },
      'Text buffer flushed'
    );

    return pieces.map(piece =>
      this.factory.create({
        contentType: buffer.contentType,
        section: buffer.section,
        headingLevel: buffer.headingLevel,
        pageStart: buffer.pageStart,
        pageEnd: buffer.pageEnd,
        anchor: buffer.anchor,
        rawText: piece,
      })
    );
  }
}
