import { logger } from '../../utils/logger.js';
import type { TokenCounter } from './types.js';

/**
 * Splits oversized prose at sentence boundaries, falling back to lines and
 * finally to character windows. Pieces never exceed `maxTokens` except when a
 * single character window cannot be made smaller.
 */
export class TokenSplitter {
  constructor(
    private readonly counter: TokenCounter,
    private readonly maxTokens: number,
    private readonly overlapTokens = 0
  ) {}

  split(text: string): string[] {
    if (!text.trim()) return [];

    const tokenCount = this.counter.count(text);
    if (tokenCount <= this.maxTokens) return [text];

    logger.warn(
      { tokens: tokenCount, maxTokens: this.maxTokens },
      'Text exceeds token ceiling, splitting at sentence boundaries'
    );

    return this.recursiveSplit(text, 0);
  }

  private recursiveSplit(text: string, depth: number): string[] {
    const pieces = this.findSentenceBoundaries(text);

    if (pieces.length > 1 && depth < 5) {
      return pieces.flatMap(piece =>
        this.counter.count(piece) <= this.maxTokens ? [piece] : this.recursiveSplit(piece, depth + 1)
      );
    }

    return this.characterSplit(text);
  }

  private findSentenceBoundaries(text: string): string[] {
    const sentences = text.split(/(?<=[.!?])\s+/);

    if (sentences.length <= 1) {
      return this.splitByLines(text);
    }

    return this.pack(sentences, ' ');
  }

  private splitByLines(text: string): string[] {
    const lines = text.split(/\n+/);

    if (lines.length <= 1) {
      return [text];
    }

    return this.pack(lines, '\n');
  }

  private pack(units: string[], joiner: string): string[] {
    const chunks: string[] = [];
    let current: string[] = [];
    let currentTokens = 0;

    for (const unit of units) {
      const unitTokens = this.counter.count(unit);

      if (currentTokens + unitTokens > this.maxTokens && current.length > 0) {
        chunks.push(this.applyOverlap(current.join(joiner), chunks[chunks.length - 1]));
        current = [unit];
        currentTokens = unitTokens;
      } else {
        current.push(unit);
        currentTokens += unitTokens;
      }
    }

    if (current.length > 0) {
      chunks.push(this.applyOverlap(current.join(joiner), chunks[chunks.length - 1]));
    }

    return chunks.length > 0 ? chunks : [units.join(joiner)];
  }

  private characterSplit(text: string): string[] {
    const chunks: string[] = [];
    let startPos = 0;

    while (startPos < text.length) {
      let endPos = Math.min(startPos + this.maxTokens * 4, text.length);
      let chunkText = text.substring(startPos, endPos);

      while (this.counter.count(chunkText) > this.maxTokens && endPos > startPos + 100) {
        endPos = Math.floor((startPos + endPos) / 2);
        chunkText = text.substring(startPos, endPos);
      }

      chunks.push(chunkText);
      if (endPos >= text.length) break;
      startPos = Math.max(startPos + 1, endPos - this.overlapTokens * 4);
    }

    return chunks;
  }

  private applyOverlap(currentChunk: string, previousChunk?: string): string {
    if (!previousChunk || this.overlapTokens === 0) {
      return currentChunk;
    }

    const sentences = previousChunk.split(/(?<=[.!?])\s+/);
    let overlapText = '';
    let overlapTokenCount = 0;

    for (let i = sentences.length - 1; i >= 0; i--) {
      const sentence = sentences[i];
      const tokens = this.counter.count(sentence);

      if (overlapTokenCount + tokens <= this.overlapTokens) {
        overlapText = sentence + ' ' + overlapText;
        overlapTokenCount += tokens;
      } else {
        break;
      }
    }

    return overlapText.trim() ? overlapText.trim() + ' ' + currentChunk : currentChunk;
  }
}
