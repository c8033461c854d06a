import { get_encoding, type Tiktoken } from 'tiktoken';
import { config } from '../../config/index.js';
import type { ChunkingConfig } from '../../config/validation.js';
import type { TokenCounter } from './types.js';

export class TiktokenCounter implements TokenCounter {
  private encoder: Tiktoken;

  constructor() {
    this.encoder = get_encoding('cl100k_base');
  }

  count(text: string): number {
    return this.encoder.encode(text).length;
  }

  dispose(): void {
    this.encoder.free();
  }
}

/** Token-equivalents from character length, four characters per token. */
export class CharTokenCounter implements TokenCounter {
  constructor(private readonly charsPerToken = 4) {}

  count(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }

  dispose(): void {}
}

export function createTokenCounter(
  tokenizer: ChunkingConfig['tokenizer'] = config.chunking.tokenizer
): TokenCounter {
  return tokenizer === 'chars' ? new CharTokenCounter() : new TiktokenCounter();
}
