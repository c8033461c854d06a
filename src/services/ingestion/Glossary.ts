import { z } from 'zod';

export interface GlossaryEntry {
  readonly term: string;
  readonly definition: string;
  readonly chunkId: string;
  readonly page: number;
  readonly sectionPath: readonly string[];
}

export const glossaryRecordSchema = z.record(
  z.object({
    term: z.string().min(1),
    definition: z.string(),
    chunk_id: z.string().min(1),
    page: z.number().int().positive(),
    section_path: z.array(z.string()),
  })
);

export type GlossaryRecord = z.infer<typeof glossaryRecordSchema>;

export const glossaryKey = (term: string): string => term.toLowerCase().replace(/\s+/g, ' ').trim();

/** Definition entries keyed by case-insensitive term. A later entry replaces an earlier one. */
export class Glossary {
  private readonly entries = new Map<string, GlossaryEntry>();

  add(entry: GlossaryEntry): void {
    const key = glossaryKey(entry.term);
    if (!key) return;
    // Re-insert so iteration order follows the latest write
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  get(term: string): GlossaryEntry | undefined {
    return this.entries.get(glossaryKey(term));
  }

  has(term: string): boolean {
    return this.entries.has(glossaryKey(term));
  }

  get size(): number {
    return this.entries.size;
  }

  terms(): string[] {
    return [...this.entries.values()].map(entry => entry.term);
  }

  values(): GlossaryEntry[] {
    return [...this.entries.values()];
  }

  toRecord(): GlossaryRecord {
    const record: GlossaryRecord = {};
    for (const [key, entry] of this.entries) {
      record[key] = {
        term: entry.term,
        definition: entry.definition,
        chunk_id: entry.chunkId,
        page: entry.page,
        section_path: [...entry.sectionPath],
      };
    }
    return record;
  }
}
