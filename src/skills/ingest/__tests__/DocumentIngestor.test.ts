import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { dumpPage } from '../../../__fixtures__/pages.js';
import { DocumentUnavailableError } from '../../../utils/errors.js';
import { DocumentIngestor } from '../index.js';
import { ProgressReporter } from '../reporters/ProgressReporter.js';

describe('DocumentIngestor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ingest-test-'));
    const dump = {
      source: 'notes-v1.2.pdf',
      page_count: 2,
      pages: [dumpPage(1, ['Alpha text.']), dumpPage(2, ['Beta text.'])],
    };
    await writeFile(join(dir, 'notes-v1.2.json'), JSON.stringify(dump), 'utf-8');
    await writeFile(join(dir, 'broken.json'), '{ not json', 'utf-8');
    await writeFile(join(dir, 'readme.txt'), 'ignored', 'utf-8');
    await writeFile(join(dir, 'other.tables.json'), '{}', 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('scans supported documents in name order', async () => {
    const files = await new DocumentIngestor().scan(dir);
    expect(files.map(file => [file.name, file.extension])).toEqual([
      ['broken.json', '.json'],
      ['notes-v1.2.json', '.json'],
    ]);
  });

  it('rejects a missing input', async () => {
    await expect(new DocumentIngestor().scan(join(dir, 'missing.pdf'))).rejects.toBeInstanceOf(
      DocumentUnavailableError
    );
  });

  it('writes chunks, glossary and report and keeps going past a failed document', async () => {
    const output = join(dir, 'out');
    const result = await new DocumentIngestor().run(
      { input: dir, output, format: 'json' },
      new ProgressReporter(false)
    );

    expect(result.summary).toMatchObject({ total: 2, processed: 1, failed: 1, cancelled: 0, chunks: 1 });
    expect(result.summary.byType.text).toBe(1);
    expect(result.documents[0]).toMatchObject({ fileName: 'broken.json', status: 'failed' });
    expect(result.documents[1]).toMatchObject({ fileName: 'notes-v1.2.json', status: 'processed', version: '1.2' });

    const lines = (await readFile(join(output, 'notes-v1.2_chunks.jsonl'), 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      content_type: 'text',
      page_start: 1,
      page_end: 2,
      section_path: ['0'],
      version: '1.2',
      raw_text: 'Alpha text.\nBeta text.',
    });

    expect(JSON.parse(await readFile(join(output, 'notes-v1.2_glossary.json'), 'utf-8'))).toEqual({});
    const report = JSON.parse(await readFile(join(output, 'notes-v1.2_report.json'), 'utf-8'));
    expect(report.coverage).toEqual({
      processed_pages: [1, 2],
      structural_pages: [],
      gaps: [],
      cancelled: false,
      last_page: 2,
    });
    expect(report.stats.total).toBe(1);
  });
});
