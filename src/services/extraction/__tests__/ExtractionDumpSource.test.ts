import { describe, it, expect } from 'vitest';
import { dumpPage } from '../../../__fixtures__/pages.js';
import { DocumentUnavailableError, PageExtractionError, ValidationError } from '../../../utils/errors.js';
import { ExtractionDumpSource } from '../ExtractionDumpSource.js';

describe('ExtractionDumpSource', () => {
  const source = ExtractionDumpSource.fromDump(
    {
      source: 'controller-spec.pdf',
      version: '2.1',
      page_count: 3,
      toc: [{ level: 1, title: '1 Scope', page: 2 }],
      pages: [
        dumpPage(1, ['Cover']),
        dumpPage(2, ['1 Scope'], {
          tables: [{ bbox: [72, 200, 520, 260], rows: [['Bit', 'Name'], ['0', null]], header_rows: 1 }],
          drawings: [[100, 300, 200, 400]],
          images: [{ bbox: [300, 300, 400, 380] }],
        }),
        { page: 3, width: 600, height: 800, error: 'Broken content stream' },
      ],
    },
    'doc-test'
  );

  it('exposes document metadata and the TOC', async () => {
    expect(source.documentId).toBe('doc-test');
    expect(source.source).toBe('controller-spec.pdf');
    expect(source.version).toBe('2.1');
    expect(source.pageCount).toBe(3);
    expect(await source.readToc()).toEqual([{ level: 1, title: '1 Scope', page: 2 }]);
  });

  it('reads page content and table geometry', async () => {
    const page = await source.pages.readPage(2);
    expect(page.blocks).toEqual([
      { bbox: { x0: 72, y0: 80, x1: 520, y1: 100 }, text: '1 Scope', fontSize: 10, bold: undefined },
    ]);
    expect(page.drawings).toEqual([{ x0: 100, y0: 300, x1: 200, y1: 400 }]);
    expect(page.images).toEqual([{ bbox: { x0: 300, y0: 300, x1: 400, y1: 380 }, width: undefined, height: undefined }]);

    const tables = await source.tables.readTables(2);
    expect(tables).toEqual([
      { bbox: { x0: 72, y0: 200, x1: 520, y1: 260 }, rows: [['Bit', 'Name'], ['0', null]], headerRows: 1 },
    ]);
  });

  it('fails pages that are missing or marked as failed', async () => {
    await expect(source.pages.readPage(3)).rejects.toBeInstanceOf(PageExtractionError);
    await expect(source.pages.readPage(9)).rejects.toMatchObject({ pageNumber: 9 });
  });

  it('rejects dumps of the wrong shape', () => {
    expect(() => ExtractionDumpSource.fromDump({ source: '', page_count: 0, pages: [] })).toThrow(ValidationError);
  });

  it('reports a missing file as an unavailable document', async () => {
    await expect(ExtractionDumpSource.open('/nonexistent/dir/missing.json')).rejects.toBeInstanceOf(
      DocumentUnavailableError
    );
  });
});
