import { describe, it, expect } from 'vitest';
import { PageExtractionError } from '../../../utils/errors.js';
import { ExtractionDumpSource } from '../ExtractionDumpSource.js';
import { PageExtractor } from '../PageExtractor.js';

const source = ExtractionDumpSource.fromDump(
  {
    source: 'controller-spec.pdf',
    page_count: 2,
    pages: [
      {
        page: 1,
        width: 600,
        height: 800,
        blocks: [
          { bbox: [72, 20, 300, 40], text: 'Controller Specification' },
          { bbox: [72, 100, 500, 120], text: 'Body   text  ( )' },
          { bbox: [72, 300, 200, 320], text: 'CONFIDENTIAL' },
          { bbox: [72, 760, 300, 780], text: 'Page 1 of 2' },
          { bbox: [72, 400, 500, 420], text: 'Second block' },
        ],
        tables: [
          { bbox: [72, 500, 520, 560], rows: [['Bit', 'Name'], [' 0 ', 'EN'], [null, '  ']] },
          { bbox: [72, 600, 520, 620], rows: [[null, ' ']] },
        ],
        drawings: [
          [100, 640, 150, 690],
          [152, 640, 200, 690],
        ],
        images: [{ bbox: [10, 100, 20, 110] }],
      },
      { page: 2, width: 600, height: 800, error: 'Unreadable content stream' },
    ],
  },
  'doc-test'
);

describe('PageExtractor', () => {
  const extractor = new PageExtractor(source, {
    headerMarginPt: 50,
    footerMarginPt: 50,
    clusterPaddingPt: 4,
    noisePatterns: ['CONFIDENTIAL'],
  });

  it('filters margins, cleans text and reindexes blocks', async () => {
    const page = await extractor.extract(1);
    expect(page.pageNumber).toBe(1);
    expect(page.blocks.map(block => [block.index, block.text])).toEqual([
      [0, 'Body text'],
      [1, 'Second block'],
    ]);
  });

  it('cleans table cells and drops empty rows and tables', async () => {
    const page = await extractor.extract(1);
    expect(page.tables).toEqual([
      {
        index: 0,
        bbox: { x0: 72, y0: 500, x1: 520, y1: 560 },
        rows: [
          ['Bit', 'Name'],
          ['0', 'EN'],
        ],
        headerRows: undefined,
      },
    ]);
  });

  it('clusters drawings and sizes images from their boxes', async () => {
    const page = await extractor.extract(1);
    expect(page.drawings).toEqual([
      { index: 0, bbox: { x0: 100, y0: 640, x1: 200, y1: 690 }, area: 5000, elementCount: 2 },
    ]);
    expect(page.images).toEqual([{ index: 0, bbox: { x0: 10, y0: 100, x1: 20, y1: 110 }, width: 10, height: 10 }]);
  });

  it('surfaces unreadable pages as page extraction errors', async () => {
    await expect(extractor.extract(2)).rejects.toBeInstanceOf(PageExtractionError);
    await expect(extractor.extract(2)).rejects.toMatchObject({ pageNumber: 2, message: 'Unreadable content stream' });
  });
});
