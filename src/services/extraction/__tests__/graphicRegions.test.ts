import { describe, it, expect } from 'vitest';
import { collectGraphicRegions, type OperatorCodes } from '../graphicRegions.js';

const codes: OperatorCodes = {
  save: 1,
  restore: 2,
  transform: 3,
  constructPath: 4,
  stroke: 5,
  closeStroke: 6,
  fill: 7,
  eoFill: 8,
  fillStroke: 9,
  eoFillStroke: 10,
  closeFillStroke: 11,
  closeEOFillStroke: 12,
  endPath: 13,
  paintImageXObject: 14,
  paintInlineImageXObject: 15,
  paintImageMaskXObject: 16,
};

describe('collectGraphicRegions', () => {
  it('collects painted paths and image placements in top-left page space', () => {
    const fnArray = [4, 5, 4, 7, 4, 13, 1, 3, 14, 2, 4, 6];
    const argsArray: unknown[] = [
      [[], [], [100, 700, 200, 750]],
      null,
      [[], [], [0, 0, 600, 800]],
      null,
      [[], [], [10, 10, 20, 20]],
      null,
      null,
      [50, 0, 0, 40, 300, 400],
      ['img_p0_1', 640, 512],
      null,
      [[], [], new Float32Array([0, 0, 10, 10])],
      null,
    ];

    const { drawings, images } = collectGraphicRegions(fnArray, argsArray, codes, [0, 0, 600, 800]);

    expect(drawings).toEqual([
      { x0: 100, y0: 50, x1: 200, y1: 100 },
      { x0: 0, y0: 790, x1: 10, y1: 800 },
    ]);
    expect(images).toEqual([{ bbox: { x0: 300, y0: 360, x1: 350, y1: 400 }, width: 640, height: 512 }]);
  });

  it('offsets by the view box origin', () => {
    const { drawings } = collectGraphicRegions([4, 5], [[[], [], [20, 30, 40, 50]], null], codes, [10, 10, 610, 810]);
    expect(drawings).toEqual([{ x0: 10, y0: 760, x1: 30, y1: 780 }]);
  });
});
