import { bbox, type BBox } from '../../domain/geometry.js';
import type { RawImage } from './types.js';

/** Operator ids of the operator-list entries the walker reacts to. */
export interface OperatorCodes {
  save: number;
  restore: number;
  transform: number;
  constructPath: number;
  stroke: number;
  closeStroke: number;
  fill: number;
  eoFill: number;
  fillStroke: number;
  eoFillStroke: number;
  closeFillStroke: number;
  closeEOFillStroke: number;
  endPath: number;
  paintImageXObject: number;
  paintInlineImageXObject: number;
  paintImageMaskXObject: number;
}

/** PDF user-space rectangle of the page: [x0, y0, x1, y1]. */
export type ViewBox = readonly [number, number, number, number];

export interface GraphicRegions {
  drawings: BBox[];
  images: RawImage[];
}

type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

const multiply = (m: Matrix, n: Matrix): Matrix => [
  m[0] * n[0] + m[2] * n[1],
  m[1] * n[0] + m[3] * n[1],
  m[0] * n[2] + m[2] * n[3],
  m[1] * n[2] + m[3] * n[3],
  m[0] * n[4] + m[2] * n[5] + m[4],
  m[1] * n[4] + m[3] * n[5] + m[5],
];

const apply = (m: Matrix, x: number, y: number): [number, number] => [
  m[0] * x + m[2] * y + m[4],
  m[1] * x + m[3] * y + m[5],
];

function toNumbers(value: unknown): number[] | null {
  if (value instanceof Float32Array || value instanceof Float64Array) return Array.from(value);
  if (!Array.isArray(value)) return null;
  const numbers: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number') return null;
    numbers.push(item);
  }
  return numbers;
}

function toMatrix(value: unknown): Matrix | null {
  const numbers = toNumbers(value);
  if (!numbers || numbers.length < 6) return null;
  const [a, b, c, d, e, f] = numbers;
  return [a, b, c, d, e, f];
}

/**
 * Walks a page operator list tracking the current transformation matrix and
 * returns painted path bounds and image placements in top-left page space.
 */
export function collectGraphicRegions(
  fnArray: readonly number[],
  argsArray: readonly unknown[],
  codes: OperatorCodes,
  viewBox: ViewBox
): GraphicRegions {
  const [vx0, vy0, vx1, vy1] = viewBox;
  const pageWidth = vx1 - vx0;
  const pageHeight = vy1 - vy0;

  const toPage = (ctm: Matrix, x0: number, y0: number, x1: number, y1: number): BBox => {
    const corners = [apply(ctm, x0, y0), apply(ctm, x1, y0), apply(ctm, x0, y1), apply(ctm, x1, y1)];
    const xs = corners.map(([x]) => x - vx0);
    const ys = corners.map(([, y]) => vy1 - y);
    return bbox(Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys));
  };

  const paintOps = new Set([
    codes.stroke,
    codes.closeStroke,
    codes.fill,
    codes.eoFill,
    codes.fillStroke,
    codes.eoFillStroke,
    codes.closeFillStroke,
    codes.closeEOFillStroke,
  ]);
  const imageOps = new Set([
    codes.paintImageXObject,
    codes.paintInlineImageXObject,
    codes.paintImageMaskXObject,
  ]);

  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;
  let pending: BBox[] = [];
  const drawings: BBox[] = [];
  const images: RawImage[] = [];

  for (let i = 0; i < fnArray.length; i++) {
    const op = fnArray[i];
    const args = argsArray[i];

    if (op === codes.save) {
      stack.push(ctm);
    } else if (op === codes.restore) {
      ctm = stack.pop() ?? IDENTITY;
    } else if (op === codes.transform) {
      const matrix = toMatrix(args);
      if (matrix) ctm = multiply(ctm, matrix);
    } else if (op === codes.constructPath) {
      const minMax = Array.isArray(args) ? toNumbers(args[2]) : null;
      if (minMax && minMax.length >= 4 && minMax.every(Number.isFinite)) {
        pending.push(toPage(ctm, minMax[0], minMax[1], minMax[2], minMax[3]));
      }
    } else if (paintOps.has(op)) {
      for (const box of pending) {
        const coversPage = box.x1 - box.x0 >= pageWidth * 0.95 && box.y1 - box.y0 >= pageHeight * 0.95;
        if (!coversPage) drawings.push(box);
      }
      pending = [];
    } else if (op === codes.endPath) {
      pending = [];
    } else if (imageOps.has(op)) {
      const box = toPage(ctm, 0, 0, 1, 1);
      const dims = Array.isArray(args) ? args : [];
      images.push({
        bbox: box,
        width: typeof dims[1] === 'number' ? dims[1] : box.x1 - box.x0,
        height: typeof dims[2] === 'number' ? dims[2] : box.y1 - box.y0,
      });
    }
  }

  return { drawings, images };
}
