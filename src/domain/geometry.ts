/**
 * Page-space rectangles. Origin is the top-left corner of the page, y grows
 * downwards, units are PDF points.
 */
export interface BBox {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

export interface Point {
  readonly x: number;
  readonly y: number;
}

export const bbox = (x0: number, y0: number, x1: number, y1: number): BBox => ({
  x0: Math.min(x0, x1),
  y0: Math.min(y0, y1),
  x1: Math.max(x0, x1),
  y1: Math.max(y0, y1),
});

export const width = (box: BBox): number => box.x1 - box.x0;

export const height = (box: BBox): number => box.y1 - box.y0;

export const area = (box: BBox): number => width(box) * height(box);

export const center = (box: BBox): Point => ({
  x: (box.x0 + box.x1) / 2,
  y: (box.y0 + box.y1) / 2,
});

export const expand = (box: BBox, padding: number): BBox => ({
  x0: box.x0 - padding,
  y0: box.y0 - padding,
  x1: box.x1 + padding,
  y1: box.y1 + padding,
});

export function containsPoint(box: BBox, point: Point, tolerance = 0): boolean {
  return (
    point.x >= box.x0 - tolerance &&
    point.x <= box.x1 + tolerance &&
    point.y >= box.y0 - tolerance &&
    point.y <= box.y1 + tolerance
  );
}

/**
 * True when the point is accepted by the tolerance band but would be
 * rejected, or sit on the edge, without it.
 */
export function isNearBoundary(box: BBox, point: Point, tolerance: number): boolean {
  if (!containsPoint(box, point, tolerance)) return false;
  const inset = box.x1 - box.x0 > 2 * tolerance && box.y1 - box.y0 > 2 * tolerance;
  return !inset || !containsPoint(box, point, -tolerance);
}

export function overlaps(a: BBox, b: BBox, padding = 0): boolean {
  return (
    a.x0 - padding < b.x1 &&
    a.x1 + padding > b.x0 &&
    a.y0 - padding < b.y1 &&
    a.y1 + padding > b.y0
  );
}

export function union(first: BBox, ...rest: BBox[]): BBox {
  return rest.reduce<BBox>(
    (acc, box) => ({
      x0: Math.min(acc.x0, box.x0),
      y0: Math.min(acc.y0, box.y0),
      x1: Math.max(acc.x1, box.x1),
      y1: Math.max(acc.y1, box.y1),
    }),
    first
  );
}

/** Vertical gap between two boxes; 0 when they overlap vertically. */
export function verticalGap(a: BBox, b: BBox): number {
  if (b.y0 >= a.y1) return b.y0 - a.y1;
  if (a.y0 >= b.y1) return a.y0 - b.y1;
  return 0;
}
