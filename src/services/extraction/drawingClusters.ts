import { area, overlaps, union, width, height, type BBox } from '../../domain/geometry.js';
import type { DrawingRegion } from '../../domain/entities/PageModel.js';

/**
 * Groups vector drawing elements into regions: boxes that touch within
 * `padding` are merged, repeating until no two clusters touch. Horizontal and
 * vertical strokes take part; bare points do not.
 */
export function clusterDrawings(elements: readonly BBox[], padding: number): DrawingRegion[] {
  let clusters = elements
    .filter(box => width(box) > 0 || height(box) > 0)
    .map(box => ({ box, count: 1 }));

  let merged = true;
  while (merged) {
    merged = false;
    const next: Array<{ box: BBox; count: number }> = [];

    for (const cluster of clusters) {
      const target = next.find(existing => overlaps(existing.box, cluster.box, padding));
      if (target) {
        target.box = union(target.box, cluster.box);
        target.count += cluster.count;
        merged = true;
      } else {
        next.push({ ...cluster });
      }
    }

    clusters = next;
  }

  return clusters
    .sort((a, b) => a.box.y0 - b.box.y0 || a.box.x0 - b.box.x0)
    .map((cluster, index) => ({
      index,
      bbox: cluster.box,
      area: area(cluster.box),
      elementCount: cluster.count,
    }));
}
