import { describe, it, expect } from 'vitest';
import {
  area,
  bbox,
  center,
  containsPoint,
  isNearBoundary,
  overlaps,
  union,
  verticalGap,
} from '../geometry.js';

describe('geometry', () => {
  it('normalizes corner order', () => {
    expect(bbox(100, 50, 10, 20)).toEqual({ x0: 10, y0: 20, x1: 100, y1: 50 });
  });

  it('computes area and center', () => {
    const box = bbox(10, 20, 30, 60);
    expect(area(box)).toBe(800);
    expect(center(box)).toEqual({ x: 20, y: 40 });
  });

  it('accepts points within the tolerance band', () => {
    const box = bbox(0, 0, 100, 100);
    expect(containsPoint(box, { x: 101, y: 50 })).toBe(false);
    expect(containsPoint(box, { x: 101, y: 50 }, 2)).toBe(true);
    expect(containsPoint(box, { x: 103, y: 50 }, 2)).toBe(false);
  });

  it('flags points near the region edge only', () => {
    const box = bbox(0, 0, 100, 100);
    expect(isNearBoundary(box, { x: 50, y: 50 }, 2)).toBe(false);
    expect(isNearBoundary(box, { x: 99, y: 50 }, 2)).toBe(true);
    expect(isNearBoundary(box, { x: 101, y: 50 }, 2)).toBe(true);
    expect(isNearBoundary(box, { x: 110, y: 50 }, 2)).toBe(false);
  });

  it('treats touching boxes as overlapping only with padding', () => {
    const a = bbox(0, 0, 10, 10);
    const b = bbox(10, 0, 20, 10);
    expect(overlaps(a, b)).toBe(false);
    expect(overlaps(a, b, 1)).toBe(true);
  });

  it('unions boxes', () => {
    expect(union(bbox(0, 0, 10, 10), bbox(5, -5, 20, 8))).toEqual({ x0: 0, y0: -5, x1: 20, y1: 10 });
  });

  it('measures vertical gaps in either order', () => {
    const upper = bbox(0, 0, 10, 10);
    const lower = bbox(0, 25, 10, 30);
    expect(verticalGap(upper, lower)).toBe(15);
    expect(verticalGap(lower, upper)).toBe(15);
    expect(verticalGap(upper, bbox(0, 5, 10, 20))).toBe(0);
  });
});
