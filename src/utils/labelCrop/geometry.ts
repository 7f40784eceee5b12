import type { PageDimensions, Rect } from './types';

export function rectWidth(r: Rect): number {
  return r.x1 - r.x0;
}

export function rectHeight(r: Rect): number {
  return r.y1 - r.y0;
}

export function centerX(r: Rect): number {
  return (r.x0 + r.x1) / 2;
}

export function centerY(r: Rect): number {
  return (r.y0 + r.y1) / 2;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Clamp each edge of a rectangle independently into [0, width] x [0, height]. */
export function clampRect(r: Rect, bounds: PageDimensions): Rect {
  return {
    x0: clamp(r.x0, 0, bounds.width),
    y0: clamp(r.y0, 0, bounds.height),
    x1: clamp(r.x1, 0, bounds.width),
    y1: clamp(r.y1, 0, bounds.height),
  };
}

/** True when the center of `inner` falls inside `outer` (edges inclusive). */
export function containsCenter(outer: Rect, inner: Rect): boolean {
  const cx = centerX(inner);
  const cy = centerY(inner);
  return cx >= outer.x0 && cx <= outer.x1 && cy >= outer.y0 && cy <= outer.y1;
}
