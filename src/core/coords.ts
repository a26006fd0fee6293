import { MAX_ZOOM, MIN_ZOOM } from './constants';

export type Point = { x: number; y: number };
export type Rect = { x: number; y: number; width: number; height: number };

/**
 * Convert a pointer position relative to the canvas origin (screen px) to WORLD units.
 */
export function canvasToWorld(p: Point, zoom: number): Point {
  return { x: p.x / zoom, y: p.y / zoom };
}

export function worldToCanvas(p: Point, zoom: number): Point {
  return { x: p.x * zoom, y: p.y * zoom };
}

/**
 * Clamp a zoom value to the canvas range (10%..1000%).
 * You can override min/max if needed.
 */
export function clampZoom(zoom: number, min = MIN_ZOOM, max = MAX_ZOOM): number {
  if (!Number.isFinite(zoom)) return min;
  if (zoom < min) return min;
  if (zoom > max) return max;
  return zoom;
}

export function rectCenter(r: Rect): Point {
  return { x: r.x + r.width / 2, y: r.y + r.height / 2 };
}

export function rectFromCenter(center: Point, width: number, height: number): Rect {
  return { x: center.x - width / 2, y: center.y - height / 2, width, height };
}

/** Inclusive on all edges. */
export function rectContains(r: Rect, p: Point): boolean {
  return p.x >= r.x && p.x <= r.x + r.width && p.y >= r.y && p.y <= r.y + r.height;
}
