import type { Block, BlockId, Vec2 } from '../types';
import { BLOCK_PADDING, MIN_BLOCK_SIZE } from './constants';
import { blockRect, setPreferredSize } from './block';
import { rectCenter, rectFromCenter, type Point, type Rect } from './coords';

export type ResizeHandle = 'nw' | 'ne' | 'sw' | 'se';

// Resize gesture captured at pointer press (ephemeral, not persisted).
export type ResizeGesture = {
  id: BlockId;
  handle: ResizeHandle;
  /** Pointer at press, canvas px. */
  startPointer: Point;
  /** Block rect at press, world units. */
  startRect: Rect;
};

/** The corner nearest to `point`, by quadrant around the rect center. */
export function handleForPoint(rect: Rect, point: Point): ResizeHandle {
  const c = rectCenter(rect);
  const north = point.y < c.y;
  const west = point.x < c.x;
  if (north) return west ? 'nw' : 'ne';
  return west ? 'sw' : 'se';
}

/**
 * New image size and origin for a center-anchored, aspect-locked resize.
 *
 * Whichever axis moved further drives the width; the height always follows from
 * `aspectRatio`. Non-finite widths fall back to MIN_BLOCK_SIZE.
 */
export function resolveResize(
  gesture: ResizeGesture,
  pointer: Point,
  zoom: number,
  aspectRatio: number,
): { position: Vec2; size: Vec2 } {
  const dx = (pointer.x - gesture.startPointer.x) / zoom;
  const dy = (pointer.y - gesture.startPointer.y) / zoom;
  const center = rectCenter(gesture.startRect);
  const halfWidth = (gesture.startRect.width - BLOCK_PADDING * 2) / 2;
  const halfHeight = (gesture.startRect.height - BLOCK_PADDING * 2) / 2;

  const xSign = gesture.handle === 'nw' || gesture.handle === 'sw' ? -1 : 1;
  const ySign = gesture.handle === 'nw' || gesture.handle === 'ne' ? -1 : 1;

  const widthFromX = Math.max(2 * Math.abs(halfWidth * xSign + dx), MIN_BLOCK_SIZE);
  const heightFromY = 2 * Math.abs(halfHeight * ySign + dy);
  const widthFromY = Math.max(heightFromY * aspectRatio, MIN_BLOCK_SIZE);

  let width = Math.abs(dx) >= Math.abs(dy) ? widthFromX : widthFromY;
  if (!Number.isFinite(width)) width = MIN_BLOCK_SIZE;
  width = Math.max(width, MIN_BLOCK_SIZE);
  const height = width / aspectRatio;

  const outer = rectFromCenter(center, width + BLOCK_PADDING * 2, height + BLOCK_PADDING * 2);
  return { position: { x: outer.x, y: outer.y }, size: { x: width, y: height } };
}

/**
 * Match a chained block to the leader's new image height, keeping its own aspect
 * ratio and its own center. A width floored at MIN_BLOCK_SIZE takes the height
 * back from the aspect ratio.
 */
export function matchChainedHeight(block: Block, leaderHeight: number): Block {
  const width = Math.max(leaderHeight * block.aspectRatio, MIN_BLOCK_SIZE);
  const height = width / block.aspectRatio;
  const center = rectCenter(blockRect(block));
  const outer = rectFromCenter(center, width + BLOCK_PADDING * 2, height + BLOCK_PADDING * 2);
  return { ...setPreferredSize(block, { x: width, y: height }), position: { x: outer.x, y: outer.y } };
}
