import { describe, it, expect } from 'vitest';
import { handleForPoint, matchChainedHeight, resolveResize, type ResizeGesture } from './resize';
import { blockRect } from './block';
import { imageBlock } from '../test/fixtures';

// 100x50 image at the origin: outer rect 108x58, centered on (54, 29).
const block = imageBlock(100, 50);
const gesture: ResizeGesture = {
  id: block.id,
  handle: 'se',
  startPointer: { x: 108, y: 58 },
  startRect: blockRect(block),
};

describe('handleForPoint', () => {
  it('picks the corner by quadrant', () => {
    const rect = blockRect(block);
    expect(handleForPoint(rect, { x: 10, y: 10 })).toBe('nw');
    expect(handleForPoint(rect, { x: 100, y: 10 })).toBe('ne');
    expect(handleForPoint(rect, { x: 10, y: 50 })).toBe('sw');
    expect(handleForPoint(rect, { x: 100, y: 50 })).toBe('se');
  });
});

describe('resolveResize', () => {
  it('grows around the center when the horizontal drag dominates', () => {
    const out = resolveResize(gesture, { x: 128, y: 58 }, 1, 2);
    expect(out.size).toEqual({ x: 140, y: 70 });
    expect(out.position).toEqual({ x: -20, y: -10 });
  });

  it('derives the width from the height when the vertical drag dominates', () => {
    const out = resolveResize(gesture, { x: 108, y: 68 }, 1, 2);
    expect(out.size).toEqual({ x: 140, y: 70 });
  });

  it('converts the pointer delta to world units', () => {
    const out = resolveResize(gesture, { x: 148, y: 58 }, 2, 2);
    expect(out.size).toEqual({ x: 140, y: 70 });
  });

  it('mirrors the delta for the opposite corner', () => {
    const nw: ResizeGesture = { ...gesture, handle: 'nw', startPointer: { x: 0, y: 0 } };
    const out = resolveResize(nw, { x: -20, y: 0 }, 1, 2);
    expect(out.size).toEqual({ x: 140, y: 70 });
  });

  it('never shrinks below MIN_BLOCK_SIZE', () => {
    const out = resolveResize(gesture, { x: 48, y: 58 }, 1, 2);
    expect(out.size).toEqual({ x: 50, y: 25 });
  });

  it('falls back to MIN_BLOCK_SIZE for a non-finite pointer', () => {
    const out = resolveResize(gesture, { x: Number.NaN, y: Number.NaN }, 1, 2);
    expect(out.size).toEqual({ x: 50, y: 25 });
  });
});

describe('matchChainedHeight', () => {
  it('keeps the aspect ratio and the center', () => {
    const out = matchChainedHeight(block, 70);
    expect(out.preferredImageSize).toEqual({ x: 140, y: 70 });
    expect(out.position).toEqual({ x: -20, y: -10 });
  });

  it('floors the width at MIN_BLOCK_SIZE and keeps the aspect ratio', () => {
    const tall = imageBlock(50, 100);
    const out = matchChainedHeight(tall, 40);
    expect(out.imageSize).toEqual({ x: 50, y: 100 });
    expect(out.imageSize.x / out.imageSize.y).toBe(tall.aspectRatio);
    expect(out.position).toEqual({ x: 0, y: 0 });
  });
});
