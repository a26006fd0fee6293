import type { Block, BlockId, Vec2 } from '../types';
import {
  ALIGN_SPACING,
  BLOCK_PADDING,
  CANVAS_PADDING,
  CANVAS_WORKING_WIDTH,
  MAX_BLOCK_DIMENSION,
  MIN_CANVAS_INNER_WIDTH,
} from './constants';
import {
  compareLayout,
  constrainToWidth,
  outerSize,
  resetToPreferredSize,
  rowIndex,
} from './block';
import type { Point } from './coords';

export function normalizeInnerWidth(innerWidth: number): number {
  if (!Number.isFinite(innerWidth)) return CANVAS_WORKING_WIDTH;
  return Math.max(innerWidth, MIN_CANVAS_INNER_WIDTH);
}

/**
 * Row-pack `blocks` in their given order into a canvas `innerWidth` wide.
 *
 * Every block is first restored to its preferred size and shrunk to fit the row.
 * A row wraps when the next block would cross `CANVAS_PADDING + innerWidth`, and
 * also whenever the group/non-group category changes, so rows of groups never
 * share a row with image blocks.
 */
export function reflow(blocks: readonly Block[], innerWidth: number): Block[] {
  const inner = normalizeInnerWidth(innerWidth);
  const rowLimit = CANVAS_PADDING + inner;
  const maxImageWidth = Math.max(inner - BLOCK_PADDING * 2, 1);

  let cursorX = CANVAS_PADDING;
  let cursorY = CANVAS_PADDING;
  let rowHeight = 0;
  let prevIsGroup: boolean | null = null;

  const wrap = () => {
    cursorX = CANVAS_PADDING;
    cursorY += rowHeight + ALIGN_SPACING;
    rowHeight = 0;
  };

  return blocks.map((b) => {
    const sized = constrainToWidth(resetToPreferredSize(b), maxImageWidth);
    if (prevIsGroup !== null && prevIsGroup !== sized.isGroup && cursorX > CANVAS_PADDING) {
      wrap();
    }
    prevIsGroup = sized.isGroup;

    const size = outerSize(sized);
    if (cursorX + size.x > rowLimit) wrap();

    const placed = { ...sized, position: { x: cursorX, y: cursorY } };
    cursorX += size.x + ALIGN_SPACING;
    rowHeight = Math.max(rowHeight, size.y);
    return placed;
  });
}

export function sortByLayout(blocks: readonly Block[]): Block[] {
  return blocks.slice().sort(compareLayout);
}

/** True when a block dropped at `leader` belongs before the block at `other`. */
export function shouldInsertBefore(leader: Point, other: Point): boolean {
  const leaderRow = rowIndex(leader.y);
  const otherRow = rowIndex(other.y);
  return leaderRow < otherRow || (leaderRow === otherRow && leader.x < other.x);
}

/**
 * Insertion index for a dropped block inside `remaining` (already in layout order).
 * Groups are only placed among groups `[0, groupBoundary)`, image blocks only among
 * image blocks `[groupBoundary, length)`.
 */
export function findInsertIndex(
  remaining: readonly Block[],
  leaderPos: Point,
  isLeaderGroup: boolean,
  groupBoundary: number,
): number {
  const [from, to] = isLeaderGroup ? [0, groupBoundary] : [groupBoundary, remaining.length];
  for (let i = from; i < to; i++) {
    if (shouldInsertBefore(leaderPos, remaining[i].position)) return i;
  }
  return to;
}

/**
 * Settle the collection after a drag: move the leader (or, if it is chained, every
 * chained block) to where it was dropped in layout order, then reflow.
 *
 * Moved blocks stay in their own category: the leader's category is inserted at
 * the drop point, the other category at the group/image boundary, so groups keep
 * every row above the image blocks.
 *
 * Without a leader the whole collection is sorted by layout order. An unknown
 * leader leaves `blocks` untouched and returns the same array.
 */
export function reorderAndReflow(
  blocks: Block[],
  leaderId: BlockId | null,
  innerWidth: number,
): Block[] {
  if (leaderId == null) return reflow(sortByLayout(blocks), innerWidth);

  const leader = blocks.find((b) => b.id === leaderId);
  if (!leader) return blocks;

  const moved: Block[] = [];
  const rest: Block[] = [];
  for (const b of blocks) {
    const isMoved = leader.chained ? b.chained : b.id === leaderId;
    (isMoved ? moved : rest).push(b);
  }
  const movedGroups = moved.filter((b) => b.isGroup);
  const movedImages = moved.filter((b) => !b.isGroup);

  const remaining = sortByLayout(rest);
  const boundary = remaining.findIndex((b) => !b.isGroup);
  const groupBoundary = boundary < 0 ? remaining.length : boundary;
  const groups = remaining.slice(0, groupBoundary);
  const images = remaining.slice(groupBoundary);
  const at = findInsertIndex(remaining, leader.position, leader.isGroup, groupBoundary);

  const ordered = leader.isGroup
    ? [...groups.slice(0, at), ...movedGroups, ...groups.slice(at), ...movedImages, ...images]
    : [
        ...groups,
        ...movedGroups,
        ...images.slice(0, at - groupBoundary),
        ...movedImages,
        ...images.slice(at - groupBoundary),
      ];
  return reflow(ordered, innerWidth);
}

/** Tallest preferred image height among image blocks, 0 when there are none. */
export function maxBlockHeight(blocks: readonly Block[]): number {
  return blocks
    .filter((b) => !b.isGroup)
    .reduce((max, b) => Math.max(max, b.preferredImageSize.y), 0);
}

/** Logical size of a freshly decoded image: native size scaled down to MAX_BLOCK_DIMENSION. */
export function scaledSize(native: Vec2): Vec2 {
  const scale = Math.min(
    MAX_BLOCK_DIMENSION / Math.max(native.x, 1),
    MAX_BLOCK_DIMENSION / Math.max(native.y, 1),
    1,
  );
  return { x: native.x * scale, y: native.y * scale };
}

/** Inner width that fits a viewport of `viewportWidth` screen px at `zoom`. */
export function innerWidthForViewport(viewportWidth: number, zoom: number): number {
  const width = viewportWidth / zoom - CANVAS_PADDING * 2;
  if (!Number.isFinite(width)) return CANVAS_WORKING_WIDTH / zoom;
  return Math.max(width, MIN_CANVAS_INNER_WIDTH);
}

/** Bottom edge of the lowest block; 0 for an empty canvas. */
export function contentHeight(blocks: readonly Block[]): number {
  return blocks.reduce((max, b) => Math.max(max, b.position.y + outerSize(b).y), 0);
}

/**
 * Size of the scrollable canvas in screen px: the full padded width, and the content
 * height (or the viewport height, whichever is larger).
 */
export function canvasSize(
  blocks: readonly Block[],
  innerWidth: number,
  viewportHeight: number,
  zoom: number,
): Vec2 {
  const height = Math.max(contentHeight(blocks) + CANVAS_PADDING, viewportHeight / zoom);
  return { x: (innerWidth + CANVAS_PADDING * 2) * zoom, y: height * zoom };
}
