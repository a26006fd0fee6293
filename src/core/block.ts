import { v4 as uuidv4 } from 'uuid';
import type { AnimationFrame, Block, BlockId, Rgba, Vec2 } from '../types';
import { BLOCK_PADDING, DEFAULT_GROUP_SIZE, ROW_QUANTIZATION_HEIGHT } from './constants';
import { colorFromId } from './color';
import { rectContains, type Point, type Rect } from './coords';

export class GroupDepthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GroupDepthError';
  }
}

export type ImageBlockInput = {
  path: string;
  imageSize: Vec2;
  frames: AnimationFrame[];
  hasAnimation: boolean;
  isFullSequence: boolean;
  /** Restored sessions keep their ids; new blocks get a fresh UUID. */
  id?: BlockId;
  color?: Rgba;
};

export function createImageBlock(input: ImageBlockInput): Block {
  const id = input.id ?? uuidv4();
  const { imageSize } = input;
  const aspectRatio = imageSize.x > 0 && imageSize.y > 0 ? imageSize.x / imageSize.y : 1;
  return {
    id,
    path: input.path,
    position: { x: 0, y: 0 },
    imageSize: { ...imageSize },
    preferredImageSize: { ...imageSize },
    aspectRatio,
    color: input.color ?? colorFromId(id),
    chained: false,
    counter: 0,
    isGroup: false,
    groupName: '',
    children: [],
    anim: {
      frames: input.frames,
      currentFrame: 0,
      frameElapsedMs: 0,
      enabled: false,
      hasAnimation: input.hasAnimation,
    },
    isFullSequence: input.isFullSequence,
  };
}

/**
 * Nest `children` under a new group positioned at their top-left-most corner.
 * Ownership moves to the group; callers remove the children from their previous list.
 */
export function createGroupBlock(
  children: Block[],
  options: { id?: BlockId; color?: Rgba } = {},
): Block {
  const id = options.id ?? uuidv4();
  let position: Vec2 = { x: 0, y: 0 };
  if (children.length > 0) {
    position = {
      x: Math.min(...children.map((c) => c.position.x)),
      y: Math.min(...children.map((c) => c.position.y)),
    };
  }
  const size = { x: DEFAULT_GROUP_SIZE, y: DEFAULT_GROUP_SIZE };
  const group: Block = {
    id,
    path: '',
    position,
    imageSize: size,
    preferredImageSize: { ...size },
    aspectRatio: 1,
    color: options.color ?? colorFromId(id),
    chained: false,
    counter: 0,
    isGroup: true,
    groupName: groupNameFor(children),
    children,
    anim: { frames: [], currentFrame: 0, frameElapsedMs: 0, enabled: false, hasAnimation: false },
    isFullSequence: true,
  };
  assertGroupDepth(group);
  return group;
}

/** Groups hold only image blocks, and image blocks hold nothing. */
export function assertGroupDepth(block: Block): void {
  if (!block.isGroup) {
    if (block.children.length > 0) {
      throw new GroupDepthError(`block ${block.id} is not a group but has children`);
    }
    return;
  }
  for (const child of block.children) {
    if (child.isGroup || child.children.length > 0) {
      throw new GroupDepthError(`group ${block.id} cannot contain nested group ${child.id}`);
    }
  }
}

export function fileName(path: string): string {
  const parts = path.split(/[\\/]/);
  const last = parts[parts.length - 1];
  return last ? last : 'unnamed';
}

export function groupNameFor(children: readonly Block[]): string {
  if (children.length === 0) return 'Empty Group';
  if (children.length === 1) return `Box: ${fileName(children[0].path)}`;
  return `Group of ${children.length}`;
}

/** Replace a group's children, keeping the derived name in sync. */
export function withChildren(group: Block, children: Block[]): Block {
  const next = { ...group, children, groupName: groupNameFor(children) };
  assertGroupDepth(next);
  return next;
}

/** Image size plus padding on all sides. */
export function outerSize(block: Block): Vec2 {
  return {
    x: block.imageSize.x + BLOCK_PADDING * 2,
    y: block.imageSize.y + BLOCK_PADDING * 2,
  };
}

export function blockRect(block: Block): Rect {
  const size = outerSize(block);
  return { x: block.position.x, y: block.position.y, width: size.x, height: size.y };
}

export function setPreferredSize(block: Block, size: Vec2): Block {
  return { ...block, preferredImageSize: { ...size }, imageSize: { ...size } };
}

export function resetToPreferredSize(block: Block): Block {
  return { ...block, imageSize: { ...block.preferredImageSize } };
}

/** Shrink (never grow) the image to `maxWidth`, keeping the aspect ratio. */
export function constrainToWidth(block: Block, maxWidth: number): Block {
  if (block.imageSize.x <= maxWidth) return block;
  const width = Math.max(maxWidth, 1);
  return { ...block, imageSize: { x: width, y: width / block.aspectRatio } };
}

export function resetCountersRecursive(block: Block): Block {
  return { ...block, counter: 0, children: block.children.map(resetCountersRecursive) };
}

export function incrementCounter(block: Block): Block {
  if (block.isGroup) return block;
  return { ...block, counter: block.counter + 1 };
}

export function decrementCounter(block: Block): Block {
  if (block.isGroup || block.counter === 0) return block;
  return { ...block, counter: block.counter - 1 };
}

export function rowIndex(y: number): number {
  return Math.trunc(y / ROW_QUANTIZATION_HEIGHT);
}

/**
 * Layout order: groups first, then by quantized row, then by x.
 * Quantizing y keeps blocks nudged a few pixels by a drag in their row.
 */
export function compareLayout(a: Block, b: Block): number {
  if (a.isGroup !== b.isGroup) return a.isGroup ? -1 : 1;
  const rowDiff = rowIndex(a.position.y) - rowIndex(b.position.y);
  if (rowDiff !== 0) return rowDiff;
  const dx = a.position.x - b.position.x;
  return Number.isNaN(dx) ? 0 : dx;
}

function frameDuration(frame: AnimationFrame): number {
  // A zero-length frame would never let playback advance.
  return Math.max(frame.durationMs, 1);
}

export function advanceAnimation(block: Block, dtMs: number): Block {
  const { anim } = block;
  if (!anim.enabled || anim.frames.length <= 1) return block;
  const cycle = anim.frames.reduce((sum, f) => sum + frameDuration(f), 0);
  let elapsed = anim.frameElapsedMs + Math.max(dtMs, 0);
  let current = anim.currentFrame;
  if (elapsed >= cycle) elapsed %= cycle;
  while (elapsed >= frameDuration(anim.frames[current])) {
    elapsed -= frameDuration(anim.frames[current]);
    current = (current + 1) % anim.frames.length;
  }
  return { ...block, anim: { ...anim, currentFrame: current, frameElapsedMs: elapsed } };
}

export function timeUntilNextFrame(block: Block): number | null {
  const { anim } = block;
  if (!anim.enabled || anim.frames.length <= 1) return null;
  const remaining = frameDuration(anim.frames[anim.currentFrame]) - anim.frameElapsedMs;
  return remaining > 0 ? remaining : 1;
}

export function stopAnimation(block: Block): Block {
  return { ...block, anim: { ...block.anim, enabled: false, currentFrame: 0, frameElapsedMs: 0 } };
}

export function toggleAnimation(block: Block): Block {
  if (block.anim.frames.length <= 1) return block;
  if (block.anim.enabled) return stopAnimation(block);
  return { ...block, anim: { ...block.anim, enabled: true } };
}

/** Drop every frame but the first; the block must be decoded again before it can play. */
export function purgeFrames(block: Block): Block {
  if (!block.isFullSequence || block.anim.frames.length <= 1) return block;
  const stopped = stopAnimation(block);
  return {
    ...stopped,
    anim: { ...stopped.anim, frames: stopped.anim.frames.slice(0, 1) },
    isFullSequence: false,
  };
}

export function findBlock(blocks: readonly Block[], id: BlockId): Block | undefined {
  return blocks.find((b) => b.id === id);
}

/** Apply `fn` to the top-level block `id`. Returns the same array when nothing changed. */
export function updateBlock(
  blocks: Block[],
  id: BlockId,
  fn: (block: Block) => Block,
): Block[] {
  const idx = blocks.findIndex((b) => b.id === id);
  if (idx < 0) return blocks;
  const next = fn(blocks[idx]);
  if (next === blocks[idx]) return blocks;
  const out = blocks.slice();
  out[idx] = next;
  return out;
}

/** Ids of a block and every descendant, parent first. */
export function collectIds(block: Block): BlockId[] {
  return [block.id, ...block.children.flatMap(collectIds)];
}

/** First group (other than `excludeId`) whose rect contains the world point. */
export function findGroupAt(
  blocks: readonly Block[],
  point: Point,
  excludeId: BlockId | null,
): Block | undefined {
  return blocks.find((b) => b.isGroup && b.id !== excludeId && rectContains(blockRect(b), point));
}
