import { create } from 'zustand';
import type { StoreApi, UseBoundStore } from 'zustand';
import { useShallow } from 'zustand/react/shallow';
import type { Block, BlockId, Vec2 } from '../types';
import type { Point } from '../core/coords';
import { canvasToWorld, clampZoom } from '../core/coords';
import { CANVAS_PADDING, CANVAS_WORKING_WIDTH } from '../core/constants';
import {
  blockRect,
  collectIds,
  createGroupBlock,
  createImageBlock,
  decrementCounter,
  findBlock,
  findGroupAt,
  incrementCounter,
  purgeFrames,
  resetCountersRecursive,
  setPreferredSize,
  stopAnimation,
  timeUntilNextFrame,
  toggleAnimation as toggleBlockAnimation,
  advanceAnimation,
  updateBlock,
  withChildren,
} from '../core/block';
import {
  innerWidthForViewport,
  maxBlockHeight,
  normalizeInnerWidth,
  reflow,
  reorderAndReflow,
  scaledSize,
} from '../core/layout';
import { RememberedChains } from '../core/chains';
import { FrameCachePolicy } from '../core/frameCache';
import {
  handleForPoint,
  matchChainedHeight,
  resolveResize,
  type ResizeGesture,
} from '../core/resize';
import {
  blockToRecord,
  parseSessionDocument,
  recordToBlock,
  type SessionDocument,
} from '../core/session';
import {
  DecodeQueue,
  type DecodeFailure,
  type DecodedImage,
  type DecodeResult,
  type ImageDecoder,
} from '../services/decodeQueue';

// Drag gesture (ephemeral). Offset is pointer minus block origin, in world units.
export type DragGesture = { id: BlockId; offset: Vec2 };

export type BlockStoreOptions = {
  decoder?: ImageDecoder | null;
  innerWidth?: number;
  /** Full-sequence budget of the frame cache. Defaults to MAX_CACHED_ANIMATIONS. */
  cacheCapacity?: number;
  queue?: DecodeQueue;
  /** Called once per failed decode, when the failure is drained. */
  onDecodeError?: (failure: DecodeFailure) => void;
};

export type BlockState = {
  /** Top-level blocks in layout order. Groups own their children. */
  readonly blocks: Block[];
  readonly rememberedChains: RememberedChains;
  /** Group made by the last compact toggle; the next toggle with nothing chained unboxes it. */
  readonly lastBoxedId: BlockId | null;
  /** Children released by the last unbox; the next toggle with nothing chained reboxes them. */
  readonly lastUnboxedIds: BlockId[];
  readonly innerWidth: number;
  /** Last viewport width reported by the host (screen px), if any. */
  readonly viewportWidth: number | null;
  readonly zoom: number;
  readonly showFileNames: boolean;
  readonly drag: DragGesture | null;
  readonly resize: ResizeGesture | null;
  /** Group under the pointer while an image block is dragged. */
  readonly dropTargetId: BlockId | null;
  readonly decodeErrors: DecodeFailure[];
};

export type BlockActions = {
  // Decoding
  setDecoder: (decoder: ImageDecoder | null) => void;
  /** Queue a decode; the result is applied by the next pollDecodeResults(). */
  requestDecode: (path: string, firstFrameOnly: boolean) => void;
  /** Decode the first frame of each file; every success becomes a new block. */
  addImages: (paths: string[]) => void;
  /** Drain every finished decode, apply them, and reflow once. Returns the number drained. */
  pollDecodeResults: () => number;
  /** Resolves when every requested decode has landed in the queue. */
  decodesSettled: () => Promise<void>;
  clearDecodeErrors: () => void;
  // Update step
  advanceAnimations: (dtMs: number) => number | null;
  /** One update step: poll decodes, then advance playback. Returns ms until the next frame, if any. */
  update: (dtMs: number) => number | null;
  toggleAnimation: (id: BlockId) => void;
  // Chains
  toggleChain: (id: BlockId) => void;
  clearChains: () => void;
  // Groups
  boxChained: () => BlockId | null;
  unboxGroup: (id: BlockId) => BlockId[];
  toggleCompactGroup: () => void;
  dropIntoGroup: (blockId: BlockId, groupId: BlockId) => void;
  // Gestures (pointer in canvas px, relative to the canvas origin)
  beginDrag: (id: BlockId, pointer: Point) => void;
  dragTo: (pointer: Point) => void;
  endDrag: () => void;
  beginResize: (id: BlockId, pointer: Point) => void;
  resizeTo: (pointer: Point) => void;
  endResize: () => void;
  // Blocks
  removeBlock: (id: BlockId, options?: { cascade?: boolean }) => BlockId[];
  incrementCounter: (id: BlockId) => void;
  decrementCounter: (id: BlockId) => void;
  resetAllCounters: () => void;
  // Layout
  reflow: () => void;
  reorderAndReflow: (leaderId: BlockId | null) => void;
  setViewportWidth: (px: number) => void;
  setZoom: (zoom: number) => void;
  toggleFileNames: () => void;
  // Session
  loadSession: (input: unknown) => void;
  exportSession: () => SessionDocument;
  /** Drop every block and all bookkeeping. */
  reset: () => void;
};

export type BlockStore = BlockState & BlockActions;
export type BlockStoreHook = UseBoundStore<StoreApi<BlockStore>>;

function initialState(innerWidth: number): BlockState {
  return {
    blocks: [],
    rememberedChains: RememberedChains.empty(),
    lastBoxedId: null,
    lastUnboxedIds: [],
    innerWidth,
    viewportWidth: null,
    zoom: 1,
    showFileNames: false,
    drag: null,
    resize: null,
    dropTargetId: null,
    decodeErrors: [],
  };
}

function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

/** A block handed to a group: unchained, stopped, holding only its first frame. */
function asChild(block: Block): Block {
  return { ...purgeFrames(stopAnimation(block)), chained: false };
}

/** A skeleton needs a result when it holds no frames yet, or a full sequence arrives. */
function needsResult(block: Block, path: string, isFull: boolean, nested = false): boolean {
  if (block.isGroup) return block.children.some((c) => needsResult(c, path, isFull, true));
  if (block.path !== path) return false;
  if (block.anim.frames.length === 0) return true;
  return isFull && !nested && !block.isFullSequence;
}

function populate(block: Block, path: string, image: DecodedImage, isFull: boolean, nested = false): Block {
  if (block.isGroup) {
    return { ...block, children: block.children.map((c) => populate(c, path, image, isFull, true)) };
  }
  if (!needsResult(block, path, isFull, nested)) return block;
  // Group children never hold more than their first frame.
  const full = isFull && !nested;
  const frames = full ? image.frames : image.frames.slice(0, 1);
  return {
    ...block,
    anim: {
      frames,
      currentFrame: 0,
      frameElapsedMs: 0,
      enabled: full && frames.length > 1,
      hasAnimation: image.hasAnimation,
    },
    isFullSequence: full,
  };
}

function skeletonPaths(blocks: readonly Block[]): string[] {
  const paths = new Set<string>();
  const visit = (b: Block) => {
    if (b.isGroup) b.children.forEach(visit);
    else if (b.anim.frames.length === 0 && b.path) paths.add(b.path);
  };
  blocks.forEach(visit);
  return [...paths];
}

export function createBlockStore(options: BlockStoreOptions = {}): BlockStoreHook {
  const queue = options.queue ?? new DecodeQueue();
  const startWidth = normalizeInnerWidth(options.innerWidth ?? CANVAS_WORKING_WIDTH);
  let decoder: ImageDecoder | null = options.decoder ?? null;

  return create<BlockStore>()((set, get) => {
    const frameCache = new FrameCachePolicy({
      capacity: options.cacheCapacity,
      onEvict: (id) => set((s) => ({ blocks: updateBlock(s.blocks, id, purgeFrames) })),
    });

    const forgetRemoved = (ids: BlockId[]) => {
      frameCache.forget(ids);
    };

    function unbox(id: BlockId): BlockId[] {
      const s = get();
      const group = findBlock(s.blocks, id);
      if (!group || !group.isGroup) return [];
      const rest = s.blocks.filter((b) => b.id !== id);
      const boundary = rest.findIndex((b) => !b.isGroup);
      const at = boundary < 0 ? rest.length : boundary;
      const children = group.children.map((c) => ({ ...c, chained: false }));
      set({
        blocks: reflow([...rest.slice(0, at), ...children, ...rest.slice(at)], s.innerWidth),
        dropTargetId: s.dropTargetId === id ? null : s.dropTargetId,
      });
      return children.map((c) => c.id);
    }

    function tryReboxLastUnboxed(): boolean {
      const { lastUnboxedIds } = get();
      if (lastUnboxedIds.length === 0) return false;
      const wanted = new Set(lastUnboxedIds);
      const s = get();
      if (!s.blocks.some((b) => wanted.has(b.id))) return false;
      set({ blocks: s.blocks.map((b) => (wanted.has(b.id) ? { ...b, chained: true } : b)) });
      const boxed = get().boxChained();
      set({ lastBoxedId: boxed, lastUnboxedIds: [] });
      return true;
    }

    function tryUnboxLastBoxed(): boolean {
      const { lastBoxedId, blocks } = get();
      if (lastBoxedId == null || !findBlock(blocks, lastBoxedId)) return false;
      const released = unbox(lastBoxedId);
      set({ lastUnboxedIds: released, lastBoxedId: null });
      return true;
    }

    function applyDecoded(results: DecodeResult[]): void {
      const s = get();
      const currentMaxHeight = maxBlockHeight(s.blocks);
      let blocks = s.blocks;
      const added: BlockId[] = [];
      const used: BlockId[] = [];
      const failures: DecodeFailure[] = [];

      for (const r of results) {
        if (!r.ok) {
          failures.push(r);
          continue;
        }
        if (r.image.frames.length === 0) {
          failures.push({ ok: false, path: r.path, message: `${r.path} did not contain renderable frames` });
          continue;
        }
        if (blocks.some((b) => needsResult(b, r.path, r.isFull))) {
          blocks = blocks.map((b) => {
            const next = populate(b, r.path, r.image, r.isFull);
            if (next.isFullSequence && !b.isFullSequence && !next.isGroup) used.push(next.id);
            return next;
          });
          continue;
        }
        // Full sequences are only requested for existing blocks; one with no taker is dropped.
        if (r.isFull) continue;
        const block = createImageBlock({
          path: r.path,
          imageSize: scaledSize(r.image.nativeSize),
          frames: r.image.frames,
          hasAnimation: r.image.hasAnimation,
          isFullSequence: false,
        });
        blocks = [...blocks, { ...block, position: { x: CANVAS_PADDING, y: CANVAS_PADDING } }];
        added.push(block.id);
      }

      // New images match the height of what is already on the canvas.
      if (added.length > 0 && currentMaxHeight > 0) {
        const fresh = new Set(added);
        blocks = blocks.map((b) =>
          fresh.has(b.id)
            ? setPreferredSize(b, { x: currentMaxHeight * b.aspectRatio, y: currentMaxHeight })
            : b,
        );
      }

      set({
        blocks: reorderAndReflow(blocks, null, s.innerWidth),
        decodeErrors: failures.length > 0 ? [...s.decodeErrors, ...failures] : s.decodeErrors,
      });
      for (const f of failures) options.onDecodeError?.(f);
      for (const id of used) frameCache.markUsed(id);
    }

    return {
      ...initialState(startWidth),

      // --- Decoding ---
      setDecoder: (next) => {
        decoder = next;
      },

      requestDecode: (path, firstFrameOnly) => {
        if (!decoder) {
          queue.push({ ok: false, path, message: 'no image decoder installed' });
          return;
        }
        queue.submit(decoder, path, { firstFrameOnly });
      },

      addImages: (paths) => {
        for (const p of paths) get().requestDecode(p, true);
      },

      pollDecodeResults: () => {
        const results = queue.drain();
        if (results.length > 0) applyDecoded(results);
        return results.length;
      },

      decodesSettled: () => queue.settled(),

      clearDecodeErrors: () => set({ decodeErrors: [] }),

      // --- Update step ---
      advanceAnimations: (dtMs) => {
        const s = get();
        const blocks: Block[] = [];
        let changed = false;
        let next: number | null = null;
        for (const b of s.blocks) {
          const advanced = advanceAnimation(b, dtMs);
          if (advanced !== b) changed = true;
          const wait = timeUntilNextFrame(advanced);
          if (wait !== null) next = next === null ? wait : Math.min(next, wait);
          blocks.push(advanced);
        }
        if (changed) set({ blocks });
        return next;
      },

      update: (dtMs) => {
        get().pollDecodeResults();
        return get().advanceAnimations(dtMs);
      },

      toggleAnimation: (id) => {
        const block = findBlock(get().blocks, id);
        if (!block || !block.anim.hasAnimation) return;
        if (!block.isFullSequence) {
          get().requestDecode(block.path, false);
          return;
        }
        const toggled = toggleBlockAnimation(block);
        set((s) => ({ blocks: updateBlock(s.blocks, id, () => toggled) }));
        if (toggled.anim.enabled) frameCache.markUsed(id);
      },

      // --- Chains ---
      toggleChain: (id) =>
        set((s) => {
          const block = findBlock(s.blocks, id);
          if (!block) return s;
          if (block.chained) {
            return { blocks: updateBlock(s.blocks, id, (b) => ({ ...b, chained: false })) };
          }
          const remembered = s.rememberedChains.find(id);
          if (remembered) {
            return {
              blocks: s.blocks.map((b) => (remembered.has(b.id) && !b.chained ? { ...b, chained: true } : b)),
            };
          }
          return { blocks: updateBlock(s.blocks, id, (b) => ({ ...b, chained: true })) };
        }),

      clearChains: () =>
        set((s) => {
          const chained = s.blocks.filter((b) => b.chained).map((b) => b.id);
          if (chained.length === 0) return s;
          return {
            rememberedChains: s.rememberedChains.remember(chained),
            blocks: s.blocks.map((b) => (b.chained ? { ...b, chained: false } : b)),
          };
        }),

      // --- Groups ---
      boxChained: () => {
        const s = get();
        const chained = s.blocks.filter((b) => b.chained);
        if (chained.length === 0) return null;
        // A chained group contributes its children; groups never nest.
        const children = chained.flatMap((b) => (b.isGroup ? b.children : [b])).map(asChild);
        const group = {
          ...createGroupBlock(children),
          position: {
            x: Math.min(...chained.map((b) => b.position.x)),
            y: Math.min(...chained.map((b) => b.position.y)),
          },
        };
        const rest = s.blocks.filter((b) => !b.chained);
        set({ blocks: reflow([group, ...rest], s.innerWidth), dropTargetId: null });
        forgetRemoved(chained.flatMap(collectIds));
        return group.id;
      },

      unboxGroup: (id) => unbox(id),

      toggleCompactGroup: () => {
        const { blocks } = get();
        const chainedCount = blocks.filter((b) => b.chained).length;
        if (chainedCount === 0) {
          if (tryReboxLastUnboxed()) return;
          tryUnboxLastBoxed();
          return;
        }
        const chainedGroups = blocks.filter((b) => b.chained && b.isGroup);
        if (chainedGroups.length === 1) {
          const released = unbox(chainedGroups[0].id);
          set({ lastUnboxedIds: released, lastBoxedId: null });
          return;
        }
        const boxed = get().boxChained();
        set({ lastBoxedId: boxed, lastUnboxedIds: [] });
      },

      dropIntoGroup: (blockId, groupId) => {
        const s = get();
        const block = findBlock(s.blocks, blockId);
        const group = findBlock(s.blocks, groupId);
        if (!block || !group || !group.isGroup || block.isGroup) return;
        const moving = new Set(
          block.chained
            ? s.blocks.filter((b) => b.chained && !b.isGroup).map((b) => b.id)
            : [blockId],
        );
        const incoming = s.blocks.filter((b) => moving.has(b.id)).map(asChild);
        const blocks = s.blocks
          .filter((b) => !moving.has(b.id))
          .map((b) => (b.id === groupId ? withChildren(b, [...b.children, ...incoming]) : b));
        set({ blocks: reflow(blocks, s.innerWidth), dropTargetId: null });
        forgetRemoved([...moving]);
      },

      // --- Gestures ---
      beginDrag: (id, pointer) =>
        set((s) => {
          const block = findBlock(s.blocks, id);
          if (!block) return s;
          const world = canvasToWorld(pointer, s.zoom);
          return { drag: { id, offset: sub(world, block.position) }, dropTargetId: null };
        }),

      dragTo: (pointer) =>
        set((s) => {
          if (!s.drag) return s;
          const leader = findBlock(s.blocks, s.drag.id);
          if (!leader) return s;
          const world = canvasToWorld(pointer, s.zoom);
          const nextPos = sub(world, s.drag.offset);
          const delta = sub(nextPos, leader.position);
          const followers = leader.chained;
          const blocks = s.blocks.map((b) => {
            if (b.id === leader.id) return { ...b, position: nextPos };
            if (followers && b.chained) return { ...b, position: add(b.position, delta) };
            return b;
          });
          let dropTargetId: BlockId | null = null;
          if (!leader.isGroup) {
            // Groups travelling with the chain cannot be drop targets.
            const still = blocks.filter((b) => !(followers && b.chained));
            dropTargetId = findGroupAt(still, world, leader.id)?.id ?? null;
          }
          return { blocks, dropTargetId };
        }),

      endDrag: () => {
        const { drag, dropTargetId, blocks } = get();
        if (!drag) return;
        set({ drag: null, dropTargetId: null });
        const leader = findBlock(blocks, drag.id);
        if (!leader) return;
        if (!leader.isGroup && dropTargetId != null && findBlock(blocks, dropTargetId)) {
          get().dropIntoGroup(leader.id, dropTargetId);
          return;
        }
        get().reorderAndReflow(leader.id);
      },

      beginResize: (id, pointer) =>
        set((s) => {
          const block = findBlock(s.blocks, id);
          if (!block) return s;
          const rect = blockRect(block);
          const handle = handleForPoint(rect, canvasToWorld(pointer, s.zoom));
          return { resize: { id, handle, startPointer: pointer, startRect: rect } };
        }),

      resizeTo: (pointer) =>
        set((s) => {
          if (!s.resize) return s;
          const leader = findBlock(s.blocks, s.resize.id);
          if (!leader) return s;
          const { position, size } = resolveResize(s.resize, pointer, s.zoom, leader.aspectRatio);
          const propagate = leader.chained && s.blocks.filter((b) => b.chained).length > 1;
          return {
            blocks: s.blocks.map((b) => {
              if (b.id === leader.id) return { ...setPreferredSize(b, size), position };
              if (propagate && b.chained) return matchChainedHeight(b, size.y);
              return b;
            }),
          };
        }),

      endResize: () =>
        set((s) => (s.resize ? { resize: null, blocks: reflow(s.blocks, s.innerWidth) } : s)),

      // --- Blocks ---
      removeBlock: (id, opts = {}) => {
        const s = get();
        const target = findBlock(s.blocks, id);
        if (!target) return [];
        const doomed =
          opts.cascade && target.chained ? s.blocks.filter((b) => b.chained) : [target];
        const doomedTop = new Set(doomed.map((b) => b.id));
        const removed = doomed.flatMap(collectIds);
        const gone = new Set(removed);
        set({
          blocks: reflow(
            s.blocks.filter((b) => !doomedTop.has(b.id)),
            s.innerWidth,
          ),
          rememberedChains: s.rememberedChains.forget(removed),
          lastUnboxedIds: s.lastUnboxedIds.filter((x) => !gone.has(x)),
          lastBoxedId: s.lastBoxedId != null && gone.has(s.lastBoxedId) ? null : s.lastBoxedId,
          drag: s.drag && gone.has(s.drag.id) ? null : s.drag,
          resize: s.resize && gone.has(s.resize.id) ? null : s.resize,
          dropTargetId: s.dropTargetId != null && gone.has(s.dropTargetId) ? null : s.dropTargetId,
        });
        forgetRemoved(removed);
        return removed;
      },

      incrementCounter: (id) => set((s) => ({ blocks: updateBlock(s.blocks, id, incrementCounter) })),
      decrementCounter: (id) => set((s) => ({ blocks: updateBlock(s.blocks, id, decrementCounter) })),
      resetAllCounters: () => set((s) => ({ blocks: s.blocks.map(resetCountersRecursive) })),

      // --- Layout ---
      reflow: () => set((s) => ({ blocks: reflow(s.blocks, s.innerWidth) })),

      reorderAndReflow: (leaderId) =>
        set((s) => {
          const blocks = reorderAndReflow(s.blocks, leaderId, s.innerWidth);
          return blocks === s.blocks ? s : { blocks };
        }),

      setViewportWidth: (px) =>
        set((s) => {
          const innerWidth = innerWidthForViewport(px, s.zoom);
          if (Math.abs(innerWidth - s.innerWidth) <= 0.5) return { viewportWidth: px };
          return { viewportWidth: px, innerWidth, blocks: reflow(s.blocks, innerWidth) };
        }),

      setZoom: (zoom) => {
        set({ zoom: clampZoom(zoom) });
        const { viewportWidth } = get();
        if (viewportWidth !== null) get().setViewportWidth(viewportWidth);
      },

      toggleFileNames: () => set((s) => ({ showFileNames: !s.showFileNames })),

      // --- Session ---
      loadSession: (input) => {
        // Parse first so a malformed document leaves the canvas untouched.
        const doc = parseSessionDocument(input);
        const blocks = doc.blocks.map(recordToBlock).filter((b): b is Block => b !== null);
        frameCache.clear();
        const s = get();
        set({
          ...initialState(s.innerWidth),
          viewportWidth: s.viewportWidth,
          decodeErrors: s.decodeErrors,
          blocks: reorderAndReflow(blocks, null, s.innerWidth),
          rememberedChains: RememberedChains.fromIds(doc.remembered_chains),
          lastUnboxedIds: doc.last_unboxed_ids,
          lastBoxedId: doc.last_boxed_id,
          zoom: clampZoom(doc.zoom),
          showFileNames: doc.show_file_names,
        });
        if (s.viewportWidth !== null) get().setViewportWidth(s.viewportWidth);
        for (const path of skeletonPaths(blocks)) get().requestDecode(path, true);
      },

      exportSession: () => {
        const s = get();
        return {
          blocks: s.blocks.map(blockToRecord),
          remembered_chains: s.rememberedChains.toJSON(),
          last_unboxed_ids: [...s.lastUnboxedIds],
          last_boxed_id: s.lastBoxedId,
          zoom: s.zoom,
          show_file_names: s.showFileNames,
        };
      },

      reset: () => {
        frameCache.clear();
        queue.drain();
        set(initialState(startWidth));
      },
    };
  });
}

/** Default engine instance. Install a decoder with `setDecoder` before adding images. */
export const useBlockStore: BlockStoreHook = createBlockStore();

// Selectors & hooks for consumers

export function useBlocks(): Block[] {
  return useBlockStore((s) => s.blocks);
}

export function useBlock(id: BlockId): Block | undefined {
  return useBlockStore((s) => findBlock(s.blocks, id));
}

export function useZoom(): number {
  return useBlockStore((s) => s.zoom);
}

export function useDropTargetId(): BlockId | null {
  return useBlockStore((s) => s.dropTargetId);
}

export function useChainedIds(): BlockId[] {
  return useBlockStore(useShallow((s) => s.blocks.filter((b) => b.chained).map((b) => b.id)));
}

export function useChainActions(): Pick<BlockActions, 'toggleChain' | 'clearChains'> {
  return useBlockStore(useShallow((s) => ({ toggleChain: s.toggleChain, clearChains: s.clearChains })));
}

export function useGroupActions(): Pick<
  BlockActions,
  'boxChained' | 'unboxGroup' | 'toggleCompactGroup' | 'dropIntoGroup'
> {
  return useBlockStore(
    useShallow((s) => ({
      boxChained: s.boxChained,
      unboxGroup: s.unboxGroup,
      toggleCompactGroup: s.toggleCompactGroup,
      dropIntoGroup: s.dropIntoGroup,
    })),
  );
}

export function useGestureActions(): Pick<
  BlockActions,
  'beginDrag' | 'dragTo' | 'endDrag' | 'beginResize' | 'resizeTo' | 'endResize'
> {
  return useBlockStore(
    useShallow((s) => ({
      beginDrag: s.beginDrag,
      dragTo: s.dragTo,
      endDrag: s.endDrag,
      beginResize: s.beginResize,
      resizeTo: s.resizeTo,
      endResize: s.endResize,
    })),
  );
}

export function useBlockActions(): Pick<
  BlockActions,
  'removeBlock' | 'incrementCounter' | 'decrementCounter' | 'resetAllCounters' | 'toggleAnimation'
> {
  return useBlockStore(
    useShallow((s) => ({
      removeBlock: s.removeBlock,
      incrementCounter: s.incrementCounter,
      decrementCounter: s.decrementCounter,
      resetAllCounters: s.resetAllCounters,
      toggleAnimation: s.toggleAnimation,
    })),
  );
}
