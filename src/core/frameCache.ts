import type { BlockId } from '../types';
import { MAX_CACHED_ANIMATIONS } from './constants';

export type FrameCacheOptions = {
  /** Called with the least recently used id when the budget is exceeded. */
  onEvict: (id: BlockId) => void;
  capacity?: number;
};

/**
 * LRU bookkeeping for blocks that hold a full animation sequence.
 * The policy only tracks ids; dropping the frames is the job of `onEvict`.
 */
export class FrameCachePolicy {
  private order: BlockId[] = [];
  private readonly onEvict: (id: BlockId) => void;
  readonly capacity: number;

  constructor(options: FrameCacheOptions) {
    this.onEvict = options.onEvict;
    this.capacity = Math.max(1, options.capacity ?? MAX_CACHED_ANIMATIONS);
  }

  /** Oldest first. */
  get accessOrder(): readonly BlockId[] {
    return this.order;
  }

  markUsed(id: BlockId): void {
    this.order = this.order.filter((x) => x !== id);
    this.order.push(id);
    while (this.order.length > this.capacity) {
      const oldest = this.order.shift();
      if (oldest !== undefined) this.onEvict(oldest);
    }
  }

  forget(ids: Iterable<BlockId>): void {
    const gone = new Set(ids);
    this.order = this.order.filter((x) => !gone.has(x));
  }

  clear(): void {
    this.order = [];
  }
}
