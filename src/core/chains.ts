import type { BlockId } from '../types';

export type ChainSet = ReadonlySet<BlockId>;

/**
 * Chains that were cleared while holding two or more blocks. Re-chaining any member
 * restores the whole set.
 *
 * Immutable: every operation returns a new instance. Invariant: the sets are pairwise
 * disjoint, which `remember` keeps by evicting every set that overlaps the new one.
 */
export class RememberedChains {
  private constructor(private readonly sets: readonly ChainSet[]) {}

  static empty(): RememberedChains {
    return new RememberedChains([]);
  }

  /** Rebuild from persisted id lists, dropping lists with fewer than two ids. */
  static fromIds(lists: readonly (readonly BlockId[])[]): RememberedChains {
    return lists.reduce((acc, ids) => acc.remember(ids), RememberedChains.empty());
  }

  get size(): number {
    return this.sets.length;
  }

  all(): readonly ChainSet[] {
    return this.sets;
  }

  find(id: BlockId): ChainSet | undefined {
    return this.sets.find((s) => s.has(id));
  }

  remember(ids: Iterable<BlockId>): RememberedChains {
    const next = new Set(ids);
    if (next.size < 2) return this;
    const kept = this.sets.filter((s) => !overlaps(s, next));
    return new RememberedChains([...kept, next]);
  }

  /** Drop every set that contains any of `ids`. */
  forget(ids: Iterable<BlockId>): RememberedChains {
    const gone = new Set(ids);
    const kept = this.sets.filter((s) => !overlaps(s, gone));
    return kept.length === this.sets.length ? this : new RememberedChains(kept);
  }

  toJSON(): BlockId[][] {
    return this.sets.map((s) => [...s]);
  }
}

function overlaps(a: ChainSet, b: ChainSet): boolean {
  for (const id of a) if (b.has(id)) return true;
  return false;
}
