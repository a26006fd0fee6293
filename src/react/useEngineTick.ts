import { useEffect } from 'react';
import { useBlockStore, type BlockStoreHook } from '../state/store';

export type UseEngineTickOptions = {
  /** Store to drive. Defaults to the shared `useBlockStore`. */
  store?: BlockStoreHook;
  enabled?: boolean; // default true
};

/**
 * Runs the engine's update step once per animation frame: finished decodes are
 * applied, then playing blocks advance by the elapsed time.
 */
export function useEngineTick(options: UseEngineTickOptions = {}): void {
  const store = options.store ?? useBlockStore;
  const enabled = options.enabled ?? true;

  useEffect(() => {
    if (!enabled) return;
    let handle = 0;
    let last: number | null = null;
    let stopped = false;

    const frame = (now: number) => {
      if (stopped) return;
      const dt = last === null ? 0 : now - last;
      last = now;
      store.getState().update(dt);
      handle = requestAnimationFrame(frame);
    };

    handle = requestAnimationFrame(frame);
    return () => {
      stopped = true;
      cancelAnimationFrame(handle);
    };
  }, [store, enabled]);
}
