import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createBlockStore, type BlockStoreHook } from './store';
import type { DecodeFailure } from '../services/decodeQueue';
import { FakeDecoder, decoded } from '../test/fixtures';

const images = {
  '/a.png': decoded(200, 100),
  '/b.gif': decoded(40, 20, 3),
  '/c.png': decoded(100, 25),
  '/d.gif': decoded(40, 40, 2),
  '/big.png': decoded(840, 420),
  '/empty.png': { frames: [], nativeSize: { x: 1, y: 1 }, hasAnimation: false },
};

let store: BlockStoreHook;
let onDecodeError: (failure: DecodeFailure) => void;

async function settle(): Promise<number> {
  await store.getState().decodesSettled();
  return store.getState().pollDecodeResults();
}

const byPath = (path: string) => store.getState().blocks.find((b) => b.path === path);

beforeEach(() => {
  onDecodeError = vi.fn();
  store = createBlockStore({ decoder: new FakeDecoder(images), cacheCapacity: 1, onDecodeError });
});

describe('Decoding new images', () => {
  it('adds a block per decoded file and reports failures', async () => {
    store.getState().addImages(['/a.png', '/b.gif', '/missing.png']);
    expect(await settle()).toBe(3);

    const s = store.getState();
    expect(s.blocks.map((b) => b.path).sort()).toEqual(['/a.png', '/b.gif']);
    expect(s.decodeErrors).toEqual([{ ok: false, path: '/missing.png', message: 'cannot open /missing.png' }]);
    expect(onDecodeError).toHaveBeenCalledTimes(1);
    expect(byPath('/b.gif')?.anim).toMatchObject({ enabled: false, hasAnimation: true });
    expect(byPath('/b.gif')?.anim.frames).toHaveLength(1);
  });

  it('scales large images down', async () => {
    store.getState().addImages(['/big.png']);
    await settle();
    expect(byPath('/big.png')?.imageSize).toEqual({ x: 420, y: 210 });
  });

  it('matches new images to the tallest block already on the canvas', async () => {
    store.getState().addImages(['/a.png']);
    await settle();
    store.getState().addImages(['/c.png']);
    await settle();
    expect(byPath('/c.png')?.preferredImageSize).toEqual({ x: 400, y: 100 });
  });

  it('rejects images without frames', async () => {
    store.getState().addImages(['/empty.png']);
    await settle();
    expect(store.getState().blocks).toEqual([]);
    expect(store.getState().decodeErrors[0].message).toBe('/empty.png did not contain renderable frames');
  });

  it('reports a missing decoder as a failure', () => {
    const bare = createBlockStore();
    bare.getState().addImages(['/a.png']);
    expect(bare.getState().pollDecodeResults()).toBe(1);
    expect(bare.getState().decodeErrors).toEqual([
      { ok: false, path: '/a.png', message: 'no image decoder installed' },
    ]);
  });

  it('polling with nothing finished changes nothing', () => {
    const before = store.getState();
    expect(store.getState().pollDecodeResults()).toBe(0);
    expect(store.getState()).toBe(before);
  });
});

describe('Animation playback', () => {
  it('decodes the full sequence on first toggle and starts playing', async () => {
    store.getState().addImages(['/b.gif']);
    await settle();
    const id = byPath('/b.gif')?.id ?? '';

    store.getState().toggleAnimation(id);
    await settle();
    const playing = byPath('/b.gif');
    expect(playing?.isFullSequence).toBe(true);
    expect(playing?.anim.frames).toHaveLength(3);
    expect(playing?.anim.enabled).toBe(true);
    expect(store.getState().blocks).toHaveLength(1);

    expect(store.getState().update(150)).toBe(50);
    expect(byPath('/b.gif')?.anim.currentFrame).toBe(1);

    store.getState().toggleAnimation(id);
    expect(byPath('/b.gif')?.anim).toMatchObject({ enabled: false, currentFrame: 0 });
    expect(store.getState().update(150)).toBeNull();
  });

  it('still images ignore the toggle', async () => {
    store.getState().addImages(['/a.png']);
    await settle();
    store.getState().toggleAnimation(byPath('/a.png')?.id ?? '');
    expect(await settle()).toBe(0);
  });

  it('evicts the least recently played sequence over budget', async () => {
    store.getState().addImages(['/b.gif', '/d.gif']);
    await settle();
    store.getState().toggleAnimation(byPath('/b.gif')?.id ?? '');
    await settle();
    store.getState().toggleAnimation(byPath('/d.gif')?.id ?? '');
    await settle();

    expect(byPath('/d.gif')?.anim.enabled).toBe(true);
    const evicted = byPath('/b.gif');
    expect(evicted?.isFullSequence).toBe(false);
    expect(evicted?.anim.frames).toHaveLength(1);
    expect(evicted?.anim.enabled).toBe(false);
  });
});

describe('Skeletons from a session', () => {
  it('fills restored blocks and group children instead of adding new ones', async () => {
    store.getState().loadSession({
      blocks: [
        {
          id: '11111111-1111-4111-8111-111111111111',
          position: [32, 32],
          size: [100, 50],
          path: '/a.png',
          chained: false,
          animation_enabled: false,
          counter: 2,
        },
        {
          id: '99999999-9999-4999-8999-999999999999',
          position: [32, 300],
          size: [160, 160],
          path: '',
          chained: false,
          animation_enabled: false,
          counter: 0,
          is_group: true,
          children: [
            {
              id: '22222222-2222-4222-8222-222222222222',
              position: [0, 0],
              size: [40, 20],
              path: '/b.gif',
              chained: false,
              animation_enabled: false,
              counter: 0,
            },
          ],
        },
      ],
    });
    expect(byPath('/a.png')?.anim.frames).toEqual([]);

    expect(await settle()).toBe(2);
    const s = store.getState();
    expect(s.blocks).toHaveLength(2);
    const [group, image] = s.blocks;
    expect(image.anim.frames).toHaveLength(1);
    expect(image.counter).toBe(2);
    expect(image.imageSize).toEqual({ x: 100, y: 50 });
    expect(group.children[0].anim.frames).toHaveLength(1);
    expect(group.children[0].isFullSequence).toBe(false);
  });
});
