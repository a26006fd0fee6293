import { describe, it, expect, beforeEach } from 'vitest';
import { createBlockStore, type BlockStoreHook } from './store';
import { reflow } from '../core/layout';
import { ID_A, ID_B, ID_C, ID_G, groupBlock, imageBlock, sizedGroup } from '../test/fixtures';

let store: BlockStoreHook;

const ids = () => store.getState().blocks.map((b) => b.id);
const chain = (...list: string[]) => list.forEach((id) => store.getState().toggleChain(id));

beforeEach(() => {
  store = createBlockStore();
  store.setState({
    blocks: reflow(
      [imageBlock(100, 50, { id: ID_A }), imageBlock(100, 50, { id: ID_B }), imageBlock(100, 50, { id: ID_C })],
      1400,
    ),
  });
});

describe('Grouping: boxing chained blocks', () => {
  it('boxChained nests the chained blocks in a new group placed first', () => {
    chain(ID_A, ID_C);
    const groupId = store.getState().boxChained();

    const s = store.getState();
    expect(ids()).toEqual([groupId, ID_B]);
    const group = s.blocks[0];
    expect(group).toMatchObject({ isGroup: true, groupName: 'Group of 2', position: { x: 32, y: 32 } });
    expect(group.children.map((c) => c.id)).toEqual([ID_A, ID_C]);
    expect(group.children.every((c) => !c.chained)).toBe(true);
    expect(s.blocks[1].position).toEqual({ x: 32, y: 224 });
  });

  it('does nothing without chained blocks', () => {
    expect(store.getState().boxChained()).toBeNull();
    expect(ids()).toEqual([ID_A, ID_B, ID_C]);
  });

  it('flattens a chained group into the new group', () => {
    chain(ID_A, ID_C);
    const first = store.getState().boxChained();
    if (!first) throw new Error('expected a group');
    chain(first, ID_B);
    store.getState().boxChained();

    const s = store.getState();
    expect(s.blocks).toHaveLength(1);
    expect(s.blocks[0].children.map((c) => c.id)).toEqual([ID_A, ID_C, ID_B]);
    expect(s.blocks[0].children.some((c) => c.isGroup)).toBe(false);
  });

  it('children keep only their first frame', () => {
    store.setState({
      blocks: reflow([{ ...imageBlock(100, 50, { id: ID_A, frameCount: 4, full: true }), chained: true }], 1400),
    });
    store.getState().toggleAnimation(ID_A);
    store.getState().boxChained();

    const [child] = store.getState().blocks[0].children;
    expect(child.anim.frames).toHaveLength(1);
    expect(child.anim.enabled).toBe(false);
    expect(child.isFullSequence).toBe(false);
  });

  it('unboxGroup puts the children back at the start of the image section', () => {
    chain(ID_A, ID_C);
    const groupId = store.getState().boxChained();
    if (!groupId) throw new Error('expected a group');

    expect(store.getState().unboxGroup(groupId)).toEqual([ID_A, ID_C]);
    expect(ids()).toEqual([ID_A, ID_C, ID_B]);
    expect(store.getState().blocks.map((b) => b.position.x)).toEqual([32, 164, 296]);
  });

  it('unboxGroup ignores image blocks', () => {
    expect(store.getState().unboxGroup(ID_A)).toEqual([]);
  });
});

describe('Grouping: compact toggle', () => {
  it('boxes, unboxes and reboxes the same blocks', () => {
    chain(ID_A, ID_C);
    store.getState().toggleCompactGroup();
    const boxed = store.getState().lastBoxedId;
    expect(boxed).not.toBeNull();
    expect(ids()).toEqual([boxed, ID_B]);

    store.getState().toggleCompactGroup();
    expect(ids()).toEqual([ID_A, ID_C, ID_B]);
    expect(store.getState().lastUnboxedIds).toEqual([ID_A, ID_C]);
    expect(store.getState().lastBoxedId).toBeNull();

    store.getState().toggleCompactGroup();
    const s = store.getState();
    expect(s.blocks).toHaveLength(2);
    expect(s.blocks[0].children.map((c) => c.id)).toEqual([ID_A, ID_C]);
    expect(s.lastBoxedId).toBe(s.blocks[0].id);
    expect(s.lastUnboxedIds).toEqual([]);
  });

  it('unboxes a single chained group', () => {
    chain(ID_A, ID_C);
    const groupId = store.getState().boxChained();
    if (!groupId) throw new Error('expected a group');
    chain(groupId);
    store.getState().toggleCompactGroup();
    expect(ids()).toEqual([ID_A, ID_C, ID_B]);
    expect(store.getState().lastUnboxedIds).toEqual([ID_A, ID_C]);
  });

  it('does nothing with nothing chained and no history', () => {
    const before = store.getState().blocks;
    store.getState().toggleCompactGroup();
    expect(store.getState().blocks).toBe(before);
  });
});

describe('Grouping: drop into group', () => {
  beforeEach(() => {
    store.setState({
      blocks: reflow([sizedGroup(160, ID_G), imageBlock(100, 50, { id: ID_A }), imageBlock(100, 50, { id: ID_B })], 1400),
    });
  });

  it('moves the block into the group', () => {
    store.getState().dropIntoGroup(ID_A, ID_G);
    expect(ids()).toEqual([ID_G, ID_B]);
    const group = store.getState().blocks[0];
    expect(group.children.map((c) => c.id)).toEqual([ID_A]);
    expect(group.groupName).toBe(`Box: ${ID_A}.png`);
  });

  it('moves every chained image block with a chained one', () => {
    chain(ID_A, ID_B);
    store.getState().dropIntoGroup(ID_B, ID_G);
    expect(ids()).toEqual([ID_G]);
    expect(store.getState().blocks[0].children.map((c) => c.id)).toEqual([ID_A, ID_B]);
  });

  it('refuses to nest groups', () => {
    const other = groupBlock([], ID_C);
    store.setState((s) => ({ blocks: [other, ...s.blocks] }));
    store.getState().dropIntoGroup(ID_C, ID_G);
    expect(ids()).toEqual([ID_C, ID_G, ID_A, ID_B]);
  });
});
