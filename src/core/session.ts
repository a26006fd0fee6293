import { validate as isUuid } from 'uuid';
import type { Block, BlockId, Rgba } from '../types';
import { colorFromId } from './color';
import { createGroupBlock, createImageBlock, setPreferredSize } from './block';

/**
 * Persisted session format. Field names are snake_case to stay compatible with
 * session files written by earlier versions of the app.
 */
export type BlockRecord = {
  id: BlockId;
  position: [number, number];
  size: [number, number];
  path: string;
  chained: boolean;
  animation_enabled: boolean;
  counter: number;
  is_group: boolean;
  group_name: string;
  color: [number, number, number, number];
  children: BlockRecord[];
};

export type SessionDocument = {
  blocks: BlockRecord[];
  remembered_chains: BlockId[][];
  last_unboxed_ids: BlockId[];
  last_boxed_id: BlockId | null;
  zoom: number;
  show_file_names: boolean;
};

export class SessionFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionFormatError';
  }
}

export function blockToRecord(b: Block): BlockRecord {
  return {
    id: b.id,
    position: [b.position.x, b.position.y],
    size: [b.imageSize.x, b.imageSize.y],
    path: b.path,
    chained: b.chained,
    animation_enabled: b.anim.enabled,
    counter: b.counter,
    is_group: b.isGroup,
    group_name: b.groupName,
    color: [b.color[0], b.color[1], b.color[2], b.color[3]],
    children: b.children.map(blockToRecord),
  };
}

/**
 * Rebuild a block from its record as a skeleton: no frames are held until the
 * decoder delivers them. Image records without a path are dropped.
 * Playback is not restored; a full sequence is decoded again on demand.
 */
export function recordToBlock(r: BlockRecord): Block | null {
  const size = { x: r.size[0], y: r.size[1] };
  const position = { x: r.position[0], y: r.position[1] };
  const color: Rgba = [r.color[0], r.color[1], r.color[2], r.color[3]];

  if (r.is_group) {
    const children = r.children
      .map(recordToBlock)
      .filter((c): c is Block => c !== null);
    const group = setPreferredSize(createGroupBlock(children, { id: r.id, color }), size);
    return { ...group, position, chained: r.chained };
  }

  if (!r.path) return null;
  const block = createImageBlock({
    id: r.id,
    color,
    path: r.path,
    imageSize: size,
    frames: [],
    hasAnimation: false,
    isFullSequence: false,
  });
  return { ...block, position, chained: r.chained, counter: r.counter };
}

// --- validation ---

type Obj = Record<string, unknown>;

function isObj(v: unknown): v is Obj {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function fail(where: string, what: string): never {
  throw new SessionFormatError(`${where}: ${what}`);
}

function num(v: unknown, where: string): number {
  if (typeof v !== 'number' || !Number.isFinite(v)) fail(where, 'expected a finite number');
  return v;
}

function pair(v: unknown, where: string): [number, number] {
  if (!Array.isArray(v) || v.length !== 2) fail(where, 'expected [number, number]');
  return [num(v[0], where), num(v[1], where)];
}

function bool(v: unknown, where: string, fallback?: boolean): boolean {
  if (v === undefined && fallback !== undefined) return fallback;
  if (typeof v !== 'boolean') fail(where, 'expected a boolean');
  return v;
}

function str(v: unknown, where: string, fallback?: string): string {
  if (v === undefined && fallback !== undefined) return fallback;
  if (typeof v !== 'string') fail(where, 'expected a string');
  return v;
}

function uuid(v: unknown, where: string): BlockId {
  if (typeof v !== 'string' || !isUuid(v)) fail(where, 'expected a UUID');
  return v;
}

function parseColor(v: unknown, id: BlockId, where: string): [number, number, number, number] {
  if (v === undefined) {
    const c = colorFromId(id);
    return [c[0], c[1], c[2], c[3]];
  }
  if (!Array.isArray(v) || v.length !== 4) fail(where, 'expected [r, g, b, a]');
  const channel = (x: unknown) => {
    const n = num(x, where);
    if (!Number.isInteger(n) || n < 0 || n > 255) fail(where, 'color channel out of range');
    return n;
  };
  return [channel(v[0]), channel(v[1]), channel(v[2]), channel(v[3])];
}

function parseBlockRecord(v: unknown, where: string, depth: number, seen: Set<BlockId>): BlockRecord {
  if (!isObj(v)) fail(where, 'expected an object');
  const id = uuid(v.id, `${where}.id`);
  if (seen.has(id)) fail(`${where}.id`, `duplicate block id ${id}`);
  seen.add(id);
  const isGroup = bool(v.is_group, `${where}.is_group`, false);
  const counter = num(v.counter, `${where}.counter`);
  const rawChildren = v.children === undefined ? [] : v.children;
  if (!Array.isArray(rawChildren)) fail(`${where}.children`, 'expected an array');
  if (!isGroup && rawChildren.length > 0) fail(`${where}.children`, 'only groups have children');
  if (isGroup && depth > 0) fail(where, 'groups cannot be nested');

  return {
    id,
    position: pair(v.position, `${where}.position`),
    size: pair(v.size, `${where}.size`),
    path: str(v.path, `${where}.path`),
    chained: bool(v.chained, `${where}.chained`),
    animation_enabled: bool(v.animation_enabled, `${where}.animation_enabled`),
    counter: Math.max(0, Math.trunc(counter)),
    is_group: isGroup,
    group_name: str(v.group_name, `${where}.group_name`, ''),
    color: parseColor(v.color, id, `${where}.color`),
    children: rawChildren.map((c: unknown, i: number) =>
      parseBlockRecord(c, `${where}.children[${i}]`, depth + 1, seen),
    ),
  };
}

function idList(v: unknown, where: string): BlockId[] {
  if (v === undefined) return [];
  if (!Array.isArray(v)) fail(where, 'expected an array of ids');
  return v.map((x: unknown, i: number) => uuid(x, `${where}[${i}]`));
}

/**
 * Validate a session document (parsed JSON or its text). Optional fields take the
 * same defaults older session files relied on.
 */
export function parseSessionDocument(input: unknown): SessionDocument {
  let data = input;
  if (typeof input === 'string') {
    try {
      data = JSON.parse(input);
    } catch (err) {
      throw new SessionFormatError(`session: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }
  }
  if (!isObj(data)) fail('session', 'expected an object');
  const doc: Obj = data;
  const blocks = doc.blocks;
  if (!Array.isArray(blocks)) fail('session.blocks', 'expected an array');

  const rawChains = doc.remembered_chains === undefined ? [] : doc.remembered_chains;
  if (!Array.isArray(rawChains)) fail('session.remembered_chains', 'expected an array');

  // Unparseable ids inside a remembered chain are skipped rather than rejected.
  const chains: BlockId[][] = rawChains.map((chain: unknown, i: number) => {
    if (!Array.isArray(chain)) fail(`session.remembered_chains[${i}]`, 'expected an array');
    return chain.filter((x: unknown): x is string => typeof x === 'string' && isUuid(x));
  });

  const lastBoxed = doc.last_boxed_id;
  // Ids are unique across the whole tree, group children included.
  const seen = new Set<BlockId>();
  return {
    blocks: blocks.map((b: unknown, i: number) => parseBlockRecord(b, `session.blocks[${i}]`, 0, seen)),
    remembered_chains: chains.filter((c) => c.length >= 2),
    last_unboxed_ids: idList(doc.last_unboxed_ids, 'session.last_unboxed_ids'),
    last_boxed_id:
      lastBoxed === undefined || lastBoxed === null ? null : uuid(lastBoxed, 'session.last_boxed_id'),
    zoom: doc.zoom === undefined ? 1 : num(doc.zoom, 'session.zoom'),
    show_file_names: bool(doc.show_file_names, 'session.show_file_names', false),
  };
}
