import { parse as parseUuid } from 'uuid';
import type { BlockId, Rgba } from '../types';
import {
  ID_COLOR_LIGHTNESS_MIN,
  ID_COLOR_LIGHTNESS_RANGE,
  ID_COLOR_SATURATION_MIN,
  ID_COLOR_SATURATION_RANGE,
} from './constants';

/** h, s, l in 0..1. */
export function hslToRgb(h: number, s: number, l: number): [number, number, number] {
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const hp = (((h % 1) + 1) % 1) * 6;
  const x = c * (1 - Math.abs((hp % 2) - 1));
  const m = l - c / 2;
  let r = 0;
  let g = 0;
  let b = 0;
  if (hp < 1) [r, g, b] = [c, x, 0];
  else if (hp < 2) [r, g, b] = [x, c, 0];
  else if (hp < 3) [r, g, b] = [0, c, x];
  else if (hp < 4) [r, g, b] = [0, x, c];
  else if (hp < 5) [r, g, b] = [x, 0, c];
  else [r, g, b] = [c, 0, x];
  const to255 = (v: number) => Math.round((v + m) * 255);
  return [to255(r), to255(g), to255(b)];
}

/**
 * Folder tint for a block, derived only from the bytes of its UUID.
 * The same id yields the same color in every process.
 */
export function colorFromId(id: BlockId): Rgba {
  const b = parseUuid(id);
  const h = (b[0] + b[1] * 256) / 65535;
  const s = ID_COLOR_SATURATION_MIN + (b[2] / 255) * ID_COLOR_SATURATION_RANGE;
  const l = ID_COLOR_LIGHTNESS_MIN + (b[3] / 255) * ID_COLOR_LIGHTNESS_RANGE;
  const [r, g, bl] = hslToRgb(h, s, l);
  return [r, g, bl, 255];
}
