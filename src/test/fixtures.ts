import type { AnimationFrame, Block } from '../types';
import { createGroupBlock, createImageBlock, setPreferredSize } from '../core/block';
import type { DecodedImage, DecodeOptions, ImageDecoder } from '../services/decodeQueue';

export const ID_A = '11111111-1111-4111-8111-111111111111';
export const ID_B = '22222222-2222-4222-8222-222222222222';
export const ID_C = '33333333-3333-4333-8333-333333333333';
export const ID_D = '44444444-4444-4444-8444-444444444444';
export const ID_G = '99999999-9999-4999-8999-999999999999';

export function frame(durationMs = 100): AnimationFrame {
  return { image: { width: 1, height: 1, pixels: new Uint8ClampedArray(4) }, durationMs };
}

export function frames(count: number, durationMs = 100): AnimationFrame[] {
  return Array.from({ length: count }, () => frame(durationMs));
}

export function imageBlock(
  width: number,
  height: number,
  opts: { id?: string; path?: string; frameCount?: number; full?: boolean } = {},
): Block {
  const count = opts.frameCount ?? 1;
  return createImageBlock({
    id: opts.id,
    path: opts.path ?? `/img/${opts.id ?? 'block'}.png`,
    imageSize: { x: width, y: height },
    frames: frames(count),
    hasAnimation: count > 1,
    isFullSequence: opts.full ?? count <= 1,
  });
}

export function groupBlock(children: Block[], id?: string): Block {
  return createGroupBlock(children, { id });
}

export function sizedGroup(size: number, id?: string): Block {
  return setPreferredSize(createGroupBlock([], { id }), { x: size, y: size });
}

export function decoded(width: number, height: number, frameCount = 1): DecodedImage {
  return { frames: frames(frameCount), nativeSize: { x: width, y: height }, hasAnimation: frameCount > 1 };
}

/** In-process decoder over a fixed table of paths. Unknown paths reject. */
export class FakeDecoder implements ImageDecoder {
  readonly calls: { path: string; options: DecodeOptions }[] = [];

  constructor(private readonly images: Record<string, DecodedImage>) {}

  async decode(path: string, options: DecodeOptions): Promise<DecodedImage> {
    this.calls.push({ path, options });
    const image = this.images[path];
    if (!image) throw new Error(`cannot open ${path}`);
    if (options.firstFrameOnly) return { ...image, frames: image.frames.slice(0, 1) };
    return image;
  }
}
