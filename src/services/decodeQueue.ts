import type { AnimationFrame, Vec2 } from '../types';

export type DecodedImage = {
  /** In display order. Holds only the first frame when decoded with `firstFrameOnly`. */
  frames: AnimationFrame[];
  /** Pixel size of the source before any scaling. */
  nativeSize: Vec2;
  /** Source has more than one frame. */
  hasAnimation: boolean;
};

export type DecodeOptions = { firstFrameOnly: boolean };

/**
 * Turns a file path into decoded frames off the engine's call path
 * (worker, native module, browser ImageDecoder, ...).
 */
export interface ImageDecoder {
  decode(path: string, options: DecodeOptions): Promise<DecodedImage>;
}

export type DecodeSuccess = { ok: true; path: string; image: DecodedImage; isFull: boolean };
export type DecodeFailure = { ok: false; path: string; message: string };
export type DecodeResult = DecodeSuccess | DecodeFailure;

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Completed decodes waiting for the next update step. Decoders settle into the
 * queue in any order; the engine drains it once per step.
 */
export class DecodeQueue {
  private ready: DecodeResult[] = [];
  private readonly inFlight = new Set<Promise<void>>();

  /** Decodes in progress. */
  get pending(): number {
    return this.inFlight.size;
  }

  /** Results waiting to be drained. */
  get size(): number {
    return this.ready.length;
  }

  /** Start one decode; its outcome (success or failure) lands in the queue. */
  submit(decoder: ImageDecoder, path: string, options: DecodeOptions): void {
    const isFull = !options.firstFrameOnly;
    const task: Promise<void> = Promise.resolve()
      .then(() => decoder.decode(path, options))
      .then(
        (image) => this.push({ ok: true, path, image, isFull }),
        (err: unknown) => this.push({ ok: false, path, message: errorMessage(err) }),
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  push(result: DecodeResult): void {
    this.ready.push(result);
  }

  drain(): DecodeResult[] {
    const out = this.ready;
    this.ready = [];
    return out;
  }

  /** Resolves once every decode submitted so far (and any started meanwhile) has landed. */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
