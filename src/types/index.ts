export type BlockId = string;

export type Vec2 = { x: number; y: number };

/** Straight (non-premultiplied) RGBA, each channel 0..255. */
export type Rgba = readonly [number, number, number, number];

/** Decoded pixels for one frame, as produced by the image decoder. */
export type FrameImage = {
  width: number;
  height: number;
  pixels: Uint8ClampedArray;
};

export type AnimationFrame = {
  image: FrameImage;
  durationMs: number;
};

export type AnimationState = {
  frames: AnimationFrame[];
  currentFrame: number;
  frameElapsedMs: number;
  enabled: boolean;
  /** Decoder reported more than one frame for the source, even if only the first is held. */
  hasAnimation: boolean;
};

export type Block = {
  readonly id: BlockId;
  /** Source file path. Empty for groups. */
  path: string;
  /** Top-left corner in world coordinates. */
  position: Vec2;
  /** Current logical render size of the image area (padding excluded). */
  imageSize: Vec2;
  /** User-set size before width clamping. */
  preferredImageSize: Vec2;
  /** width / height of the source. Fixed for the block's lifetime. */
  readonly aspectRatio: number;
  color: Rgba;
  chained: boolean;
  counter: number;
  readonly isGroup: boolean;
  /** Derived from children, see groupNameFor(). */
  groupName: string;
  /**
   * Ordered children of a group. Empty for image blocks.
   * Invariant: children are never groups themselves (depth <= 2).
   */
  children: Block[];
  anim: AnimationState;
  /** True when every decoded frame is held; false for a first-frame skeleton. */
  isFullSequence: boolean;
};
