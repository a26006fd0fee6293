/**
 * Canvas and block sizing constants (world units unless noted).
 */

// Padding between a block's image and its border, on every side.
export const BLOCK_PADDING = 4;

// Smallest image width a block may shrink to; also the fallback for degenerate resize math.
export const MIN_BLOCK_SIZE = 50;

// Row height used to bucket Y positions when ordering blocks.
export const ROW_QUANTIZATION_HEIGHT = 100;

// Image size (square) of a freshly boxed group.
export const DEFAULT_GROUP_SIZE = 160;

// Left/top margin of the canvas.
export const CANVAS_PADDING = 32;

// Inner width used before the host reports a viewport.
export const CANVAS_WORKING_WIDTH = 1400;

// Horizontal and vertical gap between packed blocks.
export const ALIGN_SPACING = 24;

// Longest side of a newly decoded image's logical size.
export const MAX_BLOCK_DIMENSION = 420;

// A row always fits at least one minimum-size block.
export const MIN_CANVAS_INNER_WIDTH = MIN_BLOCK_SIZE + BLOCK_PADDING * 2;

// Number of blocks allowed to hold a full animation sequence at once.
export const MAX_CACHED_ANIMATIONS = 20;

export const MIN_ZOOM = 0.1;
export const MAX_ZOOM = 10;

// Id-derived color ranges (HSL, 0..1).
export const ID_COLOR_SATURATION_MIN = 0.6;
export const ID_COLOR_SATURATION_RANGE = 0.4;
export const ID_COLOR_LIGHTNESS_MIN = 0.5;
export const ID_COLOR_LIGHTNESS_RANGE = 0.2;
