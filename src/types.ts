/**
 * Shared data model for the render pipeline
 */

/**
 * A character paired with its normalized brightness in [0, 1]
 */
export interface CharacterBrightness {
  character: string;
  brightness: number;
}

/**
 * Characters sorted ascending by brightness, no duplicates
 */
export type Palette = readonly CharacterBrightness[];

/**
 * Identifies one font configuration in the profile cache
 */
export interface FontFingerprint {
  fontPath: string;
  modifiedMs: number;
  /** Glyph cell the palette was profiled at */
  pixelSize: GlyphSize;
  /** Hex digest of the three fields above; doubles as the cache file name */
  key: string;
}

export interface FontProfile {
  version: number;
  fingerprint: FontFingerprint;
  palette: Palette;
}

export interface GlyphSize {
  width: number;
  height: number;
}

/**
 * Greyscale rendering of one character, one byte per pixel
 */
export interface GlyphBitmap {
  character: string;
  width: number;
  height: number;
  pixels: Uint8Array;
}

export interface RGB {
  r: number;
  g: number;
  b: number;
}

/**
 * Decoded image, 4 bytes per pixel (RGBA)
 */
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface Cell {
  luminance: number;
  color: RGB;
  /** Mean opacity of the block, 0 when fully transparent */
  alpha: number;
}

export interface GridSize {
  columns: number;
  rows: number;
}

export interface RenderGrid extends GridSize {
  /** Row-major, columns * rows entries */
  cells: Cell[];
}

export const Colors = {
  RED: '\x1b[0;31m',
  NC: '\x1b[0m'  // No Color
} as const;
