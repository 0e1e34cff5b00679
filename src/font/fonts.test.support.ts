/**
 * Synthetic monospace fonts for tests
 *
 * Cells are 8x16 px: 1000 units per em with ascender 750 and descender -250
 * puts the baseline 12 px down and makes one pixel 62.5 units.
 */

import opentype from 'opentype.js';
import type { Font, Path } from 'opentype.js';

const UNITS_PER_PIXEL = 62.5;
const BASELINE_PX = 12;

/** Rectangle in cell pixels, origin at the top-left corner */
export interface PixelBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export const FULL: PixelBox = { x0: 0, y0: 0, x1: 8, y1: 16 };
export const LOWER_HALF: PixelBox = { x0: 0, y0: 8, x1: 8, y1: 16 };
export const LOWER_QUARTER: PixelBox = { x0: 0, y0: 8, x1: 4, y1: 16 };

function boxPath(box: PixelBox): Path {
  const x = (px: number) => px * UNITS_PER_PIXEL;
  const y = (px: number) => (BASELINE_PX - px) * UNITS_PER_PIXEL;
  const path = new opentype.Path();
  path.moveTo(x(box.x0), y(box.y1));
  path.lineTo(x(box.x1), y(box.y1));
  path.lineTo(x(box.x1), y(box.y0));
  path.lineTo(x(box.x0), y(box.y0));
  path.close();
  return path;
}

/**
 * Encode a font whose glyphs are the given boxes (null for an empty glyph)
 */
export function testFontBytes(shapes: Record<string, PixelBox | null>): ArrayBuffer {
  const glyphs = [new opentype.Glyph({ name: '.notdef', advanceWidth: 500, path: new opentype.Path() })];
  for (const [character, box] of Object.entries(shapes)) {
    const code = character.codePointAt(0);
    glyphs.push(
      new opentype.Glyph({
        name: `char${code}`,
        unicode: code,
        advanceWidth: 500,
        path: box ? boxPath(box) : new opentype.Path(),
      })
    );
  }

  const font = new opentype.Font({
    familyName: 'Test Mono',
    styleName: 'Regular',
    unitsPerEm: 1000,
    ascender: 750,
    descender: -250,
    glyphs,
  });
  return font.toArrayBuffer();
}

/**
 * Encode then parse, so tests exercise the same code paths as a font file
 */
export function testFont(shapes: Record<string, PixelBox | null>): Font {
  return opentype.parse(testFontBytes(shapes));
}

/**
 * A box per printable ASCII character, height varying with the codepoint.
 * Characters in `omit` get no glyph at all; space is empty.
 */
export function asciiShapes(omit: readonly string[] = []): Record<string, PixelBox | null> {
  const shapes: Record<string, PixelBox | null> = {};
  for (let code = 0x20; code <= 0x7e; code++) {
    const character = String.fromCharCode(code);
    if (omit.includes(character)) {
      continue;
    }
    const rows = ((code % 8) + 1) * 2;
    shapes[character] = code === 0x20 ? null : { x0: 0, y0: 16 - rows, x1: 8, y1: 16 };
  }
  return shapes;
}
