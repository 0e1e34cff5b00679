/**
 * Glyph rasterization
 *
 * Fonts are parsed with opentype.js; each glyph outline is turned into an
 * SVG path and rasterized by sharp into a fixed-size greyscale cell.
 */

import fs from 'node:fs/promises';
import opentype from 'opentype.js';
import type { Font } from 'opentype.js';
import sharp from 'sharp';
import { FontLoadFailed, GlyphMissing } from '../errors.js';
import type { GlyphBitmap, GlyphSize } from '../types.js';
import { COMPONENTS, logDebug } from '../utils/logger.js';

export type { Font };

const PATH_PRECISION = 2;

/**
 * Read and parse a font file
 */
export async function loadFont(fontPath: string): Promise<Font> {
  let data: Buffer;
  try {
    data = await fs.readFile(fontPath);
  } catch (error) {
    throw new FontLoadFailed(fontPath, error);
  }

  try {
    // opentype.js wants an ArrayBuffer that starts at the font's first byte
    const buffer = data.buffer.slice(data.byteOffset, data.byteOffset + data.byteLength);
    const font = opentype.parse(buffer);
    logDebug(COMPONENTS.RASTERIZER, `Loaded font ${fontPath} (${font.glyphs.length} glyphs)`);
    return font;
  } catch (error) {
    throw new FontLoadFailed(fontPath, error);
  }
}

/**
 * Scale and baseline that fit the font's ascender-to-descender span into
 * the cell height
 */
function cellMetrics(font: Font, size: GlyphSize): { fontSize: number; baseline: number } {
  const span = font.ascender - font.descender;
  const designHeight = span > 0 ? span : font.unitsPerEm;
  const fontSize = (size.height * font.unitsPerEm) / designHeight;
  const ascender = span > 0 ? font.ascender : font.unitsPerEm;
  return { fontSize, baseline: (ascender * fontSize) / font.unitsPerEm };
}

/**
 * SVG document for one glyph: white outline on a black cell, no anti-aliasing
 */
export function glyphSvg(font: Font, character: string, size: GlyphSize): string {
  const { fontSize, baseline } = cellMetrics(font, size);
  const d = font.getPath(character, 0, baseline, fontSize).toPathData(PATH_PRECISION);
  const outline = d ? `<path d="${d}" fill="#fff" fill-rule="nonzero" shape-rendering="crispEdges"/>` : '';

  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}" ` +
    `viewBox="0 0 ${size.width} ${size.height}" shape-rendering="crispEdges">` +
    `<rect width="${size.width}" height="${size.height}" fill="#000"/>` +
    outline +
    '</svg>'
  );
}

/**
 * Render a single character into a width x height greyscale bitmap.
 *
 * @throws GlyphMissing when the font has no glyph for the character
 */
export async function rasterizeGlyph(font: Font, character: string, size: GlyphSize): Promise<GlyphBitmap> {
  // Index 0 is .notdef; cmap lookups yield undefined or null for unmapped characters
  const glyphIndex = font.charToGlyphIndex(character);
  if (!glyphIndex) {
    throw new GlyphMissing(character);
  }

  const { data, info } = await sharp(Buffer.from(glyphSvg(font, character, size)))
    .flatten({ background: '#000000' })
    .greyscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const pixels = new Uint8Array(size.width * size.height);
  const rows = Math.min(size.height, info.height);
  const cols = Math.min(size.width, info.width);
  for (let y = 0; y < rows; y++) {
    for (let x = 0; x < cols; x++) {
      pixels[y * size.width + x] = data[(y * info.width + x) * info.channels];
    }
  }

  return { character, width: size.width, height: size.height, pixels };
}
