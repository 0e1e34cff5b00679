/**
 * Brightness profiling
 *
 * Rasterizes the supported character set, scores each glyph by its mean
 * intensity and min-max normalizes the scores into an ascending palette.
 */

import { DEFAULT_CONCURRENCY, DEFAULT_GLYPH_SIZE } from '../config.js';
import { GlyphMissing, ProfilingFailed } from '../errors.js';
import type { CharacterBrightness, GlyphBitmap, GlyphSize, Palette } from '../types.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { COMPONENTS, logDebug, logWarn } from '../utils/logger.js';
import { SUPPORTED_CHARACTERS } from './charset.js';
import { rasterizeGlyph, type Font } from './rasterizer.js';

export interface ProfileOptions {
  size?: GlyphSize;
  /** Maximum glyphs rasterized at once */
  concurrency?: number;
  characters?: readonly string[];
}

/**
 * Mean normalized pixel intensity of a bitmap, 0 for an empty one
 */
export function glyphBrightness(bitmap: GlyphBitmap): number {
  if (bitmap.pixels.length === 0) {
    return 0;
  }
  let total = 0;
  for (const value of bitmap.pixels) {
    total += value;
  }
  return total / (bitmap.pixels.length * 255);
}

/**
 * Min-max normalize to [0, 1]. A flat input maps to all zeros.
 */
export function normalizeBrightness(values: readonly number[]): number[] {
  if (values.length === 0) {
    return [];
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = max - min;
  if (range <= 0) {
    return values.map(() => 0);
  }
  return values.map((value) => (value - min) / range);
}

/**
 * Sort ascending by brightness. Array.prototype.sort is stable, so equal
 * brightnesses keep their incoming (codepoint) order.
 */
export function sortPalette(entries: readonly CharacterBrightness[]): CharacterBrightness[] {
  return [...entries].sort((a, b) => a.brightness - b.brightness);
}

/**
 * Build the brightness palette for a font.
 *
 * Characters the font lacks get the lowest brightness and a warning.
 *
 * @throws ProfilingFailed when no character could be rasterized
 */
export async function buildPalette(font: Font, options: ProfileOptions = {}): Promise<Palette> {
  const size = options.size ?? DEFAULT_GLYPH_SIZE;
  const characters = [...new Set(options.characters ?? SUPPORTED_CHARACTERS)];
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

  if (characters.length === 0) {
    throw new ProfilingFailed('Character set is empty');
  }

  const raw = await mapWithConcurrency(characters, concurrency, async (character) => {
    try {
      return glyphBrightness(await rasterizeGlyph(font, character, size));
    } catch (error) {
      if (error instanceof GlyphMissing) {
        logWarn(COMPONENTS.PROFILER, `${error.message}; using lowest brightness`);
        return null;
      }
      throw error;
    }
  });

  const measured = raw.filter((value): value is number => value !== null);
  if (measured.length === 0) {
    throw new ProfilingFailed();
  }

  // Missing glyphs sit at the floor of the measured range
  const floor = Math.min(...measured);
  const normalized = normalizeBrightness(raw.map((value) => value ?? floor));

  const palette = sortPalette(
    characters.map((character, index) => ({ character, brightness: normalized[index] }))
  );

  logDebug(
    COMPONENTS.PROFILER,
    `Profiled ${characters.length} characters at ${size.width}x${size.height} (${characters.length - measured.length} missing)`
  );
  return palette;
}
