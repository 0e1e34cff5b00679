/**
 * The render pipeline: cache lookup, profiling on a miss, sampling and
 * compositing
 */

import { ProfileCache, PROFILE_SCHEMA_VERSION } from './cache/profile-cache.js';
import type { Config } from './config.js';
import { CacheWriteFailed } from './errors.js';
import { fingerprintFont } from './font/fingerprint.js';
import { buildPalette } from './font/profiler.js';
import { loadFont } from './font/rasterizer.js';
import { computeGridSize, decodeImage, sampleImage } from './image/sampler.js';
import { composite, rampPalette } from './render/compositor.js';
import type { FontProfile, GridSize, Palette } from './types.js';
import { COMPONENTS, logDebug, logInfo, logWarn } from './utils/logger.js';

export interface RenderRequest {
  imagePath: string;
  /** Overrides config.fontPath */
  fontPath?: string;
  clean: boolean;
  color: boolean;
  /** Columns and rows available for the render */
  bounds: GridSize;
}

/**
 * Cached profile for the font, profiling and storing it on a miss.
 * A failed cache write is logged and does not fail the call.
 */
export async function resolveProfile(fontPath: string, cache: ProfileCache, config: Config): Promise<FontProfile> {
  const fingerprint = await fingerprintFont(fontPath, config.glyphSize);
  const cached = await cache.load(fingerprint);
  if (cached) {
    return cached;
  }

  logInfo(COMPONENTS.PROFILER, `Profiling ${fingerprint.fontPath}`);
  const font = await loadFont(fingerprint.fontPath);
  const palette = await buildPalette(font, { size: config.glyphSize, concurrency: config.concurrency });
  const profile: FontProfile = { version: PROFILE_SCHEMA_VERSION, fingerprint, palette };

  try {
    await cache.store(profile);
  } catch (error) {
    if (!(error instanceof CacheWriteFailed)) {
      throw error;
    }
    logWarn(COMPONENTS.CACHE, error.message);
  }
  return profile;
}

/**
 * Palette for the run: profiled from the font when one is configured,
 * otherwise the built-in ramp
 */
export async function resolvePalette(fontPath: string | undefined, cache: ProfileCache, config: Config): Promise<Palette> {
  if (!fontPath) {
    logDebug(COMPONENTS.PROFILER, 'No font configured, using the built-in ramp');
    return rampPalette();
  }
  const profile = await resolveProfile(fontPath, cache, config);
  return profile.palette;
}

/**
 * Run the whole pipeline and return the text block to print
 */
export async function render(request: RenderRequest, config: Config): Promise<string> {
  const cache = new ProfileCache({ directory: config.cacheDir });

  if (request.clean) {
    const removed = await cache.clear();
    logInfo(COMPONENTS.CACHE, `Removed ${removed} cached profile(s) from ${cache.directory}`);
  }

  // Decode first so a bad image fails before any profiling work
  const image = await decodeImage(request.imagePath);
  const palette = await resolvePalette(request.fontPath ?? config.fontPath, cache, config);

  const gridSize = computeGridSize(image, request.bounds);
  logDebug(COMPONENTS.SAMPLER, `Grid ${gridSize.columns}x${gridSize.rows} for ${image.width}x${image.height} image`);
  const grid = sampleImage(image, gridSize);

  return composite(palette, grid, { color: request.color });
}

export { ProfileCache, PROFILE_SCHEMA_VERSION } from './cache/profile-cache.js';
export { resolveConfig, type Config } from './config.js';
export * from './errors.js';
export { createFingerprint, fingerprintFont } from './font/fingerprint.js';
export { buildPalette } from './font/profiler.js';
export { loadFont, rasterizeGlyph } from './font/rasterizer.js';
export { computeGridSize, decodeImage, sampleImage } from './image/sampler.js';
export { composite, selectCharacter } from './render/compositor.js';
export type { Cell, CharacterBrightness, FontFingerprint, FontProfile, GlyphBitmap, Palette, RenderGrid, RgbaImage } from './types.js';
