import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { FontLoadFailed } from '../errors.js';
import type { FontFingerprint, GlyphSize } from '../types.js';

/**
 * Build the cache identity of a font configuration.
 *
 * Pure: the same (path, modification time, pixel size) always yields the
 * same key, and changing any of them changes it.
 */
export function createFingerprint(fontPath: string, modifiedMs: number, size: GlyphSize): FontFingerprint {
  const absolute = path.resolve(fontPath);
  const pixelSize = { width: size.width, height: size.height };
  const key = createHash('sha256')
    .update(JSON.stringify([absolute, modifiedMs, pixelSize.width, pixelSize.height]))
    .digest('hex')
    .slice(0, 32);

  return { fontPath: absolute, modifiedMs, pixelSize, key };
}

/**
 * Stat a font file and fingerprint it at the given glyph cell size
 */
export async function fingerprintFont(fontPath: string, size: GlyphSize): Promise<FontFingerprint> {
  let modifiedMs: number;
  try {
    const stats = await fs.stat(fontPath);
    modifiedMs = Math.trunc(stats.mtimeMs);
  } catch (error) {
    throw new FontLoadFailed(fontPath, error);
  }
  return createFingerprint(fontPath, modifiedMs, size);
}
