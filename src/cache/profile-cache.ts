/**
 * On-disk cache of font brightness profiles
 *
 * One JSON file per fingerprint key. A missing, stale or unreadable entry
 * is a miss; the cache never decides whether a run succeeds.
 */

import { randomBytes } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { CacheCorrupt, CacheSchemaMismatch, CacheWriteFailed, errorMessage } from '../errors.js';
import type { FontFingerprint, FontProfile } from '../types.js';
import { COMPONENTS, logDebug, logWarn } from '../utils/logger.js';

export const PROFILE_SCHEMA_VERSION = 1;

const ENTRY_SUFFIX = '.json';
const TEMP_SUFFIX = '.tmp';

/** `<key>.json` entries and the `<key>.json.<pid>.<hex>.tmp` files a store leaves behind on a crash */
const CACHE_FILE_PATTERN = /^[0-9a-f]+\.json(?:\.\d+\.[0-9a-f]+\.tmp)?$/;

function isCacheFile(name: string): boolean {
  return CACHE_FILE_PATTERN.test(name);
}

const FingerprintSchema = z.object({
  fontPath: z.string(),
  modifiedMs: z.number(),
  pixelSize: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
  }),
  key: z.string().regex(/^[0-9a-f]+$/),
});

const PaletteSchema = z
  .array(
    z.object({
      character: z.string().min(1),
      brightness: z.number().min(0).max(1),
    })
  )
  .min(1)
  .refine((palette) => new Set(palette.map((entry) => entry.character)).size === palette.length, {
    message: 'palette has duplicate characters',
  })
  .refine((palette) => palette.every((entry, i) => i === 0 || palette[i - 1].brightness <= entry.brightness), {
    message: 'palette is not sorted by brightness',
  });

export const FontProfileSchema = z.object({
  version: z.literal(PROFILE_SCHEMA_VERSION),
  fingerprint: FingerprintSchema,
  palette: PaletteSchema,
});

const VersionProbeSchema = z.object({ version: z.unknown() }).passthrough();

export interface ProfileCacheOptions {
  /** Directory holding the entries; created on first store */
  directory: string;
}

function sameFingerprint(a: FontFingerprint, b: FontFingerprint): boolean {
  return (
    a.key === b.key &&
    a.fontPath === b.fontPath &&
    a.modifiedMs === b.modifiedMs &&
    a.pixelSize.width === b.pixelSize.width &&
    a.pixelSize.height === b.pixelSize.height
  );
}

export class ProfileCache {
  readonly directory: string;

  constructor(options: ProfileCacheOptions) {
    this.directory = options.directory;
  }

  entryPath(fingerprint: FontFingerprint): string {
    return path.join(this.directory, `${fingerprint.key}${ENTRY_SUFFIX}`);
  }

  /**
   * Return the stored profile for this exact fingerprint and schema
   * version, or undefined
   */
  async load(fingerprint: FontFingerprint): Promise<FontProfile | undefined> {
    const file = this.entryPath(fingerprint);

    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch {
      logDebug(COMPONENTS.CACHE, `No cache entry at ${file}`);
      return undefined;
    }

    let profile: FontProfile;
    try {
      profile = this.parseEntry(file, text);
    } catch (error) {
      logDebug(COMPONENTS.CACHE, `Treating as miss: ${errorMessage(error)}`);
      await this.discard(file);
      return undefined;
    }

    if (!sameFingerprint(profile.fingerprint, fingerprint)) {
      logDebug(COMPONENTS.CACHE, `Fingerprint mismatch in ${file}, treating as miss`);
      return undefined;
    }

    logDebug(COMPONENTS.CACHE, `Cache hit for ${fingerprint.fontPath} (${profile.palette.length} characters)`);
    return profile;
  }

  /**
   * Write the profile atomically: temp file in the same directory, then rename
   *
   * @throws CacheWriteFailed
   */
  async store(profile: FontProfile): Promise<void> {
    const file = this.entryPath(profile.fingerprint);
    const temp = `${file}.${process.pid}.${randomBytes(4).toString('hex')}${TEMP_SUFFIX}`;
    const entry: FontProfile = {
      version: profile.version,
      fingerprint: { ...profile.fingerprint },
      palette: profile.palette.map(({ character, brightness }) => ({ character, brightness })),
    };

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(temp, JSON.stringify(entry, null, 2), 'utf-8');
      await fs.rename(temp, file);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        logDebug(COMPONENTS.CACHE, `Could not remove ${temp}: ${errorMessage(cleanupError)}`);
      });
      throw new CacheWriteFailed(file, error);
    }
    logDebug(COMPONENTS.CACHE, `Stored profile ${file}`);
  }

  /**
   * Remove every entry and leftover temp file. Anything else in the
   * directory is left alone; failures are logged and skipped.
   *
   * @returns number of files removed
   */
  async clear(): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      logDebug(COMPONENTS.CACHE, `Nothing to clear in ${this.directory}: ${errorMessage(error)}`);
      return 0;
    }

    const entries = names.filter(isCacheFile);
    let removed = 0;
    for (const name of entries) {
      const file = path.join(this.directory, name);
      try {
        await fs.rm(file, { force: true });
        removed++;
      } catch (error) {
        logWarn(COMPONENTS.CACHE, `Could not remove ${file}: ${errorMessage(error)}`);
      }
    }
    logDebug(COMPONENTS.CACHE, `Cleared ${removed} of ${entries.length} cache entries`);
    return removed;
  }

  private parseEntry(file: string, text: string): FontProfile {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new CacheCorrupt(file, error);
    }

    const probe = VersionProbeSchema.safeParse(json);
    if (!probe.success) {
      throw new CacheCorrupt(file, probe.error);
    }
    if (probe.data.version !== PROFILE_SCHEMA_VERSION) {
      throw new CacheSchemaMismatch(file, probe.data.version, PROFILE_SCHEMA_VERSION);
    }

    const parsed = FontProfileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CacheCorrupt(file, parsed.error);
    }
    return parsed.data;
  }

  private async discard(file: string): Promise<void> {
    try {
      await fs.rm(file, { force: true });
    } catch (error) {
      logDebug(COMPONENTS.CACHE, `Could not remove stale entry ${file}: ${errorMessage(error)}`);
    }
  }
}
