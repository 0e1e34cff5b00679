import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { render, resolvePalette, resolveProfile } from './app.js';
import { ProfileCache } from './cache/profile-cache.js';
import type { Config } from './config.js';
import { FontLoadFailed, ImageDecodeFailed } from './errors.js';
import { fingerprintFont } from './font/fingerprint.js';
import { asciiShapes, FULL, testFontBytes } from './font/fonts.test.support.js';
import { DEFAULT_RAMP } from './render/compositor.js';

describe('render pipeline', () => {
  let dir: string;
  let config: Config;
  let fontPath: string;
  let stderr: MockInstance<typeof process.stderr.write>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'term-render-app-'));
    config = {
      cacheDir: path.join(dir, 'cache'),
      logLevel: 'WARN',
      glyphSize: { width: 8, height: 16 },
      concurrency: 4,
    };
    fontPath = path.join(dir, 'Mono.otf');
    await fs.writeFile(fontPath, Buffer.from(testFontBytes(asciiShapes())));
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeImage(name: string, width: number, height: number, color: { r: number; g: number; b: number }) {
    const file = path.join(dir, name);
    await sharp({ create: { width, height, channels: 3, background: color } }).png().toFile(file);
    return file;
  }

  describe('resolveProfile', () => {
    it('should profile on a miss and store the result', async () => {
      const cache = new ProfileCache({ directory: config.cacheDir });

      const profile = await resolveProfile(fontPath, cache, config);

      expect(profile.palette).toHaveLength(95);
      expect(await cache.load(profile.fingerprint)).toEqual(profile);
    });

    it('should reuse the cached profile without profiling again', async () => {
      const cache = new ProfileCache({ directory: config.cacheDir });
      const fingerprint = await fingerprintFont(fontPath, config.glyphSize);
      const sentinel = [{ character: '@', brightness: 1 }];
      await cache.store({ version: 1, fingerprint, palette: sentinel });

      const profile = await resolveProfile(fontPath, cache, config);

      expect(profile.palette).toEqual(sentinel);
    });

    it('should profile again when the glyph width changes', async () => {
      const cache = new ProfileCache({ directory: config.cacheDir });
      const fingerprint = await fingerprintFont(fontPath, config.glyphSize);
      const sentinel = [{ character: '@', brightness: 1 }];
      await cache.store({ version: 1, fingerprint, palette: sentinel });
      const narrow: Config = { ...config, glyphSize: { width: 2, height: 16 } };

      const profile = await resolveProfile(fontPath, cache, narrow);

      expect(profile.fingerprint.key).not.toBe(fingerprint.key);
      expect(profile.fingerprint.pixelSize).toEqual({ width: 2, height: 16 });
      expect(profile.palette).toHaveLength(95);
      expect(await fs.readdir(config.cacheDir)).toHaveLength(2);
    });

    it('should profile again after the font file changes', async () => {
      const cache = new ProfileCache({ directory: config.cacheDir });
      const first = await resolveProfile(fontPath, cache, config);
      await fs.utimes(fontPath, new Date('2020-01-01T00:00:00Z'), new Date('2020-01-01T00:00:00Z'));

      const second = await resolveProfile(fontPath, cache, config);

      expect(second.fingerprint.key).not.toBe(first.fingerprint.key);
      expect(second.palette).toEqual(first.palette);
    });

    it('should succeed with a warning when the cache cannot be written', async () => {
      const blocker = path.join(dir, 'blocker');
      await fs.writeFile(blocker, '');
      const cache = new ProfileCache({ directory: path.join(blocker, 'cache') });

      const profile = await resolveProfile(fontPath, cache, config);

      expect(profile.palette).toHaveLength(95);
      const warnings = stderr.mock.calls.map(([line]) => String(line)).filter((line) => line.includes('[CACHE] [WARN]'));
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toContain('Unable to write cache entry');
    });

    it('should fail with FontLoadFailed for a missing font', async () => {
      const cache = new ProfileCache({ directory: config.cacheDir });

      await expect(resolveProfile(path.join(dir, 'absent.ttf'), cache, config)).rejects.toBeInstanceOf(FontLoadFailed);
    });
  });

  describe('resolvePalette', () => {
    it('should use the built-in ramp without a font', async () => {
      const palette = await resolvePalette(undefined, new ProfileCache({ directory: config.cacheDir }), config);

      expect(palette.map((entry) => entry.character).join('')).toBe(DEFAULT_RAMP);
    });
  });

  describe('render', () => {
    it('should render a white image as the brightest character', async () => {
      const image = await writeImage('white.png', 4, 2, { r: 255, g: 255, b: 255 });

      const output = await render(
        { imagePath: image, clean: false, color: false, bounds: { columns: 4, rows: 10 } },
        config
      );

      expect(output).toBe('@@@@\n');
    });

    it('should size the grid for tall character cells', async () => {
      const image = await writeImage('wide.png', 100, 50, { r: 0, g: 0, b: 0 });

      const output = await render(
        { imagePath: image, clean: false, color: false, bounds: { columns: 80, rows: 40 } },
        config
      );

      const rows = output.split('\n').slice(0, -1);
      expect(rows).toHaveLength(20);
      expect(rows.every((row) => row === ' '.repeat(80))).toBe(true);
    });

    it('should colour the output unless plain is requested', async () => {
      const image = await writeImage('red.png', 2, 1, { r: 255, g: 0, b: 0 });

      const output = await render(
        { imagePath: image, fontPath, clean: false, color: true, bounds: { columns: 2, rows: 1 } },
        config
      );

      expect(output.startsWith('\x1b[38;2;255;0;0m')).toBe(true);
      expect(output.endsWith('\x1b[0m\n')).toBe(true);
    });

    it('should profile with the font and populate the cache', async () => {
      const image = await writeImage('grey.png', 2, 1, { r: 128, g: 128, b: 128 });

      await render({ imagePath: image, fontPath, clean: false, color: false, bounds: { columns: 2, rows: 1 } }, config);

      expect(await fs.readdir(config.cacheDir)).toHaveLength(1);
    });

    it('should empty the cache before running in clean mode', async () => {
      const cache = new ProfileCache({ directory: config.cacheDir });
      const stale = await resolveProfile(fontPath, cache, config);
      const image = await writeImage('grey.png', 2, 1, { r: 128, g: 128, b: 128 });

      await render({ imagePath: image, clean: true, color: false, bounds: { columns: 2, rows: 1 } }, config);

      expect(await cache.load(stale.fingerprint)).toBeUndefined();
    });

    it('should fail on a bad image before touching the font', async () => {
      const image = path.join(dir, 'broken.png');
      await fs.writeFile(image, 'not an image');

      await expect(
        render(
          { imagePath: image, fontPath: path.join(dir, 'absent.ttf'), clean: false, color: false, bounds: { columns: 2, rows: 1 } },
          config
        )
      ).rejects.toBeInstanceOf(ImageDecodeFailed);
    });

    it('should use the font from the configuration when none is requested', async () => {
      const image = await writeImage('grey.png', 2, 1, { r: 128, g: 128, b: 128 });

      await render(
        { imagePath: image, clean: false, color: false, bounds: { columns: 2, rows: 1 } },
        { ...config, fontPath }
      );

      expect(await fs.readdir(config.cacheDir)).toHaveLength(1);
    });
  });

  it('should keep glyphs of a single-glyph font usable', async () => {
    const single = path.join(dir, 'Block.otf');
    await fs.writeFile(single, Buffer.from(testFontBytes({ '#': FULL, ' ': null })));
    const image = await writeImage('white.png', 2, 1, { r: 255, g: 255, b: 255 });

    const output = await render(
      { imagePath: image, fontPath: single, clean: false, color: false, bounds: { columns: 2, rows: 1 } },
      config
    );

    expect(output).toBe('##\n');
  });
});
