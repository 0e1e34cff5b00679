import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { DEFAULT_CONCURRENCY, resolveCacheDir, resolveConfig } from './config.js';

describe('resolveCacheDir', () => {
  it('should prefer TERM_RENDER_CACHE_DIR', () => {
    expect(resolveCacheDir({ TERM_RENDER_CACHE_DIR: '/tmp/profiles', XDG_CACHE_HOME: '/xdg' }, '/home/user')).toBe(
      path.resolve('/tmp/profiles')
    );
  });

  it('should fall back to XDG_CACHE_HOME', () => {
    expect(resolveCacheDir({ XDG_CACHE_HOME: '/xdg' }, '/home/user')).toBe(
      path.join(path.resolve('/xdg'), 'term-render', 'profiles')
    );
  });

  it('should fall back to ~/.cache', () => {
    expect(resolveCacheDir({}, '/home/user')).toBe(path.join('/home/user', '.cache', 'term-render', 'profiles'));
  });
});

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    const config = resolveConfig({ TERM_RENDER_CACHE_DIR: '/tmp/profiles' });

    expect(config).toEqual({
      cacheDir: path.resolve('/tmp/profiles'),
      fontPath: undefined,
      logLevel: 'WARN',
      logFile: undefined,
      glyphSize: { width: 8, height: 16 },
      concurrency: DEFAULT_CONCURRENCY,
    });
  });

  it('should read overrides from the environment', () => {
    const config = resolveConfig({
      TERM_RENDER_CACHE_DIR: '/tmp/profiles',
      TERM_RENDER_FONT: '/fonts/Mono.ttf',
      TERM_RENDER_LOG_LEVEL: 'debug',
      TERM_RENDER_LOG_FILE: '/tmp/term-render.log',
      TERM_RENDER_GLYPH_WIDTH: '10',
      TERM_RENDER_GLYPH_HEIGHT: '20',
      TERM_RENDER_CONCURRENCY: '2',
    });

    expect(config.fontPath).toBe('/fonts/Mono.ttf');
    expect(config.logLevel).toBe('DEBUG');
    expect(config.logFile).toBe('/tmp/term-render.log');
    expect(config.glyphSize).toEqual({ width: 10, height: 20 });
    expect(config.concurrency).toBe(2);
  });

  it('should reject an unknown log level', () => {
    expect(() => resolveConfig({ TERM_RENDER_LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });

  it('should reject a non-numeric glyph size', () => {
    expect(() => resolveConfig({ TERM_RENDER_GLYPH_HEIGHT: 'tall' })).toThrow(ZodError);
  });
});
