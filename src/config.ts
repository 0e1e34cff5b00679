import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS } from './utils/logger.js';

export const DEFAULT_GLYPH_SIZE = { width: 8, height: 16 } as const;
export const DEFAULT_CONCURRENCY = 8;

const APP_DIR = 'term-render';

export const ConfigSchema = z.object({
  cacheDir: z.string().min(1),
  fontPath: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS),
  logFile: z.string().min(1).optional(),
  glyphSize: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
  }),
  concurrency: z.number().int().positive(),
});

export type Config = z.infer<typeof ConfigSchema>;

export type Environment = Record<string, string | undefined>;

/**
 * User-scoped cache directory for brightness profiles
 *
 * TERM_RENDER_CACHE_DIR wins, then $XDG_CACHE_HOME, then ~/.cache.
 */
export function resolveCacheDir(env: Environment = process.env, home: string = os.homedir()): string {
  if (env.TERM_RENDER_CACHE_DIR) {
    return path.resolve(env.TERM_RENDER_CACHE_DIR);
  }
  const base = env.XDG_CACHE_HOME ? path.resolve(env.XDG_CACHE_HOME) : path.join(home, '.cache');
  return path.join(base, APP_DIR, 'profiles');
}

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Build the run configuration from environment variables
 *
 * Throws a ZodError when a variable holds an unusable value.
 */
export function resolveConfig(env: Environment = process.env): Config {
  return ConfigSchema.parse({
    cacheDir: resolveCacheDir(env),
    fontPath: env.TERM_RENDER_FONT || undefined,
    logLevel: env.TERM_RENDER_LOG_LEVEL?.toUpperCase() ?? 'WARN',
    logFile: env.TERM_RENDER_LOG_FILE || undefined,
    glyphSize: {
      width: optionalInt(env.TERM_RENDER_GLYPH_WIDTH) ?? DEFAULT_GLYPH_SIZE.width,
      height: optionalInt(env.TERM_RENDER_GLYPH_HEIGHT) ?? DEFAULT_GLYPH_SIZE.height,
    },
    concurrency: optionalInt(env.TERM_RENDER_CONCURRENCY) ?? DEFAULT_CONCURRENCY,
  });
}
