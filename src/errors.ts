/**
 * Error taxonomy for term-render
 *
 * Fatal errors abort the run with a non-zero exit. The others are caught
 * close to where they happen and turned into a fallback plus a log line.
 */

export type ErrorCode =
  | 'IMAGE_DECODE_FAILED'
  | 'FONT_LOAD_FAILED'
  | 'GLYPH_MISSING'
  | 'PROFILING_FAILED'
  | 'CACHE_CORRUPT'
  | 'CACHE_SCHEMA_MISMATCH'
  | 'CACHE_WRITE_FAILED'
  | 'USAGE';

export class TermRenderError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TermRenderError';
    this.code = code;
  }
}

export class ImageDecodeFailed extends TermRenderError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('IMAGE_DECODE_FAILED', `Unable to decode image: ${path}${describeCause(cause)}`, { cause });
    this.name = 'ImageDecodeFailed';
    this.path = path;
  }
}

export class FontLoadFailed extends TermRenderError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('FONT_LOAD_FAILED', `Unable to load font: ${path}${describeCause(cause)}`, { cause });
    this.name = 'FontLoadFailed';
    this.path = path;
  }
}

export class GlyphMissing extends TermRenderError {
  readonly character: string;

  constructor(character: string) {
    super('GLYPH_MISSING', `Font has no glyph for ${JSON.stringify(character)}`);
    this.name = 'GlyphMissing';
    this.character = character;
  }
}

export class ProfilingFailed extends TermRenderError {
  constructor(message = 'No character in the supported set could be rasterized') {
    super('PROFILING_FAILED', message);
    this.name = 'ProfilingFailed';
  }
}

export class CacheCorrupt extends TermRenderError {
  constructor(file: string, cause?: unknown) {
    super('CACHE_CORRUPT', `Cache entry is corrupt: ${file}${describeCause(cause)}`, { cause });
    this.name = 'CacheCorrupt';
  }
}

export class CacheSchemaMismatch extends TermRenderError {
  constructor(file: string, found: unknown, expected: number) {
    super('CACHE_SCHEMA_MISMATCH', `Cache entry ${file} has schema version ${String(found)}, expected ${expected}`);
    this.name = 'CacheSchemaMismatch';
  }
}

export class CacheWriteFailed extends TermRenderError {
  constructor(file: string, cause?: unknown) {
    super('CACHE_WRITE_FAILED', `Unable to write cache entry: ${file}${describeCause(cause)}`, { cause });
    this.name = 'CacheWriteFailed';
  }
}

export class UsageError extends TermRenderError {
  constructor(message: string) {
    super('USAGE', message);
    this.name = 'UsageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(cause: unknown): string {
  return cause === undefined ? '' : ` (${errorMessage(cause)})`;
}
