/**
 * Maps sampled cells onto palette characters and assembles the output text
 */

import type { CharacterBrightness, Palette, RenderGrid, RGB } from '../types.js';

export const RESET = '\x1b[0m';

export interface CompositeOptions {
  /** Wrap characters in 24-bit foreground colour escapes */
  color: boolean;
}

/**
 * Built-in ramp used when no font is available for profiling
 */
export const DEFAULT_RAMP = ' .:-=+*#%@';

export function rampPalette(ramp: string = DEFAULT_RAMP): Palette {
  const characters = [...new Set(ramp)];
  const last = Math.max(1, characters.length - 1);
  return characters.map((character, index) => ({ character, brightness: index / last }));
}

export function foreground(color: RGB): string {
  return `\x1b[38;2;${color.r};${color.g};${color.b}m`;
}

/**
 * Palette entry closest in brightness; on an exact tie the earlier entry wins
 */
export function selectCharacter(palette: Palette, luminance: number): CharacterBrightness {
  if (palette.length === 0) {
    throw new RangeError('Palette is empty');
  }

  let best = palette[0];
  let bestDistance = Math.abs(best.brightness - luminance);
  for (let i = 1; i < palette.length; i++) {
    const distance = Math.abs(palette[i].brightness - luminance);
    if (distance < bestDistance) {
      best = palette[i];
      bestDistance = distance;
    }
  }
  return best;
}

function sameColor(a: RGB | null, b: RGB): boolean {
  return a !== null && a.r === b.r && a.g === b.g && a.b === b.b;
}

/**
 * Render the grid row by row. Each row ends with a reset when it emitted
 * any colour; the block ends with a single newline.
 */
export function composite(palette: Palette, grid: RenderGrid, options: CompositeOptions): string {
  const lines: string[] = [];

  for (let row = 0; row < grid.rows; row++) {
    let line = '';
    let current: RGB | null = null;

    for (let column = 0; column < grid.columns; column++) {
      const cell = grid.cells[row * grid.columns + column];
      if (cell.alpha === 0) {
        line += ' ';
        continue;
      }

      const { character } = selectCharacter(palette, cell.luminance);
      if (options.color && !sameColor(current, cell.color)) {
        line += foreground(cell.color);
        current = cell.color;
      }
      line += character;
    }

    if (current !== null) {
      line += RESET;
    }
    lines.push(line);
  }

  return lines.join('\n') + '\n';
}
