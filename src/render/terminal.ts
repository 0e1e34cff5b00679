/**
 * Terminal dimensions as reported by terminal-kit
 */

import termKit from 'terminal-kit';
import type { GridSize } from '../types.js';

/**
 * Space available for the render: full width, and every row but the one
 * the shell prompt returns to
 */
export function terminalBounds(): GridSize {
  const term = termKit.terminal;
  const columns = term.width > 0 ? term.width : 80;
  const rows = term.height > 1 ? term.height - 1 : 24;
  return { columns, rows };
}
