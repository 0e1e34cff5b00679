import { UsageError } from '../errors.js';
import type { GridSize } from '../types.js';

export interface CliOptions {
  help: boolean;
  imagePath?: string;
  fontPath?: string;
  clean: boolean;
  plain: boolean;
  width?: number;
  height?: number;
  verbose: boolean;
}

function requireValue(args: readonly string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value === '') {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function parseCount(value: string, flag: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value) || count < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${value}"`);
  }
  return count;
}

/**
 * Parse command line arguments (without the node and script entries)
 *
 * @throws UsageError on unknown options, missing values or a missing path
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { help: false, clean: false, plain: false, verbose: false };
  const positional: string[] = [];

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        return options;
      case '--font':
      case '-f':
        options.fontPath = requireValue(args, i, arg);
        i += 2;
        break;
      case '--clean':
      case '-c':
        options.clean = true;
        i++;
        break;
      case '--plain':
      case '-p':
        options.plain = true;
        i++;
        break;
      case '--width':
      case '-w':
        options.width = parseCount(requireValue(args, i, arg), arg);
        i += 2;
        break;
      case '--height':
      case '-H':
        options.height = parseCount(requireValue(args, i, arg), arg);
        i += 2;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        i++;
        break;
      case '--':
        positional.push(...args.slice(i + 1));
        i = args.length;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
        i++;
    }
  }

  if (positional.length === 0) {
    throw new UsageError('Missing required argument <PATH>');
  }
  if (positional.length > 1) {
    throw new UsageError(`Unexpected argument: ${positional[1]}`);
  }
  options.imagePath = positional[0];
  return options;
}

/**
 * Render bounds: --width and --height where given, the terminal size for
 * whichever is missing. The terminal is only queried when needed.
 */
export function resolveBounds(options: Pick<CliOptions, 'width' | 'height'>, terminal: () => GridSize): GridSize {
  if (options.width !== undefined && options.height !== undefined) {
    return { columns: options.width, rows: options.height };
  }
  const size = terminal();
  return {
    columns: options.width ?? size.columns,
    rows: options.height ?? size.rows,
  };
}
