export const USAGE = 'Usage: term-render [OPTIONS] <PATH>';

/**
 * Display help message
 */
export function showHelp(): void {
  console.log(`term-render - Draw an image in the terminal with brightness-matched characters

${USAGE}

Arguments:
  <PATH>                 Path to the source image

Options:
  -f, --font <FONT>      Font file used for brightness profiling
                         (default: $TERM_RENDER_FONT, else a built-in ramp)
  -c, --clean            Clear all cached brightness profiles before running
  -p, --plain            Render without color escape codes
  -w, --width <COLS>     Number of columns (default: terminal width)
  -H, --height <ROWS>    Maximum number of rows (default: terminal height - 1)
  -v, --verbose          Print debug diagnostics to stderr
  -h, --help             Print this help message

Environment:
  TERM_RENDER_CACHE_DIR  Profile cache directory (default: $XDG_CACHE_HOME/term-render/profiles)
  TERM_RENDER_LOG_LEVEL  DEBUG, INFO, WARN or ERROR (default: WARN)
  TERM_RENDER_LOG_FILE   Also append diagnostics to this file

Examples:
  term-render photo.png
  term-render -f ~/.fonts/FiraMono-Regular.ttf photo.jpg
  term-render --plain --width 60 logo.png > logo.txt`);
}
