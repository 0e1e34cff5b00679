#!/usr/bin/env node

import { ZodError } from 'zod';
import { render } from './app.js';
import { resolveConfig, type Config } from './config.js';
import { UsageError, errorMessage } from './errors.js';
import { showHelp, USAGE } from './commands/help.js';
import { parseArgs, resolveBounds, type CliOptions } from './commands/options.js';
import { terminalBounds } from './render/terminal.js';
import { Colors } from './types.js';
import { COMPONENTS, configureLogger, logDebug } from './utils/logger.js';

function loadConfig(): Config {
  try {
    return resolveConfig(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new UsageError(`Invalid environment configuration: ${issues}`);
    }
    throw error;
  }
}

function fail(message: string): never {
  process.stderr.write(`${Colors.RED}Error: ${message}${Colors.NC}\n`);
  process.exit(1);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`${Colors.RED}${error.message}${Colors.NC}\n${USAGE}\nTry 'term-render --help' for more information.\n`);
      process.exit(1);
    }
    throw error;
  }

  if (options.help) {
    showHelp();
    return;
  }

  const config = loadConfig();
  configureLogger({
    level: options.verbose ? 'DEBUG' : config.logLevel,
    file: config.logFile ?? null,
  });

  const imagePath = options.imagePath;
  if (!imagePath) {
    throw new UsageError('Missing required argument <PATH>');
  }

  const bounds = resolveBounds(options, terminalBounds);
  logDebug(COMPONENTS.CLI, `Rendering ${imagePath} into at most ${bounds.columns}x${bounds.rows} cells`);

  const output = await render(
    {
      imagePath,
      fontPath: options.fontPath,
      clean: options.clean,
      color: !options.plain,
      bounds,
    },
    config
  );

  process.stdout.write(output);
}

// Handle uncaught errors gracefully
process.on('uncaughtException', (err) => {
  fail(`Uncaught error: ${err.message}`);
});

process.on('unhandledRejection', (err) => {
  fail(`Unhandled rejection: ${errorMessage(err)}`);
});

main().catch((err: unknown) => {
  fail(errorMessage(err));
});
