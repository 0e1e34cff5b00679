/**
 * Centralized logging for term-render
 *
 * Everything goes to stderr so diagnostics never mix with the rendered
 * image on stdout. Optionally mirrored to a log file.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Component name constants for consistent logging
 */
export const COMPONENTS = {
  CLI: 'CLI',
  RASTERIZER: 'RASTERIZER',
  PROFILER: 'PROFILER',
  CACHE: 'CACHE',
  SAMPLER: 'SAMPLER',
} as const;

export type ComponentName = (typeof COMPONENTS)[keyof typeof COMPONENTS];

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
  /** Also append lines to this file; null turns the file copy off */
  file?: string | null;
}

let threshold: LogLevel = 'WARN';
let logFilePath: string | null = null;

export function configureLogger(options: LoggerOptions): void {
  if (options.level) {
    threshold = options.level;
  }
  if (options.file !== undefined) {
    logFilePath = options.file;
  }
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Append to the log file, creating its directory on first use
 */
function appendToFile(entry: string): void {
  if (!logFilePath) {
    return;
  }

  try {
    const dir = path.dirname(logFilePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.appendFileSync(logFilePath, entry, 'utf-8');
  } catch {
    // Fail silently - the stderr copy has already been written
  }
}

function writeLog(level: LogLevel, component: string, message: string): void {
  if (!isEnabled(level)) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logEntry = `[${timestamp}] [${component}] [${level}] ${message}\n`;

  process.stderr.write(logEntry);
  appendToFile(logEntry);
}

/**
 * Log a DEBUG level message
 */
export function logDebug(component: string, msg: string): void {
  writeLog('DEBUG', component, msg);
}

/**
 * Log an INFO level message
 */
export function logInfo(component: string, msg: string): void {
  writeLog('INFO', component, msg);
}

/**
 * Log a WARN level message
 */
export function logWarn(component: string, msg: string): void {
  writeLog('WARN', component, msg);
}

/**
 * Log an ERROR level message
 */
export function logError(component: string, msg: string): void {
  writeLog('ERROR', component, msg);
}
