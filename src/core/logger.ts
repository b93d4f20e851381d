/**
 * Centralized pino logger factory for vastcheck.
 *
 * Singleton pattern. With a configured file path, uses pino-roll for
 * size-based rotation and retention; otherwise logs go to stderr.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout is reserved for the validation report.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

const levelFormatter = (label: string) => ({ level: label.toUpperCase() });

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param config - Logging section of the resolved configuration
 * @param cwd - Directory a relative `filePath` is resolved against
 */
export function initLogger(config: LoggingConfig, cwd: string = process.cwd()): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    formatters: { level: levelFormatter },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!config.filePath) {
    rootLogger = pino(options, pino.destination(2));
    return rootLogger;
  }

  const dest = resolve(cwd, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // pino.transport() runs in a worker thread; pino-roll handles rotation.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      mkdir: true,
      limit: { count: config.maxFiles },
    },
  });

  rootLogger = pino(options, transport);
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr logger at 'warn'
 * so library callers and tests stay quiet.
 *
 * @param subsystem - Logical subsystem name (e.g. 'validation', 'config')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (rootLogger) {
    return rootLogger.child({ subsystem });
  }
  fallbackLogger ??= pino(
    { level: 'warn', formatters: { level: levelFormatter } },
    pino.destination(2),
  );
  return fallbackLogger.child({ subsystem });
}

/**
 * Flush and close the logger. Call before process exit.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
