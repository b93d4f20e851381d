/**
 * Configuration type definitions for vastcheck.
 * Defaults overridden by VASTCHECK_* environment variables and CLI flags.
 */

import type { ImplementationType } from './rules.js';

/** Report format. */
export type OutputFormat = 'human' | 'json';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
  showColor: boolean;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'warn') */
  level: LogLevel;
  /** Log file path; when unset, logs go to stderr */
  filePath?: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Defaults applied when the matching CLI flag is absent. */
export interface ValidationDefaults {
  implementationType?: ImplementationType;
  programmatic: boolean;
  decode: boolean;
}

/** Resolved vastcheck configuration. */
export interface VastCheckConfig {
  output: OutputConfig;
  logging: LoggingConfig;
  validation: ValidationDefaults;
}

/** Configuration source for a resolved value. */
export type ConfigSource = 'default' | 'env';

/** A config value with the source it was resolved from. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
