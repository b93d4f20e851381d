/**
 * Configuration engine for vastcheck.
 *
 * Resolution priority: CLI flags > Environment vars > Defaults
 * CLI flags are applied by the command layer on top of loadConfig().
 * There are no config files: a command line means the same thing in
 * every directory.
 */

import { z } from 'zod';
import type { ResolvedValue, VastCheckConfig } from '../types/config.js';
import { IMPLEMENTATION_TYPES } from '../types/rules.js';
import { ExitCode } from '../types/exit-codes.js';
import { VastCheckError } from './errors.js';

/** Default configuration values. */
const DEFAULTS: VastCheckConfig = {
  output: {
    defaultFormat: 'human',
    showColor: true,
  },
  logging: {
    level: 'warn',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
  validation: {
    programmatic: false,
    decode: false,
  },
};

const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/** Shape of a fully resolved configuration. */
export const VastCheckConfigSchema = z.object({
  output: z.object({
    defaultFormat: z.enum(['human', 'json']),
    showColor: z.boolean(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    filePath: z.string().min(1).optional(),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
  validation: z.object({
    implementationType: z.enum(IMPLEMENTATION_TYPES).optional(),
    programmatic: z.boolean(),
    decode: z.boolean(),
  }),
});

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'VASTCHECK_FORMAT': 'output.defaultFormat',
  'VASTCHECK_SHOW_COLOR': 'output.showColor',
  'VASTCHECK_LOG_LEVEL': 'logging.level',
  'VASTCHECK_LOG_FILE': 'logging.filePath',
  'VASTCHECK_IMPLEMENTATION_TYPE': 'validation.implementationType',
  'VASTCHECK_PROGRAMMATIC': 'validation.programmatic',
  'VASTCHECK_DECODE': 'validation.decode',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
export function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

function collectEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = env[envKey];
    if (envValue !== undefined) {
      setNestedValue(overrides, configPath, parseEnvValue(envValue));
    }
  }
  return overrides;
}

/**
 * Resolve configuration from defaults and environment variables.
 * Priority: defaults < environment vars. Nothing is read from disk.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VastCheckConfig {
  const defaults: Record<string, unknown> = { ...DEFAULTS };
  const merged = deepMerge(defaults, collectEnvOverrides(env));

  const result = VastCheckConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : 'configuration';
    throw new VastCheckError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration value for ${where}: ${issue?.message ?? 'unknown error'}`,
      { fix: 'Check VASTCHECK_* environment variables' },
    );
  }
  return result.data;
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export function getConfigValue(path: string, env: NodeJS.ProcessEnv = process.env): ResolvedValue<unknown> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const defaults: Record<string, unknown> = { ...DEFAULTS };
  return { value: getNestedValue(defaults, path), source: 'default' };
}
