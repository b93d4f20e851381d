/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

import type { OutputFormat } from '../types/config.js';

/** Where the resolved format came from. */
export type FormatSource = 'flag' | 'config' | 'default';

/** Resolved output format for one invocation. */
export interface FlagResolution {
  format: OutputFormat;
  source: FormatSource;
  quiet: boolean;
}

/**
 * Current resolved format for this CLI invocation.
 * Defaults to human-readable until resolved by the preAction hook.
 */
const DEFAULT_RESOLUTION: FlagResolution = {
  format: 'human',
  source: 'default',
  quiet: false,
};

let currentResolution: FlagResolution = DEFAULT_RESOLUTION;

/**
 * Set the resolved format for this CLI invocation.
 * Called once from the preAction hook in src/cli/program.ts.
 */
export function setFormatContext(resolution: FlagResolution): void {
  currentResolution = resolution;
}

/** Return to the default (human) format before flags are resolved. */
export function resetFormatContext(): void {
  currentResolution = DEFAULT_RESOLUTION;
}

/**
 * Get the current resolved format.
 */
export function getFormatContext(): FlagResolution {
  return currentResolution;
}
