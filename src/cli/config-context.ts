/**
 * CLI configuration context.
 *
 * Holds the configuration loaded for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by command actions.
 */

import type { VastCheckConfig } from '../types/config.js';

let currentConfig: VastCheckConfig | null = null;

/** Set the configuration for this CLI invocation. */
export function setConfigContext(config: VastCheckConfig): void {
  currentConfig = config;
}

/**
 * Get the configuration for this CLI invocation.
 * Throws if called before the preAction hook ran.
 */
export function getConfigContext(): VastCheckConfig {
  if (!currentConfig) {
    throw new Error('CLI configuration requested before it was loaded');
  }
  return currentConfig;
}

/** Forget the loaded configuration (tests). */
export function resetConfigContext(): void {
  currentConfig = null;
}
