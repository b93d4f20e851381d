/**
 * Path resolution for files shipped beside the compiled code.
 */

import { fileURLToPath } from 'node:url';

/**
 * Get the path to the package manifest.
 * Resolves the same way from src/core and dist/core.
 */
export function getPackageJsonPath(): string {
  return fileURLToPath(new URL('../../package.json', import.meta.url));
}
