/**
 * Shared CLI middleware for resolving output format from --human/--json/--quiet flags.
 */

import type { OutputFormat } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import { VastCheckError } from '../../core/errors.js';
import type { FlagResolution } from '../format-context.js';

/**
 * Resolve output format from Commander.js option values.
 *
 * An explicit --json or --human flag wins over the configured default.
 * Passing both is a usage error.
 *
 * @param opts - Commander.js parsed options object
 * @param configuredDefault - `output.defaultFormat` from the loaded config
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  configuredDefault?: OutputFormat,
): FlagResolution {
  const json = opts['json'] === true;
  const human = opts['human'] === true;
  const quiet = opts['quiet'] === true;

  if (json && human) {
    throw new VastCheckError(ExitCode.INVALID_INPUT, '--json and --human cannot be combined', {
      fix: 'Pass only one of --json or --human',
    });
  }
  if (json) return { format: 'json', source: 'flag', quiet };
  if (human) return { format: 'human', source: 'flag', quiet };
  if (configuredDefault) return { format: configuredDefault, source: 'config', quiet };
  return { format: 'human', source: 'default', quiet };
}
