/**
 * CLI validate command - check a VAST request URL against a context's rules.
 * Default command: `vastcheck <url> -i web` is `vastcheck validate <url> -i web`.
 */

import { Command } from 'commander';
import { cliError, cliOutput } from '../renderers/index.js';
import { getConfigContext } from '../config-context.js';
import { VastCheckError } from '../../core/errors.js';
import { validateVastRequest } from '../../core/validation/index.js';
import { IMPLEMENTATION_TYPES } from '../../types/rules.js';
import { ExitCode } from '../../types/exit-codes.js';

/**
 * Read a tri-state boolean flag: true, false (--no-x), or undefined when absent.
 */
export function flagValue(opts: Record<string, unknown>, name: string): boolean | undefined {
  const value = opts[name];
  return typeof value === 'boolean' ? value : undefined;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate', { isDefault: true })
    .description('Validate the query parameters of a VAST request URL')
    .argument('<vast-request>', 'The VAST request URL (quote it in the shell)')
    .option('-i, --implementation-type <type>', `Implementation type (${IMPLEMENTATION_TYPES.join(', ')})`)
    .option('-p, --programmatic', 'Also check programmatic required and recommended parameters')
    .option('--no-programmatic', 'Ignore VASTCHECK_PROGRAMMATIC')
    .option('-d, --decode', 'URL-decode parameter values before checking them')
    .option('--no-decode', 'Ignore VASTCHECK_DECODE')
    .action((vastRequest: string, opts: Record<string, unknown>) => {
      try {
        const config = getConfigContext();
        const typeOption = opts['implementationType'];
        const implementationType = typeof typeOption === 'string'
          ? typeOption
          : config.validation.implementationType;
        if (implementationType === undefined) {
          throw new VastCheckError(ExitCode.INVALID_INPUT, 'Missing implementation type', {
            fix: `Pass --implementation-type ${IMPLEMENTATION_TYPES.join('|')} or set VASTCHECK_IMPLEMENTATION_TYPE`,
          });
        }

        const report = validateVastRequest(vastRequest, implementationType, {
          programmatic: flagValue(opts, 'programmatic') ?? config.validation.programmatic,
          decode: flagValue(opts, 'decode') ?? config.validation.decode,
        });

        cliOutput({ command: 'validate', data: report });

        if (!report.passed) {
          process.exit(ExitCode.VALIDATION_FAILED);
        }
      } catch (err) {
        if (err instanceof VastCheckError) {
          cliError(err);
          process.exit(err.code);
        }
        throw err;
      }
    });
}
