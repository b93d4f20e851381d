/**
 * CLI rules command - show the parameters an implementation type expects.
 */

import { Command } from 'commander';
import { cliError, cliOutput } from '../renderers/index.js';
import { VastCheckError } from '../../core/errors.js';
import { rulesFor } from '../../core/rules/registry.js';
import { parseImplementationType } from '../../core/validation/index.js';
import { IMPLEMENTATION_TYPES } from '../../types/rules.js';
import { flagValue } from './validate.js';

export function registerRulesCommand(program: Command): void {
  program
    .command('rules')
    .description('Show the parameter rules of an implementation type')
    .argument('<implementation-type>', `One of ${IMPLEMENTATION_TYPES.join(', ')}`)
    .option('-p, --programmatic', 'Include programmatic required and recommended parameters')
    .action((implementationType: string, opts: Record<string, unknown>) => {
      try {
        const context = parseImplementationType(implementationType);
        cliOutput({
          command: 'rules',
          data: rulesFor(context),
          programmatic: flagValue(opts, 'programmatic') ?? false,
        });
      } catch (err) {
        if (err instanceof VastCheckError) {
          cliError(err);
          process.exit(err.code);
        }
        throw err;
      }
    });
}
