/**
 * Commander program for the vastcheck CLI.
 * Built by createProgram() so tests can parse argv without spawning a process.
 */

import { Command, type CommanderError } from 'commander';
import { readFileSync } from 'node:fs';
import { registerValidateCommand } from './commands/validate.js';
import { registerRulesCommand } from './commands/rules.js';
import { resolveFormat } from './middleware/output-format.js';
import { resetFormatContext, setFormatContext } from './format-context.js';
import { setConfigContext } from './config-context.js';
import { cliError, cliOutput } from './renderers/index.js';
import { configureColors } from './renderers/colors.js';
import { VastCheckError } from '../core/errors.js';
import { loadConfig } from '../core/config.js';
import { initLogger, getLogger } from '../core/logger.js';
import { getPackageJsonPath } from '../core/paths.js';
import { ExitCode } from '../types/exit-codes.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(getPackageJsonPath(), 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Map Commander's own exits: help and version exit 0, every parse error
 * (unknown option, missing argument) is a usage error.
 */
function exitForCommanderError(err: CommanderError): never {
  process.exit(err.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INVALID_INPUT);
}

export function createProgram(): Command {
  const version = getPackageVersion();
  const program = new Command();

  program
    .name('vastcheck')
    .description('Validate VAST ad-request URL parameters per implementation type')
    .version(version)
    .exitOverride(exitForCommanderError)
    .option('-j, --json', 'Output in JSON format')
    .option('--human', 'Output in human-readable format (default)')
    .option('-q, --quiet', 'Suppress output except for errors');

  program
    .command('version')
    .description('Display vastcheck version')
    .action(() => {
      cliOutput({ command: 'version', data: { version } });
    });

  registerValidateCommand(program);
  registerRulesCommand(program);

  // Resolve output format, load config, and initialize the logger before
  // any command runs. Config problems end the run with CONFIG_ERROR.
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    resetFormatContext();
    try {
      setFormatContext(resolveFormat(opts));
      const config = loadConfig();
      setFormatContext(resolveFormat(opts, config.output.defaultFormat));
      setConfigContext(config);
      configureColors(config.output.showColor);
      initLogger(config.logging);
      getLogger('cli').debug({ command: actionCommand.name() }, 'Starting command');
    } catch (err) {
      if (err instanceof VastCheckError) {
        cliError(err);
        process.exit(err.code);
      }
      throw err;
    }
  });

  return program;
}
