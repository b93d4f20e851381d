#!/usr/bin/env -S node --disable-warning=ExperimentalWarning
/**
 * vastcheck CLI entry point.
 */

import { createProgram } from './program.js';
import { closeLogger } from '../core/logger.js';
import { getNodeVersionInfo, MINIMUM_NODE_MAJOR, MINIMUM_NODE_MINOR } from '../core/platform.js';
import { ExitCode } from '../types/exit-codes.js';

// Startup guard: fail fast if Node.js version is below minimum
const nodeInfo = getNodeVersionInfo();
if (!nodeInfo.meetsMinimum) {
  process.stderr.write(
    `\nError: vastcheck requires Node.js v${MINIMUM_NODE_MAJOR}.${MINIMUM_NODE_MINOR}+ but found v${nodeInfo.version}\n`
    + `\nUpgrade: https://nodejs.org/en/download/\n\n`,
  );
  process.exit(ExitCode.RUNTIME_ERROR);
}

process.on('exit', closeLogger);

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    process.stderr.write(`Unexpected error: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exit(ExitCode.RUNTIME_ERROR);
  });
