/**
 * Central output dispatch for CLI commands.
 *
 * Provides cliOutput(), which checks the resolved format (JSON/human/quiet)
 * and dispatches to either the JSON formatter or a human-readable renderer.
 *
 * Commands call:
 *   cliOutput({ command: 'validate', data: report })
 */

import { getFormatContext } from '../format-context.js';
import {
  formatError,
  formatSuccess,
  toReportJson,
  toRuleSetJson,
} from '../../core/output.js';
import type { VastCheckError } from '../../core/errors.js';
import type { VastValidationReport } from '../../types/validation.js';
import type { ContextRuleSet } from '../../types/rules.js';
import { renderRules, renderValidation, renderVersion } from './validation.js';

// ---------------------------------------------------------------------------
// Payloads: one variant per command with output
// ---------------------------------------------------------------------------

export type CliPayload =
  | { command: 'validate'; data: VastValidationReport }
  | { command: 'rules'; data: ContextRuleSet; programmatic: boolean }
  | { command: 'version'; data: { version: string } };

function renderHuman(payload: CliPayload, quiet: boolean): string {
  switch (payload.command) {
    case 'validate': return renderValidation(payload.data, quiet);
    case 'rules': return renderRules(payload.data, payload.programmatic, quiet);
    case 'version': return renderVersion(payload.data.version, quiet);
  }
}

function toJson(payload: CliPayload): unknown {
  switch (payload.command) {
    case 'validate': return toReportJson(payload.data);
    case 'rules': return toRuleSetJson(payload.data, payload.programmatic);
    case 'version': return payload.data;
  }
}

// ---------------------------------------------------------------------------
// Main output function
// ---------------------------------------------------------------------------

/**
 * Output a command result to stdout in the resolved format.
 * Quiet human output that renders to nothing prints nothing.
 */
export function cliOutput(payload: CliPayload): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const text = renderHuman(payload, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(formatSuccess(toJson(payload)));
}

/**
 * Output an error to stderr in the resolved format.
 * JSON: the error object. Human: the message plus a fix line when present.
 */
export function cliError(error: VastCheckError): void {
  const ctx = getFormatContext();

  if (ctx.format === 'json') {
    console.error(formatError(error));
    return;
  }

  console.error(`Error: ${error.message}`);
  if (error.fix) {
    console.error(`  Fix: ${error.fix}`);
  }
}
