/**
 * Human-readable renderers for validation commands.
 *
 * Covers: validate, rules, version.
 */

import type { Finding, VastValidationReport } from '../../types/validation.js';
import type { ContextRuleSet, ParameterSpec } from '../../types/rules.js';
import { bold, cyan, dim, green, hRule, red, SYMBOLS, yellow } from './colors.js';

// ---------------------------------------------------------------------------
// validate: one report
// ---------------------------------------------------------------------------

function renderFinding(finding: Finding): string {
  const icon = finding.severity === 'error' ? red(SYMBOLS.fail) : yellow(SYMBOLS.warn);
  return `  ${icon} ${bold(finding.parameter)} ${dim(`[${finding.kind}]`)} ${finding.message}`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function renderValidation(report: VastValidationReport, quiet: boolean): string {
  if (quiet) {
    return report.errors.map(renderFinding).join('\n');
  }

  const present = Object.keys(report.presentParameters);
  const lines: string[] = [];
  lines.push(bold('VAST Request Validation'));
  lines.push(hRule());
  lines.push(`${dim('Implementation Type:')} ${report.implementationType}`);
  lines.push(`${dim('Mode:')} ${report.programmatic ? 'programmatic' : 'standard'}`);
  lines.push(`${dim('Present Parameters:')} ${present.length > 0 ? present.join(', ') : 'None'}`);

  if (report.errors.length > 0) {
    lines.push('');
    lines.push(red(bold(`Errors (${report.errors.length})`)));
    for (const finding of report.errors) lines.push(renderFinding(finding));
  }

  if (report.warnings.length > 0) {
    lines.push('');
    lines.push(yellow(bold(`Warnings (${report.warnings.length})`)));
    for (const finding of report.warnings) lines.push(renderFinding(finding));
  }

  lines.push('');
  const summary = `${plural(report.errors.length, 'error')}, ${plural(report.warnings.length, 'warning')}`;
  lines.push(report.passed
    ? `${green(bold(`${SYMBOLS.pass} PASSED`))} ${dim(`(${summary})`)}`
    : `${red(bold(`${SYMBOLS.fail} FAILED`))} ${dim(`(${summary})`)}`);

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// rules: one context's rule set
// ---------------------------------------------------------------------------

function describeType(spec: ParameterSpec): string {
  switch (spec.type) {
    case 'enum': return `enum (${spec.allowedValues.join(' | ')})`;
    case 'size': return `size (WIDTH${spec.dimensionSeparator}HEIGHT)`;
    default: return spec.type;
  }
}

function renderSpecList(title: string, specs: readonly ParameterSpec[]): string[] {
  const lines = [bold(`${title} (${specs.length})`)];
  if (specs.length === 0) {
    lines.push(`  ${dim('none')}`);
    return lines;
  }
  const width = Math.max(...specs.map((spec) => spec.name.length));
  for (const spec of specs) {
    lines.push(`  ${cyan(spec.name.padEnd(width))}  ${describeType(spec)}`);
  }
  return lines;
}

export function renderRules(rules: ContextRuleSet, programmatic: boolean, quiet: boolean): string {
  const lists: Array<[string, readonly ParameterSpec[]]> = [['Required', rules.required]];
  if (programmatic) {
    lists.push(['Programmatic Required', rules.programmaticRequired]);
    lists.push(['Programmatic Recommended', rules.programmaticRecommended]);
  }

  if (quiet) {
    return lists.flatMap(([, specs]) => specs.map((spec) => spec.name)).join('\n');
  }

  const lines: string[] = [];
  lines.push(`${bold('Implementation Type:')} ${rules.context}${programmatic ? ' (programmatic)' : ''}`);
  for (const [title, specs] of lists) {
    lines.push('');
    lines.push(...renderSpecList(title, specs));
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// version
// ---------------------------------------------------------------------------

export function renderVersion(version: string, quiet: boolean): string {
  if (quiet) return version;
  return `vastcheck v${version}`;
}
