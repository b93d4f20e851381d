/**
 * JSON output formatting for vastcheck.
 *
 * Reports are emitted as a single indented JSON document; findings keep
 * their list (errors / warnings) as severity.
 */

import type { Finding, FindingKind, VastValidationReport } from '../types/validation.js';
import type { ContextRuleSet, ParameterSpec } from '../types/rules.js';
import { VastCheckError } from './errors.js';

/** A finding as it appears in JSON output. */
export interface FindingJson {
  parameter: string;
  kind: FindingKind;
  message: string;
}

/** A validation report as it appears in JSON output. */
export interface ReportJson {
  passed: boolean;
  implementationType: string;
  programmatic: boolean;
  decoded: boolean;
  baseUrl: string;
  errors: FindingJson[];
  warnings: FindingJson[];
  presentParameters: Record<string, string>;
}

export function toFindingJson(finding: Finding): FindingJson {
  return { parameter: finding.parameter, kind: finding.kind, message: finding.message };
}

/** Project a report onto its JSON field layout. */
export function toReportJson(report: VastValidationReport): ReportJson {
  return {
    passed: report.passed,
    implementationType: report.implementationType,
    programmatic: report.programmatic,
    decoded: report.decoded,
    baseUrl: report.baseUrl,
    errors: report.errors.map(toFindingJson),
    warnings: report.warnings.map(toFindingJson),
    presentParameters: report.presentParameters,
  };
}

/** A parameter spec as it appears in `rules` output. */
export function toParameterJson(spec: ParameterSpec): Record<string, unknown> {
  switch (spec.type) {
    case 'enum': return { name: spec.name, type: spec.type, allowedValues: [...spec.allowedValues] };
    case 'size': return { name: spec.name, type: spec.type, dimensionSeparator: spec.dimensionSeparator };
    default: return { name: spec.name, type: spec.type };
  }
}

/**
 * A rule set as it appears in `rules` output. Programmatic lists are
 * included only in programmatic mode.
 */
export function toRuleSetJson(rules: ContextRuleSet, programmatic: boolean): Record<string, unknown> {
  const json: Record<string, unknown> = {
    implementationType: rules.context,
    programmatic,
    required: rules.required.map(toParameterJson),
  };
  if (programmatic) {
    json['programmaticRequired'] = rules.programmaticRequired.map(toParameterJson);
    json['programmaticRecommended'] = rules.programmaticRecommended.map(toParameterJson);
  }
  return json;
}

/**
 * Format a successful result as an indented JSON document.
 */
export function formatSuccess(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format an error as a single-line JSON object.
 */
export function formatError(error: VastCheckError): string {
  return JSON.stringify(error.toJSON());
}
