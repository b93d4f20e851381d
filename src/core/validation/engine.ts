/**
 * Validation engine: reconciles a parsed request against the rule set of
 * one implementation type.
 *
 * Required and recommended parameters go through separate functions so a
 * finding's severity is fixed where it is created.
 */

import type { ImplementationType, ParameterSpec, RuleRegistry } from '../../types/rules.js';
import type { Finding, ParsedRequest, ValidationResult } from '../../types/validation.js';
import { checkValue } from '../rules/type-checker.js';
import { getRuleRegistry } from '../rules/registry.js';
import { getLogger } from '../logger.js';

/**
 * Check one required parameter. Absence and type failures are errors.
 */
function checkRequired(spec: ParameterSpec, params: ReadonlyMap<string, string>): Finding | null {
  const value = params.get(spec.name);
  if (value === undefined) {
    return {
      severity: 'error',
      parameter: spec.name,
      kind: 'missing',
      message: `missing required parameter ${spec.name}`,
    };
  }
  const result = checkValue(spec, value);
  if (result.ok) return null;
  return {
    severity: 'error',
    parameter: spec.name,
    kind: result.error.kind,
    message: `${spec.name}: ${result.error.message}`,
  };
}

/**
 * Check one recommended parameter. Absence and type failures are warnings.
 */
function checkRecommended(spec: ParameterSpec, params: ReadonlyMap<string, string>): Finding | null {
  const value = params.get(spec.name);
  if (value === undefined) {
    return {
      severity: 'warning',
      parameter: spec.name,
      kind: 'missing',
      message: `missing recommended parameter ${spec.name}`,
    };
  }
  const result = checkValue(spec, value);
  if (result.ok) return null;
  return {
    severity: 'warning',
    parameter: spec.name,
    kind: result.error.kind,
    message: `${spec.name}: ${result.error.message}`,
  };
}

/**
 * Validate a parsed request for one implementation type.
 *
 * Findings follow rule declaration order: required, then
 * programmatic-required, then programmatic-recommended. Parameters the
 * rule set does not declare are ignored.
 */
export function validateRequest(
  parsed: ParsedRequest,
  context: ImplementationType,
  programmatic: boolean,
  registry: RuleRegistry = getRuleRegistry(),
): ValidationResult {
  const rules = registry.rulesFor(context);
  const requiredSet = programmatic
    ? [...rules.required, ...rules.programmaticRequired]
    : rules.required;

  const errors: Finding[] = [];
  for (const spec of requiredSet) {
    const finding = checkRequired(spec, parsed.params);
    if (finding) errors.push(finding);
  }

  const warnings: Finding[] = [];
  if (programmatic) {
    for (const spec of rules.programmaticRecommended) {
      const finding = checkRecommended(spec, parsed.params);
      if (finding) warnings.push(finding);
    }
  }

  getLogger('validation').debug(
    { implementationType: context, programmatic, errors: errors.length, warnings: warnings.length },
    'Validated VAST request',
  );

  return { passed: errors.length === 0, errors, warnings };
}
