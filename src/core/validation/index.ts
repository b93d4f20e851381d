/**
 * VAST request validation entry point.
 *
 * Resolves the implementation type, parses the request and runs the
 * validation engine. Usage problems throw a VastCheckError before any
 * report exists; parameter problems are findings in the report.
 */

import { IMPLEMENTATION_TYPES, type ImplementationType, type RuleRegistry } from '../../types/rules.js';
import type { ValidateOptions, VastValidationReport } from '../../types/validation.js';
import { ExitCode } from '../../types/exit-codes.js';
import { VastCheckError } from '../errors.js';
import { parseRequest } from '../request/parser.js';
import { getRuleRegistry } from '../rules/registry.js';
import { validateRequest } from './engine.js';

export { validateRequest } from './engine.js';

/** Narrow a string to a known implementation type (exact match). */
export function isImplementationType(token: string): token is ImplementationType {
  return IMPLEMENTATION_TYPES.some((type) => type === token);
}

/**
 * Resolve a user-supplied implementation type token, ignoring case and
 * surrounding whitespace.
 *
 * @throws VastCheckError (INVALID_INPUT) for an unknown token
 */
export function parseImplementationType(token: string): ImplementationType {
  const normalized = token.trim().toLowerCase();
  if (isImplementationType(normalized)) return normalized;
  throw new VastCheckError(
    ExitCode.INVALID_INPUT,
    `Invalid implementation type: '${token}'. Allowed types are: ${IMPLEMENTATION_TYPES.join(', ')}`,
    { fix: `Pass one of ${IMPLEMENTATION_TYPES.join(', ')} with --implementation-type` },
  );
}

/**
 * Validate a raw VAST request URL.
 *
 * @param rawUrl - Full ad-request URL, query string included
 * @param implementationType - Delivery context token (web, app, ctv, audio, doh)
 * @throws VastCheckError for an unknown implementation type
 * @throws RequestParseError for an empty request, or one without a query
 *   when the context requires parameters
 */
export function validateVastRequest(
  rawUrl: string,
  implementationType: string,
  options: ValidateOptions = {},
  registry: RuleRegistry = getRuleRegistry(),
): VastValidationReport {
  const context = parseImplementationType(implementationType);
  const programmatic = options.programmatic ?? false;
  const decode = options.decode ?? false;

  const rules = registry.rulesFor(context);
  const parsed = parseRequest(rawUrl, { decode, requireQuery: rules.required.length > 0 });
  const result = validateRequest(parsed, context, programmatic, registry);

  return {
    passed: result.passed,
    implementationType: context,
    programmatic,
    decoded: decode,
    baseUrl: parsed.baseUrl,
    errors: result.errors,
    warnings: result.warnings,
    presentParameters: Object.fromEntries(parsed.params),
  };
}
