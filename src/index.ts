/**
 * vastcheck library entry point.
 *
 * Validate VAST ad-request URLs without going through the CLI:
 *
 *   const report = validateVastRequest(url, 'web', { programmatic: true });
 */

export * from './types/index.js';
export { VastCheckError, RequestParseError, type RequestParseFailure } from './core/errors.js';
export {
  validateVastRequest,
  validateRequest,
  parseImplementationType,
  isImplementationType,
} from './core/validation/index.js';
export { parseRequest, parseQuery, decodeValue, type ParseRequestOptions } from './core/request/parser.js';
export { checkValue } from './core/rules/type-checker.js';
export { createRuleRegistry, getRuleRegistry, rulesFor, declaredParameters } from './core/rules/registry.js';
export { loadConfig, getConfigValue } from './core/config.js';
export { toReportJson, type ReportJson, type FindingJson } from './core/output.js';
