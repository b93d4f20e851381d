/**
 * Type checks for raw request parameter values.
 *
 * Every check returns a definite outcome: the value either conforms to its
 * declared type or is rejected with exactly one error kind.
 */

import type { EnumParameterSpec, ParameterSpec, SizeParameterSpec } from '../../types/rules.js';
import type { TypeCheckResult, TypeErrorKind } from '../../types/validation.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

const ACCEPTED_URL_PROTOCOLS = new Set(['http:', 'https:']);

// `new URL` accepts 'http:host'; the value itself must carry the `//`.
const URL_PREFIX_PATTERN = /^https?:\/\//i;

const OK: TypeCheckResult = { ok: true };

function reject(kind: TypeErrorKind, message: string): TypeCheckResult {
  return { ok: false, error: { kind, message } };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function checkInt(value: string): TypeCheckResult {
  return INTEGER_PATTERN.test(value) ? OK : reject('NotInteger', `Expected integer, got '${value}'`);
}

export function checkBool(value: string): TypeCheckResult {
  return value === '0' || value === '1' ? OK : reject('NotBoolean', `Expected 0 or 1, got '${value}'`);
}

export function checkStr(value: string): TypeCheckResult {
  return value.trim().length > 0 ? OK : reject('EmptyString', 'Parameter value is empty');
}

export function checkEnum(value: string, spec: EnumParameterSpec): TypeCheckResult {
  if (spec.allowedValues.includes(value)) return OK;
  return reject('NotInEnum', `Invalid value '${value}'. Allowed values: ${spec.allowedValues.join(', ')}`);
}

/** http(s) URL with a `//` authority and a non-empty host. */
export function checkUrl(value: string): TypeCheckResult {
  if (!URL_PREFIX_PATTERN.test(value)) {
    return reject('InvalidUrl', `Invalid URL: '${value}'`);
  }
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return reject('InvalidUrl', `Invalid URL: '${value}'`);
  }
  if (!ACCEPTED_URL_PROTOCOLS.has(parsed.protocol) || parsed.hostname === '') {
    return reject('InvalidUrl', `Invalid URL: '${value}'`);
  }
  return OK;
}

/** WIDTH<sep>HEIGHT, both decimal digits. */
export function checkSize(value: string, spec: SizeParameterSpec): TypeCheckResult {
  const sep = spec.dimensionSeparator;
  const pattern = new RegExp(`^\\d+${escapeRegExp(sep)}\\d+$`);
  if (pattern.test(value)) return OK;
  return reject('InvalidSize', `Expected format WIDTH${sep}HEIGHT (e.g., 640${sep}480), got '${value}'`);
}

/**
 * Check a raw value against the declared type of its parameter.
 */
export function checkValue(spec: ParameterSpec, value: string): TypeCheckResult {
  switch (spec.type) {
    case 'int': return checkInt(value);
    case 'bool': return checkBool(value);
    case 'str': return checkStr(value);
    case 'url': return checkUrl(value);
    case 'enum': return checkEnum(value, spec);
    case 'size': return checkSize(value, spec);
    default: {
      const unhandled: never = spec;
      return unhandled;
    }
  }
}
