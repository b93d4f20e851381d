/**
 * Parsed request, findings and validation result shapes.
 */

import type { ImplementationType } from './rules.js';

/** Ways a raw value can fail its declared type. */
export type TypeErrorKind =
  | 'NotInteger'
  | 'NotBoolean'
  | 'EmptyString'
  | 'NotInEnum'
  | 'InvalidUrl'
  | 'InvalidSize';

export interface ValueTypeError {
  kind: TypeErrorKind;
  message: string;
}

export type TypeCheckResult = { ok: true } | { ok: false; error: ValueTypeError };

/** A request split into its base URL and query parameters. */
export interface ParsedRequest {
  readonly baseUrl: string;
  /** Parameter name to raw (or decoded) value; the last duplicate wins. */
  readonly params: ReadonlyMap<string, string>;
}

export type FindingSeverity = 'error' | 'warning';

export type FindingKind = 'missing' | TypeErrorKind;

/** A single reported issue about one parameter. */
export interface Finding {
  severity: FindingSeverity;
  parameter: string;
  kind: FindingKind;
  message: string;
}

export interface ValidationResult {
  /** True iff `errors` is empty. Warnings never affect it. */
  passed: boolean;
  errors: Finding[];
  warnings: Finding[];
}

/** Options accepted by the top-level validation entry point. */
export interface ValidateOptions {
  programmatic?: boolean;
  decode?: boolean;
}

/** Validation result plus the request context it was produced for. */
export interface VastValidationReport extends ValidationResult {
  implementationType: ImplementationType;
  programmatic: boolean;
  decoded: boolean;
  baseUrl: string;
  presentParameters: Record<string, string>;
}
