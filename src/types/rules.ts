/**
 * Rule model: parameter types, parameter specs and per-context rule sets.
 */

/** Delivery surfaces that carry their own rule set. */
export const IMPLEMENTATION_TYPES = ['web', 'app', 'ctv', 'audio', 'doh'] as const;

export type ImplementationType = (typeof IMPLEMENTATION_TYPES)[number];

interface BaseParameterSpec {
  readonly name: string;
}

export interface ScalarParameterSpec extends BaseParameterSpec {
  readonly type: 'int' | 'bool' | 'str' | 'url';
}

export interface EnumParameterSpec extends BaseParameterSpec {
  readonly type: 'enum';
  /** Case-sensitive value domain. */
  readonly allowedValues: readonly string[];
}

export interface SizeParameterSpec extends BaseParameterSpec {
  readonly type: 'size';
  /** Separator between width and height, `x` in every shipped rule. */
  readonly dimensionSeparator: string;
}

export type ParameterSpec = ScalarParameterSpec | EnumParameterSpec | SizeParameterSpec;

/** Which list of a rule set a parameter was declared in. */
export type RuleList = 'required' | 'programmaticRequired' | 'programmaticRecommended';

export const RULE_LISTS: readonly RuleList[] = ['required', 'programmaticRequired', 'programmaticRecommended'];

/** Parameters one delivery context expects. */
export interface ContextRuleSet {
  readonly context: ImplementationType;
  readonly required: readonly ParameterSpec[];
  readonly programmaticRequired: readonly ParameterSpec[];
  readonly programmaticRecommended: readonly ParameterSpec[];
}

/** Read-only lookup of rule sets by context. */
export interface RuleRegistry {
  /** Rule data version from the rules file. */
  readonly version: number;
  rulesFor(context: ImplementationType): ContextRuleSet;
}
