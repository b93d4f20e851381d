/**
 * Rule registry: the per-context parameter catalog.
 *
 * Rule tables live in vast-request-rules.json beside this module and are
 * imported into the build, then validated and frozen on first use. Nothing outside this module knows which
 * parameters a context expects.
 */

import { z } from 'zod';
import {
  IMPLEMENTATION_TYPES,
  RULE_LISTS,
  type ContextRuleSet,
  type ImplementationType,
  type ParameterSpec,
  type RuleRegistry,
} from '../../types/rules.js';
import { ExitCode } from '../../types/exit-codes.js';
import { VastCheckError } from '../errors.js';
import bundledRules from './vast-request-rules.json' with { type: 'json' };

const ParameterNameSchema = z.string().regex(/^[A-Za-z0-9_]+$/, 'parameter names are letters, digits and underscores');

export const ParameterSpecSchema = z.discriminatedUnion('type', [
  z.object({ name: ParameterNameSchema, type: z.literal('int') }).strict(),
  z.object({ name: ParameterNameSchema, type: z.literal('bool') }).strict(),
  z.object({ name: ParameterNameSchema, type: z.literal('str') }).strict(),
  z.object({ name: ParameterNameSchema, type: z.literal('url') }).strict(),
  z.object({
    name: ParameterNameSchema,
    type: z.literal('enum'),
    allowedValues: z.array(z.string()).min(1),
  }).strict(),
  z.object({
    name: ParameterNameSchema,
    type: z.literal('size'),
    dimensionSeparator: z.string().min(1).default('x'),
  }).strict(),
]);

const ParameterListSchema = z.array(ParameterSpecSchema);

const ContextRulesSchema = z.object({
  required: ParameterListSchema,
  programmaticRequired: ParameterListSchema,
  programmaticRecommended: ParameterListSchema,
}).strict();

/** Shape of the rules file. Every implementation type must have an entry. */
export const RuleFileSchema = z.object({
  version: z.number().int().positive(),
  contexts: z.object({
    web: ContextRulesSchema,
    app: ContextRulesSchema,
    ctv: ContextRulesSchema,
    audio: ContextRulesSchema,
    doh: ContextRulesSchema,
  }).strict(),
});

export type RuleFile = z.input<typeof RuleFileSchema>;

function typeSignature(spec: ParameterSpec): string {
  switch (spec.type) {
    case 'enum': return `enum(${spec.allowedValues.join('|')})`;
    case 'size': return `size(${spec.dimensionSeparator})`;
    default: return spec.type;
  }
}

/**
 * Names that appear more than once in a context with different types.
 */
export function findTypeConflicts(rules: ContextRuleSet): string[] {
  const seen = new Map<string, string>();
  const conflicts = new Set<string>();
  for (const list of RULE_LISTS) {
    for (const spec of rules[list]) {
      const signature = typeSignature(spec);
      const previous = seen.get(spec.name);
      if (previous !== undefined && previous !== signature) {
        conflicts.add(spec.name);
      }
      seen.set(spec.name, signature);
    }
  }
  return [...conflicts];
}

function freezeSpec(spec: ParameterSpec): ParameterSpec {
  switch (spec.type) {
    case 'enum':
      return Object.freeze({ ...spec, allowedValues: Object.freeze([...spec.allowedValues]) });
    default:
      return Object.freeze({ ...spec });
  }
}

function freezeList(specs: readonly ParameterSpec[]): readonly ParameterSpec[] {
  return Object.freeze(specs.map(freezeSpec));
}

/**
 * Build a registry from raw rule data.
 * Throws a CONFIG_ERROR if the data is malformed or a context declares
 * one parameter name with conflicting types.
 *
 * @param data - Parsed rules file contents
 * @param source - Where the data came from, for error messages
 */
export function createRuleRegistry(data: unknown, source = 'rule data'): RuleRegistry {
  const parsed = RuleFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new VastCheckError(ExitCode.CONFIG_ERROR, `Invalid rules in ${source}: ${issues}`);
  }

  const table = new Map<ImplementationType, ContextRuleSet>();
  for (const context of IMPLEMENTATION_TYPES) {
    const lists = parsed.data.contexts[context];
    const rules: ContextRuleSet = Object.freeze({
      context,
      required: freezeList(lists.required),
      programmaticRequired: freezeList(lists.programmaticRequired),
      programmaticRecommended: freezeList(lists.programmaticRecommended),
    });

    const conflicts = findTypeConflicts(rules);
    if (conflicts.length > 0) {
      throw new VastCheckError(
        ExitCode.CONFIG_ERROR,
        `Invalid rules in ${source}: ${context} declares ${conflicts.join(', ')} with conflicting types`,
      );
    }
    table.set(context, rules);
  }

  const version = parsed.data.version;
  return Object.freeze({
    version,
    rulesFor(context: ImplementationType): ContextRuleSet {
      const rules = table.get(context);
      if (!rules) {
        throw new Error(`No rule set registered for implementation type: ${String(context)}`);
      }
      return rules;
    },
  });
}

let defaultRegistry: RuleRegistry | null = null;

/**
 * The process-wide registry built from the bundled rule tables.
 * Validated on first use and shared read-only afterwards.
 */
export function getRuleRegistry(): RuleRegistry {
  defaultRegistry ??= createRuleRegistry(bundledRules, 'bundled rules');
  return defaultRegistry;
}

/** Shorthand for `getRuleRegistry().rulesFor(context)`. */
export function rulesFor(context: ImplementationType): ContextRuleSet {
  return getRuleRegistry().rulesFor(context);
}

/**
 * Every parameter name a context declares, in declaration order.
 */
export function declaredParameters(rules: ContextRuleSet): string[] {
  const names = new Set<string>();
  for (const list of RULE_LISTS) {
    for (const spec of rules[list]) names.add(spec.name);
  }
  return [...names];
}
