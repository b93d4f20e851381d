/**
 * Tests for the validation engine.
 */

import { describe, it, expect } from 'vitest';
import { validateRequest } from '../engine.js';
import { parseRequest } from '../../request/parser.js';
import { createRuleRegistry, getRuleRegistry } from '../../rules/registry.js';
import { IMPLEMENTATION_TYPES } from '../../../types/rules.js';
import type { ParsedRequest } from '../../../types/validation.js';
import { scenarioRuleData } from '../../rules/__tests__/rule-data.js';

const registry = createRuleRegistry(scenarioRuleData());

function parse(url: string, decode = false): ParsedRequest {
  return parseRequest(url, { decode, requireQuery: true });
}

describe('validateRequest', () => {
  it('passes when every required parameter is present and valid', () => {
    const result = validateRequest(parse('https://x/ads?VAST_REQUEST&cmsid=123'), 'web', false, registry);
    expect(result).toEqual({ passed: true, errors: [], warnings: [] });
  });

  it('reports a required parameter of the wrong type', () => {
    const result = validateRequest(parse('https://x/ads?cmsid=abc'), 'web', false, registry);
    expect(result.passed).toBe(false);
    expect(result.errors).toEqual([
      {
        severity: 'error',
        parameter: 'cmsid',
        kind: 'NotInteger',
        message: "cmsid: Expected integer, got 'abc'",
      },
    ]);
  });

  it('reports a missing required parameter', () => {
    const result = validateRequest(parse('https://x/ads?foo=1'), 'web', false, registry);
    expect(result.errors).toEqual([
      {
        severity: 'error',
        parameter: 'cmsid',
        kind: 'missing',
        message: 'missing required parameter cmsid',
      },
    ]);
  });

  it('ignores parameters no rule declares', () => {
    const result = validateRequest(parse('https://x/ads?cmsid=1&correlator=oops&extra='), 'web', false, registry);
    expect(result).toEqual({ passed: true, errors: [], warnings: [] });
  });

  describe('programmatic mode', () => {
    it('skips programmatic rules when not programmatic', () => {
      const result = validateRequest(parse('https://x/ads?cmsid=1'), 'web', false, registry);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    it('requires programmatic parameters', () => {
      const result = validateRequest(parse('https://x/ads?cmsid=1&sz=640x480&hl=en'), 'web', true, registry);
      expect(result.passed).toBe(false);
      expect(result.errors.map((f) => [f.parameter, f.kind])).toEqual([['vpa', 'missing']]);
    });

    it('type-checks programmatic required parameters as errors', () => {
      const result = validateRequest(parse('https://x/ads?cmsid=1&vpa=yes&sz=640x480&hl=en'), 'web', true, registry);
      expect(result.errors).toEqual([
        { severity: 'error', parameter: 'vpa', kind: 'NotBoolean', message: "vpa: Expected 0 or 1, got 'yes'" },
      ]);
    });

    it('warns about missing recommended parameters without failing', () => {
      const result = validateRequest(parse('https://x/ads?cmsid=1&vpa=1&hl=en'), 'web', true, registry);
      expect(result.passed).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([
        { severity: 'warning', parameter: 'sz', kind: 'missing', message: 'missing recommended parameter sz' },
      ]);
    });

    it('reports an invalid recommended parameter as a warning', () => {
      const result = validateRequest(parse('https://x/ads?cmsid=1&vpa=1&sz=640-480&hl=en'), 'web', true, registry);
      expect(result.passed).toBe(true);
      expect(result.warnings).toEqual([
        {
          severity: 'warning',
          parameter: 'sz',
          kind: 'InvalidSize',
          message: "sz: Expected format WIDTHxHEIGHT (e.g., 640x480), got '640-480'",
        },
      ]);
    });

    it('orders findings by rule declaration', () => {
      const result = validateRequest(parse('https://x/ads?hl=%20', true), 'web', true, registry);
      expect(result.errors.map((f) => f.parameter)).toEqual(['cmsid', 'vpa']);
      expect(result.warnings.map((f) => [f.parameter, f.kind])).toEqual([
        ['sz', 'missing'],
        ['hl', 'EmptyString'],
      ]);
    });
  });

  it('checks decoded values when the request was decoded', () => {
    const raw = validateRequest(parse('https://x/ads?cmsid=1&vpa=1&sz=1&hl=%20'), 'web', true, registry);
    expect(raw.warnings.map((f) => f.parameter)).toEqual(['sz']);
    const decoded = validateRequest(parse('https://x/ads?cmsid=1&vpa=1&sz=1&hl=%20', true), 'web', true, registry);
    expect(decoded.warnings.map((f) => f.parameter)).toEqual(['sz', 'hl']);
  });

  it('returns identical results for the same request', () => {
    const parsed = parse('https://x/ads?cmsid=x&vpa=2');
    const first = validateRequest(parsed, 'web', true, registry);
    const second = validateRequest(parsed, 'web', true, registry);
    expect(second).toEqual(first);
  });

  it('does not mutate the parsed request', () => {
    const parsed = parse('https://x/ads?cmsid=x');
    validateRequest(parsed, 'web', true, registry);
    expect([...parsed.params]).toEqual([['cmsid', 'x']]);
  });

  describe('with the bundled rules', () => {
    const empty: ParsedRequest = { baseUrl: 'https://x/ads', params: new Map() };

    it.each(IMPLEMENTATION_TYPES)('%s checks required always and programmatic-required only when programmatic', (type) => {
      const rules = getRuleRegistry().rulesFor(type);
      const standard = validateRequest(empty, type, false);
      expect(standard.errors.map((f) => f.parameter)).toEqual(rules.required.map((s) => s.name));
      expect(standard.warnings).toEqual([]);

      const programmatic = validateRequest(empty, type, true);
      expect(programmatic.errors.map((f) => f.parameter)).toEqual([
        ...rules.required.map((s) => s.name),
        ...rules.programmaticRequired.map((s) => s.name),
      ]);
      expect(programmatic.warnings.map((f) => f.parameter)).toEqual(rules.programmaticRecommended.map((s) => s.name));
    });
  });
});
