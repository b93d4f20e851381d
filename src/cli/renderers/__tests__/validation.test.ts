/**
 * Tests for human-readable validation renderers.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { renderRules, renderValidation, renderVersion } from '../validation.js';
import { hRule, setColorsEnabled, SYMBOLS } from '../colors.js';
import { createRuleRegistry } from '../../../core/rules/registry.js';
import { ruleData, scenarioRuleData } from '../../../core/rules/__tests__/rule-data.js';
import type { VastValidationReport } from '../../../types/validation.js';

function report(overrides: Partial<VastValidationReport> = {}): VastValidationReport {
  return {
    passed: true,
    implementationType: 'web',
    programmatic: false,
    decoded: false,
    baseUrl: 'https://x/ads',
    errors: [],
    warnings: [],
    presentParameters: {},
    ...overrides,
  };
}

describe('renderValidation', () => {
  beforeAll(() => {
    setColorsEnabled(false);
  });

  it('renders a passing report', () => {
    const text = renderValidation(report({ presentParameters: { cmsid: '123', hl: 'en' } }), false);
    expect(text.split('\n')).toEqual([
      'VAST Request Validation',
      hRule(),
      'Implementation Type: web',
      'Mode: standard',
      'Present Parameters: cmsid, hl',
      '',
      `${SYMBOLS.pass} PASSED (0 errors, 0 warnings)`,
    ]);
  });

  it('renders errors and warnings in their own sections', () => {
    const text = renderValidation(report({
      passed: false,
      programmatic: true,
      errors: [{ severity: 'error', parameter: 'vpa', kind: 'missing', message: 'missing required parameter vpa' }],
      warnings: [
        { severity: 'warning', parameter: 'sz', kind: 'missing', message: 'missing recommended parameter sz' },
        { severity: 'warning', parameter: 'hl', kind: 'EmptyString', message: 'hl: Parameter value is empty' },
      ],
    }), false);
    expect(text.split('\n')).toEqual([
      'VAST Request Validation',
      hRule(),
      'Implementation Type: web',
      'Mode: programmatic',
      'Present Parameters: None',
      '',
      'Errors (1)',
      `  ${SYMBOLS.fail} vpa [missing] missing required parameter vpa`,
      '',
      'Warnings (2)',
      `  ${SYMBOLS.warn} sz [missing] missing recommended parameter sz`,
      `  ${SYMBOLS.warn} hl [EmptyString] hl: Parameter value is empty`,
      '',
      `${SYMBOLS.fail} FAILED (1 error, 2 warnings)`,
    ]);
  });

  it('prints only errors in quiet mode', () => {
    const quiet = renderValidation(report({
      passed: false,
      errors: [{ severity: 'error', parameter: 'cmsid', kind: 'NotInteger', message: "cmsid: Expected integer, got 'abc'" }],
      warnings: [{ severity: 'warning', parameter: 'hl', kind: 'missing', message: 'missing recommended parameter hl' }],
    }), true);
    expect(quiet).toBe(`  ${SYMBOLS.fail} cmsid [NotInteger] cmsid: Expected integer, got 'abc'`);
    expect(renderValidation(report(), true)).toBe('');
  });
});

describe('renderRules', () => {
  beforeAll(() => {
    setColorsEnabled(false);
  });

  const rules = createRuleRegistry(scenarioRuleData()).rulesFor('web');

  it('renders required parameters only outside programmatic mode', () => {
    expect(renderRules(rules, false, false).split('\n')).toEqual([
      'Implementation Type: web',
      '',
      'Required (1)',
      '  cmsid  int',
    ]);
  });

  it('renders every list in programmatic mode', () => {
    expect(renderRules(rules, true, false).split('\n')).toEqual([
      'Implementation Type: web (programmatic)',
      '',
      'Required (1)',
      '  cmsid  int',
      '',
      'Programmatic Required (1)',
      '  vpa  bool',
      '',
      'Programmatic Recommended (2)',
      '  sz  size (WIDTHxHEIGHT)',
      '  hl  str',
    ]);
  });

  it('marks empty lists and describes enums', () => {
    const data = ruleData({
      ctv: {
        required: [{ name: 'env', type: 'enum', allowedValues: ['vp', 'instream'] }],
        programmaticRequired: [],
        programmaticRecommended: [],
      },
    });
    const ctv = createRuleRegistry(data).rulesFor('ctv');
    expect(renderRules(ctv, true, false).split('\n')).toEqual([
      'Implementation Type: ctv (programmatic)',
      '',
      'Required (1)',
      '  env  enum (vp | instream)',
      '',
      'Programmatic Required (0)',
      '  none',
      '',
      'Programmatic Recommended (0)',
      '  none',
    ]);
  });

  it('prints bare names in quiet mode', () => {
    expect(renderRules(rules, true, true)).toBe('cmsid\nvpa\nsz\nhl');
  });
});

describe('renderVersion', () => {
  it('prefixes the program name unless quiet', () => {
    expect(renderVersion('1.0.0', false)).toBe('vastcheck v1.0.0');
    expect(renderVersion('1.0.0', true)).toBe('1.0.0');
  });
});
