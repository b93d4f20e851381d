/**
 * Tests for config engine.
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, getConfigValue, parseEnvValue } from '../config.js';
import { VastCheckError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('loadConfig', () => {
  it('returns defaults when no VASTCHECK_* variables are set', () => {
    const config = loadConfig({ HOME: '/home/test', LANG: 'C' });
    expect(config).toEqual({
      output: { defaultFormat: 'human', showColor: true },
      logging: { level: 'warn', maxFileSize: 10 * 1024 * 1024, maxFiles: 5 },
      validation: { programmatic: false, decode: false },
    });
  });

  it('environment variables override defaults', () => {
    const config = loadConfig({
      VASTCHECK_FORMAT: 'json',
      VASTCHECK_PROGRAMMATIC: 'true',
      VASTCHECK_LOG_LEVEL: 'debug',
      VASTCHECK_IMPLEMENTATION_TYPE: 'ctv',
    });
    expect(config.output).toEqual({ defaultFormat: 'json', showColor: true });
    expect(config.validation).toEqual({ implementationType: 'ctv', programmatic: true, decode: false });
    expect(config.logging.level).toBe('debug');
    // Other defaults preserved
    expect(config.logging.maxFiles).toBe(5);
  });

  it('sets a log file path from the environment', () => {
    const config = loadConfig({ VASTCHECK_LOG_FILE: 'logs/vastcheck.log' });
    expect(config.logging.filePath).toBe('logs/vastcheck.log');
  });

  it('ignores unrelated variables', () => {
    const config = loadConfig({ VASTCHECK_HOME: '/tmp/elsewhere', VASTCHECK_COLOUR: 'false' });
    expect(config.output.showColor).toBe(true);
  });

  it('does not modify the defaults between calls', () => {
    loadConfig({ VASTCHECK_DECODE: 'true' });
    expect(loadConfig({}).validation.decode).toBe(false);
  });

  it('rejects an unknown implementation type', () => {
    expect(() => loadConfig({ VASTCHECK_IMPLEMENTATION_TYPE: 'radio' })).toThrow(VastCheckError);
  });

  it('names the offending path for an invalid value', () => {
    let caught: unknown;
    try {
      loadConfig({ VASTCHECK_SHOW_COLOR: 'sometimes' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(VastCheckError);
    expect(caught).toMatchObject({ code: ExitCode.CONFIG_ERROR });
    expect(caught instanceof Error ? caught.message : '').toMatch(/^Invalid configuration value for output\.showColor: /);
  });
});

describe('getConfigValue', () => {
  it('reports default source', () => {
    expect(getConfigValue('logging.maxFiles', {})).toEqual({ value: 5, source: 'default' });
  });

  it('reports env source', () => {
    const result = getConfigValue('validation.implementationType', { VASTCHECK_IMPLEMENTATION_TYPE: 'audio' });
    expect(result).toEqual({ value: 'audio', source: 'env' });
  });

  it('returns undefined for an unknown path', () => {
    expect(getConfigValue('validation.missing', {})).toEqual({ value: undefined, source: 'default' });
  });
});

describe('parseEnvValue', () => {
  it('parses booleans and numbers', () => {
    expect(parseEnvValue('true')).toBe(true);
    expect(parseEnvValue('false')).toBe(false);
    expect(parseEnvValue('42')).toBe(42);
  });

  it('keeps other strings', () => {
    expect(parseEnvValue('web')).toBe('web');
    expect(parseEnvValue(' ')).toBe(' ');
  });
});
