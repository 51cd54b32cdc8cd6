import { describe, it, expect } from 'vitest';
import { loadTriageConfig, DEFAULT_FINDINGS_DIR } from '../index.js';
import { ValidationError } from '../../core/errors.js';

describe('loadTriageConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadTriageConfig({})).toEqual({
      findingsDir: DEFAULT_FINDINGS_DIR,
      defaultLimit: 20,
      logLevel: 'info',
    });
  });

  it('reads every variable', () => {
    expect(
      loadTriageConfig({
        CI_TRIAGE_FINDINGS_DIR: '/var/ci/findings',
        CI_TRIAGE_DEFAULT_LIMIT: '8',
        CI_TRIAGE_LOG_LEVEL: 'debug',
      })
    ).toEqual({ findingsDir: '/var/ci/findings', defaultLimit: 8, logLevel: 'debug' });
  });

  it('treats blank values as unset', () => {
    expect(loadTriageConfig({ CI_TRIAGE_DEFAULT_LIMIT: '  ', CI_TRIAGE_FINDINGS_DIR: '' })).toEqual({
      findingsDir: DEFAULT_FINDINGS_DIR,
      defaultLimit: 20,
      logLevel: 'info',
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadTriageConfig({ PATH: '/usr/bin', HOME: '/root' }).defaultLimit).toBe(20);
  });

  it('rejects a non-positive limit', () => {
    expect(() => loadTriageConfig({ CI_TRIAGE_DEFAULT_LIMIT: '0' })).toThrow(
      'Validation failed for CI_TRIAGE_DEFAULT_LIMIT: expected a positive integer, got 0'
    );
    expect(() => loadTriageConfig({ CI_TRIAGE_DEFAULT_LIMIT: 'ten' })).toThrow(ValidationError);
  });

  it('rejects an unknown log level', () => {
    let caught: unknown;
    try {
      loadTriageConfig({ CI_TRIAGE_LOG_LEVEL: 'verbose' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      field: 'CI_TRIAGE_LOG_LEVEL',
      expected: 'one of debug, info, warn, error',
      received: 'verbose',
    });
  });
});
