import { describe, it, expect } from 'vitest';
import {
  getErrorMessage,
  isTriageError,
  ProviderError,
  remediationHint,
  ValidationError,
} from '../errors.js';

describe('ProviderError', () => {
  it('prefixes the message with the reason title', () => {
    const error = ProviderError.buildNotFound('https://ci.example.com/b/1');

    expect(error.message).toBe('Build not found: https://ci.example.com/b/1');
    expect(error.code).toBe('PROVIDER_ERROR');
    expect(error.retryable).toBe(false);
    expect(error.toString()).toBe('[PROVIDER_ERROR] Build not found: https://ci.example.com/b/1');
  });

  it('renders a user message with hint and details', () => {
    const error = ProviderError.buildNotFound('https://ci.example.com/b/1');

    expect(error.toUserMessage()).toBe(
      'Build not found\n\n' +
        'Hint: Check that the build URL is correct and you have access to the repository.\n\n' +
        'Details: Build not found: https://ci.example.com/b/1'
    );
  });

  it('prefers the cause in user-facing details', () => {
    const error = new ProviderError('network_timeout', true, 'GET /builds', new Error('socket hang up'));

    expect(error.toUserMessage().endsWith('Details: socket hang up')).toBe(true);
    expect(error.toJSON().details).toEqual({
      reason: 'network_timeout',
      hint: remediationHint('network_timeout'),
      cause: 'socket hang up',
    });
    expect(error.toJSON().retryable).toBe(true);
  });

  it('lists supported formats for invalid URLs', () => {
    const error = ProviderError.invalidUrl('ftp://nope');

    expect(error.reason).toBe('invalid_url');
    expect(error.toUserMessage()).toContain('  - https://buildkite.com/org/pipeline/builds/123');
  });
});

describe('ValidationError', () => {
  it('names field, expectation and received value', () => {
    const error = new ValidationError('limit', 'a positive integer', '-1');

    expect(error.message).toBe('Validation failed for limit: expected a positive integer, got -1');
    expect(error.toUserMessage()).toBe(error.message);
    expect(error.toJSON().details).toEqual({ field: 'limit', expected: 'a positive integer', received: '-1' });
  });
});

describe('helpers', () => {
  it('isTriageError recognizes the hierarchy only', () => {
    expect(isTriageError(new ValidationError('f', 'e', 'r'))).toBe(true);
    expect(isTriageError(new Error('plain'))).toBe(false);
  });

  it('getErrorMessage handles every shape', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('text')).toBe('text');
    expect(getErrorMessage({ message: 42 })).toBe('42');
    expect(getErrorMessage(null)).toBe('Unknown error');
  });
});
