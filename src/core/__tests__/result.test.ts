import { describe, it, expect } from 'vitest';
import { Err, mapResult, Ok, unwrapOr, type Result } from '../result.js';

describe('Result', () => {
  it('maps only success values', () => {
    const ok: Result<number, string> = Ok(2);
    const err: Result<number, string> = Err('missing');

    expect(mapResult(ok, (n) => n * 10)).toEqual({ ok: true, value: 20 });
    expect(mapResult(err, (n) => n * 10)).toEqual({ ok: false, error: 'missing' });
  });

  it('unwraps with a default', () => {
    expect(unwrapOr(Ok('value'), 'fallback')).toBe('value');
    expect(unwrapOr(Err('missing'), 'fallback')).toBe('fallback');
  });
});
