import { describe, it, expect, vi, afterEach } from 'vitest';
import { InMemoryFindingsStore, createInMemoryFindingsStore } from '../findings_store.js';
import type { ClassifiedFinding, TieredResult } from '../../triage/types.js';
import { makeBuild } from '../../triage/__tests__/fixtures.js';

function finding(id: string, tier: ClassifiedFinding['tier']): ClassifiedFinding {
  return {
    id,
    requestId: 'req-1',
    message: `message ${id}`,
    severity: 'ERROR',
    confidence: 0.5,
    jobName: 'test-unit',
    jobOutcome: 'failed',
    pattern: id,
    recurrenceCount: 1,
    tier,
    alsoInPassingJobs: tier === 3,
    preContext: [],
    postContext: [],
  };
}

function result(tier1: ClassifiedFinding[], tier3: ClassifiedFinding[] = []): TieredResult {
  return { build: makeBuild(), tier1, tier2: [], tier3 };
}

describe('InMemoryFindingsStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns stored findings from any tier', () => {
    const store = createInMemoryFindingsStore();
    const unique = finding('a1', 1);
    const noise = finding('c3', 3);
    store.store('req-1', result([unique], [noise]));

    expect(store.get('req-1', 'a1')).toEqual(unique);
    expect(store.get('req-1', 'c3')).toEqual(noise);
    expect(store.getAll('req-1')).toEqual(result([unique], [noise]));
  });

  it('misses unknown requests and findings', () => {
    const store = new InMemoryFindingsStore();
    store.store('req-1', result([finding('a1', 1)]));

    expect(store.get('req-2', 'a1')).toBeUndefined();
    expect(store.get('req-1', 'zz')).toBeUndefined();
    expect(store.getAll('req-2')).toBeUndefined();
  });

  it('replaces an earlier result for the same request', () => {
    const store = new InMemoryFindingsStore();
    store.store('req-1', result([finding('old', 1)]));
    store.store('req-1', result([finding('new', 1)]));

    expect(store.get('req-1', 'old')).toBeUndefined();
    expect(store.get('req-1', 'new')?.id).toBe('new');
    expect(store.size()).toBe(1);
  });

  it('keeps requests isolated', () => {
    const store = new InMemoryFindingsStore();
    store.store('req-1', result([finding('shared', 1)]));
    store.store('req-2', result([], [finding('shared', 3)]));

    expect(store.get('req-1', 'shared')?.tier).toBe(1);
    expect(store.get('req-2', 'shared')?.tier).toBe(3);
    expect(store.size()).toBe(2);
  });

  it('keeps the first tier on a duplicate id and warns', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new InMemoryFindingsStore();
    store.store('req-1', result([finding('dup', 1)], [finding('dup', 3)]));

    expect(store.get('req-1', 'dup')?.tier).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('stores an empty result', () => {
    const store = new InMemoryFindingsStore();
    store.store('req-empty', result([]));

    expect(store.getAll('req-empty')).toEqual(result([]));
    expect(store.get('req-empty', 'x')).toBeUndefined();
  });
});
