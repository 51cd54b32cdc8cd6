import { describe, it, expect, vi } from 'vitest';
import {
  analyzeBuild,
  describeLookupMiss,
  getFindingDetails,
  type FindingBatch,
  type FindingSource,
} from '../analyze_build.js';
import { ProviderError } from '../../core/errors.js';
import { InMemoryFindingsStore } from '../../storage/findings_store.js';
import { makeBuild, makeFinding, numberedLines } from '../../triage/__tests__/fixtures.js';

function staticSource(batch: FindingBatch): FindingSource {
  return { collect: vi.fn(async () => batch) };
}

function sampleBatch(): FindingBatch {
  return {
    requestId: 'req-42',
    build: makeBuild(),
    findings: [
      makeFinding({
        id: 'unique',
        normalizedPattern: 'unique-error',
        jobName: 'test-unit',
        confidence: 0.95,
        message: 'AssertionError: expected 200 to equal 500',
        preContext: numberedLines('pre', 20),
      }),
      makeFinding({ id: 'common', normalizedPattern: 'common-error', jobName: 'test-integration', confidence: 0.85, message: 'npm WARN deprecated' }),
      makeFinding({ id: 'common-pass', normalizedPattern: 'common-error', jobName: 'lint', jobOutcome: 'passed', confidence: 0.6, message: 'npm WARN deprecated' }),
    ],
  };
}

describe('analyzeBuild', () => {
  it('returns a manifest and stores the full result', async () => {
    const store = new InMemoryFindingsStore();
    const source = staticSource(sampleBatch());

    const manifest = await analyzeBuild({ source, store }, { buildUrl: 'https://buildkite.com/acme/web/builds/42' });

    expect(source.collect).toHaveBeenCalledWith('https://buildkite.com/acme/web/builds/42');
    expect(manifest.requestId).toBe('req-42');
    expect(manifest.tier1Findings.map((f) => f.id)).toEqual(['unique']);
    expect(manifest.tier1Findings[0]?.preContext).toEqual(numberedLines('pre', 20).slice(5));
    expect(manifest.otherFindings).toEqual([
      { id: 'common', tier: 3, severity: 'ERROR', confidence: 0.85, jobName: 'test-integration', message: 'npm WARN deprecated' },
    ]);
    expect(store.getAll('req-42')?.tier3.map((f) => f.id)).toEqual(['common']);
  });

  it('keeps the stored build intact when the manifest is edited', async () => {
    const store = new InMemoryFindingsStore();
    const manifest = await analyzeBuild(
      { source: staticSource(sampleBatch()), store },
      { buildUrl: 'https://buildkite.com/acme/web/builds/42' }
    );

    manifest.build.failedJobs.push('deploy');

    expect(store.getAll('req-42')?.build.failedJobs).toEqual(['test-unit']);
  });

  it('applies the limit', async () => {
    const batch: FindingBatch = {
      requestId: 'req-limit',
      build: makeBuild(),
      findings: [
        makeFinding({ id: 'a', confidence: 0.9 }),
        makeFinding({ id: 'b', confidence: 0.8 }),
        makeFinding({ id: 'c', confidence: 0.7 }),
      ],
    };

    const manifest = await analyzeBuild(
      { source: staticSource(batch), store: new InMemoryFindingsStore() },
      { buildUrl: 'https://buildkite.com/acme/web/builds/42', limit: 2 }
    );

    expect(manifest.tier1Findings.map((f) => f.id)).toEqual(['a', 'b']);
  });

  it('propagates source failures and stores nothing', async () => {
    const store = new InMemoryFindingsStore();
    const source: FindingSource = {
      collect: async (url) => {
        throw ProviderError.buildNotFound(url);
      },
    };

    await expect(analyzeBuild({ source, store }, { buildUrl: 'https://ci.example.com/b/1' })).rejects.toBeInstanceOf(ProviderError);
    expect(store.size()).toBe(0);
  });
});

describe('getFindingDetails', () => {
  it('returns a stored tier 3 finding with its full data', async () => {
    const store = new InMemoryFindingsStore();
    await analyzeBuild({ source: staticSource(sampleBatch()), store }, { buildUrl: 'https://buildkite.com/acme/web/builds/42' });

    const lookup = getFindingDetails(store, 'req-42', 'common');

    expect(lookup.ok).toBe(true);
    if (lookup.ok) {
      expect(lookup.value.tier).toBe(3);
      expect(lookup.value.passingJobCount).toBe(1);
      expect(lookup.value.alsoInPassingJobs).toBe(true);
    }
  });

  it('distinguishes unknown requests from unknown findings', async () => {
    const store = new InMemoryFindingsStore();
    await analyzeBuild({ source: staticSource(sampleBatch()), store }, { buildUrl: 'https://buildkite.com/acme/web/builds/42' });

    expect(getFindingDetails(store, 'req-nope', 'common')).toEqual({
      ok: false,
      error: { reason: 'unknown_request', requestId: 'req-nope' },
    });
    expect(getFindingDetails(store, 'req-42', 'missing')).toEqual({
      ok: false,
      error: { reason: 'unknown_finding', requestId: 'req-42', findingId: 'missing' },
    });
  });
});

describe('describeLookupMiss', () => {
  it('renders both miss reasons', () => {
    expect(describeLookupMiss({ reason: 'unknown_request', requestId: 'r1' })).toBe(
      'No analysis found for request_id "r1". Run analyze_build first.'
    );
    expect(describeLookupMiss({ reason: 'unknown_finding', requestId: 'r1', findingId: 'f1' })).toBe(
      'No finding "f1" in request "r1".'
    );
  });
});
