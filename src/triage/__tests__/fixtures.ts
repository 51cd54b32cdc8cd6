import type { BuildInfo, RawFinding } from '../types.js';

let counter = 0;

export function makeFinding(overrides: Partial<RawFinding> = {}): RawFinding {
  counter += 1;
  return {
    id: `hash-${counter}`,
    requestId: 'req-test',
    message: `error ${counter}`,
    severity: 'ERROR',
    confidence: 0.5,
    jobName: 'test-unit',
    jobOutcome: 'failed',
    normalizedPattern: `pattern-${counter}`,
    preContext: [],
    postContext: [],
    ...overrides,
  };
}

export function makeBuild(overrides: Partial<BuildInfo> = {}): BuildInfo {
  return {
    url: 'https://buildkite.com/acme/web/builds/42',
    status: 'failed',
    failedJobs: ['test-unit'],
    passedJobsCount: 3,
    timestamp: '2024-05-21T10:00:00Z',
    ...overrides,
  };
}

export function numberedLines(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}`);
}
