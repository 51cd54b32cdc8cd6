/**
 * @fileoverview Cross-job outcome correlation
 *
 * A pattern seen only in failed jobs is a candidate root cause; one that also
 * shows up in passing jobs is environmental noise.
 */

import type { RawFinding } from './types.js';

/** Recorded state of a pattern across the jobs of one build. */
export type ObservedJobState = 'failed' | 'passed' | 'both';

/** Lookup result; `unknown` when the pattern was never recorded. */
export type JobState = ObservedJobState | 'unknown';

export type JobStateMap = ReadonlyMap<string, ObservedJobState>;

function outcomeState(outcome: string): 'failed' | 'passed' | null {
  switch (outcome.trim().toLowerCase()) {
    case 'failed':
      return 'failed';
    case 'passed':
      return 'passed';
    default:
      return null;
  }
}

export function isPassingOutcome(outcome: string): boolean {
  return outcomeState(outcome) === 'passed';
}

/**
 * Record, per pattern, whether it was seen in failed jobs, passing jobs, or
 * both. Findings from jobs in any other state (canceled, skipped, missing) do
 * not contribute.
 */
export function buildJobStateMap(
  findings: readonly RawFinding[],
  patternOf: (finding: RawFinding) => string
): JobStateMap {
  const states = new Map<string, ObservedJobState>();

  for (const finding of findings) {
    const state = outcomeState(finding.jobOutcome);
    if (!state) continue;

    const pattern = patternOf(finding);
    const existing = states.get(pattern);
    if (existing === undefined) {
      states.set(pattern, state);
    } else if (existing !== state) {
      states.set(pattern, 'both');
    }
  }

  return states;
}

export function lookupJobState(states: JobStateMap, pattern: string): JobState {
  return states.get(pattern) ?? 'unknown';
}

/**
 * Distinct passing job names per pattern.
 */
export function countPassingJobs(
  findings: readonly RawFinding[],
  patternOf: (finding: RawFinding) => string
): Map<string, number> {
  const jobsByPattern = new Map<string, Set<string>>();
  for (const finding of findings) {
    if (!isPassingOutcome(finding.jobOutcome)) continue;
    const pattern = patternOf(finding);
    let jobs = jobsByPattern.get(pattern);
    if (!jobs) {
      jobs = new Set();
      jobsByPattern.set(pattern, jobs);
    }
    jobs.add(finding.jobName);
  }

  const counts = new Map<string, number>();
  for (const [pattern, jobs] of jobsByPattern) {
    counts.set(pattern, jobs.size);
  }
  return counts;
}
