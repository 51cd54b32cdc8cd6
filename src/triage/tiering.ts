/**
 * @fileoverview Tier classification
 *
 * Deduplicates a build's findings by recurrence-level pattern, keeps the
 * highest-confidence occurrence of each, and sorts survivors into tiers using
 * cross-job outcome correlation. Per-tier capacities and context windows keep
 * the result within a token-constrained caller's budget.
 */

import { normalize } from '../patterns/normalize.js';
import { logDebug } from '../telemetry/logger.js';
import {
  buildJobStateMap,
  countPassingJobs,
  lookupJobState,
  type JobState,
} from './job_state.js';
import type { ClassifiedFinding, RawFinding, Tier, TierBuckets } from './types.js';

// ============================================================================
// POLICY
// ============================================================================

export const DEFAULT_FINDINGS_LIMIT = 20;

export type TierCapacities = Record<Tier, number>;

/** Capacities used when the caller passes {@link DEFAULT_FINDINGS_LIMIT}. */
export const DEFAULT_TIER_CAPACITIES: Readonly<TierCapacities> = Object.freeze({
  1: DEFAULT_FINDINGS_LIMIT,
  2: 10,
  3: 10,
});

export interface ContextWindow {
  /** Lines kept from the end of the pre-context. */
  pre: number;
  /** Lines kept from the start of the post-context. */
  post: number;
}

export const CONTEXT_WINDOWS: Readonly<Record<Tier, ContextWindow>> = Object.freeze({
  1: { pre: 15, post: 30 },
  2: { pre: 5, post: 10 },
  3: { pre: 2, post: 3 },
});

/**
 * Tier 1 takes the limit directly; tiers 2 and 3 get a half and a quarter of
 * it (at least one each). The limit is floored to an integer no smaller than 1;
 * a non-finite limit falls back to the default.
 */
export function resolveTierCapacities(limit: number): TierCapacities {
  const normalized = Number.isFinite(limit) ? Math.max(1, Math.floor(limit)) : DEFAULT_FINDINGS_LIMIT;
  if (normalized === DEFAULT_FINDINGS_LIMIT) {
    return { ...DEFAULT_TIER_CAPACITIES };
  }
  return {
    1: normalized,
    2: Math.max(1, Math.floor(normalized / 2)),
    3: Math.max(1, Math.floor(normalized / 4)),
  };
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Deduplication key of a finding: the detector's pattern when present,
 * otherwise the recurrence-level normalization of its message.
 */
export function patternKey(finding: RawFinding): string {
  const provided = finding.normalizedPattern.trim();
  return provided.length > 0 ? provided : normalize(finding.message, 'recurrence');
}

/**
 * Tier for a pattern's job state, or null when the pattern only occurred in
 * passing jobs and therefore says nothing about this build's failure.
 */
export function tierForJobState(state: JobState): Tier | null {
  switch (state) {
    case 'unknown':
    case 'failed':
      return 1;
    case 'both':
      return 3;
    case 'passed':
      return null;
  }
}

/**
 * Confidence descending, then recurrence descending. Array.prototype.sort is
 * stable, so remaining ties keep input order.
 */
export function compareFindings(a: RawFinding, b: RawFinding): number {
  if (a.confidence !== b.confidence) {
    return b.confidence - a.confidence;
  }
  return (b.recurrenceCount ?? 1) - (a.recurrenceCount ?? 1);
}

export function classifyFindings(
  findings: readonly RawFinding[],
  limit: number = DEFAULT_FINDINGS_LIMIT
): TierBuckets {
  const buckets: TierBuckets = { tier1: [], tier2: [], tier3: [] };
  if (findings.length === 0) {
    return buckets;
  }

  const capacities = resolveTierCapacities(limit);
  const jobStates = buildJobStateMap(findings, patternKey);
  const passingJobs = countPassingJobs(findings, patternKey);

  const sorted = [...findings].sort(compareFindings);
  const seen = new Set<string>();
  let droppedPassingOnly = 0;
  let droppedOverCapacity = 0;

  for (const finding of sorted) {
    const pattern = patternKey(finding);
    if (seen.has(pattern)) continue;
    seen.add(pattern);

    const state = lookupJobState(jobStates, pattern);
    const tier = tierForJobState(state);
    if (tier === null) {
      droppedPassingOnly += 1;
      continue;
    }

    const bucket = bucketFor(buckets, tier);
    if (bucket.length >= capacities[tier]) {
      droppedOverCapacity += 1;
      continue;
    }

    bucket.push(toClassified(finding, pattern, tier, state, passingJobs.get(pattern) ?? 0));
  }

  if (droppedPassingOnly > 0 || droppedOverCapacity > 0) {
    logDebug('[triage] findings dropped during classification', {
      passingOnly: droppedPassingOnly,
      overCapacity: droppedOverCapacity,
    });
  }

  return buckets;
}

function bucketFor(buckets: TierBuckets, tier: Tier): ClassifiedFinding[] {
  switch (tier) {
    case 1:
      return buckets.tier1;
    case 2:
      return buckets.tier2;
    case 3:
      return buckets.tier3;
  }
}

function toClassified(
  finding: RawFinding,
  pattern: string,
  tier: Tier,
  state: JobState,
  passingJobCount: number
): ClassifiedFinding {
  const window = CONTEXT_WINDOWS[tier];
  const classified: ClassifiedFinding = {
    id: finding.id,
    requestId: finding.requestId,
    message: finding.message,
    severity: finding.severity,
    confidence: finding.confidence,
    jobName: finding.jobName,
    jobOutcome: finding.jobOutcome,
    pattern,
    recurrenceCount: finding.recurrenceCount ?? 1,
    tier,
    alsoInPassingJobs: state === 'both',
    preContext: takeLast(finding.preContext, window.pre),
    postContext: finding.postContext.slice(0, window.post),
  };
  if (finding.source) {
    classified.source = finding.source;
  }
  if (tier === 3) {
    classified.passingJobCount = passingJobCount;
  }
  return classified;
}

function takeLast(lines: readonly string[], count: number): string[] {
  if (count <= 0) return [];
  return lines.length <= count ? [...lines] : lines.slice(lines.length - count);
}

// ============================================================================
// RANKING VIEWS
// ============================================================================

export interface RankedFinding {
  finding: ClassifiedFinding;
  /** 1-based position across all tiers, tier 1 first. */
  rank: number;
}

export function flattenByTier(buckets: TierBuckets): RankedFinding[] {
  return [...buckets.tier1, ...buckets.tier2, ...buckets.tier3].map((finding, index) => ({
    finding,
    rank: index + 1,
  }));
}

export function tierCounts(buckets: TierBuckets): Record<Tier, number> {
  return {
    1: buckets.tier1.length,
    2: buckets.tier2.length,
    3: buckets.tier3.length,
  };
}
