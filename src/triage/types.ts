/**
 * @fileoverview Triage domain types
 *
 * Findings arrive from the detector as {@link RawFinding}s, are deduplicated
 * and tiered into {@link ClassifiedFinding}s, and leave as a {@link Manifest}
 * plus per-finding drill-down records.
 */

// ============================================================================
// INPUT
// ============================================================================

/** Where the detector found the error. */
export type FindingSourceKind = 'log' | 'junit';

/** A single error extracted from a job log. Immutable once produced. */
export interface RawFinding {
  /** Content hash of the message; stable finding identifier. */
  readonly id: string;
  readonly requestId: string;
  readonly message: string;
  readonly severity: string;
  /** Detector confidence in [0, 1]. */
  readonly confidence: number;
  readonly jobName: string;
  /** `failed`, `passed`, or any other provider state (`canceled`, `skipped`, ...). */
  readonly jobOutcome: string;
  /** Recurrence-level key from the detector; derived locally when empty. */
  readonly normalizedPattern: string;
  readonly preContext: readonly string[];
  readonly postContext: readonly string[];
  /** Occurrences of this message in its job; defaults to 1. */
  readonly recurrenceCount?: number;
  readonly source?: FindingSourceKind;
}

/** Build metadata carried unchanged from the source into the manifest. */
export interface BuildInfo {
  url: string;
  status: string;
  failedJobs: string[];
  passedJobsCount: number;
  timestamp: string;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * 1: unique failure (likely root cause)
 * 2: frequency spike (reserved; needs a cross-build baseline)
 * 3: common noise (also seen in passing jobs)
 */
export type Tier = 1 | 2 | 3;

export interface ClassifiedFinding {
  id: string;
  requestId: string;
  message: string;
  severity: string;
  confidence: number;
  jobName: string;
  jobOutcome: string;
  /** Deduplication key this finding survived under. */
  pattern: string;
  recurrenceCount: number;
  source?: FindingSourceKind;
  tier: Tier;
  alsoInPassingJobs: boolean;
  preContext: string[];
  postContext: string[];

  // Tier 2 specific
  recurrenceThisBuild?: number;
  avgRecurrence?: number;

  // Tier 3 specific
  passingJobCount?: number;
}

export interface TierBuckets {
  tier1: ClassifiedFinding[];
  tier2: ClassifiedFinding[];
  tier3: ClassifiedFinding[];
}

export interface TieredResult extends TierBuckets {
  build: BuildInfo;
}

// ============================================================================
// MANIFEST
// ============================================================================

/** Lightweight stand-in for a tier 2/3 finding; drill down for the rest. */
export interface FindingSummary {
  id: string;
  tier: Tier;
  severity: string;
  confidence: number;
  jobName: string;
  message: string;
}

export interface Manifest {
  requestId: string;
  build: BuildInfo;
  tier1Findings: ClassifiedFinding[];
  otherFindings: FindingSummary[];
}
