import { compressContextLines, compressLine } from '../patterns/normalize.js';
import type {
  ClassifiedFinding,
  FindingSummary,
  Manifest,
  TieredResult,
} from './types.js';

export const SUMMARY_MESSAGE_MAX_LENGTH = 100;
export const TRUNCATION_MARKER = '...';

/**
 * Cap a message at {@link SUMMARY_MESSAGE_MAX_LENGTH} characters, marker
 * included. Counts code points so a surrogate pair is never split.
 */
export function truncateMessage(message: string, maxLength: number = SUMMARY_MESSAGE_MAX_LENGTH): string {
  const chars = Array.from(message);
  if (chars.length <= maxLength) {
    return message;
  }
  return chars.slice(0, maxLength - TRUNCATION_MARKER.length).join('') + TRUNCATION_MARKER;
}

/** Tier-1 entry: display-compressed, never truncated. */
export function expandFinding(finding: ClassifiedFinding): ClassifiedFinding {
  return {
    ...finding,
    message: compressLine(finding.message),
    preContext: compressContextLines(finding.preContext),
    postContext: compressContextLines(finding.postContext),
  };
}

export function summarizeFinding(finding: ClassifiedFinding): FindingSummary {
  return {
    id: finding.id,
    tier: finding.tier,
    severity: finding.severity,
    confidence: finding.confidence,
    jobName: finding.jobName,
    message: truncateMessage(compressLine(finding.message)),
  };
}

/**
 * Project a tiered result into the first-phase response. Tier 1 is the
 * payload an agent reads without further calls; tiers 2 and 3 are summaries
 * to decide whether to drill down.
 */
export function buildManifest(requestId: string, result: TieredResult): Manifest {
  return {
    requestId,
    build: { ...result.build, failedJobs: [...result.build.failedJobs] },
    tier1Findings: result.tier1.map(expandFinding),
    otherFindings: [...result.tier2, ...result.tier3].map(summarizeFinding),
  };
}
