/**
 * @fileoverview Two-phase build analysis
 *
 * `analyzeBuild` runs collect -> classify -> store and returns the compact
 * manifest; `getFindingDetails` serves the follow-up drill-down from the store.
 */

import { Err, Ok, type Result } from '../core/result.js';
import type { FindingsStore } from '../storage/findings_store.js';
import { logInfo } from '../telemetry/logger.js';
import { buildManifest } from '../triage/manifest.js';
import { classifyFindings, DEFAULT_FINDINGS_LIMIT, tierCounts } from '../triage/tiering.js';
import type {
  BuildInfo,
  ClassifiedFinding,
  Manifest,
  RawFinding,
  TieredResult,
} from '../triage/types.js';

// ============================================================================
// TYPES
// ============================================================================

/** Everything the ingestion stage collected for one build. */
export interface FindingBatch {
  requestId: string;
  build: BuildInfo;
  findings: RawFinding[];
}

/**
 * Supplier of finished finding batches. Implementations own provider access,
 * log chunking and detection, and throw `ProviderError` for boundary failures.
 */
export interface FindingSource {
  collect(buildUrl: string): Promise<FindingBatch>;
}

export interface AnalyzeBuildDeps {
  source: FindingSource;
  store: FindingsStore;
}

export interface AnalyzeBuildInput {
  buildUrl: string;
  limit?: number;
}

export type FindingLookupMiss =
  | { reason: 'unknown_request'; requestId: string }
  | { reason: 'unknown_finding'; requestId: string; findingId: string };

// ============================================================================
// OPERATIONS
// ============================================================================

export async function analyzeBuild(
  deps: AnalyzeBuildDeps,
  input: AnalyzeBuildInput
): Promise<Manifest> {
  const batch = await deps.source.collect(input.buildUrl);
  const limit = input.limit ?? DEFAULT_FINDINGS_LIMIT;

  const buckets = classifyFindings(batch.findings, limit);
  const result: TieredResult = { build: batch.build, ...buckets };
  deps.store.store(batch.requestId, result);

  const counts = tierCounts(buckets);
  logInfo('[analyze] build classified', {
    requestId: batch.requestId,
    buildUrl: batch.build.url,
    findings: batch.findings.length,
    tier1: counts[1],
    tier2: counts[2],
    tier3: counts[3],
  });

  return buildManifest(batch.requestId, result);
}

export function getFindingDetails(
  store: FindingsStore,
  requestId: string,
  findingId: string
): Result<ClassifiedFinding, FindingLookupMiss> {
  const finding = store.get(requestId, findingId);
  if (finding) {
    return Ok(finding);
  }
  if (!store.getAll(requestId)) {
    return Err({ reason: 'unknown_request', requestId });
  }
  return Err({ reason: 'unknown_finding', requestId, findingId });
}

export function describeLookupMiss(miss: FindingLookupMiss): string {
  switch (miss.reason) {
    case 'unknown_request':
      return `No analysis found for request_id "${miss.requestId}". Run analyze_build first.`;
    case 'unknown_finding':
      return `No finding "${miss.findingId}" in request "${miss.requestId}".`;
  }
}
