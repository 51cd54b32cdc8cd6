/**
 * @fileoverview JSON wire format for manifests and drill-down records
 *
 * Field names are snake_case to match what the ingestion stage writes and what
 * tool consumers already parse.
 */

import type { BuildInfo, ClassifiedFinding, FindingSummary, Manifest, Tier } from './types.js';

export interface BuildInfoPayload {
  url: string;
  status: string;
  failed_jobs: string[];
  passed_jobs_count: number;
  timestamp: string;
}

export interface FindingPayload {
  id: string;
  message: string;
  severity: string;
  confidence: number;
  job: string;
  job_state: string;
  recurrence: number;
  also_in_passing_jobs: boolean;
  pre_context: string[];
  post_context: string[];
  tier: Tier;
  recurrence_this_build?: number;
  avg_recurrence?: number;
  passing_job_count?: number;
}

export interface FindingSummaryPayload {
  id: string;
  tier: Tier;
  message: string;
  severity: string;
  confidence: number;
  job: string;
}

export interface ManifestPayload {
  request_id: string;
  build: BuildInfoPayload;
  tier_1_findings: FindingPayload[];
  other_findings: FindingSummaryPayload[];
}

export function serializeBuild(build: BuildInfo): BuildInfoPayload {
  return {
    url: build.url,
    status: build.status,
    failed_jobs: [...build.failedJobs],
    passed_jobs_count: build.passedJobsCount,
    timestamp: build.timestamp,
  };
}

export function serializeFinding(finding: ClassifiedFinding): FindingPayload {
  const payload: FindingPayload = {
    id: finding.id,
    message: finding.message,
    severity: finding.severity,
    confidence: finding.confidence,
    job: finding.jobName,
    job_state: finding.jobOutcome,
    recurrence: finding.recurrenceCount,
    also_in_passing_jobs: finding.alsoInPassingJobs,
    pre_context: [...finding.preContext],
    post_context: [...finding.postContext],
    tier: finding.tier,
  };
  if (finding.recurrenceThisBuild !== undefined) {
    payload.recurrence_this_build = finding.recurrenceThisBuild;
  }
  if (finding.avgRecurrence !== undefined) {
    payload.avg_recurrence = finding.avgRecurrence;
  }
  if (finding.passingJobCount !== undefined) {
    payload.passing_job_count = finding.passingJobCount;
  }
  return payload;
}

export function serializeSummary(summary: FindingSummary): FindingSummaryPayload {
  return {
    id: summary.id,
    tier: summary.tier,
    message: summary.message,
    severity: summary.severity,
    confidence: summary.confidence,
    job: summary.jobName,
  };
}

export function serializeManifest(manifest: Manifest): ManifestPayload {
  return {
    request_id: manifest.requestId,
    build: serializeBuild(manifest.build),
    tier_1_findings: manifest.tier1Findings.map(serializeFinding),
    other_findings: manifest.otherFindings.map(serializeSummary),
  };
}
