/**
 * @fileoverview Finding source backed by bundle files
 *
 * The ingestion stage writes one JSON bundle per analyzed build: the build's
 * metadata plus every finding its detector produced. This source picks the
 * bundle whose build URL matches the request.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { getErrorMessage, ProviderError } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { FindingBatch, FindingSource } from '../api/analyze_build.js';
import type { RawFinding } from '../triage/types.js';

// ============================================================================
// BUNDLE SCHEMA
// ============================================================================

export const BundleFindingSchema = z.object({
  message_hash: z.string().min(1),
  request_id: z.string().optional(),
  job_name: z.string(),
  job_state: z.string().default(''),
  severity: z.string(),
  raw_message: z.string(),
  normalized_message: z.string().default(''),
  confidence_score: z.number().min(0).max(1),
  pre_context: z.array(z.string()).default([]),
  post_context: z.array(z.string()).default([]),
  recurrence_count: z.number().int().positive().optional(),
  source: z.enum(['log', 'junit']).optional(),
});

export const FindingBundleSchema = z.object({
  request_id: z.string().min(1),
  build: z.object({
    url: z.string().min(1),
    status: z.string(),
    failed_jobs: z.array(z.string()).default([]),
    passed_jobs_count: z.number().int().min(0).default(0),
    timestamp: z.string().default(''),
  }),
  findings: z.array(BundleFindingSchema).default([]),
});

export type BundleFinding = z.infer<typeof BundleFindingSchema>;
export type FindingBundle = z.infer<typeof FindingBundleSchema>;

// ============================================================================
// CONVERSION
// ============================================================================

export function toRawFinding(requestId: string, finding: BundleFinding): RawFinding {
  return {
    id: finding.message_hash,
    requestId: finding.request_id ?? requestId,
    message: finding.raw_message,
    severity: finding.severity,
    confidence: finding.confidence_score,
    jobName: finding.job_name,
    jobOutcome: finding.job_state,
    normalizedPattern: finding.normalized_message,
    preContext: finding.pre_context,
    postContext: finding.post_context,
    recurrenceCount: finding.recurrence_count,
    source: finding.source,
  };
}

export function toFindingBatch(bundle: FindingBundle): FindingBatch {
  return {
    requestId: bundle.request_id,
    build: {
      url: bundle.build.url,
      status: bundle.build.status,
      failedJobs: bundle.build.failed_jobs,
      passedJobsCount: bundle.build.passed_jobs_count,
      timestamp: bundle.build.timestamp,
    },
    findings: bundle.findings.map((finding) => toRawFinding(bundle.request_id, finding)),
  };
}

/**
 * Canonical form used to match request URLs against bundle URLs.
 * @throws ProviderError (`invalid_url`) for anything that is not http(s)
 */
export function canonicalBuildUrl(raw: string): string {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    throw ProviderError.invalidUrl(raw);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw ProviderError.invalidUrl(raw);
  }
  parsed.hash = '';
  parsed.search = '';
  return parsed.toString().replace(/\/+$/, '');
}

// ============================================================================
// SOURCE
// ============================================================================

export class BundleFindingSource implements FindingSource {
  constructor(private readonly directory: string) {}

  async collect(buildUrl: string): Promise<FindingBatch> {
    const wanted = canonicalBuildUrl(buildUrl);

    for (const file of await this.listBundleFiles()) {
      const bundle = await this.readBundle(file);
      if (!bundle) continue;
      if (sameBuild(bundle.build.url, wanted)) {
        logDebug('[bundle-source] matched bundle', { file, requestId: bundle.request_id });
        return toFindingBatch(bundle);
      }
    }

    throw ProviderError.buildNotFound(buildUrl);
  }

  private async listBundleFiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissingPath(error)) {
        logWarning('[bundle-source] findings directory does not exist', { directory: this.directory });
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.endsWith('.json'))
      .sort()
      .map((entry) => path.join(this.directory, entry));
  }

  private async readBundle(file: string): Promise<FindingBundle | null> {
    let json: unknown;
    try {
      json = JSON.parse(await fs.readFile(file, 'utf8'));
    } catch (error) {
      logWarning('[bundle-source] skipping unreadable bundle', { file, error: getErrorMessage(error) });
      return null;
    }

    const parsed = FindingBundleSchema.safeParse(json);
    if (!parsed.success) {
      logWarning('[bundle-source] skipping invalid bundle', {
        file,
        issues: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }
    return parsed.data;
  }
}

function sameBuild(bundleUrl: string, wanted: string): boolean {
  try {
    return canonicalBuildUrl(bundleUrl) === wanted;
  } catch {
    return false;
  }
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
