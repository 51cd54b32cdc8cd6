/**
 * @fileoverview ci-triage public API
 *
 * Pattern normalization, tier classification and the drill-down store behind
 * a two-phase (manifest, then details) build triage protocol.
 *
 * @packageDocumentation
 */

// Normalization
export {
  normalize,
  normalizeLines,
  findCommonPrefix,
  compressLine,
  compressContextLines,
  MIN_COMMON_PREFIX_LENGTH,
  COMMON_PREFIX_MARKER,
  type MaskingLevel,
} from './patterns/normalize.js';

// Classification
export {
  classifyFindings,
  resolveTierCapacities,
  patternKey,
  tierForJobState,
  flattenByTier,
  tierCounts,
  DEFAULT_FINDINGS_LIMIT,
  DEFAULT_TIER_CAPACITIES,
  CONTEXT_WINDOWS,
  type TierCapacities,
  type ContextWindow,
  type RankedFinding,
} from './triage/tiering.js';
export {
  buildJobStateMap,
  lookupJobState,
  countPassingJobs,
  type JobState,
  type JobStateMap,
  type ObservedJobState,
} from './triage/job_state.js';
export {
  buildManifest,
  summarizeFinding,
  truncateMessage,
  SUMMARY_MESSAGE_MAX_LENGTH,
} from './triage/manifest.js';
export {
  serializeManifest,
  serializeFinding,
  type ManifestPayload,
  type FindingPayload,
  type FindingSummaryPayload,
  type BuildInfoPayload,
} from './triage/wire.js';
export type {
  RawFinding,
  BuildInfo,
  Tier,
  ClassifiedFinding,
  TierBuckets,
  TieredResult,
  FindingSummary,
  Manifest,
} from './triage/types.js';

// Storage
export {
  InMemoryFindingsStore,
  createInMemoryFindingsStore,
  type FindingsStore,
} from './storage/findings_store.js';

// Operations
export {
  analyzeBuild,
  getFindingDetails,
  describeLookupMiss,
  type FindingBatch,
  type FindingSource,
  type FindingLookupMiss,
  type AnalyzeBuildDeps,
  type AnalyzeBuildInput,
} from './api/analyze_build.js';
export { BundleFindingSource, FindingBundleSchema, type FindingBundle } from './sources/bundle_source.js';

// Errors, config, server
export {
  TriageError,
  ProviderError,
  ValidationError,
  remediationHint,
  type ProviderErrorReason,
} from './core/errors.js';
export { Ok, Err, type Result } from './core/result.js';
export { loadTriageConfig, type TriageConfig } from './config/index.js';
export { TriageMCPServer, createTriageMCPServer, startStdioServer } from './mcp/server.js';
