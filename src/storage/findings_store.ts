/**
 * @fileoverview Request-scoped findings store for drill-down
 *
 * Holds each analysis request's full tiered result plus an index from finding
 * id (content hash) to finding, so a summary in the manifest can be expanded
 * with one lookup.
 *
 * Entries are never evicted. A persistent, TTL-capable backend can replace
 * the in-memory implementation behind the same three operations.
 *
 * @packageDocumentation
 */

import { logWarning } from '../telemetry/logger.js';
import type { ClassifiedFinding, TieredResult } from '../triage/types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface FindingsStore {
  /** Save a result, replacing any earlier one under the same request id. */
  store(requestId: string, result: TieredResult): void;

  /** One finding by id; undefined when the request or finding is unknown. */
  get(requestId: string, findingId: string): ClassifiedFinding | undefined;

  /** The full result; undefined when the request is unknown. */
  getAll(requestId: string): TieredResult | undefined;
}

// ============================================================================
// IN-MEMORY IMPLEMENTATION
// ============================================================================

/**
 * Map-backed store. Every method runs synchronously to completion, so on the
 * event loop a write is never observed half-applied by a reader.
 */
export class InMemoryFindingsStore implements FindingsStore {
  private readonly results = new Map<string, TieredResult>();
  private readonly findings = new Map<string, Map<string, ClassifiedFinding>>();

  store(requestId: string, result: TieredResult): void {
    const index = new Map<string, ClassifiedFinding>();
    for (const finding of [...result.tier1, ...result.tier2, ...result.tier3]) {
      const existing = index.get(finding.id);
      if (existing) {
        // Ids are content hashes; a repeat means upstream dedup let a duplicate through.
        logWarning('[store] duplicate finding id in result; keeping earlier tier', {
          requestId,
          findingId: finding.id,
          keptTier: existing.tier,
          droppedTier: finding.tier,
        });
        continue;
      }
      index.set(finding.id, finding);
    }

    this.results.set(requestId, result);
    this.findings.set(requestId, index);
  }

  get(requestId: string, findingId: string): ClassifiedFinding | undefined {
    return this.findings.get(requestId)?.get(findingId);
  }

  getAll(requestId: string): TieredResult | undefined {
    return this.results.get(requestId);
  }

  /** Number of stored requests. */
  size(): number {
    return this.results.size;
  }
}

export function createInMemoryFindingsStore(): InMemoryFindingsStore {
  return new InMemoryFindingsStore();
}
