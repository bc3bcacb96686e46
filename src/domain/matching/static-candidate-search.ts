import { logWarn } from "../../core/logging.js";
import type {
  Candidate,
  CandidateQuery,
  CandidateSearch,
  OpportunityLookup,
  PoolEntry,
} from "./types.js";

/**
 * In-process candidate pool with precomputed similarities. Serves the demo
 * and tests, and stands in for the vector search when none is configured.
 *
 * With an `opportunities` lookup, the stored record for each id wins over
 * the copy embedded in the pool; entries with neither are skipped.
 */
export class StaticCandidateSearch implements CandidateSearch {
  private readonly pool: PoolEntry[];
  private readonly opportunities?: OpportunityLookup;

  constructor(pool: PoolEntry[], opportunities?: OpportunityLookup) {
    this.pool = [...pool].sort((a, b) => b.similarity - a.similarity);
    this.opportunities = opportunities;
  }

  async search(query: CandidateQuery, signal?: AbortSignal): Promise<Candidate[]> {
    signal?.throwIfAborted();
    const found: Candidate[] = [];
    for (const entry of this.pool) {
      if (found.length >= query.limit) break;
      if (entry.similarity < query.minSimilarity) break;

      const opportunity =
        this.opportunities?.getOpportunity(entry.opportunityId) ?? entry.opportunity;
      if (!opportunity) {
        logWarn(`No opportunity record for pool entry ${entry.opportunityId}; skipped`);
        continue;
      }
      found.push({ opportunityId: entry.opportunityId, similarity: entry.similarity, opportunity });
    }
    return found;
  }

  get size(): number {
    return this.pool.length;
  }
}
