import type { CacheStatistics } from "../core/cache-store.js";
import type {
  MatchResult,
  RankedResultSet,
  ScoreBreakdown,
  SearchMetadata,
} from "../domain/matching/types.js";

/**
 * Match item as returned to callers: the opportunity is reduced to the
 * fields a result list shows.
 */
export interface MatchItem {
  opportunityId: string;
  opportunityName: string;
  awardAmount: number;
  deadline: string | null;
  semanticSimilarity: number;
  compositeScore: number;
  breakdown: ScoreBreakdown;
  meetsAllRequirements: boolean;
  unmetRequirements: string[];
}

export interface SearchResponse {
  matches: MatchItem[];
  totalCount: number;
  metadata: SearchMetadata;
}

export interface CacheStatsResponse extends CacheStatistics {
  timestamp: string;
}

export function toMatchItem(result: MatchResult): MatchItem {
  return {
    opportunityId: result.opportunityId,
    opportunityName: result.opportunity.name,
    awardAmount: result.opportunity.awardAmount,
    deadline: result.opportunity.deadline ?? null,
    semanticSimilarity: result.semanticSimilarity,
    compositeScore: result.compositeScore,
    breakdown: result.breakdown,
    meetsAllRequirements: result.meetsAllRequirements,
    unmetRequirements: result.unmetRequirements,
  };
}

export function toSearchResponse(result: RankedResultSet): SearchResponse {
  return {
    matches: result.matches.map(toMatchItem),
    totalCount: result.totalCount,
    metadata: result.metadata,
  };
}

export function toCacheStatsResponse(
  stats: CacheStatistics,
  now: number,
): CacheStatsResponse {
  return { ...stats, timestamp: new Date(now).toISOString() };
}
