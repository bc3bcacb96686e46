import type { MatchResult, SearchFilters } from "./types.js";
import { parseTimestamp } from "./dates.js";

/**
 * Total order over results: composite score descending, then award amount
 * descending, then opportunity id ascending (plain code-unit comparison, so
 * the order does not depend on the host locale).
 */
export function compareMatches(a: MatchResult, b: MatchResult): number {
  if (a.compositeScore !== b.compositeScore) {
    return b.compositeScore - a.compositeScore;
  }
  if (a.opportunity.awardAmount !== b.opportunity.awardAmount) {
    return b.opportunity.awardAmount - a.opportunity.awardAmount;
  }
  if (a.opportunityId < b.opportunityId) return -1;
  if (a.opportunityId > b.opportunityId) return 1;
  return 0;
}

/**
 * Apply the caller's hard filters. Ranges are inclusive; an opportunity
 * without a deadline never satisfies a deadline bound.
 */
export function matchesFilters(
  result: MatchResult,
  filters: SearchFilters,
): boolean {
  const opp = result.opportunity;

  if (
    filters.minAwardAmount !== undefined &&
    opp.awardAmount < filters.minAwardAmount
  ) {
    return false;
  }
  if (
    filters.maxAwardAmount !== undefined &&
    opp.awardAmount > filters.maxAwardAmount
  ) {
    return false;
  }

  const after = parseTimestamp(filters.deadlineAfter);
  const before = parseTimestamp(filters.deadlineBefore);
  if (after !== null || before !== null) {
    const deadline = parseTimestamp(opp.deadline);
    if (deadline === null) return false;
    if (after !== null && deadline < after) return false;
    if (before !== null && deadline > before) return false;
  }

  if (
    filters.requiresEssay !== undefined &&
    opp.requiresEssay !== filters.requiresEssay
  ) {
    return false;
  }

  return true;
}

export function applyRequestFilters(
  results: MatchResult[],
  filters: SearchFilters,
): MatchResult[] {
  return results.filter((r) => matchesFilters(r, filters));
}

export function rankMatches(results: MatchResult[]): MatchResult[] {
  return [...results].sort(compareMatches);
}

export function paginate<T>(items: T[], offset: number, limit: number): T[] {
  return items.slice(offset, offset + limit);
}
