import { describe, it, expect } from "vitest";
import {
  applyRequestFilters,
  compareMatches,
  matchesFilters,
  paginate,
  rankMatches,
} from "../src/domain/matching/ranking.js";
import type { MatchResult, Opportunity } from "../src/domain/matching/types.js";
import { isoDaysFromNow, makeOpportunity } from "./fixtures.js";

function makeMatch(
  compositeScore: number,
  overrides: Partial<Opportunity> = {},
): MatchResult {
  const opportunity = makeOpportunity(overrides);
  return {
    opportunityId: opportunity.id,
    opportunity,
    semanticSimilarity: 0.8,
    compositeScore,
    breakdown: { semantic: 0, award: 0, complexity: 0, deadlineProximity: 0 },
    meetsAllRequirements: true,
    unmetRequirements: [],
  };
}

const ids = (results: MatchResult[]) => results.map((r) => r.opportunityId);

describe("compareMatches / rankMatches", () => {
  it("orders by composite score descending", () => {
    const ranked = rankMatches([
      makeMatch(0.5, { id: "a" }),
      makeMatch(0.9, { id: "b" }),
      makeMatch(0.7, { id: "c" }),
    ]);
    expect(ids(ranked)).toEqual(["b", "c", "a"]);
  });

  it("breaks composite ties by award amount descending", () => {
    const ranked = rankMatches([
      makeMatch(0.8, { id: "a", awardAmount: 1_000 }),
      makeMatch(0.8, { id: "b", awardAmount: 9_000 }),
    ]);
    expect(ids(ranked)).toEqual(["b", "a"]);
  });

  it("breaks remaining ties by id in code-unit order", () => {
    const ranked = rankMatches([
      makeMatch(0.8, { id: "b-2" }),
      makeMatch(0.8, { id: "B-1" }),
      makeMatch(0.8, { id: "a-3" }),
    ]);
    // Uppercase sorts before lowercase in code-unit order
    expect(ids(ranked)).toEqual(["B-1", "a-3", "b-2"]);
  });

  it("returns 0 only for the same opportunity", () => {
    const m = makeMatch(0.8, { id: "x" });
    expect(compareMatches(m, makeMatch(0.8, { id: "x" }))).toBe(0);
  });

  it("does not mutate its input", () => {
    const input = [makeMatch(0.1, { id: "a" }), makeMatch(0.9, { id: "b" })];
    rankMatches(input);
    expect(ids(input)).toEqual(["a", "b"]);
  });
});

describe("matchesFilters", () => {
  it("applies award bounds inclusively", () => {
    const filters = { minAwardAmount: 5_000, maxAwardAmount: 10_000 };
    expect(matchesFilters(makeMatch(1, { awardAmount: 5_000 }), filters)).toBe(true);
    expect(matchesFilters(makeMatch(1, { awardAmount: 10_000 }), filters)).toBe(true);
    expect(matchesFilters(makeMatch(1, { awardAmount: 4_999 }), filters)).toBe(false);
    expect(matchesFilters(makeMatch(1, { awardAmount: 10_001 }), filters)).toBe(false);
  });

  it("applies deadline bounds inclusively", () => {
    const deadline = isoDaysFromNow(20);
    const m = makeMatch(1, { deadline });
    expect(matchesFilters(m, { deadlineAfter: deadline, deadlineBefore: deadline })).toBe(true);
    expect(matchesFilters(m, { deadlineAfter: isoDaysFromNow(21) })).toBe(false);
    expect(matchesFilters(m, { deadlineBefore: isoDaysFromNow(19) })).toBe(false);
  });

  it("excludes opportunities without a deadline from deadline filters", () => {
    expect(
      matchesFilters(makeMatch(1), { deadlineAfter: isoDaysFromNow(0) }),
    ).toBe(false);
    expect(matchesFilters(makeMatch(1), {})).toBe(true);
  });

  it("matches the essay flag exactly", () => {
    const essay = makeMatch(1, { requiresEssay: true });
    const none = makeMatch(1, { requiresEssay: false });
    expect(matchesFilters(essay, { requiresEssay: true })).toBe(true);
    expect(matchesFilters(none, { requiresEssay: true })).toBe(false);
    expect(matchesFilters(essay, { requiresEssay: false })).toBe(false);
    expect(matchesFilters(none, { requiresEssay: false })).toBe(true);
  });

  it("filters a list", () => {
    const results = [
      makeMatch(1, { id: "small", awardAmount: 500 }),
      makeMatch(1, { id: "large", awardAmount: 50_000 }),
    ];
    expect(ids(applyRequestFilters(results, { minAwardAmount: 1_000 }))).toEqual([
      "large",
    ]);
  });
});

describe("paginate", () => {
  it("slices by offset and limit", () => {
    expect(paginate([1, 2, 3, 4, 5], 1, 2)).toEqual([2, 3]);
    expect(paginate([1, 2, 3], 2, 10)).toEqual([3]);
    expect(paginate([1, 2, 3], 5, 10)).toEqual([]);
  });
});
