import { describe, it, expect } from "vitest";
import {
  AWARD_CAP,
  MATCHING_WEIGHTS,
  awardComponent,
  calculateScore,
  complexityComponent,
  deadlineComponent,
  normalizeSimilarity,
} from "../src/domain/matching/scoring.js";
import {
  NOW,
  isoDaysFromNow,
  makeOpportunity,
  makeProfile,
} from "./fixtures.js";

const at = { now: NOW };

describe("MATCHING_WEIGHTS", () => {
  it("sums to 1", () => {
    const sum =
      MATCHING_WEIGHTS.semantic +
      MATCHING_WEIGHTS.award +
      MATCHING_WEIGHTS.complexity +
      MATCHING_WEIGHTS.deadlineProximity;
    expect(sum).toBeCloseTo(1, 12);
  });
});

describe("components", () => {
  it("clamps similarity into [0, 1] and zeroes non-finite values", () => {
    expect(normalizeSimilarity(0.42)).toBe(0.42);
    expect(normalizeSimilarity(1.5)).toBe(1);
    expect(normalizeSimilarity(-0.2)).toBe(0);
    expect(normalizeSimilarity(Number.NaN)).toBe(0);
    expect(normalizeSimilarity(Number.POSITIVE_INFINITY)).toBe(0);
  });

  it("scales award linearly up to the cap", () => {
    expect(awardComponent(makeOpportunity({ awardAmount: 0 }))).toBe(0);
    expect(awardComponent(makeOpportunity({ awardAmount: 25_000 }))).toBe(0.5);
    expect(awardComponent(makeOpportunity({ awardAmount: AWARD_CAP }))).toBe(1);
    expect(awardComponent(makeOpportunity({ awardAmount: 250_000 }))).toBe(1);
    expect(awardComponent(makeOpportunity({ awardAmount: -100 }))).toBe(0);
  });

  it("penalizes essay and recommendation requirements", () => {
    expect(complexityComponent(makeOpportunity())).toBe(1);
    expect(
      complexityComponent(makeOpportunity({ requiresEssay: true })),
    ).toBeCloseTo(0.7, 12);
    expect(
      complexityComponent(
        makeOpportunity({ requiresEssay: true, requiresRecommendation: true }),
      ),
    ).toBeCloseTo(0.4, 12);
  });

  it("halves deadline proximity inside 30 days", () => {
    const score = (days: number) =>
      deadlineComponent(makeOpportunity({ deadline: isoDaysFromNow(days) }), NOW);
    expect(score(29)).toBe(0.5);
    expect(score(30)).toBe(1);
    expect(score(120)).toBe(1);
    expect(score(-3)).toBe(0.5);
  });

  it("treats a missing deadline as a year away", () => {
    expect(deadlineComponent(makeOpportunity(), NOW)).toBe(1);
  });
});

describe("calculateScore", () => {
  it("weights each component and sums them", () => {
    const result = calculateScore(
      makeProfile(),
      makeOpportunity({
        awardAmount: 25_000,
        requiresEssay: true,
        deadline: isoDaysFromNow(10),
      }),
      0.8,
      at,
    );

    expect(result.breakdown.semantic).toBeCloseTo(0.48, 12);
    expect(result.breakdown.award).toBeCloseTo(0.1, 12);
    expect(result.breakdown.complexity).toBeCloseTo(0.07, 12);
    expect(result.breakdown.deadlineProximity).toBeCloseTo(0.05, 12);
    expect(result.compositeScore).toBeCloseTo(0.7, 12);
    expect(result.semanticSimilarity).toBe(0.8);
    expect(result.opportunityId).toBe("opp-1");
  });

  it("reaches 1 for a perfect, simple, large, open-ended opportunity", () => {
    const result = calculateScore(
      makeProfile(),
      makeOpportunity({ awardAmount: 80_000 }),
      1,
      at,
    );
    expect(result.compositeScore).toBeCloseTo(1, 12);
  });

  it("copies eligibility from the filter without overriding it", () => {
    const result = calculateScore(
      makeProfile({ score: 3.8 }),
      makeOpportunity({ minScore: 3.9 }),
      0.99,
      at,
    );
    expect(result.meetsAllRequirements).toBe(false);
    expect(result.unmetRequirements).toEqual(["Minimum score not met"]);
  });

  it("is bit-identical across calls with the same inputs", () => {
    const profile = makeProfile();
    const opp = makeOpportunity({
      awardAmount: 33_333,
      requiresRecommendation: true,
      deadline: isoDaysFromNow(45),
    });
    const a = calculateScore(profile, opp, 0.7341, at);
    const b = calculateScore(profile, opp, 0.7341, at);
    expect(a.compositeScore).toBe(b.compositeScore);
    expect(a).toEqual(b);
  });

  it("never decreases as similarity increases", () => {
    const opp = makeOpportunity({ awardAmount: 12_000, requiresEssay: true });
    const composites = [0, 0.2, 0.5, 0.61, 0.9, 1].map(
      (s) => calculateScore(makeProfile(), opp, s, at).compositeScore,
    );
    for (let i = 1; i < composites.length; i++) {
      expect(composites[i]).toBeGreaterThanOrEqual(composites[i - 1]);
    }
  });

  it("stays within [0, 1] for extreme inputs", () => {
    const cases = [
      { sim: -5, opp: makeOpportunity({ awardAmount: 0, requiresEssay: true, requiresRecommendation: true, deadline: isoDaysFromNow(-30) }) },
      { sim: 5, opp: makeOpportunity({ awardAmount: 1_000_000 }) },
      { sim: Number.NaN, opp: makeOpportunity() },
    ];
    for (const c of cases) {
      const { compositeScore } = calculateScore(makeProfile(), c.opp, c.sim, at);
      expect(compositeScore).toBeGreaterThanOrEqual(0);
      expect(compositeScore).toBeLessThanOrEqual(1 + 1e-12);
    }
  });
});
