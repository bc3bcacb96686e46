import type {
  EvaluationOptions,
  MatchResult,
  Opportunity,
  Profile,
  ScoreBreakdown,
} from "./types.js";
import { checkEligibility } from "./eligibility.js";
import { daysUntil, parseTimestamp } from "./dates.js";

/** Component weights. They sum to 1, which keeps the composite in [0, 1]. */
export const MATCHING_WEIGHTS = {
  semantic: 0.6,
  award: 0.2,
  complexity: 0.1,
  deadlineProximity: 0.1,
} as const;

/** Awards at or above this amount get the full award component. */
export const AWARD_CAP = 50_000;

/** Fewer days than this before the deadline halves the proximity component. */
export const DEADLINE_URGENT_DAYS = 30;

/** Assumed horizon for opportunities that publish no deadline. */
const NO_DEADLINE_DAYS = 365;

const ESSAY_PENALTY = 0.3;
const RECOMMENDATION_PENALTY = 0.3;

export function normalizeSimilarity(similarity: number): number {
  if (!Number.isFinite(similarity)) return 0;
  return Math.min(1, Math.max(0, similarity));
}

export function awardComponent(opp: Opportunity): number {
  const amount = Number.isFinite(opp.awardAmount) ? opp.awardAmount : 0;
  return Math.min(1, Math.max(0, amount) / AWARD_CAP);
}

/** Each extra application requirement makes the opportunity less attractive. */
export function complexityComponent(opp: Opportunity): number {
  const penalty =
    (opp.requiresEssay ? ESSAY_PENALTY : 0) +
    (opp.requiresRecommendation ? RECOMMENDATION_PENALTY : 0);
  return Math.max(0, 1 - penalty);
}

export function deadlineComponent(opp: Opportunity, now: number): number {
  const deadline = parseTimestamp(opp.deadline);
  const days = deadline === null ? NO_DEADLINE_DAYS : daysUntil(deadline, now);
  return days < DEADLINE_URGENT_DAYS ? 0.5 : 1.0;
}

/**
 * Score one profile/opportunity pair.
 *
 * Pure: the same inputs (including `now`) always produce the same result.
 * The composite is summed in a fixed order so it is bit-identical across runs.
 */
export function calculateScore(
  profile: Profile,
  opp: Opportunity,
  similarity: number,
  options: EvaluationOptions = {},
): MatchResult {
  const now = options.now ?? Date.now();
  const semanticSimilarity = normalizeSimilarity(similarity);

  const breakdown: ScoreBreakdown = {
    semantic: semanticSimilarity * MATCHING_WEIGHTS.semantic,
    award: awardComponent(opp) * MATCHING_WEIGHTS.award,
    complexity: complexityComponent(opp) * MATCHING_WEIGHTS.complexity,
    deadlineProximity:
      deadlineComponent(opp, now) * MATCHING_WEIGHTS.deadlineProximity,
  };

  const compositeScore =
    breakdown.semantic +
    breakdown.award +
    breakdown.complexity +
    breakdown.deadlineProximity;

  const eligibility = checkEligibility(profile, opp, { now });

  return {
    opportunityId: opp.id,
    opportunity: opp,
    semanticSimilarity,
    compositeScore,
    breakdown,
    meetsAllRequirements: eligibility.meetsAll,
    unmetRequirements: eligibility.unmetReasons,
  };
}
