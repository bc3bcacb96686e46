import type {
  EligibilityCheck,
  EligibilityResult,
  EvaluationOptions,
  Opportunity,
  Profile,
} from "./types.js";
import { formatDeadline, parseTimestamp } from "./dates.js";

// ============================================================================
// Individual checks
//
// Each returns null when the opportunity places no restriction on the field,
// so the audit trail only lists checks that actually applied.
// ============================================================================

export function checkMinimumScore(
  profile: Profile,
  opp: Opportunity,
): EligibilityCheck | null {
  if (opp.minScore === undefined) return null;
  // A profile without a score cannot demonstrate the minimum
  const passed = profile.score !== undefined && profile.score >= opp.minScore;
  return {
    name: "min_score",
    passed,
    detail: passed
      ? `Score ${profile.score} meets minimum ${opp.minScore}`
      : "Minimum score not met",
  };
}

export function checkMaximumScore(
  profile: Profile,
  opp: Opportunity,
): EligibilityCheck | null {
  if (opp.maxScore === undefined) return null;
  const passed = profile.score === undefined || profile.score <= opp.maxScore;
  return {
    name: "max_score",
    passed,
    detail: passed
      ? `Score within maximum ${opp.maxScore}`
      : "Maximum score exceeded",
  };
}

const usd = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/** Projects much smaller than the smallest award suggest the grant is out of reach. */
export function checkProjectBudget(
  profile: Profile,
  opp: Opportunity,
): EligibilityCheck | null {
  if (opp.awardFloor === undefined || profile.typicalProjectBudget === undefined) {
    return null;
  }
  const passed = profile.typicalProjectBudget >= opp.awardFloor * 0.5;
  return {
    name: "project_budget",
    passed,
    detail: passed
      ? `Typical project budget fits minimum award $${usd.format(opp.awardFloor)}`
      : `Typical project budget may be too small for this grant (minimum award: $${usd.format(opp.awardFloor)})`,
  };
}

/** An award over three times the annual budget is a capacity concern. */
export function checkOrganizationalCapacity(
  profile: Profile,
  opp: Opportunity,
): EligibilityCheck | null {
  if (
    opp.awardCeiling === undefined ||
    profile.annualBudget === undefined ||
    profile.annualBudget <= 0
  ) {
    return null;
  }
  const passed = opp.awardCeiling <= profile.annualBudget * 3;
  return {
    name: "organizational_capacity",
    passed,
    detail: passed
      ? `Award up to $${usd.format(opp.awardCeiling)} is within capacity`
      : `Grant size may exceed organizational capacity (award up to $${usd.format(opp.awardCeiling)})`,
  };
}

function checkMembership(
  name: string,
  label: string,
  value: string | undefined,
  allowed: string[],
): EligibilityCheck | null {
  if (allowed.length === 0) return null;
  const needle = value?.trim().toLowerCase();
  const passed =
    needle !== undefined &&
    allowed.some((a) => a.trim().toLowerCase() === needle);
  return {
    name,
    passed,
    detail: passed
      ? `${label} "${value}" is eligible`
      : `${label} must be one of: ${allowed.join(", ")}`,
  };
}

/**
 * Overlap between two lists. Only applies when both sides are populated:
 * a profile that does not declare the field is not penalized for it.
 */
function checkOverlap(
  name: string,
  failure: string,
  values: string[],
  allowed: string[],
): EligibilityCheck | null {
  if (allowed.length === 0 || values.length === 0) return null;
  const wanted = new Set(allowed.map((a) => a.trim().toLowerCase()));
  const shared = values.filter((v) => wanted.has(v.trim().toLowerCase()));
  const passed = shared.length > 0;
  return {
    name,
    passed,
    detail: passed
      ? `Matches ${shared.join(", ")}`
      : `${failure}: ${allowed.join(", ")}`,
  };
}

export function checkCategorical(
  profile: Profile,
  opp: Opportunity,
): EligibilityCheck[] {
  const checks = [
    checkMembership("major", "Major", profile.major, opp.eligibleMajors),
    checkMembership("state", "State", profile.state, opp.requiredStates),
    checkMembership(
      "ethnicity",
      "Ethnicity",
      profile.ethnicity,
      opp.requiredEthnicities,
    ),
    checkMembership("gender", "Gender", profile.gender, opp.requiredGenders),
    checkOverlap(
      "applicant_type",
      "Applicant type must be one of",
      profile.applicantTypes,
      opp.applicantTypes,
    ),
    checkOverlap(
      "funding_category",
      "Funding focus must align with",
      profile.fundingCategories,
      opp.fundingCategories,
    ),
  ];
  return checks.filter((c): c is EligibilityCheck => c !== null);
}

export function checkFirstGeneration(
  profile: Profile,
  opp: Opportunity,
): EligibilityCheck | null {
  if (!opp.firstGenerationRequired) return null;
  return {
    name: "first_generation",
    passed: profile.firstGeneration,
    detail: profile.firstGeneration
      ? "First-generation status confirmed"
      : "First-generation status required",
  };
}

export function checkGraduationYear(
  profile: Profile,
  opp: Opportunity,
): EligibilityCheck[] {
  const checks: EligibilityCheck[] = [];
  const year = profile.graduationYear;

  if (opp.minGraduationYear !== undefined) {
    const passed = year !== undefined && year >= opp.minGraduationYear;
    checks.push({
      name: "min_graduation_year",
      passed,
      detail: passed
        ? `Graduation year ${year} on or after ${opp.minGraduationYear}`
        : `Graduation year must be at least ${opp.minGraduationYear}`,
    });
  }

  if (opp.maxGraduationYear !== undefined) {
    const passed = year !== undefined && year <= opp.maxGraduationYear;
    checks.push({
      name: "max_graduation_year",
      passed,
      detail: passed
        ? `Graduation year ${year} on or before ${opp.maxGraduationYear}`
        : `Graduation year must be at most ${opp.maxGraduationYear}`,
    });
  }

  return checks;
}

export function checkDeadline(
  opp: Opportunity,
  now: number,
): EligibilityCheck | null {
  const deadline = parseTimestamp(opp.deadline);
  if (deadline === null) return null;
  const passed = deadline >= now;
  return {
    name: "deadline",
    passed,
    detail: passed
      ? `Open until ${formatDeadline(deadline)}`
      : `Deadline has passed (${formatDeadline(deadline)})`,
  };
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Run every applicable check, in order: numeric, categorical, boolean, date.
 * Nothing short-circuits, so the result is a full audit of the pair.
 */
export function evaluateEligibility(
  profile: Profile,
  opp: Opportunity,
  options: EvaluationOptions = {},
): EligibilityCheck[] {
  const now = options.now ?? Date.now();
  const checks: (EligibilityCheck | null)[] = [
    checkMinimumScore(profile, opp),
    checkMaximumScore(profile, opp),
    checkProjectBudget(profile, opp),
    checkOrganizationalCapacity(profile, opp),
    ...checkCategorical(profile, opp),
    checkFirstGeneration(profile, opp),
    ...checkGraduationYear(profile, opp),
    checkDeadline(opp, now),
  ];
  return checks.filter((c): c is EligibilityCheck => c !== null);
}

export function checkEligibility(
  profile: Profile,
  opp: Opportunity,
  options: EvaluationOptions = {},
): EligibilityResult {
  const unmetReasons = evaluateEligibility(profile, opp, options)
    .filter((c) => !c.passed)
    .map((c) => c.detail);

  return { meetsAll: unmetReasons.length === 0, unmetReasons };
}
