// ============================================================================
// Profiles and opportunities
// ============================================================================

/** An applicant (nonprofit or individual) looking for funding. */
export interface Profile {
  id: string;
  name?: string;
  /** Academic or assessment score on a 0.0-4.0 scale. */
  score?: number;
  major?: string;
  state?: string;
  ethnicity?: string;
  gender?: string;
  /** Organization types, e.g. "Nonprofit", "Tribal government". */
  applicantTypes: string[];
  /** Focus areas, e.g. "Education", "Health". */
  fundingCategories: string[];
  firstGeneration: boolean;
  graduationYear?: number;
  /** Organization's yearly operating budget, USD. */
  annualBudget?: number;
  /** Size of a project the organization usually runs, USD. */
  typicalProjectBudget?: number;
}

/** A grant or scholarship. Empty lists and absent bounds mean "no restriction". */
export interface Opportunity {
  id: string;
  name: string;
  minScore?: number;
  maxScore?: number;
  eligibleMajors: string[];
  requiredStates: string[];
  requiredEthnicities: string[];
  requiredGenders: string[];
  applicantTypes: string[];
  fundingCategories: string[];
  firstGenerationRequired: boolean;
  minGraduationYear?: number;
  maxGraduationYear?: number;
  requiresEssay: boolean;
  requiresRecommendation: boolean;
  awardAmount: number;
  /** Smallest and largest award the funder will make, when published. */
  awardFloor?: number;
  awardCeiling?: number;
  /** ISO 8601 timestamp. */
  deadline?: string;
  renewable: boolean;
}

// ============================================================================
// Eligibility and scoring
// ============================================================================

export interface EligibilityCheck {
  name: string;
  passed: boolean;
  detail: string;
}

export interface EligibilityResult {
  meetsAll: boolean;
  /** In check order: numeric → categorical → boolean → date. */
  unmetReasons: string[];
}

/** Each component is its normalized value multiplied by its weight. */
export interface ScoreBreakdown {
  semantic: number;
  award: number;
  complexity: number;
  deadlineProximity: number;
}

export interface MatchResult {
  opportunityId: string;
  opportunity: Opportunity;
  semanticSimilarity: number;
  compositeScore: number;
  breakdown: ScoreBreakdown;
  meetsAllRequirements: boolean;
  unmetRequirements: string[];
}

/** Evaluation instant shared by every check in one request (epoch ms). */
export interface EvaluationOptions {
  now?: number;
}

// ============================================================================
// Search requests and results
// ============================================================================

export interface SearchFilters {
  minAwardAmount?: number;
  maxAwardAmount?: number;
  /** ISO 8601 timestamp, inclusive. */
  deadlineAfter?: string;
  /** ISO 8601 timestamp, inclusive. */
  deadlineBefore?: string;
  requiresEssay?: boolean;
}

export interface SearchRequest extends SearchFilters {
  profileId: string;
  limit: number;
  offset: number;
  minSimilarity: number;
}

export interface SearchMetadata {
  processingTimeMs: number;
  fromCache: boolean;
  searchStrategy: string;
  candidatesRetrieved: number;
  eligibleCount: number;
}

export interface RankedResultSet {
  matches: MatchResult[];
  totalCount: number;
  metadata: SearchMetadata;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface Candidate {
  opportunityId: string;
  similarity: number;
  opportunity: Opportunity;
}

/** Precomputed pool entry; without an embedded opportunity it is resolved by id. */
export interface PoolEntry {
  opportunityId: string;
  similarity: number;
  opportunity?: Opportunity;
}

export interface CandidateQuery {
  profile: Profile;
  filters: SearchFilters;
  minSimilarity: number;
  limit: number;
}

/**
 * Vector-search capability. Implemented by the remote entity-matching
 * client and by an in-process static pool.
 */
export interface CandidateSearch {
  search(query: CandidateQuery, signal?: AbortSignal): Promise<Candidate[]>;
}

export interface ProfileRepository {
  getProfile(id: string): Promise<Profile | null>;
}

export interface OpportunityLookup {
  getOpportunity(id: string): Opportunity | null;
}
