import { z } from "zod";
import { validationFailure } from "../../core/errors.js";
import type { SearchRequest } from "./types.js";

export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;
export const DEFAULT_MIN_SIMILARITY = 0.6;

const isoTimestamp = z
  .string()
  .trim()
  .refine((s) => !Number.isNaN(Date.parse(s)), {
    message: "must be an ISO 8601 timestamp",
  });

/**
 * Profile ids are embedded in cache keys and invalidation globs, so they may
 * not contain the key separator or glob syntax.
 */
export const PROFILE_ID_PATTERN = /^[^:*?[\]\\]*$/;
const PROFILE_ID_MESSAGE = "profileId must not contain ':', '*', '?', '[', ']' or '\\'";

/**
 * Profile record as stored or received from a caller.
 */
export const ProfileSchema = z.object({
  id: z.string().trim().min(1).regex(PROFILE_ID_PATTERN, PROFILE_ID_MESSAGE),
  name: z.string().optional(),
  score: z.number().min(0).max(4).optional(),
  major: z.string().optional(),
  state: z.string().optional(),
  ethnicity: z.string().optional(),
  gender: z.string().optional(),
  applicantTypes: z.array(z.string()).default([]),
  fundingCategories: z.array(z.string()).default([]),
  firstGeneration: z.boolean().default(false),
  graduationYear: z.number().int().optional(),
  annualBudget: z.number().min(0).optional(),
  typicalProjectBudget: z.number().min(0).optional(),
});

/**
 * Opportunity record. Lists default to empty ("no restriction").
 */
export const OpportunitySchema = z.object({
  id: z.string().trim().min(1),
  name: z.string(),
  minScore: z.number().optional(),
  maxScore: z.number().optional(),
  eligibleMajors: z.array(z.string()).default([]),
  requiredStates: z.array(z.string()).default([]),
  requiredEthnicities: z.array(z.string()).default([]),
  requiredGenders: z.array(z.string()).default([]),
  applicantTypes: z.array(z.string()).default([]),
  fundingCategories: z.array(z.string()).default([]),
  firstGenerationRequired: z.boolean().default(false),
  minGraduationYear: z.number().int().optional(),
  maxGraduationYear: z.number().int().optional(),
  requiresEssay: z.boolean().default(false),
  requiresRecommendation: z.boolean().default(false),
  awardAmount: z.number().min(0),
  awardFloor: z.number().min(0).optional(),
  awardCeiling: z.number().min(0).optional(),
  deadline: isoTimestamp.optional(),
  renewable: z.boolean().default(false),
});

export const CandidateSchema = z.object({
  opportunityId: z.string().min(1),
  similarity: z.number(),
  opportunity: OpportunitySchema,
});

export const PoolEntrySchema = CandidateSchema.extend({
  opportunity: OpportunitySchema.optional(),
});

export const SearchRequestSchema = z
  .object({
    profileId: z
      .string()
      .trim()
      .min(1, "profileId is required")
      .regex(PROFILE_ID_PATTERN, PROFILE_ID_MESSAGE),
    minAwardAmount: z.number().min(0).optional(),
    maxAwardAmount: z.number().min(0).optional(),
    deadlineAfter: isoTimestamp.optional(),
    deadlineBefore: isoTimestamp.optional(),
    requiresEssay: z.boolean().optional(),
    limit: z.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
    offset: z.number().int().min(0).default(0),
    minSimilarity: z.number().min(0).max(1).default(DEFAULT_MIN_SIMILARITY),
  })
  .superRefine((req, ctx) => {
    if (
      req.minAwardAmount !== undefined &&
      req.maxAwardAmount !== undefined &&
      req.minAwardAmount > req.maxAwardAmount
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minAwardAmount"],
        message: "minAwardAmount must be <= maxAwardAmount",
      });
    }
    if (
      req.deadlineAfter !== undefined &&
      req.deadlineBefore !== undefined &&
      Date.parse(req.deadlineAfter) > Date.parse(req.deadlineBefore)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["deadlineAfter"],
        message: "deadlineAfter must be <= deadlineBefore",
      });
    }
  });

export type SearchRequestInput = z.input<typeof SearchRequestSchema>;

/**
 * Validate and normalize a raw search request, applying defaults.
 * Throws a ValidationFailure carrying the flattened zod issues.
 */
export function parseSearchRequest(input: unknown): SearchRequest {
  const parsed = SearchRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw validationFailure("Invalid search request", parsed.error.flatten());
  }
  return parsed.data;
}
