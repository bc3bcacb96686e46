import type { CacheStore } from "../../core/cache-store.js";
import type { SearchConfig } from "../../core/config.js";
import {
  isAbortError,
  isMatchingError,
  notFound,
  upstreamUnavailable,
} from "../../core/errors.js";
import { logDebug, logInfo, logWarn } from "../../core/logging.js";
import { calculateScore } from "./scoring.js";
import { applyRequestFilters, paginate, rankMatches } from "./ranking.js";
import { CandidateSchema, parseSearchRequest } from "./schemas.js";
import { profileSearchPattern, searchFingerprint } from "./fingerprint.js";
import type {
  Candidate,
  CandidateQuery,
  CandidateSearch,
  MatchResult,
  ProfileRepository,
  RankedResultSet,
  SearchFilters,
  SearchRequest,
} from "./types.js";

export const SEARCH_STRATEGY = "Hybrid (Filters + Vector Similarity)";

export interface MatchingOrchestratorDeps {
  profiles: ProfileRepository;
  search: CandidateSearch;
  cache: CacheStore;
  config: SearchConfig;
  now?: () => number;
}

export interface FindMatchesOptions {
  signal?: AbortSignal;
}

/** What gets cached: everything except the per-caller metadata. */
interface CachedSearch {
  matches: MatchResult[];
  totalCount: number;
  candidatesRetrieved: number;
  eligibleCount: number;
}

/**
 * Composes candidate retrieval, eligibility, scoring and ranking behind the
 * cache. Identical requests (by fingerprint) share one computation.
 */
export class MatchingOrchestrator {
  private readonly profiles: ProfileRepository;
  private readonly search: CandidateSearch;
  private readonly cache: CacheStore;
  private readonly config: SearchConfig;
  private readonly now: () => number;

  constructor(deps: MatchingOrchestratorDeps) {
    this.profiles = deps.profiles;
    this.search = deps.search;
    this.cache = deps.cache;
    this.config = deps.config;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Validate `input`, then return the ranked page for it.
   *
   * @throws MatchingError ValidationFailure, NotFound or UpstreamUnavailable
   */
  async findMatches(
    input: unknown,
    options: FindMatchesOptions = {},
  ): Promise<RankedResultSet> {
    const started = this.now();
    const request = parseSearchRequest(input);
    const key = searchFingerprint(request);

    let computedHere = false;
    const cached = await this.cache.getOrCreate<CachedSearch>(
      key,
      (signal) => {
        computedHere = true;
        return this.compute(request, signal);
      },
      {
        absoluteExpiryMs: this.config.resultTtlMs,
        slidingExpiryMs: this.config.resultSlidingMs,
      },
      options.signal,
    );

    const processingTimeMs = this.now() - started;
    if (processingTimeMs > this.config.slowThresholdMs) {
      logWarn(
        `Slow search for profile ${request.profileId}: ${processingTimeMs}ms (threshold ${this.config.slowThresholdMs}ms)`,
      );
    }

    return {
      matches: cached.matches,
      totalCount: cached.totalCount,
      metadata: {
        processingTimeMs,
        fromCache: !computedHere,
        searchStrategy: SEARCH_STRATEGY,
        candidatesRetrieved: cached.candidatesRetrieved,
        eligibleCount: cached.eligibleCount,
      },
    };
  }

  /** Drop every cached search for one profile, e.g. after it was edited. */
  async invalidateProfile(profileId: string): Promise<number> {
    const removed = await this.cache.removeByPattern(
      profileSearchPattern(profileId),
    );
    logInfo(`Invalidated ${removed} cached searches for profile ${profileId}`);
    return removed;
  }

  private async compute(
    request: SearchRequest,
    signal: AbortSignal,
  ): Promise<CachedSearch> {
    const profile = await this.profiles.getProfile(request.profileId);
    if (!profile) {
      throw notFound(`Profile ${request.profileId} not found`);
    }

    const filters: SearchFilters = {
      minAwardAmount: request.minAwardAmount,
      maxAwardAmount: request.maxAwardAmount,
      deadlineAfter: request.deadlineAfter,
      deadlineBefore: request.deadlineBefore,
      requiresEssay: request.requiresEssay,
    };
    const poolLimit = Math.max(
      request.offset + request.limit,
      this.config.candidatePoolSize,
    );

    const raw = await this.fetchCandidates(
      {
        profile,
        filters,
        minSimilarity: request.minSimilarity,
        limit: poolLimit,
      },
      signal,
    );
    const candidates = raw.filter(
      (c) => c.similarity >= request.minSimilarity,
    );

    // One evaluation instant for every candidate in this request
    const now = this.now();
    const scored = candidates.map((c) =>
      calculateScore(profile, c.opportunity, c.similarity, { now }),
    );
    const ranked = rankMatches(applyRequestFilters(scored, filters));

    logDebug(
      `Search ${request.profileId}: ${raw.length} retrieved, ${candidates.length} above similarity, ${ranked.length} after filters`,
    );

    return {
      matches: paginate(ranked, request.offset, request.limit),
      totalCount: ranked.length,
      candidatesRetrieved: raw.length,
      eligibleCount: ranked.filter((m) => m.meetsAllRequirements).length,
    };
  }

  /**
   * Call the search collaborator. A failure, or any candidate that does not
   * validate, fails the whole search: a partial pool would rank wrongly.
   */
  private async fetchCandidates(
    query: CandidateQuery,
    signal: AbortSignal,
  ): Promise<Candidate[]> {
    let payload: unknown;
    try {
      payload = await this.search.search(query, signal);
    } catch (err) {
      if (isMatchingError(err) || isAbortError(err) || signal.aborted) {
        throw err;
      }
      throw upstreamUnavailable("Candidate search is unavailable", err);
    }

    if (!Array.isArray(payload)) {
      throw upstreamUnavailable("Candidate search returned a malformed payload");
    }

    const candidates: Candidate[] = [];
    for (const item of payload) {
      const parsed = CandidateSchema.safeParse(item);
      if (!parsed.success) {
        throw upstreamUnavailable(
          "Candidate search returned a malformed payload",
          parsed.error,
        );
      }
      candidates.push(parsed.data);
    }
    return candidates;
  }
}
