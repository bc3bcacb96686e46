import type {
  AppConfig,
  CacheConfig,
  RateLimitConfig,
  SearchConfig,
} from "../src/core/config.js";
import type {
  Candidate,
  CandidateQuery,
  CandidateSearch,
  Opportunity,
  Profile,
  ProfileRepository,
} from "../src/domain/matching/types.js";

/** Fixed evaluation instant used across the suite. */
export const NOW = Date.parse("2026-06-01T00:00:00Z");

export const DAY_MS = 24 * 60 * 60 * 1000;

export function isoDaysFromNow(days: number): string {
  return new Date(NOW + days * DAY_MS).toISOString();
}

export function makeProfile(overrides: Partial<Profile> = {}): Profile {
  return {
    id: "p-1",
    name: "Test Applicant",
    score: 3.8,
    major: "CS",
    state: "CA",
    applicantTypes: [],
    fundingCategories: [],
    firstGeneration: false,
    graduationYear: 2027,
    ...overrides,
  };
}

/** Unrestricted opportunity: every check passes for any profile. */
export function makeOpportunity(
  overrides: Partial<Opportunity> = {},
): Opportunity {
  return {
    id: "opp-1",
    name: "Test Grant",
    eligibleMajors: [],
    requiredStates: [],
    requiredEthnicities: [],
    requiredGenders: [],
    applicantTypes: [],
    fundingCategories: [],
    firstGenerationRequired: false,
    requiresEssay: false,
    requiresRecommendation: false,
    awardAmount: 10_000,
    renewable: false,
    ...overrides,
  };
}

export function makeCandidate(
  similarity: number,
  overrides: Partial<Opportunity> = {},
): Candidate {
  const opportunity = makeOpportunity(overrides);
  return { opportunityId: opportunity.id, similarity, opportunity };
}

export function makeSearchConfig(
  overrides: Partial<SearchConfig> = {},
): SearchConfig {
  return {
    resultTtlMs: 15 * 60_000,
    resultSlidingMs: 5 * 60_000,
    candidatePoolSize: 50,
    slowThresholdMs: 3000,
    ...overrides,
  };
}

export function makeCacheConfig(
  overrides: Partial<CacheConfig> = {},
): CacheConfig {
  return {
    maxEntries: 100,
    absoluteTtlMs: 30 * 60_000,
    slidingTtlMs: 10 * 60_000,
    sweepIntervalMs: 60_000,
    ...overrides,
  };
}

export function makeRateLimitConfig(
  overrides: Partial<RateLimitConfig> = {},
): RateLimitConfig {
  return {
    windows: [
      { name: "1m", windowMs: 60_000, maxRequests: 60 },
      { name: "5m", windowMs: 300_000, maxRequests: 200 },
    ],
    sweepIntervalMs: 600_000,
    subjectHeader: "x-user-id",
    ...overrides,
  };
}

export function makeAppConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    server: { port: 0, dataDir: "/tmp/grant-match-test" },
    cache: makeCacheConfig(),
    rateLimit: makeRateLimitConfig(),
    entityMatching: { timeoutMs: 1000, maxRetries: 0, retryBackoffMs: 1 },
    search: makeSearchConfig(),
    ...overrides,
  };
}

/** Manually advanced clock for cache and rate-limiter tests. */
export class FakeClock {
  current: number;

  constructor(start: number = NOW) {
    this.current = start;
  }

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export class InMemoryProfiles implements ProfileRepository {
  private profiles = new Map<string, Profile>();
  lookups = 0;

  constructor(profiles: Profile[] = []) {
    for (const p of profiles) this.profiles.set(p.id, p);
  }

  async getProfile(id: string): Promise<Profile | null> {
    this.lookups++;
    return this.profiles.get(id) ?? null;
  }
}

/**
 * Candidate search stub that records its queries. `respond` decides what each
 * call returns; by default it resolves with the configured pool.
 */
export class RecordingSearch implements CandidateSearch {
  calls: CandidateQuery[] = [];
  signals: (AbortSignal | undefined)[] = [];
  respond: (query: CandidateQuery, signal?: AbortSignal) => Promise<Candidate[]>;

  constructor(pool: Candidate[] = []) {
    this.respond = async () => pool;
  }

  search(query: CandidateQuery, signal?: AbortSignal): Promise<Candidate[]> {
    this.calls.push(query);
    this.signals.push(signal);
    return this.respond(query, signal);
  }
}

/** A promise plus its resolve/reject, for holding a computation open. */
export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
