import fs from "fs";
import path from "path";
import { z } from "zod";
import { loadConfig, type AppConfig } from "../core/config.js";
import { CacheStore } from "../core/cache-store.js";
import { RateLimiter } from "../core/rate-limiter.js";
import { logInfo, logWarn } from "../core/logging.js";
import { ensureSqlJs, SqliteDatabase } from "../data-sources/sqlite-adapter.js";
import { ProfileStore } from "../data-sources/profile-store.js";
import { RedisRestClient } from "../data-sources/redis-rest-client.js";
import { EntityMatchingClient } from "../data-sources/entity-matching-client.js";
import { MatchingOrchestrator } from "../domain/matching/orchestrator.js";
import { StaticCandidateSearch } from "../domain/matching/static-candidate-search.js";
import { PoolEntrySchema } from "../domain/matching/schemas.js";
import type {
  CandidateSearch,
  PoolEntry,
  ProfileRepository,
} from "../domain/matching/types.js";

export interface ServerContext {
  config: AppConfig;
  profiles: ProfileRepository;
  cache: CacheStore;
  rateLimiter: RateLimiter;
  orchestrator: MatchingOrchestrator;
  /** Label for the health endpoint: "entity-matching" or "static". */
  searchBackend: string;
  startedAt: number;
  now: () => number;
  close(): void;
}

export interface ContextDeps {
  config: AppConfig;
  profiles: ProfileRepository;
  search: CandidateSearch;
  searchBackend?: string;
  now?: () => number;
  close?: () => void;
}

const CANDIDATE_FILE = "candidates.json";
const DATABASE_FILE = "matching.db";

/**
 * Wire the shared cache, rate limiter and orchestrator around the given
 * collaborators. Every surface (HTTP, MCP) works off the one context.
 */
export function buildServerContext(deps: ContextDeps): ServerContext {
  const { config } = deps;
  const now = deps.now ?? Date.now;

  const cache = new CacheStore({
    maxEntries: config.cache.maxEntries,
    defaultAbsoluteExpiryMs: config.cache.absoluteTtlMs,
    defaultSlidingExpiryMs: config.cache.slidingTtlMs,
    sweepIntervalMs: config.cache.sweepIntervalMs,
    remote: config.cache.remote
      ? new RedisRestClient(config.cache.remote)
      : undefined,
    now,
  });

  const rateLimiter = new RateLimiter({
    windows: config.rateLimit.windows,
    sweepIntervalMs: config.rateLimit.sweepIntervalMs,
    now,
  });

  const orchestrator = new MatchingOrchestrator({
    profiles: deps.profiles,
    search: deps.search,
    cache,
    config: config.search,
    now,
  });

  return {
    config,
    profiles: deps.profiles,
    cache,
    rateLimiter,
    orchestrator,
    searchBackend: deps.searchBackend ?? "custom",
    startedAt: now(),
    now,
    close: deps.close ?? (() => undefined),
  };
}

/**
 * Read a precomputed candidate pool (`<dataDir>/candidates.json`). Entries
 * may omit `opportunity` when the record is seeded into the store.
 * Missing file means an empty pool; a malformed file is a startup error.
 */
export function loadCandidatePool(dataDir: string): PoolEntry[] {
  const file = path.join(dataDir, CANDIDATE_FILE);
  if (!fs.existsSync(file)) {
    logWarn(`No candidate pool at ${file}; static search will return nothing`);
    return [];
  }
  const parsed = z
    .array(PoolEntrySchema)
    .safeParse(JSON.parse(fs.readFileSync(file, "utf-8")));
  if (!parsed.success) {
    throw new Error(`Invalid candidate pool in ${file}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Create and initialize the full server context from the environment.
 * All instantiation + async init happens here (not at module import time).
 */
export async function createServerContext(): Promise<ServerContext> {
  // sql.js WASM must load before any SQLite operations
  await ensureSqlJs();

  const config = loadConfig();

  const profileStore = new ProfileStore();
  profileStore.initialize(
    SqliteDatabase.open(path.join(config.server.dataDir, DATABASE_FILE)),
  );

  let search: CandidateSearch;
  let searchBackend: string;
  if (config.entityMatching.baseUrl) {
    search = new EntityMatchingClient(config.entityMatching);
    searchBackend = "entity-matching";
  } else {
    search = new StaticCandidateSearch(
      loadCandidatePool(config.server.dataDir),
      profileStore,
    );
    searchBackend = "static";
  }
  logInfo(`Candidate search backend: ${searchBackend}`);

  return buildServerContext({
    config,
    profiles: profileStore,
    search,
    searchBackend,
    close: () => profileStore.close(),
  });
}
