import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

// Load environment variables
dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const MINUTE_MS = 60_000;

export interface ServerConfig {
  port: number;
  dataDir: string;
}

export interface RemoteCacheConfig {
  restUrl: string;
  restToken: string;
  keyPrefix: string;
  timeoutMs: number;
}

export interface CacheConfig {
  maxEntries: number;
  absoluteTtlMs: number;
  slidingTtlMs: number;
  sweepIntervalMs: number;
  remote?: RemoteCacheConfig;
}

export interface RateLimitWindow {
  /** Short label used in logs, e.g. "1m". */
  name: string;
  windowMs: number;
  maxRequests: number;
}

export interface RateLimitConfig {
  windows: RateLimitWindow[];
  sweepIntervalMs: number;
  subjectHeader: string;
}

export interface EntityMatchingConfig {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
}

export interface SearchConfig {
  resultTtlMs: number;
  resultSlidingMs: number;
  candidatePoolSize: number;
  slowThresholdMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  cache: CacheConfig;
  rateLimit: RateLimitConfig;
  entityMatching: EntityMatchingConfig;
  search: SearchConfig;
}

function envNum(
  key: string,
  fallback: number,
  validate: (n: number) => boolean,
): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

function envString(key: string): string | undefined {
  const val = process.env[key]?.trim();
  return val ? val : undefined;
}

function isSecureUrl(url: string): boolean {
  return (
    url.startsWith("https://") ||
    /^http:\/\/(localhost|127\.0\.0\.1)(:\d+)?(\/|$)/.test(url)
  );
}

function throwIfErrors(label: string, errors: string[]): void {
  if (errors.length > 0) {
    throw new Error(`Invalid ${label}:\n  - ${errors.join("\n  - ")}`);
  }
}

export function loadServerConfig(): ServerConfig {
  return {
    port: envInt("PORT", 3000),
    dataDir: path.resolve(
      envString("DATA_DIR") ?? path.resolve(__dirname, "../../data"),
    ),
  };
}

/**
 * The remote tier is enabled only when both the REST URL and token are set.
 */
export function loadCacheConfig(): CacheConfig {
  const restUrl = envString("CACHE_REDIS_REST_URL");
  const restToken = envString("CACHE_REDIS_REST_TOKEN");

  return {
    maxEntries: envInt("CACHE_MAX_ENTRIES", 1000),
    absoluteTtlMs: envInt("CACHE_ABSOLUTE_TTL_MS", 30 * MINUTE_MS),
    slidingTtlMs: envInt("CACHE_SLIDING_TTL_MS", 10 * MINUTE_MS),
    sweepIntervalMs: envInt("CACHE_SWEEP_INTERVAL_MS", MINUTE_MS),
    remote:
      restUrl && restToken
        ? {
            restUrl: restUrl.replace(/\/+$/, ""),
            restToken,
            keyPrefix: envString("CACHE_KEY_PREFIX") ?? "grant-match:",
            timeoutMs: Math.max(100, envInt("CACHE_REMOTE_TIMEOUT_MS", 2000)),
          }
        : undefined,
  };
}

export function validateCacheConfig(c: CacheConfig): void {
  const errors: string[] = [];

  if (c.maxEntries < 1) errors.push("maxEntries must be >= 1");
  if (c.absoluteTtlMs <= 0) errors.push("absoluteTtlMs must be positive");
  if (c.slidingTtlMs <= 0) errors.push("slidingTtlMs must be positive");
  if (c.slidingTtlMs > c.absoluteTtlMs)
    errors.push("slidingTtlMs must be <= absoluteTtlMs");
  if (c.sweepIntervalMs <= 0) errors.push("sweepIntervalMs must be positive");
  if (c.remote && !isSecureUrl(c.remote.restUrl))
    errors.push("remote restUrl must use https:// (http allowed for localhost)");

  throwIfErrors("cache config", errors);
}

export function loadRateLimitConfig(): RateLimitConfig {
  return {
    windows: [
      {
        name: "1m",
        windowMs: MINUTE_MS,
        maxRequests: envInt("RATE_LIMIT_PER_MINUTE", 60),
      },
      {
        name: "5m",
        windowMs: 5 * MINUTE_MS,
        maxRequests: envInt("RATE_LIMIT_PER_FIVE_MINUTES", 200),
      },
    ],
    sweepIntervalMs: envInt("RATE_LIMIT_SWEEP_INTERVAL_MS", 10 * MINUTE_MS),
    subjectHeader: (
      envString("RATE_LIMIT_SUBJECT_HEADER") ?? "x-user-id"
    ).toLowerCase(),
  };
}

/**
 * Windows must be listed shortest first, and a longer window may never allow
 * fewer requests than a shorter one.
 */
export function validateRateLimitConfig(c: RateLimitConfig): void {
  const errors: string[] = [];

  if (c.windows.length === 0) errors.push("at least one window is required");
  for (const w of c.windows) {
    if (w.windowMs <= 0) errors.push(`window ${w.name}: windowMs must be positive`);
    if (w.maxRequests < 1)
      errors.push(`window ${w.name}: maxRequests must be >= 1`);
  }
  for (let i = 1; i < c.windows.length; i++) {
    const prev = c.windows[i - 1];
    const cur = c.windows[i];
    if (cur.windowMs <= prev.windowMs)
      errors.push(`window ${cur.name} must be longer than ${prev.name}`);
    if (cur.maxRequests < prev.maxRequests)
      errors.push(`window ${cur.name} limit must be >= ${prev.name} limit`);
  }
  if (c.sweepIntervalMs <= 0) errors.push("sweepIntervalMs must be positive");

  throwIfErrors("rate limit config", errors);
}

export function loadEntityMatchingConfig(): EntityMatchingConfig {
  return {
    baseUrl: envString("ENTITY_MATCHING_BASE_URL")?.replace(/\/+$/, ""),
    apiKey: envString("ENTITY_MATCHING_API_KEY"),
    timeoutMs: Math.max(500, envInt("ENTITY_MATCHING_TIMEOUT_MS", 10_000)),
    maxRetries: Math.max(
      0,
      Math.min(5, envInt("ENTITY_MATCHING_MAX_RETRIES", 2)),
    ),
    retryBackoffMs: Math.max(
      50,
      envInt("ENTITY_MATCHING_RETRY_BACKOFF_MS", 500),
    ),
  };
}

export function validateEntityMatchingConfig(c: EntityMatchingConfig): void {
  const errors: string[] = [];

  if (c.baseUrl && !isSecureUrl(c.baseUrl))
    errors.push("baseUrl must use https:// (http allowed for localhost)");
  if (c.baseUrl && !c.apiKey)
    errors.push("apiKey is required when baseUrl is set");

  throwIfErrors("entity matching config", errors);
}

export function loadSearchConfig(): SearchConfig {
  return {
    resultTtlMs: envInt("SEARCH_RESULT_TTL_MS", 15 * MINUTE_MS),
    resultSlidingMs: envInt("SEARCH_RESULT_SLIDING_MS", 5 * MINUTE_MS),
    candidatePoolSize: Math.min(
      1000,
      Math.max(1, envInt("SEARCH_CANDIDATE_POOL", 200)),
    ),
    slowThresholdMs: Math.max(1, envInt("SEARCH_SLOW_THRESHOLD_MS", 3000)),
  };
}

export function validateSearchConfig(c: SearchConfig): void {
  const errors: string[] = [];

  if (c.resultTtlMs <= 0) errors.push("resultTtlMs must be positive");
  if (c.resultSlidingMs <= 0) errors.push("resultSlidingMs must be positive");
  if (c.resultSlidingMs > c.resultTtlMs)
    errors.push("resultSlidingMs must be <= resultTtlMs");

  throwIfErrors("search config", errors);
}

/**
 * Loads and validates the full application config.
 * Throws on misconfiguration rather than starting with broken limits.
 */
export function loadConfig(): AppConfig {
  const cache = loadCacheConfig();
  validateCacheConfig(cache);
  const rateLimit = loadRateLimitConfig();
  validateRateLimitConfig(rateLimit);
  const entityMatching = loadEntityMatchingConfig();
  validateEntityMatchingConfig(entityMatching);
  const search = loadSearchConfig();
  validateSearchConfig(search);

  return {
    server: loadServerConfig(),
    cache,
    rateLimit,
    entityMatching,
    search,
  };
}
