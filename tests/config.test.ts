import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  loadCacheConfig,
  loadConfig,
  loadEntityMatchingConfig,
  loadRateLimitConfig,
  loadSearchConfig,
  validateCacheConfig,
  validateEntityMatchingConfig,
  validateRateLimitConfig,
  validateSearchConfig,
} from '../src/core/config.js';
import {
  makeCacheConfig,
  makeRateLimitConfig,
  makeSearchConfig,
} from './fixtures.js';

const ENV_KEYS = [
  'PORT',
  'DATA_DIR',
  'CACHE_MAX_ENTRIES',
  'CACHE_ABSOLUTE_TTL_MS',
  'CACHE_SLIDING_TTL_MS',
  'CACHE_SWEEP_INTERVAL_MS',
  'CACHE_REDIS_REST_URL',
  'CACHE_REDIS_REST_TOKEN',
  'CACHE_KEY_PREFIX',
  'CACHE_REMOTE_TIMEOUT_MS',
  'RATE_LIMIT_PER_MINUTE',
  'RATE_LIMIT_PER_FIVE_MINUTES',
  'RATE_LIMIT_SWEEP_INTERVAL_MS',
  'RATE_LIMIT_SUBJECT_HEADER',
  'ENTITY_MATCHING_BASE_URL',
  'ENTITY_MATCHING_API_KEY',
  'ENTITY_MATCHING_TIMEOUT_MS',
  'ENTITY_MATCHING_MAX_RETRIES',
  'ENTITY_MATCHING_RETRY_BACKOFF_MS',
  'SEARCH_RESULT_TTL_MS',
  'SEARCH_RESULT_SLIDING_MS',
  'SEARCH_CANDIDATE_POOL',
  'SEARCH_SLOW_THRESHOLD_MS',
];

let saved: Record<string, string | undefined>;

beforeEach(() => {
  saved = {};
  for (const key of ENV_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = saved[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

describe('loadConfig defaults', () => {
  it('matches the documented defaults with no environment', () => {
    const config = loadConfig();

    expect(config.server.port).toBe(3000);
    expect(config.cache).toEqual({
      maxEntries: 1000,
      absoluteTtlMs: 1_800_000,
      slidingTtlMs: 600_000,
      sweepIntervalMs: 60_000,
      remote: undefined,
    });
    expect(config.rateLimit).toEqual({
      windows: [
        { name: '1m', windowMs: 60_000, maxRequests: 60 },
        { name: '5m', windowMs: 300_000, maxRequests: 200 },
      ],
      sweepIntervalMs: 600_000,
      subjectHeader: 'x-user-id',
    });
    expect(config.entityMatching).toEqual({
      baseUrl: undefined,
      apiKey: undefined,
      timeoutMs: 10_000,
      maxRetries: 2,
      retryBackoffMs: 500,
    });
    expect(config.search).toEqual({
      resultTtlMs: 900_000,
      resultSlidingMs: 300_000,
      candidatePoolSize: 200,
      slowThresholdMs: 3000,
    });
  });
});

describe('environment overrides', () => {
  it('reads integers and ignores garbage', () => {
    process.env.RATE_LIMIT_PER_MINUTE = '10';
    process.env.RATE_LIMIT_PER_FIVE_MINUTES = 'lots';
    process.env.RATE_LIMIT_SUBJECT_HEADER = 'X-Api-Client';

    const rl = loadRateLimitConfig();
    expect(rl.windows.map((w) => w.maxRequests)).toEqual([10, 200]);
    expect(rl.subjectHeader).toBe('x-api-client');
  });

  it('rejects fractional values for integer settings', () => {
    process.env.CACHE_MAX_ENTRIES = '12.5';
    expect(loadCacheConfig().maxEntries).toBe(1000);
  });

  it('enables the remote tier only with both URL and token', () => {
    process.env.CACHE_REDIS_REST_URL = 'https://cache.example.com/';
    expect(loadCacheConfig().remote).toBeUndefined();

    process.env.CACHE_REDIS_REST_TOKEN = 'test-secret';
    expect(loadCacheConfig().remote).toEqual({
      restUrl: 'https://cache.example.com',
      restToken: 'test-secret',
      keyPrefix: 'grant-match:',
      timeoutMs: 2000,
    });
  });

  it('clamps retries, timeouts and pool size into range', () => {
    process.env.ENTITY_MATCHING_MAX_RETRIES = '9';
    process.env.ENTITY_MATCHING_TIMEOUT_MS = '10';
    process.env.ENTITY_MATCHING_RETRY_BACKOFF_MS = '1';
    process.env.SEARCH_CANDIDATE_POOL = '5000';

    expect(loadEntityMatchingConfig()).toMatchObject({
      maxRetries: 5,
      timeoutMs: 500,
      retryBackoffMs: 50,
    });
    expect(loadSearchConfig().candidatePoolSize).toBe(1000);
  });

  it('fails loadConfig on an invalid combination', () => {
    process.env.ENTITY_MATCHING_BASE_URL = 'https://match.example.com';
    expect(() => loadConfig()).toThrow(/apiKey is required when baseUrl is set/);
  });
});

describe('validateCacheConfig', () => {
  it('accepts the test defaults', () => {
    expect(() => validateCacheConfig(makeCacheConfig())).not.toThrow();
  });

  it('rejects a sliding TTL longer than the absolute TTL', () => {
    const c = makeCacheConfig({ absoluteTtlMs: 1000, slidingTtlMs: 2000 });
    expect(() => validateCacheConfig(c)).toThrow(/slidingTtlMs must be <= absoluteTtlMs/);
  });

  it('rejects a plain-http remote that is not localhost', () => {
    const c = makeCacheConfig({
      remote: {
        restUrl: 'http://cache.example.com',
        restToken: 'test-secret',
        keyPrefix: 'x:',
        timeoutMs: 1000,
      },
    });
    expect(() => validateCacheConfig(c)).toThrow(/must use https:\/\//);
  });

  it('allows http for localhost', () => {
    const c = makeCacheConfig({
      remote: {
        restUrl: 'http://localhost:8079',
        restToken: 'test-secret',
        keyPrefix: 'x:',
        timeoutMs: 1000,
      },
    });
    expect(() => validateCacheConfig(c)).not.toThrow();
  });

  it('lists every problem in one error', () => {
    const c = makeCacheConfig({ maxEntries: 0, sweepIntervalMs: 0 });
    expect(() => validateCacheConfig(c)).toThrow(
      'Invalid cache config:\n  - maxEntries must be >= 1\n  - sweepIntervalMs must be positive',
    );
  });
});

describe('validateRateLimitConfig', () => {
  it('accepts the defaults', () => {
    expect(() => validateRateLimitConfig(makeRateLimitConfig())).not.toThrow();
  });

  it('rejects a longer window with a smaller limit', () => {
    const c = makeRateLimitConfig({
      windows: [
        { name: '1m', windowMs: 60_000, maxRequests: 60 },
        { name: '5m', windowMs: 300_000, maxRequests: 30 },
      ],
    });
    expect(() => validateRateLimitConfig(c)).toThrow(/window 5m limit must be >= 1m limit/);
  });

  it('rejects windows out of order', () => {
    const c = makeRateLimitConfig({
      windows: [
        { name: '5m', windowMs: 300_000, maxRequests: 200 },
        { name: '1m', windowMs: 60_000, maxRequests: 200 },
      ],
    });
    expect(() => validateRateLimitConfig(c)).toThrow(/window 1m must be longer than 5m/);
  });

  it('requires at least one window', () => {
    expect(() => validateRateLimitConfig(makeRateLimitConfig({ windows: [] }))).toThrow(
      /at least one window is required/,
    );
  });
});

describe('validateEntityMatchingConfig', () => {
  it('accepts an unset backend', () => {
    expect(() =>
      validateEntityMatchingConfig({ timeoutMs: 1000, maxRetries: 0, retryBackoffMs: 50 }),
    ).not.toThrow();
  });

  it('rejects an insecure base URL', () => {
    expect(() =>
      validateEntityMatchingConfig({
        baseUrl: 'http://match.example.com',
        apiKey: 'test-secret',
        timeoutMs: 1000,
        maxRetries: 0,
        retryBackoffMs: 50,
      }),
    ).toThrow(/baseUrl must use https:\/\//);
  });
});

describe('validateSearchConfig', () => {
  it('rejects a sliding window longer than the result TTL', () => {
    const c = makeSearchConfig({ resultTtlMs: 1000, resultSlidingMs: 5000 });
    expect(() => validateSearchConfig(c)).toThrow(/resultSlidingMs must be <= resultTtlMs/);
  });
});
