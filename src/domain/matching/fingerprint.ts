import { createHash } from "crypto";
import { validationFailure } from "../../core/errors.js";
import { PROFILE_ID_PATTERN } from "./schemas.js";
import type { SearchRequest } from "./types.js";

const SEARCH_KEY_PREFIX = "search:matches";

/**
 * Serialize with sorted keys and no undefined members, so two requests that
 * differ only in property order or omitted optionals hash identically.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  const parts = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
  return `{${parts.join(",")}}`;
}

/**
 * Cache key for a normalized request:
 * `search:matches:<profileId>:<sha256 of everything else>`.
 * Deadline bounds are normalized to ISO form before hashing.
 */
export function searchFingerprint(request: SearchRequest): string {
  const { profileId, ...rest } = request;
  const normalized = {
    ...rest,
    deadlineAfter: normalizeTimestamp(rest.deadlineAfter),
    deadlineBefore: normalizeTimestamp(rest.deadlineBefore),
  };
  const digest = createHash("sha256")
    .update(canonicalJson(normalized))
    .digest("hex");
  return `${SEARCH_KEY_PREFIX}:${profileId}:${digest}`;
}

/** Glob covering every cached search for one profile, and nothing else. */
export function profileSearchPattern(profileId: string): string {
  if (profileId === "" || !PROFILE_ID_PATTERN.test(profileId)) {
    throw validationFailure(`Invalid profile id: ${JSON.stringify(profileId)}`);
  }
  return `${SEARCH_KEY_PREFIX}:${profileId}:*`;
}

function normalizeTimestamp(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? value : new Date(ms).toISOString();
}
