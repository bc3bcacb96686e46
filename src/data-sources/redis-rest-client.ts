import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { RemoteCacheConfig } from "../core/config.js";
import type { RemoteCacheTier } from "../core/cache-store.js";
import { logDebug } from "../core/logging.js";

const CommandResponse = z.object({
  result: z.unknown().optional(),
  error: z.string().optional(),
});

/**
 * Escape Redis glob metacharacters other than `*` and `?`, leaving the same
 * two-wildcard syntax the local tier's `globToRegExp` understands.
 */
function escapeRedisGlob(text: string): string {
  return text.replace(/[[\]\\]/g, "\\$&");
}

/**
 * Remote cache tier over a Redis REST endpoint (Upstash-compatible: each
 * command is POSTed as a JSON array and answered with `{ result }`).
 * Every key is namespaced with the configured prefix.
 */
export class RedisRestClient implements RemoteCacheTier {
  private http: AxiosInstance;
  private keyPrefix: string;

  constructor(config: RemoteCacheConfig) {
    this.keyPrefix = config.keyPrefix;
    this.http = axios.create({
      baseURL: config.restUrl,
      timeout: config.timeoutMs,
      headers: {
        Authorization: `Bearer ${config.restToken}`,
        "Content-Type": "application/json",
      },
    });
  }

  async get(key: string): Promise<string | null> {
    const result = await this.command(["GET", this.keyPrefix + key]);
    return typeof result === "string" ? result : null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.command([
      "SET",
      this.keyPrefix + key,
      value,
      "EX",
      String(Math.max(1, Math.ceil(ttlSeconds))),
    ]);
  }

  async remove(key: string): Promise<void> {
    await this.command(["DEL", this.keyPrefix + key]);
  }

  async removeByPattern(pattern: string): Promise<number> {
    return this.deleteMatching(
      escapeRedisGlob(this.keyPrefix) + escapeRedisGlob(pattern),
    );
  }

  /** Clears only keys under this client's prefix. */
  async clear(): Promise<void> {
    await this.deleteMatching(`${escapeRedisGlob(this.keyPrefix)}*`);
  }

  private async deleteMatching(glob: string): Promise<number> {
    const keys = await this.command(["KEYS", glob]);
    if (!Array.isArray(keys) || keys.length === 0) return 0;

    const names = keys.filter((k): k is string => typeof k === "string");
    if (names.length === 0) return 0;

    const deleted = await this.command(["DEL", ...names]);
    logDebug(`Remote cache deleted ${String(deleted)} keys matching ${glob}`);
    return typeof deleted === "number" ? deleted : names.length;
  }

  private async command(args: string[]): Promise<unknown> {
    const response = await this.http.post<unknown>("", args);
    const parsed = CommandResponse.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Unexpected response from remote cache for ${args[0]}`);
    }
    if (parsed.data.error) {
      throw new Error(`Remote cache ${args[0]} failed: ${parsed.data.error}`);
    }
    return parsed.data.result;
  }
}
