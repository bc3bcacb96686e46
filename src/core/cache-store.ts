import { z } from "zod";
import { logDebug, logInfo, logWarn, getErrorMessage } from "./logging.js";

/**
 * Shared tier reachable by every instance of the service. Values travel as
 * serialized strings; TTLs are whole seconds.
 */
export interface RemoteCacheTier {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  remove(key: string): Promise<void>;
  removeByPattern(pattern: string): Promise<number>;
  clear(): Promise<void>;
}

export interface CacheEntryOptions {
  /** Hard deadline, relative to now. */
  absoluteExpiryMs?: number;
  /** Idle window; each read pushes expiry out again, never past the absolute deadline. */
  slidingExpiryMs?: number;
}

export interface CacheStatistics {
  hits: number;
  misses: number;
  evictions: number;
  currentEntries: number;
  hitRate: number;
}

export interface CacheStoreOptions {
  maxEntries: number;
  defaultAbsoluteExpiryMs: number;
  defaultSlidingExpiryMs?: number;
  sweepIntervalMs?: number;
  remote?: RemoteCacheTier;
  now?: () => number;
}

interface CacheEntry {
  key: string;
  value: string;
  createdAt: number;
  expiresAt: number;
  slidingMs?: number;
  lastAccess: number;
}

interface InFlight {
  key: string;
  /** Serialized result, so every waiter parses its own copy. */
  promise: Promise<string>;
  controller: AbortController;
  waiters: number;
  /** Key was removed mid-computation: deliver to current waiters, cache nothing. */
  invalidated: boolean;
}

/**
 * What the remote tier holds per key. The absolute deadline travels with the
 * value so an instance reading it never keeps it longer than the writer would.
 */
const RemoteEnvelope = z.object({
  value: z.string(),
  expiresAt: z.number(),
});
type RemoteEnvelope = z.infer<typeof RemoteEnvelope>;

/**
 * Translate a key glob (`*` any run, `?` one character) into an anchored
 * regular expression. Everything else matches literally.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = "";
  for (const ch of pattern) {
    if (ch === "*") source += ".*";
    else if (ch === "?") source += ".";
    else source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  }
  return new RegExp(`^${source}$`);
}

/**
 * Two-tier get-or-create cache.
 *
 * The local tier is an LRU map bounded by `maxEntries`; the optional remote
 * tier is shared between instances and every failure there degrades to
 * local-only operation. `getOrCreate` runs at most one factory per key at a
 * time: concurrent callers for the same key join the in-flight promise.
 *
 * All state transitions below are synchronous, so statistics and the
 * in-flight map stay consistent without locks.
 */
export class CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, InFlight>();
  private readonly maxEntries: number;
  private readonly defaultAbsoluteMs: number;
  private readonly defaultSlidingMs?: number;
  private readonly sweepIntervalMs?: number;
  private readonly remote?: RemoteCacheTier;
  private readonly now: () => number;
  private lastSweep: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: CacheStoreOptions) {
    if (options.maxEntries < 1) {
      throw new Error("CacheStore maxEntries must be >= 1");
    }
    this.maxEntries = options.maxEntries;
    this.defaultAbsoluteMs = options.defaultAbsoluteExpiryMs;
    this.defaultSlidingMs = options.defaultSlidingExpiryMs;
    this.sweepIntervalMs = options.sweepIntervalMs;
    this.remote = options.remote;
    this.now = options.now ?? Date.now;
    this.lastSweep = this.now();

    logInfo(
      `CacheStore initialized with ${this.remote ? "local + remote" : "local-only"} tiers (max ${this.maxEntries} entries)`,
    );
  }

  get hasRemoteTier(): boolean {
    return this.remote !== undefined;
  }

  /**
   * Return the cached value for `key`, or run `factory` once and cache what
   * it resolves to.
   *
   * `signal` cancels only this caller's wait. The factory receives its own
   * signal, which aborts once every caller waiting on it has cancelled.
   */
  async getOrCreate<T>(
    key: string,
    factory: (signal: AbortSignal) => Promise<T>,
    options: CacheEntryOptions = {},
    signal?: AbortSignal,
  ): Promise<T> {
    assertKey(key);
    signal?.throwIfAborted();

    const local = this.readLocal<T>(key);
    if (local.found) {
      this.hits++;
      return local.value;
    }

    let flight = this.inFlight.get(key);
    if (flight) {
      // Served by someone else's computation
      this.hits++;
      logDebug(`Cache wait (in-flight): ${key}`);
    } else {
      flight = this.startFlight(key, factory, options);
    }

    const raw = await this.join(flight, signal);
    return JSON.parse(raw) as T;
  }

  async get<T>(key: string): Promise<T | undefined> {
    assertKey(key);

    const local = this.readLocal<T>(key);
    if (local.found) {
      this.hits++;
      return local.value;
    }

    const remote = await this.readRemote(key);
    if (remote !== null) {
      this.hits++;
      this.writeLocal(key, remote.value, {}, remote.expiresAt);
      return JSON.parse(remote.value) as T;
    }

    this.misses++;
    return undefined;
  }

  async set<T>(
    key: string,
    value: T,
    options: CacheEntryOptions = {},
  ): Promise<void> {
    assertKey(key);
    await this.store(key, value, options);
  }

  async remove(key: string): Promise<boolean> {
    assertKey(key);
    const removed = this.entries.delete(key);
    this.abandonFlights((k) => k === key);

    if (this.remote) {
      try {
        await this.remote.remove(key);
      } catch (err) {
        logWarn(
          `Error removing from remote cache for key ${key}: ${getErrorMessage(err)}`,
        );
      }
    }

    return removed;
  }

  /**
   * Remove every key matching a glob. Values are never inspected.
   * Returns the number of entries dropped from this instance's local tier;
   * the remote tier's count is only logged.
   */
  async removeByPattern(pattern: string): Promise<number> {
    if (!pattern.trim()) {
      throw new Error("Pattern cannot be empty");
    }
    const regex = globToRegExp(pattern);

    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (regex.test(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.abandonFlights((k) => regex.test(k));

    let remoteRemoved: number | null = null;
    if (this.remote) {
      try {
        remoteRemoved = await this.remote.removeByPattern(pattern);
      } catch (err) {
        logWarn(
          `Error removing pattern ${pattern} from remote cache: ${getErrorMessage(err)}`,
        );
      }
    }

    logInfo(
      `Removed ${removed} local cache entries matching pattern: ${pattern}` +
        (remoteRemoved === null ? "" : ` (${remoteRemoved} remote)`),
    );
    return removed;
  }

  async clear(): Promise<void> {
    logWarn("Clearing all cache entries");
    this.entries.clear();
    this.abandonFlights(() => true);

    if (this.remote) {
      try {
        await this.remote.clear();
      } catch (err) {
        logWarn(`Error clearing remote cache: ${getErrorMessage(err)}`);
      }
    }
  }

  statistics(): CacheStatistics {
    this.sweepExpired(this.now());
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      currentEntries: this.entries.size,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  /** Drop expired local entries; returns how many were removed. */
  sweepExpired(now: number = this.now()): number {
    let removed = 0;
    for (const entry of [...this.entries.values()]) {
      if (!isLive(entry, now)) {
        this.entries.delete(entry.key);
        this.evictions++;
        removed++;
      }
    }
    this.lastSweep = now;
    return removed;
  }

  private startFlight<T>(
    key: string,
    factory: (signal: AbortSignal) => Promise<T>,
    options: CacheEntryOptions,
  ): InFlight {
    const controller = new AbortController();
    const flight: InFlight = {
      key,
      promise: this.populate(
        key,
        factory,
        options,
        controller.signal,
        () => !flight.invalidated,
      ),
      controller,
      waiters: 0,
      invalidated: false,
    };
    this.inFlight.set(key, flight);

    flight.promise.then(
      () => this.detach(flight),
      () => this.detach(flight),
    );
    return flight;
  }

  private detach(flight: InFlight): void {
    if (this.inFlight.get(flight.key) === flight) {
      this.inFlight.delete(flight.key);
    }
  }

  /** Later callers start a fresh computation instead of joining these. */
  private abandonFlights(matches: (key: string) => boolean): void {
    for (const flight of [...this.inFlight.values()]) {
      if (!matches(flight.key)) continue;
      flight.invalidated = true;
      this.inFlight.delete(flight.key);
      logDebug(`Cache flight invalidated: ${flight.key}`);
    }
  }

  private async populate<T>(
    key: string,
    factory: (signal: AbortSignal) => Promise<T>,
    options: CacheEntryOptions,
    signal: AbortSignal,
    stillCurrent: () => boolean,
  ): Promise<string> {
    const remote = await this.readRemote(key);
    if (remote !== null) {
      this.hits++;
      logDebug(`Cache hit (remote): ${key}`);
      if (stillCurrent()) {
        this.writeLocal(key, remote.value, options, remote.expiresAt);
      }
      return remote.value;
    }

    this.misses++;
    logDebug(`Cache miss: ${key}`);

    const value = await factory(signal);
    if (!stillCurrent()) {
      return serialize(key, value);
    }
    return this.store(key, value, options);
  }

  private join(flight: InFlight, signal?: AbortSignal): Promise<string> {
    flight.waiters++;
    const shared = flight.promise;

    if (!signal) {
      // A caller that cannot cancel keeps the computation alive
      return shared;
    }

    return new Promise<string>((resolve, reject) => {
      let settled = false;
      const onAbort = (): void => {
        if (settled) return;
        settled = true;
        flight.waiters--;
        if (flight.waiters === 0) {
          this.detach(flight);
          flight.controller.abort(signal.reason);
        }
        reject(signal.reason);
      };
      signal.addEventListener("abort", onAbort, { once: true });

      shared.then(
        (value) => {
          if (settled) return;
          settled = true;
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (err: unknown) => {
          if (settled) return;
          settled = true;
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      );
    });
  }

  private async store<T>(
    key: string,
    value: T,
    options: CacheEntryOptions,
  ): Promise<string> {
    const serialized = serialize(key, value);
    const entry = this.writeLocal(key, serialized, options);
    await this.writeRemote(key, { value: serialized, expiresAt: entry.expiresAt });
    return serialized;
  }

  private readLocal<T>(
    key: string,
  ): { found: true; value: T } | { found: false } {
    const now = this.now();
    this.maybeSweep(now);

    const entry = this.entries.get(key);
    if (!entry) return { found: false };

    if (!isLive(entry, now)) {
      this.entries.delete(key);
      this.evictions++;
      return { found: false };
    }

    entry.lastAccess = now;
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    return { found: true, value: JSON.parse(entry.value) as T };
  }

  /** `deadline` caps the absolute expiry, for values first written elsewhere. */
  private writeLocal(
    key: string,
    value: string,
    options: CacheEntryOptions,
    deadline: number = Infinity,
  ): CacheEntry {
    const now = this.now();
    const absoluteMs = options.absoluteExpiryMs ?? this.defaultAbsoluteMs;
    const slidingMs = options.slidingExpiryMs ?? this.defaultSlidingMs;

    const entry: CacheEntry = {
      key,
      value,
      createdAt: now,
      expiresAt: Math.min(now + absoluteMs, deadline),
      slidingMs,
      lastAccess: now,
    };

    this.entries.delete(key);
    this.entries.set(key, entry);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
      logDebug(`Cache evicted (capacity): ${oldest.value}`);
    }

    return entry;
  }

  /** A remote value past its deadline, or not in envelope form, is a miss. */
  private async readRemote(key: string): Promise<RemoteEnvelope | null> {
    if (!this.remote) return null;
    let raw: string | null;
    try {
      raw = await this.remote.get(key);
    } catch (err) {
      logWarn(
        `Error reading from remote cache for key ${key}: ${getErrorMessage(err)}`,
      );
      return null;
    }
    if (raw === null) return null;

    const envelope = parseEnvelope(raw);
    if (envelope === null) {
      logWarn(`Ignoring malformed remote cache entry for key ${key}`);
      return null;
    }
    if (this.now() >= envelope.expiresAt) {
      logDebug(`Remote cache entry expired: ${key}`);
      return null;
    }
    return envelope;
  }

  private async writeRemote(key: string, envelope: RemoteEnvelope): Promise<void> {
    if (!this.remote) return;
    const ttlMs = envelope.expiresAt - this.now();
    try {
      await this.remote.set(
        key,
        JSON.stringify(envelope),
        Math.max(1, Math.ceil(ttlMs / 1000)),
      );
    } catch (err) {
      logWarn(
        `Error writing to remote cache for key ${key}: ${getErrorMessage(err)}`,
      );
    }
  }

  private maybeSweep(now: number): void {
    if (
      this.sweepIntervalMs !== undefined &&
      now - this.lastSweep >= this.sweepIntervalMs
    ) {
      this.sweepExpired(now);
    }
  }
}

function isLive(entry: CacheEntry, now: number): boolean {
  if (now >= entry.expiresAt) return false;
  if (entry.slidingMs !== undefined && now >= entry.lastAccess + entry.slidingMs) {
    return false;
  }
  return true;
}

function serialize(key: string, value: unknown): string {
  const serialized = JSON.stringify(value);
  if (serialized === undefined) {
    throw new Error(`Cache value for ${key} is not serializable`);
  }
  return serialized;
}

function parseEnvelope(raw: string): RemoteEnvelope | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = RemoteEnvelope.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function assertKey(key: string): void {
  if (!key.trim()) {
    throw new Error("Cache key cannot be empty");
  }
}
