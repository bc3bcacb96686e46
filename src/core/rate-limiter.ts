import type { RateLimitWindow } from "./config.js";
import { logDebug, logWarn } from "./logging.js";

export interface AdmissionDecision {
  admitted: boolean;
  clientId: string;
  /** Seconds until the request would be admitted; 0 when admitted. */
  retryAfterSeconds: number;
  /** Name of the window that rejected the request. */
  window?: string;
}

export interface RateLimiterOptions {
  windows: RateLimitWindow[];
  sweepIntervalMs: number;
  now?: () => number;
}

export interface ClientIdentity {
  subject?: string;
  forwardedFor?: string;
  realIp?: string;
  remoteAddress?: string;
}

const UNKNOWN_CLIENT = "unknown";

/**
 * Resolve the bucket a request is counted against: authenticated subject
 * first, then the first forwarded address, then the socket address. With
 * nothing to go on every request shares the "unknown" bucket.
 */
export function resolveClientId(identity: ClientIdentity): string {
  const subject = identity.subject?.trim();
  if (subject) return `user:${subject}`;

  const forwarded = identity.forwardedFor?.split(",")[0]?.trim();
  const ip = forwarded || identity.realIp?.trim() || identity.remoteAddress;
  if (ip) return `ip:${ip}`;

  return UNKNOWN_CLIENT;
}

/**
 * Sliding-window admission control over several horizons at once
 * (e.g. 60 per minute and 200 per five minutes).
 *
 * Each client owns a time-ordered queue of admitted request timestamps.
 * Only admitted requests are recorded, so a client hammering a closed
 * window does not extend its own lockout.
 */
export class RateLimiter {
  private readonly windows: RateLimitWindow[];
  private readonly horizonMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly clients = new Map<string, number[]>();
  private lastSweep: number;

  constructor(options: RateLimiterOptions) {
    if (options.windows.length === 0) {
      throw new Error("RateLimiter requires at least one window");
    }
    this.windows = [...options.windows].sort(
      (a, b) => a.windowMs - b.windowMs,
    );
    this.horizonMs = this.windows[this.windows.length - 1].windowMs;
    this.sweepIntervalMs = options.sweepIntervalMs;
    this.now = options.now ?? Date.now;
    this.lastSweep = this.now();
  }

  admit(clientId: string): AdmissionDecision {
    const now = this.now();
    this.maybeSweep(now);

    const queue = this.clients.get(clientId) ?? [];
    pruneBefore(queue, now - this.horizonMs);

    let rejectedBy: RateLimitWindow | undefined;
    let retryAfterMs = 0;

    for (const w of this.windows) {
      const firstInWindow = firstIndexAfter(queue, now - w.windowMs);
      const count = queue.length - firstInWindow;
      if (count >= w.maxRequests) {
        // The oldest timestamp counted in this window must age out first
        const waitMs = queue[firstInWindow] + w.windowMs - now;
        if (!rejectedBy || waitMs > retryAfterMs) {
          rejectedBy = w;
          retryAfterMs = waitMs;
        }
      }
    }

    if (rejectedBy) {
      if (queue.length > 0) this.clients.set(clientId, queue);
      const retryAfterSeconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
      logWarn(
        `Rate limit exceeded for client ${clientId} (window ${rejectedBy.name}, retry in ${retryAfterSeconds}s)`,
      );
      return {
        admitted: false,
        clientId,
        retryAfterSeconds,
        window: rejectedBy.name,
      };
    }

    queue.push(now);
    this.clients.set(clientId, queue);
    return { admitted: true, clientId, retryAfterSeconds: 0 };
  }

  /** Drop clients with no request inside the longest horizon. */
  sweep(now: number = this.now()): number {
    const cutoff = now - this.horizonMs;
    let removed = 0;
    for (const [clientId, queue] of this.clients) {
      const newest = queue[queue.length - 1];
      if (newest === undefined || newest <= cutoff) {
        this.clients.delete(clientId);
        removed++;
      }
    }
    this.lastSweep = now;
    if (removed > 0) {
      logDebug(`Cleaned up ${removed} rate limit tracking entries`);
    }
    return removed;
  }

  get trackedClients(): number {
    return this.clients.size;
  }

  private maybeSweep(now: number): void {
    if (now - this.lastSweep >= this.sweepIntervalMs) {
      this.sweep(now);
    }
  }
}

/** Remove timestamps at or before `cutoff` from the head of the queue. */
function pruneBefore(queue: number[], cutoff: number): void {
  let drop = 0;
  while (drop < queue.length && queue[drop] <= cutoff) drop++;
  if (drop > 0) queue.splice(0, drop);
}

/** Index of the first timestamp strictly after `cutoff`. */
function firstIndexAfter(queue: number[], cutoff: number): number {
  let i = 0;
  while (i < queue.length && queue[i] <= cutoff) i++;
  return i;
}
