// ============================================
// Sliding-window rate limiter (in-memory, per identity)
// ============================================

import { logger } from "../lib/logger.js";

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  /** Clock in epoch milliseconds; injectable for tests */
  now?: () => number;
}

/**
 * Counts requests per client identity inside a trailing time window.
 *
 * Every call prunes instants older than `windowMs` before deciding, so the
 * window moves continuously rather than resetting in fixed buckets.
 * Check-and-record in `isAllowed` is synchronous: on the Node event loop no
 * other request can interleave between the capacity check and the append.
 *
 * State is process-local and lost on restart.
 */
export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;

  private readonly now: () => number;
  private readonly windows = new Map<string, number[]>();
  private evictionTimer: ReturnType<typeof setInterval> | undefined;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests <= 0) {
      throw new RangeError("maxRequests must be a positive integer");
    }
    if (!(options.windowMs > 0)) {
      throw new RangeError("windowMs must be positive");
    }

    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a request for `identity` if there is room left in its window.
   * A denied request is not recorded.
   */
  isAllowed(identity: string): boolean {
    const now = this.now();
    const recent = this.prune(identity, now);

    if (recent.length >= this.maxRequests) {
      return false;
    }

    recent.push(now);
    this.windows.set(identity, recent);
    return true;
  }

  /** Requests still available to `identity` in the current window. */
  getRemaining(identity: string): number {
    const recent = this.prune(identity, this.now());
    return Math.max(0, this.maxRequests - recent.length);
  }

  /**
   * Epoch ms at which the oldest recorded request leaves the window,
   * i.e. when one more slot frees up. Returns now if nothing is recorded.
   */
  getResetAt(identity: string): number {
    const now = this.now();
    const oldest = this.prune(identity, now)[0];
    return oldest === undefined ? now : oldest + this.windowMs;
  }

  /** Milliseconds until `identity` gets a slot back; 0 if one is free. */
  getRetryAfterMs(identity: string): number {
    if (this.getRemaining(identity) > 0) return 0;
    return Math.max(0, this.getResetAt(identity) - this.now());
  }

  /** Number of identities currently tracked. */
  get size(): number {
    return this.windows.size;
  }

  /**
   * Drop identities with no requests left inside the window.
   * Returns how many were removed.
   */
  evictIdle(): number {
    const now = this.now();
    let evicted = 0;

    for (const identity of [...this.windows.keys()]) {
      if (this.prune(identity, now).length === 0) {
        evicted++;
      }
    }

    return evicted;
  }

  /** Run `evictIdle` periodically. The timer does not keep the process alive. */
  startEviction(intervalMs: number = this.windowMs): void {
    this.stop();
    this.evictionTimer = setInterval(() => {
      const evicted = this.evictIdle();
      if (evicted > 0) {
        logger.debug("Evicted idle rate-limit identities", {
          stage: "ratelimit",
          evicted,
          tracked: this.windows.size,
        });
      }
    }, intervalMs);
    this.evictionTimer.unref();
  }

  stop(): void {
    if (this.evictionTimer) {
      clearInterval(this.evictionTimer);
      this.evictionTimer = undefined;
    }
  }

  /**
   * Keep only instants inside the trailing window.
   * Identities left with no instants are removed from the map.
   */
  private prune(identity: string, now: number): number[] {
    const timestamps = this.windows.get(identity);
    if (!timestamps) return [];

    const recent = timestamps.filter((t) => now - t < this.windowMs);
    if (recent.length === 0) {
      this.windows.delete(identity);
    } else if (recent.length !== timestamps.length) {
      this.windows.set(identity, recent);
    }
    return recent;
  }
}
