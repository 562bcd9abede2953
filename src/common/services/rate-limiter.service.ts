import { Injectable, Logger } from '@nestjs/common';
import { RATE_LIMIT_CONSTANTS } from '../constants/rate-limit.constants';
import { TimestampQueue } from '../utils/timestamp-queue';

export interface RateLimitDecision {
  allowed: boolean;
  /** Whole seconds until a slot frees up; 0 when admitted */
  retryAfterSeconds: number;
  /** Slots left in the current window after this call */
  remaining: number;
}

export interface RateLimitPolicy {
  identifier: string;
  maxRequests: number;
  windowSeconds: number;
}

/**
 * In-memory sliding-window log rate limiter.
 *
 * Keeps the exact timestamp of every admitted request per client key, so an
 * admission decision is precise at the cost of O(limit) memory per active
 * key. State is process-local and lost on restart.
 *
 * `isAllowed` and `admitAll` never await: prune, count and append run as one
 * synchronous step, so concurrent requests on the same key cannot both take
 * the last slot.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly requests = new Map<string, TimestampQueue>();
  private lastCleanup = Date.now();
  private longestWindowMs = 0;

  isAllowed(
    identifier: string,
    maxRequests: number = RATE_LIMIT_CONSTANTS.DEFAULT_LIMIT,
    windowSeconds: number = RATE_LIMIT_CONSTANTS.DEFAULT_WINDOW_SECONDS,
  ): RateLimitDecision {
    return this.admitAll([{ identifier, maxRequests, windowSeconds }]);
  }

  /**
   * Admits a request only if every policy has room, then records it under
   * every key. A rejection records nothing anywhere, so a request refused by
   * one policy never consumes quota of another.
   */
  admitAll(policies: readonly RateLimitPolicy[]): RateLimitDecision {
    const now = Date.now();
    for (const policy of policies) {
      this.longestWindowMs = Math.max(this.longestWindowMs, policy.windowSeconds * 1000);
    }

    this.cleanupIfDue(now);

    const windows = policies.map(policy => ({
      policy,
      timestamps: this.pruned(policy, now),
    }));

    let retryAfterSeconds = 0;
    for (const { policy, timestamps } of windows) {
      if (timestamps.size >= policy.maxRequests) {
        retryAfterSeconds = Math.max(retryAfterSeconds, this.retryAfter(policy, timestamps, now));
      }
    }

    if (retryAfterSeconds > 0) {
      return { allowed: false, retryAfterSeconds, remaining: 0 };
    }

    for (const { timestamps } of windows) {
      timestamps.push(now);
    }

    return {
      allowed: true,
      retryAfterSeconds: 0,
      remaining: Math.min(
        ...windows.map(({ policy, timestamps }) => policy.maxRequests - timestamps.size),
      ),
    };
  }

  /** Number of client keys currently held in memory */
  get trackedClients(): number {
    return this.requests.size;
  }

  reset(): void {
    this.requests.clear();
    this.lastCleanup = Date.now();
    this.longestWindowMs = 0;
  }

  private pruned(policy: RateLimitPolicy, now: number): TimestampQueue {
    let timestamps = this.requests.get(policy.identifier);
    if (!timestamps) {
      timestamps = new TimestampQueue();
      this.requests.set(policy.identifier, timestamps);
    }

    timestamps.dropUntil(now - policy.windowSeconds * 1000);
    return timestamps;
  }

  private retryAfter(policy: RateLimitPolicy, timestamps: TimestampQueue, now: number): number {
    const oldest = timestamps.peekOldest();
    if (oldest === undefined) {
      return policy.windowSeconds;
    }
    return Math.max(1, Math.ceil((oldest + policy.windowSeconds * 1000 - now) / 1000));
  }

  /**
   * Sweep every key at most once per interval. Runs inline on whichever call
   * crosses the interval boundary.
   */
  private cleanupIfDue(now: number): void {
    if (now - this.lastCleanup < RATE_LIMIT_CONSTANTS.CLEANUP_INTERVAL_MS) {
      return;
    }

    const cutoff = now - Math.max(RATE_LIMIT_CONSTANTS.RETENTION_MS, this.longestWindowMs);
    let evicted = 0;

    for (const [key, timestamps] of this.requests) {
      timestamps.dropUntil(cutoff);
      if (timestamps.isEmpty) {
        this.requests.delete(key);
        evicted++;
      }
    }

    this.lastCleanup = now;
    this.logger.debug(
      `Rate limiter cleanup evicted ${evicted} clients, ${this.requests.size} still tracked`,
    );
  }
}
