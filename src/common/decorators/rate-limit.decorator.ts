import { SetMetadata } from '@nestjs/common';

export const RATE_LIMIT_KEY = 'rate_limit';
export const SKIP_RATE_LIMIT_KEY = 'skip_rate_limit';

export interface RateLimitOptions {
  /** Requests admitted per client within the window */
  limit: number;
  windowSeconds: number;
}

/**
 * Adds a route-specific policy on top of the global one.
 * Both must admit the request.
 */
export const RateLimit = (options: RateLimitOptions) => SetMetadata(RATE_LIMIT_KEY, options);

/** Exempts a controller or handler from every rate limit policy */
export const SkipRateLimit = () => SetMetadata(SKIP_RATE_LIMIT_KEY, true);
