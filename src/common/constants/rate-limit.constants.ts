/**
 * Rate limiting constants
 *
 * Default rate limit configurations for different endpoint types.
 * The global pair can be overridden with RATE_LIMIT_CALLS / RATE_LIMIT_PERIOD;
 * per-route values are attached with the @RateLimit() decorator.
 */

export const RATE_LIMIT_CONSTANTS = {
  /** Default rate limit: 100 requests per window */
  DEFAULT_LIMIT: 100,

  /** Default time window: 60 seconds */
  DEFAULT_WINDOW_SECONDS: 60,

  /** Registration: 5 requests per minute */
  REGISTER_LIMIT: 5,
  REGISTER_WINDOW_SECONDS: 60,

  /** Login: 10 requests per minute */
  LOGIN_LIMIT: 10,
  LOGIN_WINDOW_SECONDS: 60,

  /** How often the limiter sweeps every tracked client: 5 minutes */
  CLEANUP_INTERVAL_MS: 5 * 60 * 1000,

  /** Timestamps older than this are dropped by the sweep: 1 hour */
  RETENTION_MS: 60 * 60 * 1000,

  /** Characters of the User-Agent header folded into the client key */
  USER_AGENT_PREFIX_LENGTH: 50,
} as const;
