import { registerAs } from '@nestjs/config';
import { RATE_LIMIT_CONSTANTS } from '../common/constants/rate-limit.constants';

export interface RateLimitConfig {
  /** Requests admitted per client in one global window */
  calls: number;
  periodSeconds: number;
}

export default registerAs(
  'rateLimit',
  (): RateLimitConfig => ({
    calls: parseInt(process.env.RATE_LIMIT_CALLS ?? `${RATE_LIMIT_CONSTANTS.DEFAULT_LIMIT}`, 10),
    periodSeconds: parseInt(
      process.env.RATE_LIMIT_PERIOD ?? `${RATE_LIMIT_CONSTANTS.DEFAULT_WINDOW_SECONDS}`,
      10,
    ),
  }),
);
