import { Injectable, CanActivate, ExecutionContext, Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { RateLimiterService, RateLimitPolicy } from '../services/rate-limiter.service';
import {
  RATE_LIMIT_KEY,
  RateLimitOptions,
  SKIP_RATE_LIMIT_KEY,
} from '../decorators/rate-limit.decorator';
import { RATE_LIMIT_CONSTANTS } from '../constants/rate-limit.constants';
import { RateLimitError } from '../errors/app-error';
import { getClientIdentifier } from '../utils/client-identifier';

/**
 * Global admission check backed by the in-memory RateLimiterService.
 *
 * Every request is counted against the global policy; handlers carrying
 * @RateLimit() are additionally counted against their own policy under a
 * key scoped to that handler. A request is recorded under either key only
 * when both admit it. Limiter failures propagate and deny the request.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  private readonly logger = new Logger(RateLimitGuard.name);
  private readonly globalPolicy: RateLimitOptions;

  constructor(
    private readonly reflector: Reflector,
    private readonly rateLimiter: RateLimiterService,
    configService: ConfigService,
  ) {
    this.globalPolicy = {
      limit: configService.get<number>('rateLimit.calls') ?? RATE_LIMIT_CONSTANTS.DEFAULT_LIMIT,
      windowSeconds:
        configService.get<number>('rateLimit.periodSeconds') ??
        RATE_LIMIT_CONSTANTS.DEFAULT_WINDOW_SECONDS,
    };
  }

  canActivate(context: ExecutionContext): boolean {
    if (context.getType() !== 'http') {
      return true;
    }

    const targets = [context.getHandler(), context.getClass()];
    if (this.reflector.getAllAndOverride<boolean>(SKIP_RATE_LIMIT_KEY, targets)) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const identifier = getClientIdentifier(request);

    const policies: RateLimitPolicy[] = [
      { identifier: `global:${identifier}`, ...this.toLimits(this.globalPolicy) },
    ];

    const routePolicy = this.reflector.getAllAndOverride<RateLimitOptions | undefined>(
      RATE_LIMIT_KEY,
      targets,
    );
    if (routePolicy) {
      const scope = `${context.getClass().name}.${context.getHandler().name}`;
      policies.push({ identifier: `${scope}:${identifier}`, ...this.toLimits(routePolicy) });
    }

    const decision = this.rateLimiter.admitAll(policies);
    if (!decision.allowed) {
      this.logger.warn(
        `Rate limit exceeded for ${policies.map(policy => policy.identifier).join(', ')} on ${request.method} ${request.url}, retry after ${decision.retryAfterSeconds}s`,
      );
      throw new RateLimitError(decision.retryAfterSeconds);
    }

    return true;
  }

  private toLimits(options: RateLimitOptions): Omit<RateLimitPolicy, 'identifier'> {
    return { maxRequests: options.limit, windowSeconds: options.windowSeconds };
  }
}
