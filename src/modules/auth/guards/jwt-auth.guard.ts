import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import { AuthGateService } from '../services/auth-gate.service';
import { AuthenticatedRequest } from '../interfaces/auth.interface';
import { AuthenticationError } from '../../../common/errors/app-error';

const BEARER_PREFIX = /^Bearer\s+(\S+)\s*$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = BEARER_PREFIX.exec(header);
  return match ? match[1] : null;
}

@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(private readonly authGate: AuthGateService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(request.headers.authorization);

    if (!token) {
      this.logger.warn(`Missing bearer token on ${request.method} ${request.url}`);
      throw new AuthenticationError('Not authenticated', 'Bearer token required');
    }

    request.user = await this.authGate.authenticate(token);
    return true;
  }
}
