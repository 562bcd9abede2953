import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGateService } from '../services/auth-gate.service';
import { AuthenticatedRequest } from '../interfaces/auth.interface';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { UserRole } from '../../users/enums/user-role.enum';
import { AuthenticationError } from '../../../common/errors/app-error';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly authGate: AuthGateService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRole = this.reflector.getAllAndOverride<UserRole | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (!requiredRole) {
      return true;
    }

    const { user } = context.switchToHttp().getRequest<AuthenticatedRequest>();
    // JwtAuthGuard did not run first
    if (!user) {
      throw new AuthenticationError();
    }

    this.authGate.authorize(user, requiredRole);
    return true;
  }
}
