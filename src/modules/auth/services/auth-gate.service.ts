import { Injectable, Logger } from '@nestjs/common';
import { TokenService } from './token.service';
import { UsersService } from '../../users/users.service';
import { UserRole } from '../../users/enums/user-role.enum';
import { UserProfileDto } from '../../users/dto/user-profile.dto';
import { User } from '../../users/entities/user.entity';
import { AuthUser } from '../interfaces/auth.interface';
import {
  AppError,
  AuthenticationError,
  AuthorizationError,
  DatabaseError,
} from '../../../common/errors/app-error';

/**
 * Resolves bearer tokens to live user identities and enforces roles.
 *
 * Every token problem and an unknown subject look the same to the caller;
 * the real cause is only logged.
 */
@Injectable()
export class AuthGateService {
  private readonly logger = new Logger(AuthGateService.name);

  constructor(
    private readonly tokenService: TokenService,
    private readonly usersService: UsersService,
  ) {}

  async authenticate(token: string): Promise<AuthUser> {
    const verification = this.tokenService.verify(token);
    if (!verification.valid) {
      this.logger.warn(`Token rejected: ${verification.reason}`);
      throw new AuthenticationError();
    }

    const email = verification.claims.sub;
    const user = await this.lookup(email);

    if (!user) {
      this.logger.warn(`User not found for token subject: ${email}`);
      throw new AuthenticationError();
    }

    if (!user.isActive) {
      this.logger.warn(`Inactive user attempted access: ${email}`);
      throw new AuthenticationError('Account is inactive', 'Your account has been deactivated');
    }

    return UserProfileDto.fromEntity(user);
  }

  /** Exact role match; no role implies another. */
  authorize(identity: AuthUser, requiredRole: UserRole): AuthUser {
    if (identity.role !== requiredRole) {
      this.logger.warn(
        `Authorization failed: User ${identity.email} (role: ${identity.role}) attempted to access ${requiredRole}-only endpoint`,
      );
      throw new AuthorizationError(
        'Not enough permissions',
        `This endpoint requires ${requiredRole} role`,
      );
    }

    return identity;
  }

  private async lookup(email: string): Promise<User | null> {
    try {
      return await this.usersService.findByEmail(email);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      this.logger.error(
        `User lookup failed during authentication: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new DatabaseError();
    }
  }
}
