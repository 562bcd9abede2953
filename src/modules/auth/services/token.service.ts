import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import {
  JwtPayload,
  TokenClaims,
  TokenFailureReason,
  TokenVerification,
} from '../interfaces/auth.interface';
import { isUserRole } from '../../users/enums/user-role.enum';
import { SigningAlgorithm } from '../../../config/jwt.config';

/**
 * Issues and verifies the signed, time-bound session tokens.
 *
 * Tokens are bearer credentials; nothing is stored server side and there is
 * no revocation besides expiry.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);
  private readonly algorithm: SigningAlgorithm;
  private readonly expiresInSeconds: number;

  constructor(
    private readonly jwtService: JwtService,
    configService: ConfigService,
  ) {
    this.algorithm = configService.get<SigningAlgorithm>('jwt.algorithm') ?? 'HS256';
    this.expiresInSeconds = (configService.get<number>('jwt.expiresInMinutes') ?? 60) * 60;
  }

  issue(claims: TokenClaims): string {
    const payload: TokenClaims = { sub: claims.sub, role: claims.role, uuid: claims.uuid };

    const token = this.jwtService.sign(payload, {
      algorithm: this.algorithm,
      expiresIn: this.expiresInSeconds,
    });
    this.logger.debug(`Access token created for: ${claims.sub}`);
    return token;
  }

  /**
   * Checks signature, expiry and claim shape in one step. The failure reason
   * is for logging only; callers must not expose it.
   */
  verify(token: string): TokenVerification {
    let decoded: Record<string, unknown>;
    try {
      decoded = this.jwtService.verify<Record<string, unknown>>(token, {
        algorithms: [this.algorithm],
      });
    } catch (error) {
      return { valid: false, reason: this.failureReason(error) };
    }

    return this.readClaims(decoded);
  }

  private failureReason(error: unknown): TokenFailureReason {
    if (!(error instanceof Error)) {
      return 'malformed';
    }
    if (error.name === 'TokenExpiredError') {
      return 'expired';
    }
    return error.message === 'invalid signature' ? 'invalid_signature' : 'malformed';
  }

  private readClaims(decoded: Record<string, unknown>): TokenVerification {
    const { sub, role, uuid, iat, exp } = decoded;

    if (typeof sub !== 'string' || sub.length === 0) {
      return { valid: false, reason: 'missing_subject' };
    }
    if (!isUserRole(role) || typeof uuid !== 'string' || typeof exp !== 'number') {
      return { valid: false, reason: 'malformed' };
    }

    const claims: JwtPayload = { sub, role, uuid, exp };
    if (typeof iat === 'number') {
      claims.iat = iat;
    }
    return { valid: true, claims };
  }
}
