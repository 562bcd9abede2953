import { Request } from 'express';
import { UserRole } from '../../users/enums/user-role.enum';
import { UserProfileDto } from '../../users/dto/user-profile.dto';

/** Claims supplied by the caller when a token is issued */
export interface TokenClaims {
  sub: string;
  role: UserRole;
  uuid: string;
}

/** Claims read back from a verified token */
export interface JwtPayload extends TokenClaims {
  iat?: number;
  exp: number;
}

export type TokenFailureReason = 'expired' | 'invalid_signature' | 'malformed' | 'missing_subject';

export type TokenVerification =
  | { valid: true; claims: JwtPayload }
  | { valid: false; reason: TokenFailureReason };

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

export interface RegisterResponse {
  id: string;
  uuid: string;
  email: string;
  userName: string;
  displayName: string;
  role: UserRole;
}

/** Identity resolved for an authenticated request */
export type AuthUser = UserProfileDto;

/** Express request after `JwtAuthGuard` has run */
export interface AuthenticatedRequest extends Request {
  user?: AuthUser;
}
