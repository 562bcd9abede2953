/**
 * Application-wide constants
 *
 * Shared constants used across the application.
 */

export const APP_CONSTANTS = {
  /** Service name reported by the health endpoint */
  SERVICE_NAME: 'rider-auth-api',

  /** Bcrypt cost factor for password hashing */
  BCRYPT_SALT_ROUNDS: 12,

  /** Bcrypt only reads the first 72 bytes of its input */
  BCRYPT_MAX_PASSWORD_BYTES: 72,

  /** Token type returned on login */
  TOKEN_TYPE: 'bearer' as const,
} as const;
