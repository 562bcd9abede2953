import { registerAs } from '@nestjs/config';
import { APP_CONSTANTS } from '../common/constants/app.constants';

export type PasswordOverflowPolicy = 'truncate' | 'reject';

export interface SecurityConfig {
  bcryptSaltRounds: number;
  /** What to do with passwords longer than bcrypt's 72-byte input */
  passwordOverflow: PasswordOverflowPolicy;
}

export default registerAs(
  'security',
  (): SecurityConfig => ({
    bcryptSaltRounds: parseInt(
      process.env.BCRYPT_SALT_ROUNDS ?? `${APP_CONSTANTS.BCRYPT_SALT_ROUNDS}`,
      10,
    ),
    passwordOverflow: process.env.PASSWORD_OVERFLOW_POLICY === 'reject' ? 'reject' : 'truncate',
  }),
);
