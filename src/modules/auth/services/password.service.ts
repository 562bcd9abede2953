import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { ValidationError } from '../../../common/errors/app-error';
import { APP_CONSTANTS } from '../../../common/constants/app.constants';
import { PasswordOverflowPolicy } from '../../../config/security.config';

/**
 * Longest prefix of `value` that fits in `maxBytes` of UTF-8 without
 * splitting a multi-byte character.
 */
export function truncateUtf8(value: string, maxBytes: number): string {
  const bytes = Buffer.from(value, 'utf8');
  if (bytes.length <= maxBytes) {
    return value;
  }

  let end = maxBytes;
  // back off while the cut lands on a continuation byte (10xxxxxx)
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }
  return bytes.subarray(0, end).toString('utf8');
}

/**
 * One-way password hashing with bcrypt.
 *
 * bcrypt only reads 72 bytes. With the default `truncate` policy longer
 * passwords are cut to 72 UTF-8 bytes first, so two passwords that share
 * those bytes are interchangeable. This is intended. The `reject` policy
 * refuses them instead.
 */
@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);
  private readonly saltRounds: number;
  private readonly overflowPolicy: PasswordOverflowPolicy;

  constructor(configService: ConfigService) {
    this.saltRounds =
      configService.get<number>('security.bcryptSaltRounds') ?? APP_CONSTANTS.BCRYPT_SALT_ROUNDS;
    this.overflowPolicy =
      configService.get<PasswordOverflowPolicy>('security.passwordOverflow') ?? 'truncate';
  }

  async hash(password: string): Promise<string> {
    if (!password) {
      throw new ValidationError('Password processing failed', 'Password must not be empty');
    }

    return bcrypt.hash(this.prepare(password), this.saltRounds);
  }

  /** Never throws; anything unexpected counts as a mismatch. */
  async verify(password: string, digest: string): Promise<boolean> {
    if (!password || !digest) {
      return false;
    }

    try {
      const candidate = truncateUtf8(password, APP_CONSTANTS.BCRYPT_MAX_PASSWORD_BYTES);
      return await bcrypt.compare(candidate, digest);
    } catch (error) {
      this.logger.error(
        `Error verifying password: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return false;
    }
  }

  private prepare(password: string): string {
    const maxBytes = APP_CONSTANTS.BCRYPT_MAX_PASSWORD_BYTES;
    const byteLength = Buffer.byteLength(password, 'utf8');

    if (byteLength <= maxBytes) {
      return password;
    }

    if (this.overflowPolicy === 'reject') {
      throw new ValidationError(
        'Password processing failed',
        `Password is too long. Maximum ${maxBytes} bytes allowed.`,
      );
    }

    this.logger.warn(`Password of ${byteLength} bytes truncated to ${maxBytes} bytes`);
    return truncateUtf8(password, maxBytes);
  }
}
