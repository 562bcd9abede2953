import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { PasswordService, truncateUtf8 } from './password.service';
import { ValidationError } from '../../../common/errors/app-error';

describe('truncateUtf8', () => {
  it('should return short values unchanged', () => {
    expect(truncateUtf8('correct-horse', 72)).toBe('correct-horse');
  });

  it('should cut on a character boundary', () => {
    expect(truncateUtf8('é'.repeat(40), 72)).toBe('é'.repeat(36));
  });

  it('should drop a multi-byte character split by the limit', () => {
    const result = truncateUtf8('a' + 'é'.repeat(40), 72);

    expect(result).toBe('a' + 'é'.repeat(35));
    expect(Buffer.byteLength(result, 'utf8')).toBe(71);
  });
});

describe('PasswordService', () => {
  const createService = async (config: Record<string, unknown>): Promise<PasswordService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PasswordService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    return module.get<PasswordService>(PasswordService);
  };

  let service: PasswordService;

  beforeEach(async () => {
    // lowest bcrypt cost keeps the suite fast
    service = await createService({
      'security.bcryptSaltRounds': 4,
      'security.passwordOverflow': 'truncate',
    });
  });

  describe('hash', () => {
    it('should produce a bcrypt digest with the configured cost', async () => {
      const digest = await service.hash('correct-horse');

      expect(digest.startsWith('$2b$04$')).toBe(true);
      expect(digest).not.toContain('correct-horse');
    });

    it('should salt every digest', async () => {
      const first = await service.hash('correct-horse');
      const second = await service.hash('correct-horse');

      expect(first).not.toBe(second);
    });

    it('should reject an empty password', async () => {
      await expect(service.hash('')).rejects.toThrow(ValidationError);
    });

    it('should reject long passwords under the reject policy', async () => {
      const strict = await createService({
        'security.bcryptSaltRounds': 4,
        'security.passwordOverflow': 'reject',
      });

      await expect(strict.hash('a'.repeat(73))).rejects.toMatchObject({
        kind: 'VALIDATION_ERROR',
        detail: 'Password is too long. Maximum 72 bytes allowed.',
      });
      await expect(strict.hash('a'.repeat(72))).resolves.toMatch(/^\$2b\$04\$/);
    });
  });

  describe('verify', () => {
    it('should accept the original password', async () => {
      const digest = await service.hash('correct-horse');

      await expect(service.verify('correct-horse', digest)).resolves.toBe(true);
    });

    it('should refuse a different password', async () => {
      const digest = await service.hash('correct-horse');

      await expect(service.verify('battery-staple', digest)).resolves.toBe(false);
    });

    it('should treat passwords sharing their first 72 bytes as equal', async () => {
      const prefix = 'p'.repeat(72);
      const digest = await service.hash(`${prefix}-first-suffix`);

      await expect(service.verify(`${prefix}-second-suffix`, digest)).resolves.toBe(true);
      await expect(service.verify(prefix, digest)).resolves.toBe(true);
    });

    it('should return false for empty input', async () => {
      const digest = await service.hash('correct-horse');

      await expect(service.verify('', digest)).resolves.toBe(false);
      await expect(service.verify('correct-horse', '')).resolves.toBe(false);
    });

    it('should return false for a malformed digest', async () => {
      await expect(service.verify('correct-horse', 'not-a-bcrypt-digest')).resolves.toBe(false);
    });
  });
});
