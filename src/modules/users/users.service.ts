import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MongoRepository } from 'typeorm';
import { randomUUID } from 'crypto';
import { User } from './entities/user.entity';
import { UserRole, isUserRole } from './enums/user-role.enum';
import { ConflictError, DatabaseError } from '../../common/errors/app-error';

export interface CreateUserInput {
  email: string;
  userName: string;
  phoneNumber: string;
  countryCode: string;
  name?: string | null;
  displayName: string;
  passwordHash: string;
}

const MONGO_DUPLICATE_KEY = 11000;

function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === MONGO_DUPLICATE_KEY
  );
}

/**
 * Persistence collaborator for user documents.
 *
 * Only lookup by email and insert are needed by the auth flows; records are
 * never deleted here.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private usersRepository: MongoRepository<User>,
  ) {}

  async findByEmail(email: string): Promise<User | null> {
    if (!email) {
      return null;
    }

    const user = await this.usersRepository.findOneBy({ email });

    if (user && !isUserRole(user.role)) {
      this.logger.error(`User ${user.uuid} has an unknown role: ${String(user.role)}`);
      throw new DatabaseError('Stored user record is invalid');
    }

    return user;
  }

  async create(input: CreateUserInput): Promise<User> {
    const now = new Date();
    const user = this.usersRepository.create({
      ...input,
      name: input.name ?? null,
      uuid: randomUUID(),
      role: UserRole.RIDER,
      isActive: true,
      isVerified: false,
      profilePictureUrl: null,
      bio: null,
      website: null,
      location: null,
      socialLinks: null,
      createdBy: null,
      updatedBy: null,
      createdAt: now,
      updatedAt: now,
    });

    try {
      const savedUser = await this.usersRepository.save(user);
      this.logger.log(`User created successfully: ${savedUser.email} (${savedUser.uuid})`);
      return savedUser;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        this.logger.warn(`Duplicate key while creating user ${input.email}`);
        throw new ConflictError(
          'User with this email or username already exists',
          'A user with this email address or username is already registered',
        );
      }

      throw error;
    }
  }
}
