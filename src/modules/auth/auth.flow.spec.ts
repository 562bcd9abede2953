import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { ExecutionContext, HttpStatus } from '@nestjs/common';
import { HTTP_CODE_METADATA } from '@nestjs/common/constants';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ObjectId } from 'mongodb';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { PasswordService } from './services/password.service';
import { TokenService } from './services/token.service';
import { AuthGateService } from './services/auth-gate.service';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from './guards/roles.guard';
import { AuthUser } from './interfaces/auth.interface';
import { UsersController } from '../users/users.controller';
import { UsersService } from '../users/users.service';
import { User } from '../users/entities/user.entity';
import { UserRole } from '../users/enums/user-role.enum';
import { AppError, AuthorizationError, ConflictError } from '../../common/errors/app-error';

/** In-process stand-in for the users collection, unique on email and userName. */
class InMemoryUsersRepository {
  readonly documents: User[] = [];

  async findOneBy(where: { email: string }): Promise<User | null> {
    return this.documents.find(user => user.email === where.email) ?? null;
  }

  create(input: Partial<User>): User {
    return Object.assign(new User(), input);
  }

  async save(user: User): Promise<User> {
    const duplicate = this.documents.some(
      existing => existing.email === user.email || existing.userName === user.userName,
    );
    if (duplicate) {
      throw Object.assign(new Error('E11000 duplicate key error'), { code: 11000 });
    }
    const stored = Object.assign(new User(), user, { _id: new ObjectId() });
    this.documents.push(stored);
    return stored;
  }
}

interface FakeRequest {
  method: string;
  url: string;
  headers: Record<string, string | undefined>;
  user?: AuthUser;
}

describe('Authentication flow', () => {
  let authController: AuthController;
  let usersController: UsersController;
  let jwtAuthGuard: JwtAuthGuard;
  let rolesGuard: RolesGuard;
  let repository: InMemoryUsersRepository;

  const config: Record<string, unknown> = {
    'jwt.algorithm': 'HS256',
    'jwt.expiresInMinutes': 60,
    'security.bcryptSaltRounds': 4,
    'security.passwordOverflow': 'truncate',
  };

  const registration = {
    email: 'alice@example.com',
    userName: 'alice',
    phoneNumber: '5551234567',
    countryCode: '+1',
    password: 'correct-horse',
    displayName: 'Alice',
  };

  const contextFor = (request: FakeRequest, handler: (...args: never[]) => unknown): ExecutionContext =>
    ({
      getType: () => 'http',
      switchToHttp: () => ({ getRequest: () => request }),
      getHandler: () => handler,
      getClass: () => UsersController,
    }) as unknown as ExecutionContext;

  const authenticate = async (token: string): Promise<FakeRequest> => {
    const request: FakeRequest = {
      method: 'GET',
      url: '/users/me',
      headers: { authorization: `Bearer ${token}` },
    };
    await jwtAuthGuard.canActivate(contextFor(request, UsersController.prototype.getProfile));
    return request;
  };

  beforeEach(async () => {
    repository = new InMemoryUsersRepository();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AuthController, UsersController],
      providers: [
        AuthService,
        PasswordService,
        TokenService,
        AuthGateService,
        JwtAuthGuard,
        RolesGuard,
        UsersService,
        {
          provide: getRepositoryToken(User),
          useValue: repository,
        },
        {
          provide: JwtService,
          useValue: new JwtService({ secret: 'test-secret' }),
        },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    authController = module.get<AuthController>(AuthController);
    usersController = module.get<UsersController>(UsersController);
    jwtAuthGuard = module.get<JwtAuthGuard>(JwtAuthGuard);
    rolesGuard = module.get<RolesGuard>(RolesGuard);
  });

  it('should answer registration with 201 and login with 200', () => {
    expect(Reflect.getMetadata(HTTP_CODE_METADATA, AuthController.prototype.register)).toBe(
      HttpStatus.CREATED,
    );
    expect(Reflect.getMetadata(HTTP_CODE_METADATA, AuthController.prototype.login)).toBe(
      HttpStatus.OK,
    );
  });

  it('should register, log in and gate access by role', async () => {
    const registered = await authController.register(registration);

    expect(registered.role).toBe(UserRole.RIDER);
    expect(registered.email).toBe('alice@example.com');
    expect(repository.documents).toHaveLength(1);
    expect(repository.documents[0].passwordHash).not.toBe('correct-horse');

    const wrongPassword = authController.login({
      username: 'alice@example.com',
      password: 'wrong-horse',
    });
    await expect(wrongPassword).rejects.toMatchObject({
      kind: 'AUTHENTICATION_ERROR',
      status: HttpStatus.UNAUTHORIZED,
      message: 'Incorrect email or password',
    });

    const unknownEmail = authController.login({
      username: 'nobody@example.com',
      password: 'correct-horse',
    });
    await expect(unknownEmail).rejects.toMatchObject({
      kind: 'AUTHENTICATION_ERROR',
      message: 'Incorrect email or password',
    });

    const session = await authController.login({
      username: 'alice@example.com',
      password: 'correct-horse',
    });
    expect(session.token_type).toBe('bearer');
    expect(session.access_token.split('.')).toHaveLength(3);

    const request = await authenticate(session.access_token);
    const identity = request.user;
    if (!identity) {
      throw new Error('JwtAuthGuard did not attach the user');
    }

    const profile = usersController.getProfile(identity);
    expect(profile).toMatchObject({
      id: registered.id,
      uuid: registered.uuid,
      email: 'alice@example.com',
      userName: 'alice',
      displayName: 'Alice',
      role: UserRole.RIDER,
      isActive: true,
      isVerified: false,
    });
    expect(profile).not.toHaveProperty('passwordHash');

    let denied: unknown;
    try {
      rolesGuard.canActivate(contextFor(request, UsersController.prototype.adminOnly));
    } catch (error) {
      denied = error;
    }
    expect(denied).toBeInstanceOf(AuthorizationError);
    if (denied instanceof AppError) {
      expect(denied.status).toBe(HttpStatus.FORBIDDEN);
    }
  });

  it('should let an admin through the admin-only endpoint', async () => {
    await authController.register(registration);
    repository.documents[0].role = UserRole.ADMIN;

    const session = await authController.login({
      username: 'alice@example.com',
      password: 'correct-horse',
    });
    const request = await authenticate(session.access_token);
    const identity = request.user;
    if (!identity) {
      throw new Error('JwtAuthGuard did not attach the user');
    }

    expect(rolesGuard.canActivate(contextFor(request, UsersController.prototype.adminOnly))).toBe(
      true,
    );
    expect(usersController.adminOnly(identity)).toEqual({
      message: 'Hello admin alice@example.com',
    });
  });

  it('should refuse a second registration with the same email', async () => {
    await authController.register(registration);

    await expect(
      authController.register({ ...registration, userName: 'alice-again' }),
    ).rejects.toThrow(ConflictError);
    expect(repository.documents).toHaveLength(1);
  });

  it('should refuse a duplicate username through the store constraint', async () => {
    await authController.register(registration);

    await expect(
      authController.register({ ...registration, email: 'other@example.com' }),
    ).rejects.toMatchObject({
      kind: 'CONFLICT_ERROR',
      message: 'User with this email or username already exists',
    });
    expect(repository.documents).toHaveLength(1);
  });

  it('should stop a deactivated account at the auth gate', async () => {
    await authController.register(registration);
    const session = await authController.login({
      username: 'alice@example.com',
      password: 'correct-horse',
    });
    repository.documents[0].isActive = false;

    await expect(authenticate(session.access_token)).rejects.toMatchObject({
      kind: 'AUTHENTICATION_ERROR',
      message: 'Account is inactive',
    });
  });
});
