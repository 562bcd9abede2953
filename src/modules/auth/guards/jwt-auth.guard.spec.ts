import { Test, TestingModule } from '@nestjs/testing';
import { ExecutionContext } from '@nestjs/common';
import { JwtAuthGuard, extractBearerToken } from './jwt-auth.guard';
import { AuthGateService } from '../services/auth-gate.service';
import { UserRole } from '../../users/enums/user-role.enum';
import { AuthenticationError } from '../../../common/errors/app-error';

describe('extractBearerToken', () => {
  it('should read the token after the scheme', () => {
    expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(extractBearerToken('bearer abc.def.ghi')).toBe('abc.def.ghi');
  });

  it('should ignore other schemes and empty values', () => {
    expect(extractBearerToken(undefined)).toBeNull();
    expect(extractBearerToken('')).toBeNull();
    expect(extractBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(extractBearerToken('Bearer ')).toBeNull();
  });
});

describe('JwtAuthGuard', () => {
  let guard: JwtAuthGuard;

  const identity = {
    id: '65f1c2a9e4b0a1b2c3d4e5f6',
    email: 'alice@example.com',
    role: UserRole.RIDER,
  };

  const mockAuthGate = {
    authenticate: jest.fn(),
  };

  const createMockExecutionContext = (request: {
    headers: Record<string, string | undefined>;
    user?: unknown;
  }): ExecutionContext => {
    return {
      switchToHttp: () => ({
        getRequest: () => Object.assign(request, { method: 'GET', url: '/users/me' }),
      }),
    } as unknown as ExecutionContext;
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        JwtAuthGuard,
        {
          provide: AuthGateService,
          useValue: mockAuthGate,
        },
      ],
    }).compile();

    guard = module.get<JwtAuthGuard>(JwtAuthGuard);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should attach the resolved identity to the request', async () => {
    mockAuthGate.authenticate.mockResolvedValue(identity);
    const request: { headers: Record<string, string | undefined>; user?: unknown } = {
      headers: { authorization: 'Bearer abc.def.ghi' },
    };

    await expect(guard.canActivate(createMockExecutionContext(request))).resolves.toBe(true);
    expect(mockAuthGate.authenticate).toHaveBeenCalledWith('abc.def.ghi');
    expect(request.user).toBe(identity);
  });

  it('should reject a request without a bearer token', async () => {
    const context = createMockExecutionContext({ headers: {} });

    await expect(guard.canActivate(context)).rejects.toThrow(AuthenticationError);
    expect(mockAuthGate.authenticate).not.toHaveBeenCalled();
  });

  it('should propagate rejections from the auth gate', async () => {
    mockAuthGate.authenticate.mockRejectedValue(new AuthenticationError());
    const context = createMockExecutionContext({ headers: { authorization: 'Bearer expired' } });

    await expect(guard.canActivate(context)).rejects.toMatchObject({
      message: 'Could not validate credentials',
    });
  });
});
