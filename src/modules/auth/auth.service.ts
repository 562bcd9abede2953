import { Injectable, Logger } from '@nestjs/common';
import { UsersService } from '../users/users.service';
import { LoginDto } from './dto/login.dto';
import { RegisterDto } from './dto/register.dto';
import { PasswordService } from './services/password.service';
import { TokenService } from './services/token.service';
import { RegisterResponse, TokenResponse } from './interfaces/auth.interface';
import { APP_CONSTANTS } from '../../common/constants/app.constants';
import {
  AppError,
  AuthenticationError,
  ConflictError,
  DatabaseError,
} from '../../common/errors/app-error';

const INVALID_LOGIN_MESSAGE = 'Incorrect email or password';
const INVALID_LOGIN_DETAIL = 'Invalid credentials provided';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly passwordService: PasswordService,
    private readonly tokenService: TokenService,
  ) {}

  async register(registerDto: RegisterDto): Promise<RegisterResponse> {
    try {
      const existingUser = await this.usersService.findByEmail(registerDto.email);
      if (existingUser) {
        this.logger.warn(`Registration attempt with existing email: ${registerDto.email}`);
        throw new ConflictError(
          'User with this email already exists',
          'A user with this email address is already registered',
        );
      }

      const passwordHash = await this.passwordService.hash(registerDto.password);

      const user = await this.usersService.create({
        email: registerDto.email,
        userName: registerDto.userName,
        phoneNumber: registerDto.phoneNumber,
        countryCode: registerDto.countryCode,
        name: registerDto.name ?? null,
        displayName: registerDto.displayName,
        passwordHash,
      });

      this.logger.log(`User registered successfully: ${user.email}`);

      return {
        id: user._id.toHexString(),
        uuid: user.uuid,
        email: user.email,
        userName: user.userName,
        displayName: user.displayName,
        role: user.role,
      };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      this.logger.error(
        `Unexpected error during registration: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new DatabaseError(
        'Failed to create user',
        'An error occurred while creating your account. Please try again later.',
      );
    }
  }

  async login(loginDto: LoginDto): Promise<TokenResponse> {
    const email = loginDto.username;

    try {
      const user = await this.usersService.findByEmail(email);
      if (!user) {
        this.logger.warn(`Login attempt with non-existent email: ${email}`);
        throw new AuthenticationError(INVALID_LOGIN_MESSAGE, INVALID_LOGIN_DETAIL);
      }

      const passwordValid = await this.passwordService.verify(
        loginDto.password,
        user.passwordHash,
      );
      if (!passwordValid) {
        this.logger.warn(`Failed login attempt for user: ${email}`);
        throw new AuthenticationError(INVALID_LOGIN_MESSAGE, INVALID_LOGIN_DETAIL);
      }

      if (!user.isActive) {
        this.logger.warn(`Login attempt for inactive user: ${email}`);
        throw new AuthenticationError('Account is inactive', 'Your account has been deactivated');
      }

      const accessToken = this.tokenService.issue({
        sub: user.email,
        role: user.role,
        uuid: user.uuid,
      });

      this.logger.log(`User logged in successfully: ${email}`);

      return { access_token: accessToken, token_type: APP_CONSTANTS.TOKEN_TYPE };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      this.logger.error(
        `Unexpected error during login: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new DatabaseError(
        'Authentication failed',
        'An error occurred during authentication. Please try again later.',
      );
    }
  }
}
