import { Body, Controller, Post, HttpCode, HttpStatus } from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiConsumes,
  ApiTooManyRequestsResponse,
  ApiUnauthorizedResponse,
  ApiBody,
} from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { LoginDto } from './dto/login.dto';
import { RegisterDto } from './dto/register.dto';
import { RegisterResponseDto, TokenResponseDto } from './dto/auth-response.dto';
import { RateLimit } from '../../common/decorators/rate-limit.decorator';
import { RATE_LIMIT_CONSTANTS } from '../../common/constants/rate-limit.constants';

@ApiTags('auth')
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  @RateLimit({
    limit: RATE_LIMIT_CONSTANTS.REGISTER_LIMIT,
    windowSeconds: RATE_LIMIT_CONSTANTS.REGISTER_WINDOW_SECONDS,
  })
  @ApiOperation({ summary: 'Register a new rider account' })
  @ApiBody({ type: RegisterDto })
  @ApiResponse({
    status: 201,
    description: 'Registration successful',
    type: RegisterResponseDto,
  })
  @ApiBadRequestResponse({ description: 'Invalid input data or password rejected' })
  @ApiConflictResponse({ description: 'Email or username already registered' })
  @ApiTooManyRequestsResponse({ description: 'Too many registration attempts' })
  async register(@Body() registerDto: RegisterDto): Promise<RegisterResponseDto> {
    return this.authService.register(registerDto);
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @RateLimit({
    limit: RATE_LIMIT_CONSTANTS.LOGIN_LIMIT,
    windowSeconds: RATE_LIMIT_CONSTANTS.LOGIN_WINDOW_SECONDS,
  })
  @ApiOperation({ summary: 'Exchange email and password for an access token' })
  @ApiConsumes('application/x-www-form-urlencoded', 'application/json')
  @ApiBody({ type: LoginDto })
  @ApiResponse({
    status: 200,
    description: 'Login successful',
    type: TokenResponseDto,
  })
  @ApiUnauthorizedResponse({ description: 'Incorrect email or password, or inactive account' })
  @ApiTooManyRequestsResponse({ description: 'Too many login attempts' })
  async login(@Body() loginDto: LoginDto): Promise<TokenResponseDto> {
    return this.authService.login(loginDto);
  }
}
