import { Controller, Get, UseGuards } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { UserProfileDto } from './dto/user-profile.dto';
import { UserRole } from './enums/user-role.enum';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { Roles } from '../auth/decorators/roles.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import { AuthUser } from '../auth/interfaces/auth.interface';

@ApiTags('users')
@Controller('users')
@UseGuards(JwtAuthGuard, RolesGuard)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Missing, invalid or expired token' })
export class UsersController {
  @Get('me')
  @ApiOperation({ summary: 'Profile of the authenticated user' })
  @ApiOkResponse({ type: UserProfileDto })
  getProfile(@CurrentUser() user: AuthUser): UserProfileDto {
    return user;
  }

  @Get('admin-only')
  @Roles(UserRole.ADMIN)
  @ApiOperation({ summary: 'Greets administrators' })
  @ApiOkResponse({ schema: { example: { message: 'Hello admin admin@example.com' } } })
  @ApiForbiddenResponse({ description: 'Caller is not an admin' })
  adminOnly(@CurrentUser() user: AuthUser): { message: string } {
    return { message: `Hello admin ${user.email}` };
  }
}
