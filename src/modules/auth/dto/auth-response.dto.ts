import { ApiProperty } from '@nestjs/swagger';
import { UserRole } from '../../users/enums/user-role.enum';
import { RegisterResponse, TokenResponse } from '../interfaces/auth.interface';

export class TokenResponseDto implements TokenResponse {
  @ApiProperty({ description: 'Signed access token' })
  access_token!: string;

  @ApiProperty({ example: 'bearer', enum: ['bearer'] })
  token_type!: 'bearer';
}

export class RegisterResponseDto implements RegisterResponse {
  @ApiProperty({ example: '65f1c2a9e4b0a1b2c3d4e5f6' })
  id!: string;

  @ApiProperty({ example: '3b241101-e2bb-4255-8caf-4136c566a962' })
  uuid!: string;

  @ApiProperty({ example: 'alice@example.com' })
  email!: string;

  @ApiProperty({ example: 'alice' })
  userName!: string;

  @ApiProperty({ example: 'Alice' })
  displayName!: string;

  @ApiProperty({ enum: UserRole, example: UserRole.RIDER })
  role!: UserRole;
}
