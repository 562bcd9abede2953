import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { NormalizeEmail } from './normalize-email';

/**
 * OAuth2 password-grant shaped credentials. `username` carries the email.
 * The remaining grant fields are accepted so standard clients are not
 * rejected, but they are not used.
 */
export class LoginDto {
  @ApiProperty({ example: 'alice@example.com', description: 'Account email' })
  @NormalizeEmail()
  @IsString()
  @IsNotEmpty()
  username!: string;

  @ApiProperty({ example: 'correct-horse' })
  @IsString()
  @IsNotEmpty()
  password!: string;

  @ApiPropertyOptional({ example: 'password' })
  @IsOptional()
  @IsString()
  grant_type?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  scope?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  client_id?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  client_secret?: string;
}
