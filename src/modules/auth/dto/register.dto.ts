import { IsEmail, IsNotEmpty, IsOptional, IsString, Length, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { NormalizeEmail } from './normalize-email';

export class RegisterDto {
  @ApiProperty({ example: 'alice@example.com' })
  @NormalizeEmail()
  @IsEmail()
  @IsNotEmpty()
  email!: string;

  @ApiProperty({ example: 'alice' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  userName!: string;

  @ApiProperty({ example: '5551234567' })
  @IsString()
  @IsNotEmpty()
  phoneNumber!: string;

  @ApiProperty({ example: '+1' })
  @IsString()
  @IsNotEmpty()
  countryCode!: string;

  @ApiProperty({
    example: 'correct-horse',
    description: 'Only the first 72 UTF-8 bytes are significant',
  })
  @IsString()
  @IsNotEmpty()
  password!: string;

  @ApiPropertyOptional({ example: 'Alice Liddell' })
  @IsOptional()
  @IsString()
  name?: string;

  @ApiProperty({ example: 'Alice', minLength: 1, maxLength: 50 })
  @IsString()
  @Length(1, 50)
  displayName!: string;
}
