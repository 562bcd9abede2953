import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { User } from '../entities/user.entity';
import { UserRole } from '../enums/user-role.enum';

/**
 * Public view of a user. Everything except the password hash.
 */
export class UserProfileDto {
  @ApiProperty({ description: 'Storage identifier', example: '65f1c2a9e4b0a1b2c3d4e5f6' })
  id!: string;

  @ApiProperty({ example: '3b241101-e2bb-4255-8caf-4136c566a962' })
  uuid!: string;

  @ApiProperty({ example: 'alice@example.com' })
  email!: string;

  @ApiProperty({ example: 'alice' })
  userName!: string;

  @ApiProperty({ example: '5551234567' })
  phoneNumber!: string;

  @ApiProperty({ example: '+1' })
  countryCode!: string;

  @ApiPropertyOptional({ nullable: true, type: String })
  name!: string | null;

  @ApiProperty({ example: 'Alice' })
  displayName!: string;

  @ApiProperty({ enum: UserRole })
  role!: UserRole;

  @ApiProperty()
  isActive!: boolean;

  @ApiProperty()
  isVerified!: boolean;

  @ApiPropertyOptional({ nullable: true, type: String })
  profilePictureUrl!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  bio!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  website!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  location!: string | null;

  @ApiPropertyOptional({ nullable: true, type: 'object', additionalProperties: { type: 'string' } })
  socialLinks!: Record<string, string> | null;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;

  static fromEntity(user: User): UserProfileDto {
    return {
      id: user._id.toHexString(),
      uuid: user.uuid,
      email: user.email,
      userName: user.userName,
      phoneNumber: user.phoneNumber,
      countryCode: user.countryCode,
      name: user.name ?? null,
      displayName: user.displayName,
      role: user.role,
      isActive: user.isActive,
      isVerified: user.isVerified,
      profilePictureUrl: user.profilePictureUrl ?? null,
      bio: user.bio ?? null,
      website: user.website ?? null,
      location: user.location ?? null,
      socialLinks: user.socialLinks ?? null,
      createdAt: user.createdAt,
      updatedAt: user.updatedAt,
    };
  }
}
