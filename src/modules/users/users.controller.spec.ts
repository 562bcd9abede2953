import { Test, TestingModule } from '@nestjs/testing';
import { Reflector } from '@nestjs/core';
import { UsersController } from './users.controller';
import { UserRole } from './enums/user-role.enum';
import { UserProfileDto } from './dto/user-profile.dto';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { ROLES_KEY } from '../auth/decorators/roles.decorator';

describe('UsersController', () => {
  let controller: UsersController;

  const profile: UserProfileDto = {
    id: '65f1c2a9e4b0a1b2c3d4e5f6',
    uuid: '3b241101-e2bb-4255-8caf-4136c566a962',
    email: 'admin@example.com',
    userName: 'admin',
    phoneNumber: '5551234567',
    countryCode: '+1',
    name: null,
    displayName: 'Admin',
    role: UserRole.ADMIN,
    isActive: true,
    isVerified: true,
    profilePictureUrl: null,
    bio: null,
    website: null,
    location: null,
    socialLinks: null,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [UsersController],
    })
      .overrideGuard(JwtAuthGuard)
      .useValue({
        canActivate: jest.fn().mockResolvedValue(true),
      })
      .overrideGuard(RolesGuard)
      .useValue({
        canActivate: jest.fn().mockReturnValue(true),
      })
      .compile();

    controller = module.get<UsersController>(UsersController);
  });

  it('should return the authenticated profile', () => {
    expect(controller.getProfile(profile)).toBe(profile);
  });

  it('should greet an admin by email', () => {
    expect(controller.adminOnly(profile)).toEqual({ message: 'Hello admin admin@example.com' });
  });

  it('should require the admin role only on the admin endpoint', () => {
    const reflector = new Reflector();

    expect(reflector.get(ROLES_KEY, UsersController.prototype.adminOnly)).toBe(UserRole.ADMIN);
    expect(reflector.get(ROLES_KEY, UsersController.prototype.getProfile)).toBeUndefined();
  });
});
