import { SetMetadata } from '@nestjs/common';
import { UserRole } from '../../users/enums/user-role.enum';

export const ROLES_KEY = 'requiredRole';

/** Restricts a handler to exactly one role. Needs `JwtAuthGuard` before `RolesGuard`. */
export const Roles = (role: UserRole) => SetMetadata(ROLES_KEY, role);
