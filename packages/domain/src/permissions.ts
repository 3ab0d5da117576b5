import { type UserRole } from './user';

export function isSuperAdmin(role: UserRole): boolean {
  return role === 'SUPER_ADMIN';
}

export function isTenant(role: UserRole): boolean {
  return role === 'TENANT';
}

export function canManageMasterPin(role: UserRole): boolean {
  return isSuperAdmin(role);
}

/** Only super admins may touch someone else's pin, and only with the master pin. */
export function canSetUserPin(actor: { userId: string; role: UserRole }, targetUserId: string): boolean {
  return actor.userId === targetUserId || isSuperAdmin(actor.role);
}

export function canManageAccessCodeAsCreator(
  actor: { userId: string; role: UserRole },
  code: { createdBy: string },
): boolean {
  return isTenant(actor.role) && code.createdBy === actor.userId;
}
