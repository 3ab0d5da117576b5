export type UserRole = 'SUPER_ADMIN' | 'PROPERTY_MANAGER' | 'FRONT_DESK' | 'TENANT';

export type DataAccessControl = 'OWN' | 'ALL' | 'PM';

/**
 * A user joined with the user type that drives its data visibility.
 * `dataAccessControl` is the raw column value; use `parseDataAccessControl`
 * before acting on it.
 */
export interface UserProfile {
  userId: string;
  userTypeId: string;
  role: UserRole;
  dataAccessControl: string | null;
  isActive: boolean;
  invitedByUserId: string | null;
  /** Legacy creator link, consulted when `invitedByUserId` is absent. */
  createdByUserId: string | null;
}

export interface Actor {
  userId: string;
  role: UserRole;
}

export interface Building {
  id: string;
  ownerId: string | null;
  createdBy: string | null;
}

export interface TenantRecord {
  id: string;
  userId: string | null;
  buildingId: string;
}

export function parseDataAccessControl(raw: string | null): DataAccessControl {
  if (raw === null) return 'ALL';
  const normalized = raw.trim().toUpperCase();
  if (normalized === '' || normalized === 'ALL') return 'ALL';
  if (normalized === 'PM' || normalized === 'PM-ECOSYSTEM') return 'PM';
  return 'OWN';
}
