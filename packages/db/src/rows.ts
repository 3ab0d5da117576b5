import {
  CREDENTIAL_TYPES,
  type CredentialType,
  type DevicePlatform,
  type UserRole,
} from '@gatehouse/domain';

export type Row = Record<string, unknown>;

const ROLES: readonly UserRole[] = ['SUPER_ADMIN', 'PROPERTY_MANAGER', 'FRONT_DESK', 'TENANT'];
const PLATFORMS: readonly DevicePlatform[] = ['android', 'ios'];

export function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  return new Date(String(value));
}

export function toNullableDate(value: unknown): Date | null {
  return value === null || value === undefined ? null : toDate(value);
}

export function toNullableId(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function toNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function toRole(value: unknown): UserRole {
  const role = ROLES.find((r) => r === value);
  if (!role) throw new Error(`Unknown user role: ${String(value)}`);
  return role;
}

export function toCredentialType(value: unknown): CredentialType {
  const type = CREDENTIAL_TYPES.find((t) => t === value);
  if (!type) throw new Error(`Unknown credential type: ${String(value)}`);
  return type;
}

export function toPlatform(value: unknown): DevicePlatform | null {
  return PLATFORMS.find((p) => p === value) ?? null;
}

export function toCount(value: unknown): number {
  return Number(value);
}
