import { type UserProfile, type Building, type TenantRecord } from './user';
import {
  type AccessPoint,
  type MasterPin,
  type UserPin,
  type TemporaryPin,
  type AccessCode,
  type FaceBiometric,
  type FaceImageHashes,
  type FaceImageMimeTypes,
  type FaceDeviceInfo,
} from './credential';
import { type AccessLog, type AccessLogEntry, type AccessLogFilter, type Page } from './access-log';

export type WithTransaction = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;

export interface UserDirectory {
  findProfile(tx: unknown, userId: string): Promise<UserProfile | null>;
  /** Users whose invitedByUserId or legacy createdByUserId is `rootUserId`. */
  listDirectInviteeIds(tx: unknown, rootUserId: string): Promise<string[]>;
}

export interface BuildingRepository {
  findById(tx: unknown, id: string): Promise<Building | null>;
  hasActivePermission(tx: unknown, userId: string, buildingId: string): Promise<boolean>;
  listPermittedBuildingIds(tx: unknown, userId: string): Promise<string[]>;
  /** Buildings whose owner or creator is one of `userIds`. */
  listOwnedBuildingIds(tx: unknown, userIds: string[]): Promise<string[]>;
}

export interface TenantDirectory {
  findBuildingIdForTenantUser(tx: unknown, userId: string): Promise<string | null>;
  findTenant(tx: unknown, tenantId: string): Promise<TenantRecord | null>;
}

export interface AccessPointRepository {
  findById(tx: unknown, id: string): Promise<AccessPoint | null>;
}

export interface MasterPinRepository {
  findActive(tx: unknown, accessPointId: string): Promise<MasterPin | null>;
  create(tx: unknown, pin: { accessPointId: string; pinHash: string; createdBy: string }): Promise<MasterPin>;
  updateHash(tx: unknown, id: string, pinHash: string, updatedBy: string): Promise<void>;
}

export interface UserPinRepository {
  findActive(tx: unknown, accessPointId: string, userId: string): Promise<UserPin | null>;
  create(
    tx: unknown,
    pin: { accessPointId: string; userId: string; pinHash: string; createdBy: string },
  ): Promise<UserPin>;
  updateHash(tx: unknown, id: string, pinHash: string, updatedBy: string): Promise<void>;
}

export interface TemporaryPinRepository {
  listLive(tx: unknown, accessPointId: string, now: Date): Promise<TemporaryPin[]>;
  create(
    tx: unknown,
    pin: { accessPointId: string; createdBy: string; pinHash: string; expiresAt: Date; maxUses: number },
  ): Promise<TemporaryPin>;
  /**
   * Counts one use if the pin is still active and under budget, deactivating it
   * when the budget is reached. Returns false when another attempt got there first.
   */
  recordUse(tx: unknown, id: string, usedAt: Date): Promise<boolean>;
}

export interface AccessCodeListFilter {
  /** null means no building restriction. */
  buildingIds: string[] | null;
  createdBy?: string;
  buildingId?: string;
  accessPointId?: string;
  page: number;
  pageSize: number;
}

export interface AccessCodePatch {
  codeHash?: string;
  codePlain?: string;
  isSingleUse?: boolean;
  validFrom?: Date;
  expiresAt?: Date;
}

export interface AccessCodeRepository {
  /**
   * Active, unspent codes whose validity window contains `now`, scoped to the
   * access point or building-wide for its building, newest first.
   */
  listLiveCandidates(
    tx: unknown,
    scope: { accessPointId: string; buildingId: string; now: Date },
  ): Promise<AccessCode[]>;
  findById(tx: unknown, id: string): Promise<AccessCode | null>;
  create(
    tx: unknown,
    code: Omit<AccessCode, 'id' | 'createdAt' | 'isActive' | 'consumedAt'>,
  ): Promise<AccessCode>;
  update(tx: unknown, id: string, patch: AccessCodePatch): Promise<AccessCode>;
  setActive(tx: unknown, id: string, isActive: boolean): Promise<AccessCode>;
  /** Deactivates an active single-use code and stamps `consumedAt`. False when it was already spent or inactive. */
  consumeSingleUse(tx: unknown, id: string, usedAt: Date): Promise<boolean>;
  delete(tx: unknown, id: string): Promise<void>;
  list(tx: unknown, filter: AccessCodeListFilter): Promise<Page<AccessCode>>;
}

export interface FaceBiometricRepository {
  findActiveByHashes(tx: unknown, hashes: FaceImageHashes): Promise<FaceBiometric | null>;
  findActiveByUserId(tx: unknown, userId: string): Promise<FaceBiometric | null>;
  /** Deactivates the user's current record and inserts the new one. */
  replaceForUser(
    tx: unknown,
    record: {
      userId: string;
      hashes: FaceImageHashes;
      mimeTypes: FaceImageMimeTypes;
      device: FaceDeviceInfo;
    },
  ): Promise<FaceBiometric>;
  deleteForUser(tx: unknown, userId: string): Promise<number>;
}

export interface AccessLogRepository {
  append(tx: unknown, entry: AccessLogEntry): Promise<string>;
  list(tx: unknown, filter: AccessLogFilter): Promise<Page<AccessLog>>;
}

export interface SecretHasher {
  hash(secret: string): Promise<string>;
  verify(secret: string, hash: string): Promise<boolean>;
}

export type DecodedImage =
  | { ok: true; mimeType: string; byteLength: number; contentHash: string }
  | { ok: false; error: string };

export interface ImageDecoder {
  decode(encoded: string): DecodedImage;
}

export interface OperationalLogger {
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
}
