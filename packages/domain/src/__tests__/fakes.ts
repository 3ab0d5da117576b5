import { vi } from 'vitest';
import { type UserProfile, type Building, type TenantRecord } from '../user';
import {
  type AccessPoint,
  type MasterPin,
  type UserPin,
  type TemporaryPin,
  type AccessCode,
  type FaceBiometric,
  isAccessCodeLive,
  isTemporaryPinLive,
} from '../credential';
import { type AccessLog } from '../access-log';
import {
  type UserDirectory,
  type BuildingRepository,
  type TenantDirectory,
  type AccessPointRepository,
  type MasterPinRepository,
  type UserPinRepository,
  type TemporaryPinRepository,
  type AccessCodeRepository,
  type FaceBiometricRepository,
  type AccessLogRepository,
  type SecretHasher,
  type ImageDecoder,
  type OperationalLogger,
  type WithTransaction,
} from '../ports';

export function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    userId: 'u-1',
    userTypeId: 't-1',
    role: 'PROPERTY_MANAGER',
    dataAccessControl: 'OWN',
    isActive: true,
    invitedByUserId: null,
    createdByUserId: null,
    ...overrides,
  };
}

export function makeAccessCode(overrides: Partial<AccessCode> = {}): AccessCode {
  return {
    id: 'code-1',
    buildingId: '7',
    accessPointId: '12',
    tenantId: null,
    codeHash: 'hashed:1234',
    codePlain: '1234',
    validFrom: null,
    expiresAt: null,
    isSingleUse: false,
    isActive: true,
    consumedAt: null,
    createdBy: 'u-1',
    createdAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

/** Reversible stand-in for argon2: `hashed:<secret>`. */
export const fakeHasher: SecretHasher = {
  hash: async (secret) => `hashed:${secret}`,
  verify: async (secret, hash) => hash === `hashed:${secret}`,
};

/**
 * Accepts `img:<label>` and hashes to `sha:<label>`; anything else is rejected
 * with "not an image".
 */
export const fakeImageDecoder: ImageDecoder = {
  decode: (encoded) =>
    encoded.startsWith('img:')
      ? { ok: true, mimeType: 'image/png', byteLength: encoded.length, contentHash: `sha:${encoded.slice(4)}` }
      : { ok: false, error: 'not an image' },
};

export function createTestLogger() {
  return { warn: vi.fn(), error: vi.fn() } satisfies OperationalLogger;
}

export const passthroughTransaction: WithTransaction = async (fn) => fn({});

/**
 * In-process store behind every domain port. Conditional updates check and
 * flip state without yielding, so concurrent callers see the same atomicity a
 * `UPDATE ... WHERE is_active RETURNING` gives.
 */
export class InMemoryStore {
  profiles: UserProfile[] = [];
  buildings: Building[] = [];
  permissions: Array<{ userId: string; buildingId: string }> = [];
  tenants: TenantRecord[] = [];
  accessPoints: AccessPoint[] = [];
  masterPins: MasterPin[] = [];
  userPins: UserPin[] = [];
  temporaryPins: TemporaryPin[] = [];
  accessCodes: AccessCode[] = [];
  faces: FaceBiometric[] = [];
  logs: AccessLog[] = [];
  private seq = 100;

  nextId(): string {
    this.seq += 1;
    return String(this.seq);
  }

  readonly userDirectory: UserDirectory = {
    findProfile: async (_tx, userId) => this.profiles.find((p) => p.userId === userId) ?? null,
    listDirectInviteeIds: async (_tx, rootUserId) =>
      this.profiles
        .filter((p) => p.invitedByUserId === rootUserId || p.createdByUserId === rootUserId)
        .map((p) => p.userId),
  };

  readonly buildingRepo: BuildingRepository = {
    findById: async (_tx, id) => this.buildings.find((b) => b.id === id) ?? null,
    hasActivePermission: async (_tx, userId, buildingId) =>
      this.permissions.some((p) => p.userId === userId && p.buildingId === buildingId),
    listPermittedBuildingIds: async (_tx, userId) =>
      this.permissions.filter((p) => p.userId === userId).map((p) => p.buildingId),
    listOwnedBuildingIds: async (_tx, userIds) =>
      this.buildings
        .filter(
          (b) => (b.ownerId !== null && userIds.includes(b.ownerId)) || (b.createdBy !== null && userIds.includes(b.createdBy)),
        )
        .map((b) => b.id),
  };

  readonly tenantDirectory: TenantDirectory = {
    findBuildingIdForTenantUser: async (_tx, userId) => this.tenants.find((t) => t.userId === userId)?.buildingId ?? null,
    findTenant: async (_tx, tenantId) => this.tenants.find((t) => t.id === tenantId) ?? null,
  };

  readonly accessPointRepo: AccessPointRepository = {
    findById: async (_tx, id) => this.accessPoints.find((a) => a.id === id) ?? null,
  };

  readonly masterPinRepo: MasterPinRepository = {
    findActive: async (_tx, accessPointId) =>
      this.masterPins.find((m) => m.accessPointId === accessPointId && m.isActive) ?? null,
    create: async (_tx, pin) => {
      const created: MasterPin = {
        id: this.nextId(),
        ...pin,
        isActive: true,
        createdAt: new Date(),
        updatedBy: null,
        updatedAt: null,
      };
      this.masterPins.push(created);
      return created;
    },
    updateHash: async (_tx, id, pinHash, updatedBy) => {
      for (const m of this.masterPins) {
        if (m.id === id) Object.assign(m, { pinHash, updatedBy, updatedAt: new Date() });
      }
    },
  };

  readonly userPinRepo: UserPinRepository = {
    findActive: async (_tx, accessPointId, userId) =>
      this.userPins.find((p) => p.accessPointId === accessPointId && p.userId === userId && p.isActive) ?? null,
    create: async (_tx, pin) => {
      const created: UserPin = {
        id: this.nextId(),
        ...pin,
        isActive: true,
        createdAt: new Date(),
        updatedBy: null,
        updatedAt: null,
      };
      this.userPins.push(created);
      return created;
    },
    updateHash: async (_tx, id, pinHash, updatedBy) => {
      for (const p of this.userPins) {
        if (p.id === id) Object.assign(p, { pinHash, updatedBy, updatedAt: new Date() });
      }
    },
  };

  readonly temporaryPinRepo: TemporaryPinRepository = {
    listLive: async (_tx, accessPointId, now) =>
      this.temporaryPins.filter((p) => p.accessPointId === accessPointId && isTemporaryPinLive(p, now)),
    create: async (_tx, pin) => {
      const created: TemporaryPin = {
        id: this.nextId(),
        ...pin,
        usesCount: 0,
        firstUsedAt: null,
        lastUsedAt: null,
        isActive: true,
        createdAt: new Date(),
      };
      this.temporaryPins.push(created);
      return created;
    },
    recordUse: async (_tx, id, usedAt) => {
      const pin = this.temporaryPins.find((p) => p.id === id);
      if (!pin || !pin.isActive || pin.usesCount >= pin.maxUses) return false;
      pin.usesCount += 1;
      pin.firstUsedAt = pin.firstUsedAt ?? usedAt;
      pin.lastUsedAt = usedAt;
      if (pin.usesCount >= pin.maxUses) pin.isActive = false;
      return true;
    },
  };

  readonly accessCodeRepo: AccessCodeRepository = {
    listLiveCandidates: async (_tx, { accessPointId, buildingId, now }) =>
      this.accessCodes
        .filter(
          (c) =>
            c.buildingId === buildingId &&
            (c.accessPointId === null || c.accessPointId === accessPointId) &&
            isAccessCodeLive(c, now),
        )
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime()),
    findById: async (_tx, id) => this.accessCodes.find((c) => c.id === id) ?? null,
    create: async (_tx, code) => {
      const created: AccessCode = { id: this.nextId(), ...code, isActive: true, consumedAt: null, createdAt: new Date() };
      this.accessCodes.push(created);
      return created;
    },
    update: async (_tx, id, patch) => {
      const code = this.requireCode(id);
      Object.assign(code, patch);
      return code;
    },
    setActive: async (_tx, id, isActive) => {
      const code = this.requireCode(id);
      code.isActive = isActive;
      return code;
    },
    consumeSingleUse: async (_tx, id, usedAt) => {
      const code = this.accessCodes.find((c) => c.id === id);
      if (!code || !code.isActive || code.consumedAt !== null) return false;
      code.isActive = false;
      code.consumedAt = usedAt;
      return true;
    },
    delete: async (_tx, id) => {
      this.accessCodes = this.accessCodes.filter((c) => c.id !== id);
    },
    list: async (_tx, filter) => {
      const items = this.accessCodes.filter(
        (c) =>
          (filter.buildingIds === null || filter.buildingIds.includes(c.buildingId)) &&
          (filter.createdBy === undefined || c.createdBy === filter.createdBy) &&
          (filter.buildingId === undefined || c.buildingId === filter.buildingId) &&
          (filter.accessPointId === undefined || c.accessPointId === filter.accessPointId),
      );
      const start = (filter.page - 1) * filter.pageSize;
      return { items: items.slice(start, start + filter.pageSize), total: items.length };
    },
  };

  readonly faceRepo: FaceBiometricRepository = {
    findActiveByHashes: async (_tx, hashes) =>
      this.faces.find(
        (f) =>
          f.isActive &&
          f.hashes.front === hashes.front &&
          f.hashes.left === hashes.left &&
          f.hashes.right === hashes.right,
      ) ?? null,
    findActiveByUserId: async (_tx, userId) => this.faces.find((f) => f.userId === userId && f.isActive) ?? null,
    replaceForUser: async (_tx, record) => {
      for (const f of this.faces) {
        if (f.userId === record.userId) f.isActive = false;
      }
      const created: FaceBiometric = {
        id: this.nextId(),
        ...record,
        isActive: true,
        createdAt: new Date(),
        updatedAt: null,
      };
      this.faces.push(created);
      return created;
    },
    deleteForUser: async (_tx, userId) => {
      const before = this.faces.length;
      this.faces = this.faces.filter((f) => f.userId !== userId);
      return before - this.faces.length;
    },
  };

  readonly accessLogRepo: AccessLogRepository = {
    append: async (_tx, entry) => {
      const id = this.nextId();
      this.logs.push({ id, ...entry });
      return id;
    },
    list: async (_tx, filter) => {
      const buildingOf = (accessPointId: string) => this.accessPoints.find((a) => a.id === accessPointId)?.buildingId;
      const items = this.logs
        .filter(
          (l) =>
            (filter.buildingIds === null || filter.buildingIds.includes(buildingOf(l.accessPointId) ?? '')) &&
            (filter.userId === undefined || l.userId === filter.userId) &&
            (filter.success === undefined || l.success === filter.success) &&
            (filter.credentialType === undefined || l.credentialType === filter.credentialType),
        )
        .sort((a, b) => b.occurredAt.getTime() - a.occurredAt.getTime());
      const start = (filter.page - 1) * filter.pageSize;
      return { items: items.slice(start, start + filter.pageSize), total: items.length };
    },
  };

  private requireCode(id: string): AccessCode {
    const code = this.accessCodes.find((c) => c.id === id);
    if (!code) throw new Error(`access code ${id} missing`);
    return code;
  }
}
