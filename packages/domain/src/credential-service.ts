import { type Actor } from './user';
import { type AccessCode, type AccessPoint, type TemporaryPin } from './credential';
import { type AccessLogEntry, type Page } from './access-log';
import {
  type AccessPointRepository,
  type AccessCodeRepository,
  type AccessCodePatch,
  type BuildingRepository,
  type MasterPinRepository,
  type UserPinRepository,
  type TemporaryPinRepository,
  type TenantDirectory,
  type UserDirectory,
  type SecretHasher,
  type WithTransaction,
} from './ports';
import { ScopeCache } from './scope-resolver';
import { type ScopeFilter } from './scope-filter';
import { type AuditLogger } from './audit-logger';
import { canManageMasterPin, canSetUserPin, canManageAccessCodeAsCreator, isSuperAdmin, isTenant } from './permissions';
import { checkPin, checkAccessCodeSecret, type PinCheck } from './pin-policy';
import { CredentialError } from './credential-error';

export interface CredentialServiceDeps {
  accessPointRepo: AccessPointRepository;
  buildingRepo: BuildingRepository;
  tenantDirectory: TenantDirectory;
  userDirectory: UserDirectory;
  masterPinRepo: MasterPinRepository;
  userPinRepo: UserPinRepository;
  temporaryPinRepo: TemporaryPinRepository;
  accessCodeRepo: AccessCodeRepository;
  hasher: SecretHasher;
  scopeFilter: ScopeFilter;
  auditLogger: AuditLogger;
  withTransaction: WithTransaction;
}

export interface PinChangeResult {
  created: boolean;
}

export interface CreateAccessCodeInput {
  buildingId?: string;
  accessPointId?: string;
  tenantId?: string;
  code: string;
  isSingleUse: boolean;
  validFrom?: Date;
  expiresAt?: Date;
}

export interface UpdateAccessCodeInput {
  code?: string;
  isSingleUse?: boolean;
  validFrom?: Date;
  expiresAt?: Date;
}

export interface CreateTemporaryPinInput {
  accessPointId: string;
  pin: string;
  expiresAt: Date;
  maxUses: number;
}

export interface AccessCodeQuery {
  buildingId?: string;
  accessPointId?: string;
  page: number;
  pageSize: number;
}

export class CredentialService {
  constructor(private readonly deps: CredentialServiceDeps) {}

  async setOrUpdateMasterPin(actor: Actor, accessPointId: string, pin: string): Promise<PinChangeResult> {
    const { masterPinRepo, hasher, auditLogger } = this.deps;

    if (!canManageMasterPin(actor.role)) {
      throw new CredentialError('FORBIDDEN', 'Only Super Admin can manage master pin.');
    }
    const value = requireValid(checkPin(pin));

    return this.deps.withTransaction(async (tx) => {
      await this.requireAccessPoint(tx, accessPointId);

      const pinHash = await hasher.hash(value);
      const existing = await masterPinRepo.findActive(tx, accessPointId);
      let refId: string;
      if (existing) {
        await masterPinRepo.updateHash(tx, existing.id, pinHash, actor.userId);
        refId = existing.id;
      } else {
        refId = (await masterPinRepo.create(tx, { accessPointId, pinHash, createdBy: actor.userId })).id;
      }

      await auditLogger.record(tx, managementEntry(accessPointId, actor.userId, 'Master', refId, 'Master pin set/updated'));
      return { created: existing === null };
    });
  }

  async setOrUpdateUserPin(
    actor: Actor,
    accessPointId: string,
    targetUserId: string,
    pin: string,
    masterPin?: string,
  ): Promise<PinChangeResult> {
    const { masterPinRepo, userPinRepo, userDirectory, hasher, auditLogger } = this.deps;

    if (!canSetUserPin(actor, targetUserId)) {
      throw new CredentialError('FORBIDDEN', 'Not allowed.');
    }
    const value = requireValid(checkPin(pin));
    const actingOnOther = actor.userId !== targetUserId;

    return this.deps.withTransaction(async (tx) => {
      if (actingOnOther) {
        if (!masterPin || masterPin.trim() === '') {
          throw new CredentialError('VALIDATION', "Master pin required to reset another user's pin.");
        }
        const master = await masterPinRepo.findActive(tx, accessPointId);
        if (!master || !(await hasher.verify(masterPin.trim(), master.pinHash))) {
          throw new CredentialError('UNAUTHORIZED', 'Invalid master pin.');
        }
      }

      await this.requireAccessPoint(tx, accessPointId);

      const target = await userDirectory.findProfile(tx, targetUserId);
      if (!target || !target.isActive) {
        throw new CredentialError('NOT_FOUND', `User ${targetUserId} not found or inactive.`);
      }

      const pinHash = await hasher.hash(value);
      const existing = await userPinRepo.findActive(tx, accessPointId, targetUserId);
      let refId: string;
      if (existing) {
        await userPinRepo.updateHash(tx, existing.id, pinHash, actor.userId);
        refId = existing.id;
      } else {
        const created = await userPinRepo.create(tx, {
          accessPointId,
          userId: targetUserId,
          pinHash,
          createdBy: actor.userId,
        });
        refId = created.id;
      }

      const reason = actingOnOther ? 'User pin set/updated by admin' : 'Own pin set/updated';
      await auditLogger.record(tx, managementEntry(accessPointId, actor.userId, 'User', refId, reason));
      return { created: existing === null };
    });
  }

  async updateOwnPin(actor: Actor, accessPointId: string, newPin: string, oldPin?: string): Promise<PinChangeResult> {
    const { userPinRepo, hasher, auditLogger } = this.deps;
    const value = requireValid(checkPin(newPin, 'New pin'));

    return this.deps.withTransaction(async (tx) => {
      await this.requireAccessPoint(tx, accessPointId);

      const existing = await userPinRepo.findActive(tx, accessPointId, actor.userId);
      if (!existing) {
        const created = await userPinRepo.create(tx, {
          accessPointId,
          userId: actor.userId,
          pinHash: await hasher.hash(value),
          createdBy: actor.userId,
        });
        await auditLogger.record(tx, managementEntry(accessPointId, actor.userId, 'User', created.id, 'Own pin created'));
        return { created: true };
      }

      if (!oldPin) {
        throw new CredentialError('VALIDATION', 'Old pin is required.');
      }
      if (!(await hasher.verify(oldPin.trim(), existing.pinHash))) {
        throw new CredentialError('UNAUTHORIZED', 'Old pin does not match.');
      }

      await userPinRepo.updateHash(tx, existing.id, await hasher.hash(value), actor.userId);
      await auditLogger.record(tx, managementEntry(accessPointId, actor.userId, 'User', existing.id, 'Own pin updated'));
      return { created: false };
    });
  }

  async createTemporaryPin(actor: Actor, input: CreateTemporaryPinInput): Promise<TemporaryPin> {
    const { temporaryPinRepo, tenantDirectory, scopeFilter, hasher } = this.deps;
    const value = requireValid(checkPin(input.pin));

    if (!Number.isInteger(input.maxUses) || input.maxUses < 1) {
      throw new CredentialError('VALIDATION', 'Max uses must be a positive integer.');
    }
    assertFutureExpiry(input.expiresAt);

    return this.deps.withTransaction(async (tx) => {
      const accessPoint = await this.requireAccessPoint(tx, input.accessPointId);

      if (isTenant(actor.role)) {
        const tenantBuildingId = await tenantDirectory.findBuildingIdForTenantUser(tx, actor.userId);
        if (!tenantBuildingId) {
          throw new CredentialError('NOT_FOUND', 'Tenant building not found.');
        }
        if (tenantBuildingId !== accessPoint.buildingId) {
          throw new CredentialError('FORBIDDEN', 'Not allowed for this building.');
        }
      } else if (!(await scopeFilter.hasBuildingAccess(tx, actor.userId, accessPoint.buildingId, new ScopeCache()))) {
        throw new CredentialError('FORBIDDEN', 'Not allowed for this building.');
      }

      return temporaryPinRepo.create(tx, {
        accessPointId: accessPoint.id,
        createdBy: actor.userId,
        pinHash: await hasher.hash(value),
        expiresAt: input.expiresAt,
        maxUses: input.maxUses,
      });
    });
  }

  async createAccessCode(actor: Actor, input: CreateAccessCodeInput): Promise<AccessCode> {
    const { accessCodeRepo, accessPointRepo, buildingRepo, tenantDirectory, scopeFilter, hasher } = this.deps;
    const code = requireValid(checkAccessCodeSecret(input.code));

    if (input.expiresAt) assertFutureExpiry(input.expiresAt);
    assertWindow(input.validFrom ?? null, input.expiresAt ?? null);

    return this.deps.withTransaction(async (tx) => {
      const cache = new ScopeCache();
      let buildingId: string;

      if (isTenant(actor.role)) {
        const tenantBuildingId = await tenantDirectory.findBuildingIdForTenantUser(tx, actor.userId);
        if (!tenantBuildingId) {
          throw new CredentialError('NOT_FOUND', 'Tenant building not found.');
        }
        if (input.buildingId !== undefined && input.buildingId !== tenantBuildingId) {
          throw new CredentialError('FORBIDDEN', 'Not allowed for this building.');
        }
        buildingId = tenantBuildingId;
      } else {
        if (input.buildingId === undefined) {
          throw new CredentialError('VALIDATION', 'BuildingId is required.');
        }
        buildingId = input.buildingId;
      }

      const building = await buildingRepo.findById(tx, buildingId);
      if (!building) {
        throw new CredentialError('NOT_FOUND', `Building ${buildingId} not found.`);
      }
      if (!isTenant(actor.role) && !(await this.hasBuildingScope(tx, actor, buildingId, cache))) {
        throw new CredentialError('FORBIDDEN', 'Not allowed for this building.');
      }

      if (input.accessPointId !== undefined) {
        const accessPoint = await accessPointRepo.findById(tx, input.accessPointId);
        if (!accessPoint) {
          throw new CredentialError('NOT_FOUND', `Access point ${input.accessPointId} not found.`);
        }
        if (accessPoint.buildingId !== buildingId) {
          throw new CredentialError('VALIDATION', 'Access point does not belong to the specified building.');
        }
      }

      if (input.tenantId !== undefined) {
        const tenant = await tenantDirectory.findTenant(tx, input.tenantId);
        if (!tenant) {
          throw new CredentialError('NOT_FOUND', `Tenant ${input.tenantId} not found.`);
        }
        if (tenant.buildingId !== buildingId) {
          throw new CredentialError('VALIDATION', 'Tenant does not belong to the specified building.');
        }
      }

      return accessCodeRepo.create(tx, {
        buildingId,
        accessPointId: input.accessPointId ?? null,
        tenantId: input.tenantId ?? null,
        codeHash: await hasher.hash(code),
        codePlain: code,
        validFrom: input.validFrom ?? null,
        expiresAt: input.expiresAt ?? null,
        isSingleUse: input.isSingleUse,
        createdBy: actor.userId,
      });
    });
  }

  async updateAccessCode(actor: Actor, id: string, input: UpdateAccessCodeInput): Promise<AccessCode> {
    const { accessCodeRepo, hasher } = this.deps;
    const code = input.code !== undefined ? requireValid(checkAccessCodeSecret(input.code)) : undefined;

    if (input.expiresAt) assertFutureExpiry(input.expiresAt);

    return this.deps.withTransaction(async (tx) => {
      const existing = await this.requireManageableCode(tx, actor, id);
      assertWindow(input.validFrom ?? existing.validFrom, input.expiresAt ?? existing.expiresAt);

      const patch: AccessCodePatch = {};
      if (code !== undefined) {
        patch.codeHash = await hasher.hash(code);
        patch.codePlain = code;
      }
      if (input.isSingleUse !== undefined) patch.isSingleUse = input.isSingleUse;
      if (input.validFrom !== undefined) patch.validFrom = input.validFrom;
      if (input.expiresAt !== undefined) patch.expiresAt = input.expiresAt;

      return accessCodeRepo.update(tx, id, patch);
    });
  }

  /**
   * Flips isActive. Rows are kept so access logs still resolve their credential.
   * A spent single-use code stays off.
   */
  async toggleAccessCode(actor: Actor, id: string): Promise<AccessCode> {
    return this.deps.withTransaction(async (tx) => {
      const existing = await this.requireManageableCode(tx, actor, id);
      if (!existing.isActive && existing.consumedAt !== null) {
        throw new CredentialError('VALIDATION', 'A used single-use code cannot be reactivated.');
      }
      return this.deps.accessCodeRepo.setActive(tx, id, !existing.isActive);
    });
  }

  async deleteAccessCode(actor: Actor, id: string): Promise<void> {
    return this.deps.withTransaction(async (tx) => {
      await this.requireManageableCode(tx, actor, id);
      await this.deps.accessCodeRepo.delete(tx, id);
    });
  }

  async listAccessCodes(actor: Actor, query: AccessCodeQuery): Promise<Page<AccessCode>> {
    const { accessCodeRepo, scopeFilter } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      if (isSuperAdmin(actor.role)) {
        return accessCodeRepo.list(tx, { ...query, buildingIds: null });
      }
      if (isTenant(actor.role)) {
        return accessCodeRepo.list(tx, { ...query, buildingIds: null, createdBy: actor.userId });
      }

      const accessible = await scopeFilter.listAccessibleBuildingIds(tx, actor.userId, new ScopeCache());
      const buildingIds = accessible === 'ALL' ? null : accessible;
      if (buildingIds !== null && buildingIds.length === 0) {
        return { items: [], total: 0 };
      }
      return accessCodeRepo.list(tx, { ...query, buildingIds });
    });
  }

  private async requireAccessPoint(tx: unknown, accessPointId: string): Promise<AccessPoint> {
    const accessPoint = await this.deps.accessPointRepo.findById(tx, accessPointId);
    if (!accessPoint) {
      throw new CredentialError('NOT_FOUND', `Access point ${accessPointId} not found.`);
    }
    return accessPoint;
  }

  private async requireManageableCode(tx: unknown, actor: Actor, id: string): Promise<AccessCode> {
    const code = await this.deps.accessCodeRepo.findById(tx, id);
    if (!code) {
      throw new CredentialError('NOT_FOUND', 'Not found.');
    }

    const allowed = isTenant(actor.role)
      ? canManageAccessCodeAsCreator(actor, code)
      : await this.hasBuildingScope(tx, actor, code.buildingId, new ScopeCache());
    if (!allowed) {
      throw new CredentialError('FORBIDDEN', 'Not allowed.');
    }
    return code;
  }

  private async hasBuildingScope(tx: unknown, actor: Actor, buildingId: string, cache: ScopeCache): Promise<boolean> {
    if (isSuperAdmin(actor.role)) return true;
    return this.deps.scopeFilter.hasBuildingAccess(tx, actor.userId, buildingId, cache);
  }
}

function requireValid(check: PinCheck): string {
  if (!check.ok) {
    throw new CredentialError('VALIDATION', check.error);
  }
  return check.value;
}

function assertFutureExpiry(expiresAt: Date): void {
  if (expiresAt.getTime() <= Date.now()) {
    throw new CredentialError('VALIDATION', 'Expiry must be in the future.');
  }
}

function assertWindow(validFrom: Date | null, expiresAt: Date | null): void {
  if (validFrom && expiresAt && expiresAt.getTime() <= validFrom.getTime()) {
    throw new CredentialError('VALIDATION', 'Expiry must be after valid-from.');
  }
}

function managementEntry(
  accessPointId: string,
  actorId: string,
  credentialType: 'Master' | 'User',
  credentialRefId: string,
  reason: string,
): AccessLogEntry {
  return {
    accessPointId,
    userId: actorId,
    credentialType,
    credentialRefId,
    success: true,
    reason,
    occurredAt: new Date(),
    ipAddress: null,
    deviceInfo: null,
  };
}
