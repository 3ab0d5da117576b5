import { type Scope, type ScopeCache, type ScopeResolver } from './scope-resolver';
import { type BuildingRepository, type TenantDirectory } from './ports';

export interface CreatedByRow {
  createdBy: string;
}

export function isInScope(row: CreatedByRow, scope: Scope): boolean {
  switch (scope.mode) {
    case 'ALL':
      return true;
    case 'OWN':
      return row.createdBy === scope.userId;
    case 'PM':
      return scope.ecosystemUserIds.has(row.createdBy);
  }
}

export function filterByScope<T extends CreatedByRow>(rows: readonly T[], scope: Scope): T[] {
  if (scope.mode === 'ALL') return [...rows];
  return rows.filter((row) => isInScope(row, scope));
}

export interface ScopeFilterDeps {
  scopeResolver: ScopeResolver;
  buildingRepo: BuildingRepository;
  tenantDirectory: TenantDirectory;
}

export class ScopeFilter {
  constructor(private readonly deps: ScopeFilterDeps) {}

  async applyScope<T extends CreatedByRow>(
    tx: unknown,
    rows: readonly T[],
    userId: string,
    cache: ScopeCache,
  ): Promise<T[]> {
    const scope = await this.deps.scopeResolver.resolveScope(tx, userId, cache);
    return filterByScope(rows, scope);
  }

  async hasAccess(tx: unknown, row: CreatedByRow, userId: string, cache: ScopeCache): Promise<boolean> {
    const scope = await this.deps.scopeResolver.resolveScope(tx, userId, cache);
    return isInScope(row, scope);
  }

  async hasBuildingAccess(tx: unknown, userId: string, buildingId: string, cache: ScopeCache): Promise<boolean> {
    const key = `${userId}:${buildingId}`;
    const cached = cache.buildingAccess.get(key);
    if (cached !== undefined) return cached;

    const allowed = await this.computeBuildingAccess(tx, userId, buildingId, cache);
    cache.buildingAccess.set(key, allowed);
    return allowed;
  }

  /** 'ALL' for super admins; otherwise the explicit list of reachable building ids. */
  async listAccessibleBuildingIds(tx: unknown, userId: string, cache: ScopeCache): Promise<'ALL' | string[]> {
    const { scopeResolver, buildingRepo, tenantDirectory } = this.deps;

    const profile = await scopeResolver.loadProfile(tx, userId, cache);
    if (!profile || !profile.isActive) return [];
    if (profile.role === 'SUPER_ADMIN') return 'ALL';

    if (profile.role === 'TENANT') {
      const tenantBuildingId = await tenantDirectory.findBuildingIdForTenantUser(tx, userId);
      return tenantBuildingId ? [tenantBuildingId] : [];
    }

    const owners = [userId];
    const root = await scopeResolver.findPropertyManagerRoot(tx, userId, cache);
    if (root && root !== userId) owners.push(root);

    const [permitted, owned] = await Promise.all([
      buildingRepo.listPermittedBuildingIds(tx, userId),
      buildingRepo.listOwnedBuildingIds(tx, owners),
    ]);
    return [...new Set([...permitted, ...owned])];
  }

  private async computeBuildingAccess(
    tx: unknown,
    userId: string,
    buildingId: string,
    cache: ScopeCache,
  ): Promise<boolean> {
    const { scopeResolver, buildingRepo, tenantDirectory } = this.deps;

    const profile = await scopeResolver.loadProfile(tx, userId, cache);
    if (!profile || !profile.isActive) return false;
    if (profile.role === 'SUPER_ADMIN') return true;

    if (profile.role === 'TENANT') {
      const tenantBuildingId = await tenantDirectory.findBuildingIdForTenantUser(tx, userId);
      return tenantBuildingId === buildingId;
    }

    if (await buildingRepo.hasActivePermission(tx, userId, buildingId)) return true;

    const building = await buildingRepo.findById(tx, buildingId);
    if (!building) return false;
    if (building.ownerId === userId || building.createdBy === userId) return true;

    const root = await scopeResolver.findPropertyManagerRoot(tx, userId, cache);
    return root !== null && building.ownerId === root;
  }
}
