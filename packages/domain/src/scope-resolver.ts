import { type UserProfile, parseDataAccessControl } from './user';
import { type UserDirectory } from './ports';

export type Scope =
  | { mode: 'ALL' }
  | { mode: 'OWN'; userId: string }
  | { mode: 'PM'; rootUserId: string | null; ecosystemUserIds: ReadonlySet<string> };

/**
 * Memo for one logical operation (one request, one verification). Create a
 * fresh instance per operation and drop it afterwards; never share one across
 * callers.
 */
export class ScopeCache {
  readonly profiles = new Map<string, UserProfile | null>();
  readonly roots = new Map<string, string | null>();
  readonly ecosystems = new Map<string, ReadonlySet<string>>();
  readonly scopes = new Map<string, Scope>();
  readonly buildingAccess = new Map<string, boolean>();
}

export interface ScopeResolverDeps {
  userDirectory: UserDirectory;
}

export class ScopeResolver {
  constructor(private readonly deps: ScopeResolverDeps) {}

  async resolveScope(tx: unknown, userId: string, cache: ScopeCache = new ScopeCache()): Promise<Scope> {
    const cached = cache.scopes.get(userId);
    if (cached) return cached;

    const scope = await this.computeScope(tx, userId, cache);
    cache.scopes.set(userId, scope);
    return scope;
  }

  async loadProfile(tx: unknown, userId: string, cache: ScopeCache): Promise<UserProfile | null> {
    if (cache.profiles.has(userId)) {
      return cache.profiles.get(userId) ?? null;
    }
    const profile = await this.deps.userDirectory.findProfile(tx, userId);
    cache.profiles.set(userId, profile);
    return profile;
  }

  /**
   * Walks invitedBy (falling back to the legacy createdBy link) until a
   * property manager is found. Returns null on a dead end, a missing user or
   * a cycle.
   */
  async findPropertyManagerRoot(tx: unknown, userId: string, cache: ScopeCache): Promise<string | null> {
    if (cache.roots.has(userId)) {
      return cache.roots.get(userId) ?? null;
    }

    const visited = new Set<string>();
    let currentId: string | null = userId;
    let root: string | null = null;

    while (currentId !== null) {
      if (visited.has(currentId)) break;
      visited.add(currentId);

      const profile = await this.loadProfile(tx, currentId, cache);
      if (!profile) break;

      if (profile.role === 'PROPERTY_MANAGER') {
        root = profile.userId;
        break;
      }

      currentId = profile.invitedByUserId ?? profile.createdByUserId;
    }

    cache.roots.set(userId, root);
    return root;
  }

  async ecosystemOf(tx: unknown, rootUserId: string, cache: ScopeCache): Promise<ReadonlySet<string>> {
    const cached = cache.ecosystems.get(rootUserId);
    if (cached) return cached;

    const invitees = await this.deps.userDirectory.listDirectInviteeIds(tx, rootUserId);
    const ecosystem: ReadonlySet<string> = new Set([rootUserId, ...invitees]);
    cache.ecosystems.set(rootUserId, ecosystem);
    return ecosystem;
  }

  private async computeScope(tx: unknown, userId: string, cache: ScopeCache): Promise<Scope> {
    const profile = await this.loadProfile(tx, userId, cache);
    if (!profile) {
      return { mode: 'PM', rootUserId: null, ecosystemUserIds: new Set<string>() };
    }

    const mode = parseDataAccessControl(profile.dataAccessControl);
    if (mode === 'ALL') return { mode: 'ALL' };
    if (mode === 'OWN') return { mode: 'OWN', userId };

    const rootUserId = await this.findPropertyManagerRoot(tx, userId, cache);
    if (rootUserId === null) {
      return { mode: 'PM', rootUserId: null, ecosystemUserIds: new Set([userId]) };
    }
    return { mode: 'PM', rootUserId, ecosystemUserIds: await this.ecosystemOf(tx, rootUserId, cache) };
  }
}
