import { type AccessLog, type AccessLogEntry, type AccessLogFilter, type Page } from './access-log';
import { type AccessLogRepository, type OperationalLogger, type WithTransaction } from './ports';
import { type Actor } from './user';
import { ScopeCache } from './scope-resolver';
import { type ScopeFilter } from './scope-filter';

export interface AuditLoggerDeps {
  accessLogRepo: AccessLogRepository;
  scopeFilter: ScopeFilter;
  logger: OperationalLogger;
  withTransaction: WithTransaction;
}

export type AccessLogQuery = Omit<AccessLogFilter, 'buildingIds'> & { buildingId?: string };

/**
 * Append-only recorder of access attempts and credential changes. Rows are
 * never updated or deleted here.
 */
export class AuditLogger {
  constructor(private readonly deps: AuditLoggerDeps) {}

  async record(tx: unknown, entry: AccessLogEntry): Promise<string> {
    return this.deps.accessLogRepo.append(tx, entry);
  }

  /** Writes in its own transaction. A failure is reported and swallowed; it never implies a grant. */
  async recordBestEffort(entry: AccessLogEntry): Promise<boolean> {
    try {
      await this.deps.withTransaction((tx) => this.deps.accessLogRepo.append(tx, entry));
      return true;
    } catch (err) {
      this.deps.logger.error(
        {
          err: err instanceof Error ? err.message : String(err),
          accessPointId: entry.accessPointId,
          credentialType: entry.credentialType,
        },
        'Failed to write access log',
      );
      return false;
    }
  }

  async listLogs(actor: Actor, query: AccessLogQuery): Promise<Page<AccessLog>> {
    const { accessLogRepo, scopeFilter } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const cache = new ScopeCache();
      const accessible =
        actor.role === 'SUPER_ADMIN' ? 'ALL' : await scopeFilter.listAccessibleBuildingIds(tx, actor.userId, cache);

      let buildingIds: string[] | null = accessible === 'ALL' ? null : accessible;
      if (query.buildingId !== undefined) {
        if (buildingIds !== null && !buildingIds.includes(query.buildingId)) {
          return { items: [], total: 0 };
        }
        buildingIds = [query.buildingId];
      }
      if (buildingIds !== null && buildingIds.length === 0) {
        return { items: [], total: 0 };
      }

      const { buildingId: _buildingId, ...rest } = query;
      const filter: AccessLogFilter = { ...rest, buildingIds };
      if (actor.role === 'TENANT') {
        filter.userId = actor.userId;
      }

      return accessLogRepo.list(tx, filter);
    });
  }
}
