import { type PoolClient } from 'pg';
import {
  type AccessLog,
  type AccessLogEntry,
  type AccessLogFilter,
  type AccessLogRepository,
  type Page,
} from '@gatehouse/domain';
import { type Row, toCount, toCredentialType, toDate, toNullableId, toNullableString } from '../rows';

const COLUMNS = `l.id, l.access_point_id, l.user_id, l.credential_type, l.credential_ref_id, l.success, l.reason,
  l.occurred_at, l.ip_address, l.device_info`;

export class PgAccessLogRepository implements AccessLogRepository {
  async append(tx: unknown, entry: AccessLogEntry): Promise<string> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO access_logs
         (access_point_id, user_id, credential_type, credential_ref_id, success, reason, occurred_at, ip_address, device_info)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING id`,
      [
        entry.accessPointId,
        entry.userId,
        entry.credentialType,
        entry.credentialRefId,
        entry.success,
        entry.reason,
        entry.occurredAt,
        entry.ipAddress,
        entry.deviceInfo,
      ],
    );
    return String(result.rows[0].id);
  }

  async list(tx: unknown, filter: AccessLogFilter): Promise<Page<AccessLog>> {
    const client = tx as PoolClient;
    const conditions: string[] = [];
    const values: unknown[] = [];

    const add = (sql: (param: string) => string, value: unknown) => {
      values.push(value);
      conditions.push(sql(`$${values.length}`));
    };

    if (filter.buildingIds !== null) add((p) => `ap.building_id = ANY(${p}::bigint[])`, filter.buildingIds);
    if (filter.accessPointId !== undefined) add((p) => `l.access_point_id = ${p}`, filter.accessPointId);
    if (filter.accessCodeId !== undefined) {
      add((p) => `l.credential_type = 'AccessCode' AND l.credential_ref_id = ${p}`, filter.accessCodeId);
    }
    if (filter.userId !== undefined) add((p) => `l.user_id = ${p}`, filter.userId);
    if (filter.success !== undefined) add((p) => `l.success = ${p}`, filter.success);
    if (filter.credentialType !== undefined) add((p) => `l.credential_type = ${p}`, filter.credentialType);
    if (filter.from !== undefined) add((p) => `l.occurred_at >= ${p}`, filter.from);
    if (filter.to !== undefined) add((p) => `l.occurred_at <= ${p}`, filter.to);

    const from = `FROM access_logs l INNER JOIN access_points ap ON ap.id = l.access_point_id`;
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const countResult = await client.query(`SELECT COUNT(*) AS total ${from} ${where}`, values);

    const limitParam = values.length + 1;
    const result = await client.query(
      `SELECT ${COLUMNS} ${from} ${where}
       ORDER BY l.occurred_at DESC, l.id DESC
       LIMIT $${limitParam} OFFSET $${limitParam + 1}`,
      [...values, filter.pageSize, (filter.page - 1) * filter.pageSize],
    );

    return { items: result.rows.map(mapAccessLogRow), total: toCount(countResult.rows[0]?.total) };
  }
}

function mapAccessLogRow(row: Row): AccessLog {
  return {
    id: String(row.id),
    accessPointId: String(row.access_point_id),
    userId: toNullableId(row.user_id),
    credentialType: toCredentialType(row.credential_type),
    credentialRefId: toNullableId(row.credential_ref_id),
    success: row.success === true,
    reason: toNullableString(row.reason),
    occurredAt: toDate(row.occurred_at),
    ipAddress: toNullableString(row.ip_address),
    deviceInfo: toNullableString(row.device_info),
  };
}
