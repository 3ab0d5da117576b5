import { type PoolClient } from 'pg';
import {
  type AccessCode,
  type AccessCodeListFilter,
  type AccessCodePatch,
  type AccessCodeRepository,
  type Page,
} from '@gatehouse/domain';
import { type Row, toCount, toDate, toNullableDate, toNullableId, toNullableString } from '../rows';

const COLUMNS = `id, building_id, access_point_id, tenant_id, code_hash, code_plain, valid_from, expires_at,
  is_single_use, is_active, consumed_at, created_by, created_at`;

const PATCH_COLUMNS: Record<keyof AccessCodePatch, string> = {
  codeHash: 'code_hash',
  codePlain: 'code_plain',
  isSingleUse: 'is_single_use',
  validFrom: 'valid_from',
  expiresAt: 'expires_at',
};

const PATCH_KEYS: readonly (keyof AccessCodePatch)[] = ['codeHash', 'codePlain', 'isSingleUse', 'validFrom', 'expiresAt'];

export class PgAccessCodeRepository implements AccessCodeRepository {
  async listLiveCandidates(
    tx: unknown,
    scope: { accessPointId: string; buildingId: string; now: Date },
  ): Promise<AccessCode[]> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT ${COLUMNS} FROM access_codes
       WHERE building_id = $1
         AND (access_point_id IS NULL OR access_point_id = $2)
         AND is_active
         AND consumed_at IS NULL
         AND (valid_from IS NULL OR valid_from <= $3)
         AND (expires_at IS NULL OR expires_at > $3)
       ORDER BY created_at DESC, id DESC`,
      [scope.buildingId, scope.accessPointId, scope.now],
    );
    return result.rows.map(mapAccessCodeRow);
  }

  async findById(tx: unknown, id: string): Promise<AccessCode | null> {
    const client = tx as PoolClient;
    const result = await client.query(`SELECT ${COLUMNS} FROM access_codes WHERE id = $1`, [id]);
    return result.rows[0] ? mapAccessCodeRow(result.rows[0]) : null;
  }

  async create(tx: unknown, code: Omit<AccessCode, 'id' | 'createdAt' | 'isActive' | 'consumedAt'>): Promise<AccessCode> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO access_codes
         (building_id, access_point_id, tenant_id, code_hash, code_plain, valid_from, expires_at, is_single_use, created_by)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${COLUMNS}`,
      [
        code.buildingId,
        code.accessPointId,
        code.tenantId,
        code.codeHash,
        code.codePlain,
        code.validFrom,
        code.expiresAt,
        code.isSingleUse,
        code.createdBy,
      ],
    );
    return mapAccessCodeRow(result.rows[0]);
  }

  async update(tx: unknown, id: string, patch: AccessCodePatch): Promise<AccessCode> {
    const client = tx as PoolClient;
    const assignments: string[] = [];
    const values: unknown[] = [id];

    for (const field of PATCH_KEYS) {
      if (patch[field] === undefined) continue;
      values.push(patch[field]);
      assignments.push(`${PATCH_COLUMNS[field]} = $${values.length}`);
    }

    const sql =
      assignments.length === 0
        ? `SELECT ${COLUMNS} FROM access_codes WHERE id = $1`
        : `UPDATE access_codes SET ${assignments.join(', ')} WHERE id = $1 RETURNING ${COLUMNS}`;
    const result = await client.query(sql, values);
    return mapAccessCodeRow(result.rows[0]);
  }

  async setActive(tx: unknown, id: string, isActive: boolean): Promise<AccessCode> {
    const client = tx as PoolClient;
    const result = await client.query(
      `UPDATE access_codes SET is_active = $2 WHERE id = $1 RETURNING ${COLUMNS}`,
      [id, isActive],
    );
    return mapAccessCodeRow(result.rows[0]);
  }

  async consumeSingleUse(tx: unknown, id: string, usedAt: Date): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      `UPDATE access_codes SET is_active = FALSE, consumed_at = $2
       WHERE id = $1 AND is_active AND consumed_at IS NULL RETURNING id`,
      [id, usedAt],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async delete(tx: unknown, id: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query(`DELETE FROM access_codes WHERE id = $1`, [id]);
  }

  async list(tx: unknown, filter: AccessCodeListFilter): Promise<Page<AccessCode>> {
    const client = tx as PoolClient;
    const conditions: string[] = [];
    const values: unknown[] = [];

    const add = (sql: (param: string) => string, value: unknown) => {
      values.push(value);
      conditions.push(sql(`$${values.length}`));
    };

    if (filter.buildingIds !== null) add((p) => `building_id = ANY(${p}::bigint[])`, filter.buildingIds);
    if (filter.createdBy !== undefined) add((p) => `created_by = ${p}`, filter.createdBy);
    if (filter.buildingId !== undefined) add((p) => `building_id = ${p}`, filter.buildingId);
    if (filter.accessPointId !== undefined) add((p) => `access_point_id = ${p}`, filter.accessPointId);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const countResult = await client.query(`SELECT COUNT(*) AS total FROM access_codes ${where}`, values);

    const limitParam = values.length + 1;
    const result = await client.query(
      `SELECT ${COLUMNS} FROM access_codes ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${limitParam} OFFSET $${limitParam + 1}`,
      [...values, filter.pageSize, (filter.page - 1) * filter.pageSize],
    );

    return { items: result.rows.map(mapAccessCodeRow), total: toCount(countResult.rows[0]?.total) };
  }
}

function mapAccessCodeRow(row: Row): AccessCode {
  return {
    id: String(row.id),
    buildingId: String(row.building_id),
    accessPointId: toNullableId(row.access_point_id),
    tenantId: toNullableId(row.tenant_id),
    codeHash: String(row.code_hash),
    codePlain: toNullableString(row.code_plain),
    validFrom: toNullableDate(row.valid_from),
    expiresAt: toNullableDate(row.expires_at),
    isSingleUse: row.is_single_use === true,
    isActive: row.is_active === true,
    consumedAt: toNullableDate(row.consumed_at),
    createdBy: String(row.created_by),
    createdAt: toDate(row.created_at),
  };
}
