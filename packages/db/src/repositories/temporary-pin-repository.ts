import { type PoolClient } from 'pg';
import { type TemporaryPin, type TemporaryPinRepository } from '@gatehouse/domain';
import { type Row, toCount, toDate, toNullableDate } from '../rows';

const COLUMNS = `id, access_point_id, created_by, pin_hash, expires_at, max_uses, uses_count,
  first_used_at, last_used_at, is_active, created_at`;

export class PgTemporaryPinRepository implements TemporaryPinRepository {
  async listLive(tx: unknown, accessPointId: string, now: Date): Promise<TemporaryPin[]> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT ${COLUMNS} FROM temporary_pins
       WHERE access_point_id = $1 AND is_active AND expires_at > $2 AND uses_count < max_uses
       ORDER BY created_at DESC`,
      [accessPointId, now],
    );
    return result.rows.map(mapTemporaryPinRow);
  }

  async create(
    tx: unknown,
    pin: { accessPointId: string; createdBy: string; pinHash: string; expiresAt: Date; maxUses: number },
  ): Promise<TemporaryPin> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO temporary_pins (access_point_id, created_by, pin_hash, expires_at, max_uses)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${COLUMNS}`,
      [pin.accessPointId, pin.createdBy, pin.pinHash, pin.expiresAt, pin.maxUses],
    );
    return mapTemporaryPinRow(result.rows[0]);
  }

  async recordUse(tx: unknown, id: string, usedAt: Date): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      `UPDATE temporary_pins
       SET uses_count = uses_count + 1,
           first_used_at = COALESCE(first_used_at, $2),
           last_used_at = $2,
           is_active = (uses_count + 1) < max_uses
       WHERE id = $1 AND is_active AND uses_count < max_uses
       RETURNING id`,
      [id, usedAt],
    );
    return (result.rowCount ?? 0) > 0;
  }
}

function mapTemporaryPinRow(row: Row): TemporaryPin {
  return {
    id: String(row.id),
    accessPointId: String(row.access_point_id),
    createdBy: String(row.created_by),
    pinHash: String(row.pin_hash),
    expiresAt: toDate(row.expires_at),
    maxUses: toCount(row.max_uses),
    usesCount: toCount(row.uses_count),
    firstUsedAt: toNullableDate(row.first_used_at),
    lastUsedAt: toNullableDate(row.last_used_at),
    isActive: row.is_active === true,
    createdAt: toDate(row.created_at),
  };
}
