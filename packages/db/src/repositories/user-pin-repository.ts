import { type PoolClient } from 'pg';
import { type UserPin, type UserPinRepository } from '@gatehouse/domain';
import { type Row, toDate, toNullableDate, toNullableId } from '../rows';

const COLUMNS = 'id, access_point_id, user_id, pin_hash, is_active, created_by, created_at, updated_by, updated_at';

export class PgUserPinRepository implements UserPinRepository {
  async findActive(tx: unknown, accessPointId: string, userId: string): Promise<UserPin | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT ${COLUMNS} FROM user_pins
       WHERE access_point_id = $1 AND user_id = $2 AND is_active
       LIMIT 1`,
      [accessPointId, userId],
    );
    return result.rows[0] ? mapUserPinRow(result.rows[0]) : null;
  }

  async create(
    tx: unknown,
    pin: { accessPointId: string; userId: string; pinHash: string; createdBy: string },
  ): Promise<UserPin> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO user_pins (access_point_id, user_id, pin_hash, created_by)
       VALUES ($1, $2, $3, $4)
       RETURNING ${COLUMNS}`,
      [pin.accessPointId, pin.userId, pin.pinHash, pin.createdBy],
    );
    return mapUserPinRow(result.rows[0]);
  }

  async updateHash(tx: unknown, id: string, pinHash: string, updatedBy: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query(
      `UPDATE user_pins SET pin_hash = $2, updated_by = $3, updated_at = NOW() WHERE id = $1`,
      [id, pinHash, updatedBy],
    );
  }
}

function mapUserPinRow(row: Row): UserPin {
  return {
    id: String(row.id),
    accessPointId: String(row.access_point_id),
    userId: String(row.user_id),
    pinHash: String(row.pin_hash),
    isActive: row.is_active === true,
    createdBy: String(row.created_by),
    createdAt: toDate(row.created_at),
    updatedBy: toNullableId(row.updated_by),
    updatedAt: toNullableDate(row.updated_at),
  };
}
