import { type PoolClient } from 'pg';
import { type MasterPin, type MasterPinRepository } from '@gatehouse/domain';
import { type Row, toDate, toNullableDate, toNullableId } from '../rows';

const COLUMNS = 'id, access_point_id, pin_hash, is_active, created_by, created_at, updated_by, updated_at';

export class PgMasterPinRepository implements MasterPinRepository {
  async findActive(tx: unknown, accessPointId: string): Promise<MasterPin | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT ${COLUMNS} FROM master_pins WHERE access_point_id = $1 AND is_active LIMIT 1`,
      [accessPointId],
    );
    return result.rows[0] ? mapMasterPinRow(result.rows[0]) : null;
  }

  async create(
    tx: unknown,
    pin: { accessPointId: string; pinHash: string; createdBy: string },
  ): Promise<MasterPin> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO master_pins (access_point_id, pin_hash, created_by)
       VALUES ($1, $2, $3)
       RETURNING ${COLUMNS}`,
      [pin.accessPointId, pin.pinHash, pin.createdBy],
    );
    return mapMasterPinRow(result.rows[0]);
  }

  async updateHash(tx: unknown, id: string, pinHash: string, updatedBy: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query(
      `UPDATE master_pins SET pin_hash = $2, updated_by = $3, updated_at = NOW() WHERE id = $1`,
      [id, pinHash, updatedBy],
    );
  }
}

function mapMasterPinRow(row: Row): MasterPin {
  return {
    id: String(row.id),
    accessPointId: String(row.access_point_id),
    pinHash: String(row.pin_hash),
    isActive: row.is_active === true,
    createdBy: String(row.created_by),
    createdAt: toDate(row.created_at),
    updatedBy: toNullableId(row.updated_by),
    updatedAt: toNullableDate(row.updated_at),
  };
}
