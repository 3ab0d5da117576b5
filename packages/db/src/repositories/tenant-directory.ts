import { type PoolClient } from 'pg';
import { type TenantDirectory, type TenantRecord } from '@gatehouse/domain';
import { toNullableId } from '../rows';

export class PgTenantDirectory implements TenantDirectory {
  async findBuildingIdForTenantUser(tx: unknown, userId: string): Promise<string | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT building_id FROM tenants
       WHERE user_id = $1 AND is_active
       ORDER BY id ASC
       LIMIT 1`,
      [userId],
    );
    return result.rows[0] ? String(result.rows[0].building_id) : null;
  }

  async findTenant(tx: unknown, tenantId: string): Promise<TenantRecord | null> {
    const client = tx as PoolClient;
    const result = await client.query(`SELECT id, user_id, building_id FROM tenants WHERE id = $1`, [tenantId]);
    if (!result.rows[0]) return null;
    const row = result.rows[0];
    return { id: String(row.id), userId: toNullableId(row.user_id), buildingId: String(row.building_id) };
  }
}
