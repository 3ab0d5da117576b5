import { type PoolClient } from 'pg';
import { type Building, type BuildingRepository } from '@gatehouse/domain';
import { type Row, toNullableId } from '../rows';

export class PgBuildingRepository implements BuildingRepository {
  async findById(tx: unknown, id: string): Promise<Building | null> {
    const client = tx as PoolClient;
    const result = await client.query(`SELECT id, owner_id, created_by FROM buildings WHERE id = $1`, [id]);
    const row: Row | undefined = result.rows[0];
    if (!row) return null;
    return { id: String(row.id), ownerId: toNullableId(row.owner_id), createdBy: toNullableId(row.created_by) };
  }

  async hasActivePermission(tx: unknown, userId: string, buildingId: string): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT 1 FROM building_permissions
       WHERE user_id = $1 AND building_id = $2 AND is_active
       LIMIT 1`,
      [userId, buildingId],
    );
    return result.rows.length > 0;
  }

  async listPermittedBuildingIds(tx: unknown, userId: string): Promise<string[]> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT DISTINCT building_id FROM building_permissions WHERE user_id = $1 AND is_active`,
      [userId],
    );
    return result.rows.map((row: Row) => String(row.building_id));
  }

  async listOwnedBuildingIds(tx: unknown, userIds: string[]): Promise<string[]> {
    if (userIds.length === 0) return [];
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT id FROM buildings
       WHERE owner_id = ANY($1::bigint[]) OR created_by = ANY($1::bigint[])`,
      [userIds],
    );
    return result.rows.map((row: Row) => String(row.id));
  }
}
