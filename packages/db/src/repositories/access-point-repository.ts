import { type PoolClient } from 'pg';
import { type AccessPoint, type AccessPointRepository } from '@gatehouse/domain';

export class PgAccessPointRepository implements AccessPointRepository {
  async findById(tx: unknown, id: string): Promise<AccessPoint | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT id, building_id, name, is_active FROM access_points WHERE id = $1`,
      [id],
    );
    if (!result.rows[0]) return null;
    const row = result.rows[0];
    return {
      id: String(row.id),
      buildingId: String(row.building_id),
      name: String(row.name),
      isActive: row.is_active === true,
    };
  }
}
