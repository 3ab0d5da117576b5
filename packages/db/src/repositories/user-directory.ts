import { type PoolClient } from 'pg';
import { type UserDirectory, type UserProfile } from '@gatehouse/domain';
import { type Row, toNullableId, toNullableString, toRole } from '../rows';

export class PgUserDirectory implements UserDirectory {
  async findProfile(tx: unknown, userId: string): Promise<UserProfile | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT u.id, u.user_type_id, u.is_active, u.invited_by_user_id, u.created_by_user_id,
              t.role, t.data_access_control
       FROM users u
       INNER JOIN user_types t ON t.id = u.user_type_id
       WHERE u.id = $1`,
      [userId],
    );
    return result.rows[0] ? mapProfileRow(result.rows[0]) : null;
  }

  async listDirectInviteeIds(tx: unknown, rootUserId: string): Promise<string[]> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT id FROM users
       WHERE invited_by_user_id = $1 OR created_by_user_id = $1`,
      [rootUserId],
    );
    return result.rows.map((row: Row) => String(row.id));
  }
}

function mapProfileRow(row: Row): UserProfile {
  return {
    userId: String(row.id),
    userTypeId: String(row.user_type_id),
    role: toRole(row.role),
    dataAccessControl: toNullableString(row.data_access_control),
    isActive: row.is_active === true,
    invitedByUserId: toNullableId(row.invited_by_user_id),
    createdByUserId: toNullableId(row.created_by_user_id),
  };
}
