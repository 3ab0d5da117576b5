import { type PoolClient } from 'pg';
import {
  type FaceBiometric,
  type FaceBiometricRepository,
  type FaceDeviceInfo,
  type FaceImageHashes,
  type FaceImageMimeTypes,
} from '@gatehouse/domain';
import { type Row, toDate, toNullableDate, toNullableString, toPlatform } from '../rows';

const COLUMNS = `id, user_id, front_image_hash, left_image_hash, right_image_hash,
  front_mime_type, left_mime_type, right_mime_type, device_platform, device_model, app_version,
  is_active, created_at, updated_at`;

export class PgFaceBiometricRepository implements FaceBiometricRepository {
  async findActiveByHashes(tx: unknown, hashes: FaceImageHashes): Promise<FaceBiometric | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT ${COLUMNS} FROM face_biometrics
       WHERE front_image_hash = $1 AND left_image_hash = $2 AND right_image_hash = $3 AND is_active
       ORDER BY created_at DESC
       LIMIT 1`,
      [hashes.front, hashes.left, hashes.right],
    );
    return result.rows[0] ? mapFaceRow(result.rows[0]) : null;
  }

  async findActiveByUserId(tx: unknown, userId: string): Promise<FaceBiometric | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT ${COLUMNS} FROM face_biometrics WHERE user_id = $1 AND is_active LIMIT 1`,
      [userId],
    );
    return result.rows[0] ? mapFaceRow(result.rows[0]) : null;
  }

  async replaceForUser(
    tx: unknown,
    record: { userId: string; hashes: FaceImageHashes; mimeTypes: FaceImageMimeTypes; device: FaceDeviceInfo },
  ): Promise<FaceBiometric> {
    const client = tx as PoolClient;
    await client.query(
      `UPDATE face_biometrics SET is_active = FALSE, updated_at = NOW() WHERE user_id = $1 AND is_active`,
      [record.userId],
    );
    const result = await client.query(
      `INSERT INTO face_biometrics
         (user_id, front_image_hash, left_image_hash, right_image_hash,
          front_mime_type, left_mime_type, right_mime_type, device_platform, device_model, app_version)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING ${COLUMNS}`,
      [
        record.userId,
        record.hashes.front,
        record.hashes.left,
        record.hashes.right,
        record.mimeTypes.front,
        record.mimeTypes.left,
        record.mimeTypes.right,
        record.device.platform,
        record.device.model,
        record.device.appVersion,
      ],
    );
    return mapFaceRow(result.rows[0]);
  }

  async deleteForUser(tx: unknown, userId: string): Promise<number> {
    const client = tx as PoolClient;
    const result = await client.query(`DELETE FROM face_biometrics WHERE user_id = $1`, [userId]);
    return result.rowCount ?? 0;
  }
}

function mapFaceRow(row: Row): FaceBiometric {
  const platform = toPlatform(row.device_platform);
  return {
    id: String(row.id),
    userId: String(row.user_id),
    hashes: {
      front: String(row.front_image_hash),
      left: String(row.left_image_hash),
      right: String(row.right_image_hash),
    },
    mimeTypes: {
      front: toNullableString(row.front_mime_type),
      left: toNullableString(row.left_mime_type),
      right: toNullableString(row.right_mime_type),
    },
    device: platform
      ? { platform, model: toNullableString(row.device_model), appVersion: toNullableString(row.app_version) }
      : null,
    isActive: row.is_active === true,
    createdAt: toDate(row.created_at),
    updatedAt: toNullableDate(row.updated_at),
  };
}
