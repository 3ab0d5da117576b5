import { type AccessCode, type AccessLog, type FaceBiometric, type Page } from '@gatehouse/domain';
import { type AccessCodeResponse, type AccessLogResponse, type FaceBiometricResponse } from '@gatehouse/proto';

export interface PageResponse<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}

export function toPageResponse<T, R>(
  page: Page<T>,
  query: { page: number; pageSize: number },
  map: (item: T) => R,
): PageResponse<R> {
  return { items: page.items.map(map), total: page.total, page: query.page, pageSize: query.pageSize };
}

/** The plaintext copy is returned so staff can hand the code to a visitor; the hash never leaves the server. */
export function toAccessCodeResponse(code: AccessCode): AccessCodeResponse {
  return {
    id: code.id,
    buildingId: code.buildingId,
    accessPointId: code.accessPointId,
    tenantId: code.tenantId,
    code: code.codePlain,
    validFrom: code.validFrom?.toISOString() ?? null,
    expiresAt: code.expiresAt?.toISOString() ?? null,
    isSingleUse: code.isSingleUse,
    isActive: code.isActive,
    consumedAt: code.consumedAt?.toISOString() ?? null,
    createdBy: code.createdBy,
    createdAt: code.createdAt.toISOString(),
  };
}

export function toAccessLogResponse(log: AccessLog): AccessLogResponse {
  return {
    id: log.id,
    accessPointId: log.accessPointId,
    userId: log.userId,
    credentialType: log.credentialType,
    credentialRefId: log.credentialRefId,
    success: log.success,
    reason: log.reason,
    occurredAt: log.occurredAt.toISOString(),
  };
}

export function toFaceBiometricResponse(face: FaceBiometric): FaceBiometricResponse {
  return {
    id: face.id,
    userId: face.userId,
    device: face.device,
    enrolledAt: (face.updatedAt ?? face.createdAt).toISOString(),
  };
}
