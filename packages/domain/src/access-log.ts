export type CredentialType = 'AccessCode' | 'Master' | 'TemporaryPin' | 'User' | 'Face' | 'None';

export const CREDENTIAL_TYPES: readonly CredentialType[] = [
  'AccessCode',
  'Master',
  'TemporaryPin',
  'User',
  'Face',
  'None',
];

export interface AccessLog {
  id: string;
  accessPointId: string;
  userId: string | null;
  credentialType: CredentialType;
  credentialRefId: string | null;
  success: boolean;
  reason: string | null;
  occurredAt: Date;
  ipAddress: string | null;
  deviceInfo: string | null;
}

export type AccessLogEntry = Omit<AccessLog, 'id'>;

export interface AccessLogFilter {
  /** null means no building restriction. */
  buildingIds: string[] | null;
  accessPointId?: string;
  accessCodeId?: string;
  userId?: string;
  success?: boolean;
  credentialType?: CredentialType;
  from?: Date;
  to?: Date;
  page: number;
  pageSize: number;
}

export interface Page<T> {
  items: T[];
  total: number;
}
