export interface AccessPoint {
  id: string;
  buildingId: string;
  name: string;
  isActive: boolean;
}

export interface MasterPin {
  id: string;
  accessPointId: string;
  pinHash: string;
  isActive: boolean;
  createdBy: string;
  createdAt: Date;
  updatedBy: string | null;
  updatedAt: Date | null;
}

export interface UserPin {
  id: string;
  accessPointId: string;
  userId: string;
  pinHash: string;
  isActive: boolean;
  createdBy: string;
  createdAt: Date;
  updatedBy: string | null;
  updatedAt: Date | null;
}

/** Legacy per-access-point PIN with a use budget. Superseded by AccessCode. */
export interface TemporaryPin {
  id: string;
  accessPointId: string;
  createdBy: string;
  pinHash: string;
  expiresAt: Date;
  maxUses: number;
  usesCount: number;
  firstUsedAt: Date | null;
  lastUsedAt: Date | null;
  isActive: boolean;
  createdAt: Date;
}

export interface AccessCode {
  id: string;
  buildingId: string;
  /** null means the code opens every access point of the building. */
  accessPointId: string | null;
  tenantId: string | null;
  codeHash: string;
  codePlain: string | null;
  validFrom: Date | null;
  expiresAt: Date | null;
  isSingleUse: boolean;
  isActive: boolean;
  /** Set once when a single-use code grants; a spent code never goes live again. */
  consumedAt: Date | null;
  createdBy: string;
  createdAt: Date;
}

export interface FaceImageHashes {
  front: string;
  left: string;
  right: string;
}

export interface FaceImageMimeTypes {
  front: string | null;
  left: string | null;
  right: string | null;
}

export type DevicePlatform = 'android' | 'ios';

export interface FaceDeviceInfo {
  platform: DevicePlatform;
  model: string | null;
  appVersion: string | null;
}

export interface FaceBiometric {
  id: string;
  userId: string;
  hashes: FaceImageHashes;
  mimeTypes: FaceImageMimeTypes;
  device: FaceDeviceInfo | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date | null;
}

export function isAccessCodeLive(code: AccessCode, now: Date): boolean {
  if (!code.isActive || code.consumedAt !== null) return false;
  if (code.validFrom && code.validFrom.getTime() > now.getTime()) return false;
  if (code.expiresAt && code.expiresAt.getTime() <= now.getTime()) return false;
  return true;
}

export function isTemporaryPinLive(pin: TemporaryPin, now: Date): boolean {
  return pin.isActive && pin.usesCount < pin.maxUses && pin.expiresAt.getTime() > now.getTime();
}
