import { type Actor } from './user';
import { type DevicePlatform, type FaceBiometric, type FaceDeviceInfo } from './credential';
import { type FaceBiometricRepository, type UserDirectory, type WithTransaction } from './ports';
import { type FaceMatcher, type FacePayload } from './face-matcher';
import { isSuperAdmin } from './permissions';
import { CredentialError } from './credential-error';

const PLATFORMS: readonly DevicePlatform[] = ['android', 'ios'];

export interface FaceEnrollmentDeps {
  faceRepo: FaceBiometricRepository;
  userDirectory: UserDirectory;
  faceMatcher: FaceMatcher;
  withTransaction: WithTransaction;
}

export interface DeviceInfoInput {
  platform: string;
  model?: string | null;
  appVersion?: string | null;
}

export class FaceEnrollmentService {
  constructor(private readonly deps: FaceEnrollmentDeps) {}

  async get(actor: Actor): Promise<FaceBiometric> {
    return this.deps.withTransaction(async (tx) => {
      const record = await this.deps.faceRepo.findActiveByUserId(tx, actor.userId);
      if (!record) {
        throw new CredentialError('NOT_FOUND', 'No face biometric enrolled.');
      }
      return record;
    });
  }

  /** Enrolls or re-enrolls; any previous active record is deactivated. */
  async enroll(actor: Actor, payload: FacePayload, deviceInfo: DeviceInfoInput): Promise<FaceBiometric> {
    const device = parseDeviceInfo(deviceInfo);
    const prepared = this.deps.faceMatcher.prepare(payload);

    return this.deps.withTransaction(async (tx) => {
      const profile = await this.deps.userDirectory.findProfile(tx, actor.userId);
      if (!profile || !profile.isActive) {
        throw new CredentialError('NOT_FOUND', `User ${actor.userId} not found or inactive.`);
      }

      return this.deps.faceRepo.replaceForUser(tx, {
        userId: actor.userId,
        hashes: prepared.hashes,
        mimeTypes: prepared.mimeTypes,
        device,
      });
    });
  }

  async remove(actor: Actor, userId: string = actor.userId): Promise<void> {
    if (userId !== actor.userId && !isSuperAdmin(actor.role)) {
      throw new CredentialError('FORBIDDEN', 'Not allowed.');
    }

    return this.deps.withTransaction(async (tx) => {
      const removed = await this.deps.faceRepo.deleteForUser(tx, userId);
      if (removed === 0) {
        throw new CredentialError('NOT_FOUND', 'No face biometric enrolled.');
      }
    });
  }
}

function parseDeviceInfo(input: DeviceInfoInput): FaceDeviceInfo {
  const platform = PLATFORMS.find((p) => p === input.platform.trim().toLowerCase());
  if (!platform) {
    throw new CredentialError('VALIDATION', 'Device platform must be android or ios.');
  }
  return {
    platform,
    model: input.model?.trim() || null,
    appVersion: input.appVersion?.trim() || null,
  };
}
