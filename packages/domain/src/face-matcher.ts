import { type FaceImageHashes, type FaceImageMimeTypes } from './credential';
import { type FaceBiometricRepository, type ImageDecoder } from './ports';
import { type ScopeCache } from './scope-resolver';
import { type ScopeFilter } from './scope-filter';
import { CredentialError } from './credential-error';

export interface FacePayload {
  frontImageBase64: string;
  leftImageBase64: string;
  rightImageBase64: string;
}

export interface PreparedFace {
  hashes: FaceImageHashes;
  mimeTypes: FaceImageMimeTypes;
}

export type FaceMatch =
  | { kind: 'granted'; recordId: string; userId: string }
  | { kind: 'no-building-access'; recordId: string; userId: string }
  | { kind: 'no-match' };

export const NO_BUILDING_ACCESS_REASON = 'user has no access to this building';

const SIDES = ['front', 'left', 'right'] as const;

export interface FaceMatcherDeps {
  imageDecoder: ImageDecoder;
  faceRepo: FaceBiometricRepository;
  scopeFilter: ScopeFilter;
}

/**
 * Exact content-hash comparison of the three enrollment angles. This is not
 * biometric similarity matching: a re-encoded or re-captured image will not match.
 */
export class FaceMatcher {
  constructor(private readonly deps: FaceMatcherDeps) {}

  prepare(payload: FacePayload): PreparedFace {
    const encoded: Record<(typeof SIDES)[number], string> = {
      front: payload.frontImageBase64,
      left: payload.leftImageBase64,
      right: payload.rightImageBase64,
    };

    if (SIDES.some((side) => !encoded[side] || encoded[side].trim() === '')) {
      throw new CredentialError('VALIDATION', 'All three face images are required.');
    }

    const hashes: FaceImageHashes = { front: '', left: '', right: '' };
    const mimeTypes: FaceImageMimeTypes = { front: null, left: null, right: null };

    for (const side of SIDES) {
      const decoded = this.deps.imageDecoder.decode(encoded[side]);
      if (!decoded.ok) {
        throw new CredentialError('VALIDATION', `Invalid ${side} image: ${decoded.error}`);
      }
      hashes[side] = decoded.contentHash;
      mimeTypes[side] = decoded.mimeType;
    }

    return { hashes, mimeTypes };
  }

  async match(tx: unknown, hashes: FaceImageHashes, buildingId: string, cache: ScopeCache): Promise<FaceMatch> {
    const record = await this.deps.faceRepo.findActiveByHashes(tx, hashes);
    if (!record) return { kind: 'no-match' };

    const allowed = await this.deps.scopeFilter.hasBuildingAccess(tx, record.userId, buildingId, cache);
    if (!allowed) {
      return { kind: 'no-building-access', recordId: record.id, userId: record.userId };
    }
    return { kind: 'granted', recordId: record.id, userId: record.userId };
  }
}
