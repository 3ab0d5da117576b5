import { type AccessPoint, type FaceImageHashes } from './credential';
import { type CredentialType } from './access-log';
import {
  type AccessCodeRepository,
  type MasterPinRepository,
  type TemporaryPinRepository,
  type SecretHasher,
} from './ports';
import { type ScopeCache } from './scope-resolver';
import { type FaceMatcher, NO_BUILDING_ACCESS_REASON } from './face-matcher';

export interface CredentialInput {
  pin: string | null;
  face: FaceImageHashes | null;
}

export interface MatchContext {
  tx: unknown;
  accessPoint: AccessPoint;
  now: Date;
  cache: ScopeCache;
}

export type MatchOutcome =
  | { kind: 'granted'; credentialType: CredentialType; credentialRefId: string; userId: string | null }
  | {
      kind: 'denied';
      credentialType: CredentialType;
      credentialRefId: string;
      userId: string | null;
      reason: string;
    }
  | { kind: 'no-match' };

export interface CredentialMatcher {
  readonly type: CredentialType;
  applies(input: CredentialInput): boolean;
  attempt(ctx: MatchContext, input: CredentialInput): Promise<MatchOutcome>;
}

const NO_MATCH: MatchOutcome = { kind: 'no-match' };

function hasPin(input: CredentialInput): input is CredentialInput & { pin: string } {
  return input.pin !== null;
}

export function accessCodeMatcher(deps: {
  accessCodeRepo: AccessCodeRepository;
  hasher: SecretHasher;
}): CredentialMatcher {
  return {
    type: 'AccessCode',
    applies: hasPin,
    async attempt(ctx, input) {
      if (!hasPin(input)) return NO_MATCH;

      const candidates = await deps.accessCodeRepo.listLiveCandidates(ctx.tx, {
        accessPointId: ctx.accessPoint.id,
        buildingId: ctx.accessPoint.buildingId,
        now: ctx.now,
      });

      for (const code of candidates) {
        if (!(await deps.hasher.verify(input.pin, code.codeHash))) continue;

        if (code.isSingleUse) {
          const consumed = await deps.accessCodeRepo.consumeSingleUse(ctx.tx, code.id, ctx.now);
          if (!consumed) continue;
        }

        return { kind: 'granted', credentialType: 'AccessCode', credentialRefId: code.id, userId: code.createdBy };
      }
      return NO_MATCH;
    },
  };
}

export function masterPinMatcher(deps: {
  masterPinRepo: MasterPinRepository;
  hasher: SecretHasher;
}): CredentialMatcher {
  return {
    type: 'Master',
    applies: hasPin,
    async attempt(ctx, input) {
      if (!hasPin(input)) return NO_MATCH;

      const master = await deps.masterPinRepo.findActive(ctx.tx, ctx.accessPoint.id);
      if (!master || !(await deps.hasher.verify(input.pin, master.pinHash))) return NO_MATCH;

      return { kind: 'granted', credentialType: 'Master', credentialRefId: master.id, userId: null };
    },
  };
}

export function temporaryPinMatcher(deps: {
  temporaryPinRepo: TemporaryPinRepository;
  hasher: SecretHasher;
}): CredentialMatcher {
  return {
    type: 'TemporaryPin',
    applies: hasPin,
    async attempt(ctx, input) {
      if (!hasPin(input)) return NO_MATCH;

      const candidates = await deps.temporaryPinRepo.listLive(ctx.tx, ctx.accessPoint.id, ctx.now);
      for (const pin of candidates) {
        if (!(await deps.hasher.verify(input.pin, pin.pinHash))) continue;
        if (!(await deps.temporaryPinRepo.recordUse(ctx.tx, pin.id, ctx.now))) continue;

        return { kind: 'granted', credentialType: 'TemporaryPin', credentialRefId: pin.id, userId: pin.createdBy };
      }
      return NO_MATCH;
    },
  };
}

export function faceCredentialMatcher(deps: { faceMatcher: FaceMatcher }): CredentialMatcher {
  return {
    type: 'Face',
    applies: (input) => input.face !== null,
    async attempt(ctx, input) {
      if (input.face === null) return NO_MATCH;

      const match = await deps.faceMatcher.match(ctx.tx, input.face, ctx.accessPoint.buildingId, ctx.cache);
      switch (match.kind) {
        case 'no-match':
          return NO_MATCH;
        case 'no-building-access':
          return {
            kind: 'denied',
            credentialType: 'Face',
            credentialRefId: match.recordId,
            userId: match.userId,
            reason: NO_BUILDING_ACCESS_REASON,
          };
        case 'granted':
          return { kind: 'granted', credentialType: 'Face', credentialRefId: match.recordId, userId: match.userId };
      }
    },
  };
}
