import { type AccessPoint, type FaceImageHashes } from './credential';
import { type CredentialType } from './access-log';
import { type AccessPointRepository, type OperationalLogger, type WithTransaction } from './ports';
import { ScopeCache } from './scope-resolver';
import { type AuditLogger } from './audit-logger';
import { type FaceMatcher, type FacePayload } from './face-matcher';
import { type CredentialMatcher, type CredentialInput, type MatchOutcome } from './credential-matchers';
import { checkSubmittedPin } from './pin-policy';
import { CredentialError } from './credential-error';

export const GENERIC_DENIAL_REASON = 'Invalid or expired';
export const GRANTED_REASON = 'OK';

export interface VerificationRequest {
  pin?: string | null;
  face?: FacePayload | null;
}

export interface VerificationContext {
  ip: string | null;
  device: string | null;
}

export interface VerificationResult {
  granted: boolean;
  reason: string;
  credentialType: CredentialType;
  credentialRefId: string | null;
  timestamp: Date;
}

export interface CredentialVerifierDeps {
  accessPointRepo: AccessPointRepository;
  faceMatcher: FaceMatcher;
  auditLogger: AuditLogger;
  /** Evaluated in order; the first decisive outcome wins. PIN matchers come before face. */
  matchers: CredentialMatcher[];
  logger: OperationalLogger;
  withTransaction: WithTransaction;
}

export class CredentialVerifier {
  constructor(private readonly deps: CredentialVerifierDeps) {}

  async verifyAccess(
    accessPointId: string,
    request: VerificationRequest,
    context: VerificationContext,
  ): Promise<VerificationResult> {
    const input = this.parseInput(request);

    let found: AccessPoint | null;
    try {
      found = await this.deps.withTransaction((tx) => this.deps.accessPointRepo.findById(tx, accessPointId));
    } catch (err) {
      return this.failClosed(accessPointId, context, err);
    }
    if (!found) {
      throw new CredentialError('NOT_FOUND', `Access point ${accessPointId} not found.`);
    }
    const accessPoint = found;

    try {
      return await this.deps.withTransaction((tx) => this.evaluate(tx, accessPoint, input, context));
    } catch (err) {
      return this.failClosed(accessPointId, context, err);
    }
  }

  private parseInput(request: VerificationRequest): CredentialInput {
    const pinCheck = checkSubmittedPin(request.pin);
    if (pinCheck && !pinCheck.ok) {
      throw new CredentialError('VALIDATION', pinCheck.error);
    }

    let face: FaceImageHashes | null = null;
    if (request.face) {
      face = this.deps.faceMatcher.prepare(request.face).hashes;
    }

    return { pin: pinCheck ? pinCheck.value : null, face };
  }

  private async evaluate(
    tx: unknown,
    accessPoint: AccessPoint,
    input: CredentialInput,
    context: VerificationContext,
  ): Promise<VerificationResult> {
    const now = new Date();
    const cache = new ScopeCache();

    let outcome: MatchOutcome = { kind: 'no-match' };
    for (const matcher of this.deps.matchers) {
      if (!matcher.applies(input)) continue;
      outcome = await matcher.attempt({ tx, accessPoint, now, cache }, input);
      if (outcome.kind !== 'no-match') break;
    }

    const result = toResult(outcome, now);
    await this.deps.auditLogger.record(tx, {
      accessPointId: accessPoint.id,
      userId: outcome.kind === 'no-match' ? null : outcome.userId,
      credentialType: result.credentialType,
      credentialRefId: result.credentialRefId,
      success: result.granted,
      reason: result.reason,
      occurredAt: now,
      ipAddress: context.ip,
      deviceInfo: context.device,
    });
    return result;
  }

  private async failClosed(
    accessPointId: string,
    context: VerificationContext,
    err: unknown,
  ): Promise<VerificationResult> {
    const now = new Date();
    this.deps.logger.error(
      { err: err instanceof Error ? err.message : String(err), accessPointId },
      'Access verification failed; denying',
    );

    await this.deps.auditLogger.recordBestEffort({
      accessPointId,
      userId: null,
      credentialType: 'None',
      credentialRefId: null,
      success: false,
      reason: GENERIC_DENIAL_REASON,
      occurredAt: now,
      ipAddress: context.ip,
      deviceInfo: context.device,
    });

    return denial(now);
  }
}

function denial(timestamp: Date): VerificationResult {
  return { granted: false, reason: GENERIC_DENIAL_REASON, credentialType: 'None', credentialRefId: null, timestamp };
}

function toResult(outcome: MatchOutcome, timestamp: Date): VerificationResult {
  switch (outcome.kind) {
    case 'no-match':
      return denial(timestamp);
    case 'denied':
      return {
        granted: false,
        reason: outcome.reason,
        credentialType: outcome.credentialType,
        credentialRefId: outcome.credentialRefId,
        timestamp,
      };
    case 'granted':
      return {
        granted: true,
        reason: GRANTED_REASON,
        credentialType: outcome.credentialType,
        credentialRefId: outcome.credentialRefId,
        timestamp,
      };
  }
}
