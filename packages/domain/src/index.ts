export type {
  UserRole,
  DataAccessControl,
  UserProfile,
  Actor,
  Building,
  TenantRecord,
} from './user';
export { parseDataAccessControl } from './user';
export type {
  AccessPoint,
  MasterPin,
  UserPin,
  TemporaryPin,
  AccessCode,
  FaceImageHashes,
  FaceImageMimeTypes,
  DevicePlatform,
  FaceDeviceInfo,
  FaceBiometric,
} from './credential';
export { isAccessCodeLive, isTemporaryPinLive } from './credential';
export type { CredentialType, AccessLog, AccessLogEntry, AccessLogFilter, Page } from './access-log';
export { CREDENTIAL_TYPES } from './access-log';
export type {
  WithTransaction,
  UserDirectory,
  BuildingRepository,
  TenantDirectory,
  AccessPointRepository,
  MasterPinRepository,
  UserPinRepository,
  TemporaryPinRepository,
  AccessCodeListFilter,
  AccessCodePatch,
  AccessCodeRepository,
  FaceBiometricRepository,
  AccessLogRepository,
  SecretHasher,
  DecodedImage,
  ImageDecoder,
  OperationalLogger,
} from './ports';
export {
  isSuperAdmin,
  isTenant,
  canManageMasterPin,
  canSetUserPin,
  canManageAccessCodeAsCreator,
} from './permissions';
export {
  PIN_MIN_LENGTH,
  PIN_MAX_LENGTH,
  ACCESS_CODE_MAX_LENGTH,
  checkPin,
  checkAccessCodeSecret,
  checkSubmittedPin,
  type PinCheck,
} from './pin-policy';
export { CredentialError, type CredentialErrorKind } from './credential-error';
export { ScopeResolver, ScopeCache, type Scope, type ScopeResolverDeps } from './scope-resolver';
export { ScopeFilter, isInScope, filterByScope, type CreatedByRow, type ScopeFilterDeps } from './scope-filter';
export {
  FaceMatcher,
  NO_BUILDING_ACCESS_REASON,
  type FacePayload,
  type PreparedFace,
  type FaceMatch,
  type FaceMatcherDeps,
} from './face-matcher';
export { AuditLogger, type AuditLoggerDeps, type AccessLogQuery } from './audit-logger';
export {
  accessCodeMatcher,
  masterPinMatcher,
  temporaryPinMatcher,
  faceCredentialMatcher,
  type CredentialMatcher,
  type CredentialInput,
  type MatchContext,
  type MatchOutcome,
} from './credential-matchers';
export {
  CredentialVerifier,
  GENERIC_DENIAL_REASON,
  GRANTED_REASON,
  type VerificationRequest,
  type VerificationContext,
  type VerificationResult,
  type CredentialVerifierDeps,
} from './credential-verifier';
export {
  CredentialService,
  type CredentialServiceDeps,
  type PinChangeResult,
  type CreateAccessCodeInput,
  type UpdateAccessCodeInput,
  type CreateTemporaryPinInput,
  type AccessCodeQuery,
} from './credential-service';
export { FaceEnrollmentService, type FaceEnrollmentDeps, type DeviceInfoInput } from './face-enrollment-service';
