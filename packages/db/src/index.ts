export { initPool, closePool, getPool, withTransaction } from './client';
export { PgUserDirectory } from './repositories/user-directory';
export { PgBuildingRepository } from './repositories/building-repository';
export { PgTenantDirectory } from './repositories/tenant-directory';
export { PgAccessPointRepository } from './repositories/access-point-repository';
export { PgMasterPinRepository } from './repositories/master-pin-repository';
export { PgUserPinRepository } from './repositories/user-pin-repository';
export { PgTemporaryPinRepository } from './repositories/temporary-pin-repository';
export { PgAccessCodeRepository } from './repositories/access-code-repository';
export { PgFaceBiometricRepository } from './repositories/face-biometric-repository';
export { PgAccessLogRepository } from './repositories/access-log-repository';
