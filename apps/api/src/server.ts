import Fastify from 'fastify';
import { createLogger, JoseTokenService, Argon2SecretHasher, Base64ImageDecoder, type TokenService } from '@gatehouse/shared';
import {
  ScopeResolver,
  ScopeFilter,
  FaceMatcher,
  AuditLogger,
  CredentialVerifier,
  CredentialService,
  FaceEnrollmentService,
  accessCodeMatcher,
  masterPinMatcher,
  temporaryPinMatcher,
  faceCredentialMatcher,
} from '@gatehouse/domain';
import {
  withTransaction,
  PgUserDirectory,
  PgBuildingRepository,
  PgTenantDirectory,
  PgAccessPointRepository,
  PgMasterPinRepository,
  PgUserPinRepository,
  PgTemporaryPinRepository,
  PgAccessCodeRepository,
  PgFaceBiometricRepository,
  PgAccessLogRepository,
} from '@gatehouse/db';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { createRateLimiter } from './plugins/rate-limit';
import { registerIntercomAccessRoutes } from './routes/intercom-access';
import { registerAccessCodeRoutes } from './routes/access-codes';
import { registerAccessLogRoutes } from './routes/access-logs';
import { registerFaceBiometricRoutes } from './routes/face-biometrics';

const logger = createLogger({ name: 'api' });

export interface ServerConfig {
  jwtActiveKid: string;
  jwtKeys: Array<{ kid: string; secret: string }>;
  jwtIssuer: string;
  jwtAccessTokenTtl: string;
  verifyRateLimitPerMinute: number;
  faceMaxImageBytes: number;
  accessLogMaxPageSize: number;
}

export interface ApiServices {
  tokenService: Pick<TokenService, 'verifyAccessToken'>;
  credentialVerifier: Pick<CredentialVerifier, 'verifyAccess'>;
  credentialService: Pick<
    CredentialService,
    | 'setOrUpdateMasterPin'
    | 'setOrUpdateUserPin'
    | 'updateOwnPin'
    | 'createTemporaryPin'
    | 'createAccessCode'
    | 'updateAccessCode'
    | 'toggleAccessCode'
    | 'deleteAccessCode'
    | 'listAccessCodes'
  >;
  faceEnrollmentService: Pick<FaceEnrollmentService, 'get' | 'enroll' | 'remove'>;
  auditLogger: Pick<AuditLogger, 'listLogs'>;
}

/** Wires the domain engines onto the Postgres repositories. `initPool` must run first. */
export function createServices(config: ServerConfig): ApiServices {
  const userDirectory = new PgUserDirectory();
  const buildingRepo = new PgBuildingRepository();
  const tenantDirectory = new PgTenantDirectory();
  const accessPointRepo = new PgAccessPointRepository();
  const masterPinRepo = new PgMasterPinRepository();
  const userPinRepo = new PgUserPinRepository();
  const temporaryPinRepo = new PgTemporaryPinRepository();
  const accessCodeRepo = new PgAccessCodeRepository();
  const faceRepo = new PgFaceBiometricRepository();
  const hasher = new Argon2SecretHasher();

  const scopeFilter = new ScopeFilter({
    scopeResolver: new ScopeResolver({ userDirectory }),
    buildingRepo,
    tenantDirectory,
  });
  const faceMatcher = new FaceMatcher({
    imageDecoder: new Base64ImageDecoder(config.faceMaxImageBytes),
    faceRepo,
    scopeFilter,
  });
  const auditLogger = new AuditLogger({
    accessLogRepo: new PgAccessLogRepository(),
    scopeFilter,
    logger: createLogger({ name: 'audit' }),
    withTransaction,
  });

  const credentialVerifier = new CredentialVerifier({
    accessPointRepo,
    faceMatcher,
    auditLogger,
    matchers: [
      accessCodeMatcher({ accessCodeRepo, hasher }),
      masterPinMatcher({ masterPinRepo, hasher }),
      temporaryPinMatcher({ temporaryPinRepo, hasher }),
      faceCredentialMatcher({ faceMatcher }),
    ],
    logger: createLogger({ name: 'verifier' }),
    withTransaction,
  });

  const credentialService = new CredentialService({
    accessPointRepo,
    buildingRepo,
    tenantDirectory,
    userDirectory,
    masterPinRepo,
    userPinRepo,
    temporaryPinRepo,
    accessCodeRepo,
    hasher,
    scopeFilter,
    auditLogger,
    withTransaction,
  });

  const faceEnrollmentService = new FaceEnrollmentService({
    faceRepo,
    userDirectory,
    faceMatcher,
    withTransaction,
  });

  const tokenService = new JoseTokenService({
    activeKid: config.jwtActiveKid,
    keys: config.jwtKeys,
    accessTokenTtl: config.jwtAccessTokenTtl,
    issuer: config.jwtIssuer,
  });

  return { tokenService, credentialVerifier, credentialService, faceEnrollmentService, auditLogger };
}

export async function buildServer(config: ServerConfig, services: ApiServices = createServices(config)) {
  // Three base64 face images plus envelope.
  const bodyLimit = Math.ceil((config.faceMaxImageBytes * 4) / 3) * 3 + 65_536;
  const app = Fastify({
    logger: false,
    bodyLimit,
  });

  registerErrorHandler(app);

  const authenticate = createAuthMiddleware(services.tokenService);
  const verifyRateLimit = createRateLimiter({ windowMs: 60_000, maxRequests: config.verifyRateLimitPerMinute });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerIntercomAccessRoutes(app, {
    credentialVerifier: services.credentialVerifier,
    credentialService: services.credentialService,
    authenticate,
    verifyRateLimit,
  });
  registerAccessCodeRoutes(app, { credentialService: services.credentialService, authenticate });
  registerAccessLogRoutes(app, {
    auditLogger: services.auditLogger,
    authenticate,
    maxPageSize: config.accessLogMaxPageSize,
  });
  registerFaceBiometricRoutes(app, { faceEnrollmentService: services.faceEnrollmentService, authenticate });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info({ method: request.method, url: request.routeOptions.url, requestId: request.id }, 'Incoming request');
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      {
        method: request.method,
        url: request.routeOptions.url,
        statusCode: reply.statusCode,
        requestId: request.id,
        durationMs: Math.round(reply.elapsedTime),
      },
      'Request completed',
    );
    done();
  });

  return app;
}
