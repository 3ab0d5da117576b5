import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { JoseTokenService } from '@gatehouse/shared';
import { CredentialError, type AccessCode, type Actor } from '@gatehouse/domain';
import { buildServer, type ServerConfig } from '../server';

const config: ServerConfig = {
  jwtActiveKid: 'k1',
  jwtKeys: [{ kid: 'k1', secret: 'test-secret-test-secret-test-secret' }],
  jwtIssuer: 'gatehouse',
  jwtAccessTokenTtl: '900',
  verifyRateLimitPerMinute: 2,
  faceMaxImageBytes: 1024,
  accessLogMaxPageSize: 50,
};

const tokenService = new JoseTokenService({
  activeKid: config.jwtActiveKid,
  keys: config.jwtKeys,
  accessTokenTtl: config.jwtAccessTokenTtl,
  issuer: config.jwtIssuer,
});

const admin: Actor = { userId: '1', role: 'SUPER_ADMIN' };
const tenant: Actor = { userId: '40', role: 'TENANT' };

const code: AccessCode = {
  id: '501',
  buildingId: '7',
  accessPointId: '12',
  tenantId: null,
  codeHash: 'argon-hash',
  codePlain: '246810',
  validFrom: null,
  expiresAt: new Date('2030-01-01T00:00:00.000Z'),
  isSingleUse: true,
  isActive: true,
  consumedAt: null,
  createdBy: '40',
  createdAt: new Date('2026-05-01T08:00:00.000Z'),
};

function createStubServices() {
  return {
    tokenService,
    credentialVerifier: { verifyAccess: vi.fn() },
    credentialService: {
      setOrUpdateMasterPin: vi.fn(),
      setOrUpdateUserPin: vi.fn(),
      updateOwnPin: vi.fn(),
      createTemporaryPin: vi.fn(),
      createAccessCode: vi.fn(),
      updateAccessCode: vi.fn(),
      toggleAccessCode: vi.fn(),
      deleteAccessCode: vi.fn(),
      listAccessCodes: vi.fn(),
    },
    faceEnrollmentService: { get: vi.fn(), enroll: vi.fn(), remove: vi.fn() },
    auditLogger: { listLogs: vi.fn() },
  };
}

async function bearer(actor: Actor): Promise<Record<string, string>> {
  return { authorization: `Bearer ${await tokenService.signAccessToken(actor)}` };
}

describe('API server', () => {
  let app: FastifyInstance;
  let services: ReturnType<typeof createStubServices>;

  beforeEach(async () => {
    services = createStubServices();
    app = await buildServer(config, services);
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('ok');
  });

  describe('POST /intercoms/:accessPointId/access/verify', () => {
    it('returns the decision and passes the caller context', async () => {
      services.credentialVerifier.verifyAccess.mockResolvedValue({
        granted: true,
        reason: 'OK',
        credentialType: 'AccessCode',
        credentialRefId: '501',
        timestamp: new Date('2026-06-01T12:00:00.000Z'),
      });

      const res = await app.inject({
        method: 'POST',
        url: '/intercoms/12/access/verify',
        payload: { pin: '246810', device: 'lobby-panel' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        granted: true,
        reason: 'OK',
        credentialType: 'AccessCode',
        credentialRefId: '501',
        timestamp: '2026-06-01T12:00:00.000Z',
      });
      expect(services.credentialVerifier.verifyAccess).toHaveBeenCalledWith(
        '12',
        { pin: '246810', face: undefined },
        { ip: '127.0.0.1', device: 'lobby-panel' },
      );
    });

    it('does not require a bearer token', async () => {
      services.credentialVerifier.verifyAccess.mockResolvedValue({
        granted: false,
        reason: 'Invalid or expired',
        credentialType: 'None',
        credentialRefId: null,
        timestamp: new Date('2026-06-01T12:00:00.000Z'),
      });

      const res = await app.inject({ method: 'POST', url: '/intercoms/12/access/verify', payload: { pin: '0000' } });

      expect(res.statusCode).toBe(200);
      expect(res.json().granted).toBe(false);
    });

    it('rejects a non-numeric access point id', async () => {
      const res = await app.inject({ method: 'POST', url: '/intercoms/abc/access/verify', payload: { pin: '1234' } });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toMatchObject({ code: 'VALIDATION', message: 'Invalid access point id' });
      expect(services.credentialVerifier.verifyAccess).not.toHaveBeenCalled();
    });

    it('rejects unknown body fields', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/intercoms/12/access/verify',
        payload: { pin: '1234', userId: '1' },
      });

      expect(res.statusCode).toBe(422);
      expect(res.json().message).toBe('Invalid verification request');
    });

    it('maps an unknown access point to 404', async () => {
      services.credentialVerifier.verifyAccess.mockRejectedValue(
        new CredentialError('NOT_FOUND', 'Access point 12 not found.'),
      );

      const res = await app.inject({ method: 'POST', url: '/intercoms/12/access/verify', payload: { pin: '1234' } });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ code: 'NOT_FOUND', message: 'Access point 12 not found.' });
    });

    it('rate limits by client IP', async () => {
      services.credentialVerifier.verifyAccess.mockResolvedValue({
        granted: false,
        reason: 'Invalid or expired',
        credentialType: 'None',
        credentialRefId: null,
        timestamp: new Date('2026-06-01T12:00:00.000Z'),
      });
      const request = { method: 'POST' as const, url: '/intercoms/12/access/verify', payload: { pin: '0000' } };

      await app.inject(request);
      await app.inject(request);
      const res = await app.inject(request);

      expect(res.statusCode).toBe(429);
      expect(res.json().code).toBe('RATE_LIMITED');
      expect(res.headers['retry-after']).toBe('60');
      expect(services.credentialVerifier.verifyAccess).toHaveBeenCalledTimes(2);
    });
  });

  describe('pin management', () => {
    it('requires a bearer token', async () => {
      const res = await app.inject({ method: 'POST', url: '/intercoms/12/access/master-pin', payload: { pin: '9999' } });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ code: 'UNAUTHORIZED', message: 'Missing or invalid authorization header' });
    });

    it('rejects a token signed with another key', async () => {
      const stranger = new JoseTokenService({
        activeKid: 'k1',
        keys: [{ kid: 'k1', secret: 'other-secret-other-secret-other-secret' }],
        accessTokenTtl: '900',
      });

      const res = await app.inject({
        method: 'POST',
        url: '/intercoms/12/access/master-pin',
        headers: { authorization: `Bearer ${await stranger.signAccessToken(admin)}` },
        payload: { pin: '9999' },
      });

      expect(res.statusCode).toBe(401);
      expect(res.json().message).toBe('Invalid or expired access token');
    });

    it('creates a master pin as the token actor', async () => {
      services.credentialService.setOrUpdateMasterPin.mockResolvedValue({ created: true });

      const res = await app.inject({
        method: 'POST',
        url: '/intercoms/12/access/master-pin',
        headers: await bearer(admin),
        payload: { pin: '9999' },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({ created: true });
      expect(services.credentialService.setOrUpdateMasterPin).toHaveBeenCalledWith(admin, '12', '9999');
    });

    it('answers 200 when an existing pin is updated', async () => {
      services.credentialService.updateOwnPin.mockResolvedValue({ created: false });

      const res = await app.inject({
        method: 'POST',
        url: '/intercoms/12/access/pin/self',
        headers: await bearer(tenant),
        payload: { newPin: '5678', oldPin: '1234' },
      });

      expect(res.statusCode).toBe(200);
      expect(services.credentialService.updateOwnPin).toHaveBeenCalledWith(tenant, '12', '5678', '1234');
    });

    it('maps FORBIDDEN to 403', async () => {
      services.credentialService.setOrUpdateUserPin.mockRejectedValue(new CredentialError('FORBIDDEN', 'Not allowed.'));

      const res = await app.inject({
        method: 'POST',
        url: '/intercoms/12/access/users/99/pin',
        headers: await bearer(tenant),
        payload: { pin: '1111' },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({ code: 'FORBIDDEN', message: 'Not allowed.' });
      expect(services.credentialService.setOrUpdateUserPin).toHaveBeenCalledWith(tenant, '12', '99', '1111', undefined);
    });

    it('creates a temporary pin with a default of one use', async () => {
      services.credentialService.createTemporaryPin.mockResolvedValue({
        id: '77',
        accessPointId: '12',
        createdBy: '40',
        pinHash: 'argon-hash',
        expiresAt: new Date('2030-01-01T00:00:00.000Z'),
        maxUses: 1,
        usesCount: 0,
        firstUsedAt: null,
        lastUsedAt: null,
        isActive: true,
        createdAt: new Date('2026-06-01T00:00:00.000Z'),
      });

      const res = await app.inject({
        method: 'POST',
        url: '/intercoms/12/access/temporary-pins',
        headers: await bearer(tenant),
        payload: { pin: '4321', expiresAt: '2030-01-01T00:00:00Z' },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({
        id: '77',
        accessPointId: '12',
        expiresAt: '2030-01-01T00:00:00.000Z',
        maxUses: 1,
        usesCount: 0,
        createdAt: '2026-06-01T00:00:00.000Z',
      });
      expect(services.credentialService.createTemporaryPin).toHaveBeenCalledWith(tenant, {
        accessPointId: '12',
        pin: '4321',
        expiresAt: new Date('2030-01-01T00:00:00.000Z'),
        maxUses: 1,
      });
    });
  });

  describe('access codes', () => {
    it('returns the plaintext code but never the hash', async () => {
      services.credentialService.createAccessCode.mockResolvedValue(code);

      const res = await app.inject({
        method: 'POST',
        url: '/access-codes',
        headers: await bearer(tenant),
        payload: { code: '246810', isSingleUse: true, expiresAt: '2030-01-01T00:00:00Z' },
      });

      expect(res.statusCode).toBe(201);
      const body = res.json();
      expect(body.code).toBe('246810');
      expect(body.expiresAt).toBe('2030-01-01T00:00:00.000Z');
      expect(body.consumedAt).toBeNull();
      expect(body).not.toHaveProperty('codeHash');
    });

    it('validates the create body', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/access-codes',
        headers: await bearer(tenant),
        payload: { code: '', isSingleUse: true },
      });

      expect(res.statusCode).toBe(422);
      expect(res.json().issues).toEqual([{ path: 'code', message: 'Code is required' }]);
    });

    it('lists with pagination', async () => {
      services.credentialService.listAccessCodes.mockResolvedValue({ items: [code], total: 6 });

      const res = await app.inject({
        method: 'GET',
        url: '/access-codes?page=2&pageSize=5&buildingId=7',
        headers: await bearer(admin),
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ total: 6, page: 2, pageSize: 5 });
      expect(services.credentialService.listAccessCodes).toHaveBeenCalledWith(admin, {
        page: 2,
        pageSize: 5,
        buildingId: '7',
      });
    });

    it('toggles through PATCH /deactivate', async () => {
      services.credentialService.toggleAccessCode.mockResolvedValue({ ...code, isActive: false });

      const res = await app.inject({
        method: 'PATCH',
        url: '/access-codes/501/deactivate',
        headers: await bearer(tenant),
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().isActive).toBe(false);
      expect(services.credentialService.toggleAccessCode).toHaveBeenCalledWith(tenant, '501');
    });

    it('rejects an empty update', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/access-codes/501',
        headers: await bearer(tenant),
        payload: {},
      });

      expect(res.statusCode).toBe(422);
      expect(services.credentialService.updateAccessCode).not.toHaveBeenCalled();
    });

    it('deletes and maps a missing code to 404', async () => {
      services.credentialService.deleteAccessCode.mockRejectedValue(new CredentialError('NOT_FOUND', 'Not found.'));

      const res = await app.inject({ method: 'DELETE', url: '/access-codes/501', headers: await bearer(tenant) });

      expect(res.statusCode).toBe(404);
      expect(res.json().message).toBe('Not found.');
    });
  });

  describe('GET /access-logs', () => {
    it('translates query parameters into the log filter', async () => {
      services.auditLogger.listLogs.mockResolvedValue({
        items: [
          {
            id: '900',
            accessPointId: '12',
            userId: null,
            credentialType: 'None',
            credentialRefId: null,
            success: false,
            reason: 'Invalid or expired',
            occurredAt: new Date('2026-06-01T12:00:00.000Z'),
            ipAddress: '10.0.0.5',
            deviceInfo: 'lobby-panel',
          },
        ],
        total: 1,
      });

      const res = await app.inject({
        method: 'GET',
        url: '/access-logs?codeId=501&success=false&credentialType=None',
        headers: await bearer(admin),
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().items[0]).toEqual({
        id: '900',
        accessPointId: '12',
        userId: null,
        credentialType: 'None',
        credentialRefId: null,
        success: false,
        reason: 'Invalid or expired',
        occurredAt: '2026-06-01T12:00:00.000Z',
      });
      expect(services.auditLogger.listLogs).toHaveBeenCalledWith(admin, {
        page: 1,
        pageSize: 20,
        accessCodeId: '501',
        success: false,
        credentialType: 'None',
      });
    });

    it('caps the page size at the configured maximum', async () => {
      const res = await app.inject({ method: 'GET', url: '/access-logs?pageSize=51', headers: await bearer(admin) });

      expect(res.statusCode).toBe(422);
      expect(services.auditLogger.listLogs).not.toHaveBeenCalled();
    });
  });

  describe('face biometric', () => {
    it('enrolls with device info', async () => {
      services.faceEnrollmentService.enroll.mockResolvedValue({
        id: '300',
        userId: '40',
        hashes: { front: 'a', left: 'b', right: 'c' },
        mimeTypes: { front: 'image/png', left: 'image/png', right: 'image/png' },
        device: { platform: 'ios', model: null, appVersion: '2.1.0' },
        isActive: true,
        createdAt: new Date('2026-06-01T00:00:00.000Z'),
        updatedAt: null,
      });

      const res = await app.inject({
        method: 'POST',
        url: '/face-biometric',
        headers: await bearer(tenant),
        payload: {
          frontImageBase64: 'Zg==',
          leftImageBase64: 'Zg==',
          rightImageBase64: 'Zg==',
          deviceInfo: { platform: 'iOS', appVersion: '2.1.0' },
        },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({
        id: '300',
        userId: '40',
        device: { platform: 'ios', model: null, appVersion: '2.1.0' },
        enrolledAt: '2026-06-01T00:00:00.000Z',
      });
      expect(services.faceEnrollmentService.enroll).toHaveBeenCalledWith(
        tenant,
        { frontImageBase64: 'Zg==', leftImageBase64: 'Zg==', rightImageBase64: 'Zg==' },
        { platform: 'iOS', appVersion: '2.1.0' },
      );
    });

    it('removes another user record through the query string', async () => {
      services.faceEnrollmentService.remove.mockResolvedValue(undefined);

      const res = await app.inject({ method: 'DELETE', url: '/face-biometric?userId=40', headers: await bearer(admin) });

      expect(res.statusCode).toBe(204);
      expect(services.faceEnrollmentService.remove).toHaveBeenCalledWith(admin, '40');
    });

    it('returns 404 when nothing is enrolled', async () => {
      services.faceEnrollmentService.get.mockRejectedValue(
        new CredentialError('NOT_FOUND', 'No face biometric enrolled.'),
      );

      const res = await app.inject({ method: 'GET', url: '/face-biometric', headers: await bearer(tenant) });

      expect(res.statusCode).toBe(404);
      expect(res.json().message).toBe('No face biometric enrolled.');
    });
  });

  it('hides unexpected errors behind a generic 500', async () => {
    services.faceEnrollmentService.get.mockRejectedValue(new Error('connection reset'));

    const res = await app.inject({ method: 'GET', url: '/face-biometric', headers: await bearer(tenant) });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ code: 'INTERNAL', message: 'Internal server error' });
  });
});
