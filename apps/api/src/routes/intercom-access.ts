import { type FastifyInstance } from 'fastify';
import { type CredentialService, type CredentialVerifier } from '@gatehouse/domain';
import {
  AccessPointParamsSchema,
  AccessPointUserParamsSchema,
  VerifyAccessRequestSchema,
  SetMasterPinRequestSchema,
  SetOwnPinRequestSchema,
  SetUserPinRequestSchema,
  CreateTemporaryPinRequestSchema,
  type VerifyAccessResponse,
} from '@gatehouse/proto';
import { type createAuthMiddleware, requireActor } from '../plugins/auth';
import { type createRateLimiter } from '../plugins/rate-limit';
import { mapCredentialError, validationError } from '../plugins/error-handler';

interface IntercomAccessRouteDeps {
  credentialVerifier: Pick<CredentialVerifier, 'verifyAccess'>;
  credentialService: Pick<
    CredentialService,
    'setOrUpdateMasterPin' | 'setOrUpdateUserPin' | 'updateOwnPin' | 'createTemporaryPin'
  >;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  verifyRateLimit: ReturnType<typeof createRateLimiter>;
}

export function registerIntercomAccessRoutes(app: FastifyInstance, deps: IntercomAccessRouteDeps): void {
  const { credentialVerifier, credentialService, authenticate, verifyRateLimit } = deps;

  // Called by the intercom device itself; the credential is the only proof.
  app.post('/intercoms/:accessPointId/access/verify', { preHandler: [verifyRateLimit] }, async (request, reply) => {
    const params = AccessPointParamsSchema.safeParse(request.params);
    if (!params.success) {
      throw validationError('Invalid access point id', params.error.issues);
    }
    const parsed = VerifyAccessRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      throw validationError('Invalid verification request', parsed.error.issues);
    }

    try {
      const result = await credentialVerifier.verifyAccess(
        params.data.accessPointId,
        { pin: parsed.data.pin, face: parsed.data.face },
        { ip: request.ip || null, device: parsed.data.device || null },
      );
      const body: VerifyAccessResponse = {
        granted: result.granted,
        reason: result.reason,
        credentialType: result.credentialType,
        credentialRefId: result.credentialRefId,
        timestamp: result.timestamp.toISOString(),
      };
      return reply.status(200).send(body);
    } catch (err) {
      return mapCredentialError(err);
    }
  });

  app.post('/intercoms/:accessPointId/access/master-pin', { preHandler: [authenticate] }, async (request, reply) => {
    const params = AccessPointParamsSchema.safeParse(request.params);
    if (!params.success) {
      throw validationError('Invalid access point id', params.error.issues);
    }
    const parsed = SetMasterPinRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw validationError('Invalid master pin data', parsed.error.issues);
    }

    try {
      const result = await credentialService.setOrUpdateMasterPin(
        requireActor(request),
        params.data.accessPointId,
        parsed.data.pin,
      );
      return reply.status(result.created ? 201 : 200).send(result);
    } catch (err) {
      return mapCredentialError(err);
    }
  });

  app.post('/intercoms/:accessPointId/access/pin/self', { preHandler: [authenticate] }, async (request, reply) => {
    const params = AccessPointParamsSchema.safeParse(request.params);
    if (!params.success) {
      throw validationError('Invalid access point id', params.error.issues);
    }
    const parsed = SetOwnPinRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw validationError('Invalid pin data', parsed.error.issues);
    }

    try {
      const result = await credentialService.updateOwnPin(
        requireActor(request),
        params.data.accessPointId,
        parsed.data.newPin,
        parsed.data.oldPin,
      );
      return reply.status(result.created ? 201 : 200).send(result);
    } catch (err) {
      return mapCredentialError(err);
    }
  });

  app.post(
    '/intercoms/:accessPointId/access/users/:userId/pin',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const params = AccessPointUserParamsSchema.safeParse(request.params);
      if (!params.success) {
        throw validationError('Invalid path parameters', params.error.issues);
      }
      const parsed = SetUserPinRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        throw validationError('Invalid pin data', parsed.error.issues);
      }

      try {
        const result = await credentialService.setOrUpdateUserPin(
          requireActor(request),
          params.data.accessPointId,
          params.data.userId,
          parsed.data.pin,
          parsed.data.masterPin,
        );
        return reply.status(result.created ? 201 : 200).send(result);
      } catch (err) {
        return mapCredentialError(err);
      }
    },
  );

  app.post(
    '/intercoms/:accessPointId/access/temporary-pins',
    { preHandler: [authenticate] },
    async (request, reply) => {
      const params = AccessPointParamsSchema.safeParse(request.params);
      if (!params.success) {
        throw validationError('Invalid access point id', params.error.issues);
      }
      const parsed = CreateTemporaryPinRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        throw validationError('Invalid temporary pin data', parsed.error.issues);
      }

      try {
        const pin = await credentialService.createTemporaryPin(requireActor(request), {
          accessPointId: params.data.accessPointId,
          ...parsed.data,
        });
        return reply.status(201).send({
          id: pin.id,
          accessPointId: pin.accessPointId,
          expiresAt: pin.expiresAt.toISOString(),
          maxUses: pin.maxUses,
          usesCount: pin.usesCount,
          createdAt: pin.createdAt.toISOString(),
        });
      } catch (err) {
        return mapCredentialError(err);
      }
    },
  );
}
