import { type FastifyInstance } from 'fastify';
import { type CredentialService } from '@gatehouse/domain';
import {
  AccessCodeParamsSchema,
  CreateAccessCodeRequestSchema,
  UpdateAccessCodeRequestSchema,
  ListAccessCodesQuerySchema,
} from '@gatehouse/proto';
import { type createAuthMiddleware, requireActor } from '../plugins/auth';
import { mapCredentialError, validationError } from '../plugins/error-handler';
import { toAccessCodeResponse, toPageResponse } from '../serializers';

interface AccessCodeRouteDeps {
  credentialService: Pick<
    CredentialService,
    'createAccessCode' | 'updateAccessCode' | 'toggleAccessCode' | 'deleteAccessCode' | 'listAccessCodes'
  >;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function registerAccessCodeRoutes(app: FastifyInstance, deps: AccessCodeRouteDeps): void {
  const { credentialService, authenticate } = deps;

  app.get('/access-codes', { preHandler: [authenticate] }, async (request, reply) => {
    const parsed = ListAccessCodesQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw validationError('Invalid query', parsed.error.issues);
    }

    try {
      const page = await credentialService.listAccessCodes(requireActor(request), parsed.data);
      return reply.status(200).send(toPageResponse(page, parsed.data, toAccessCodeResponse));
    } catch (err) {
      return mapCredentialError(err);
    }
  });

  app.post('/access-codes', { preHandler: [authenticate] }, async (request, reply) => {
    const parsed = CreateAccessCodeRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw validationError('Invalid access code data', parsed.error.issues);
    }

    try {
      const code = await credentialService.createAccessCode(requireActor(request), parsed.data);
      return reply.status(201).send(toAccessCodeResponse(code));
    } catch (err) {
      return mapCredentialError(err);
    }
  });

  app.put('/access-codes/:id', { preHandler: [authenticate] }, async (request, reply) => {
    const params = AccessCodeParamsSchema.safeParse(request.params);
    if (!params.success) {
      throw validationError('Invalid access code id', params.error.issues);
    }
    const parsed = UpdateAccessCodeRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw validationError('Invalid access code data', parsed.error.issues);
    }

    try {
      const code = await credentialService.updateAccessCode(requireActor(request), params.data.id, parsed.data);
      return reply.status(200).send(toAccessCodeResponse(code));
    } catch (err) {
      return mapCredentialError(err);
    }
  });

  app.patch('/access-codes/:id/deactivate', { preHandler: [authenticate] }, async (request, reply) => {
    const params = AccessCodeParamsSchema.safeParse(request.params);
    if (!params.success) {
      throw validationError('Invalid access code id', params.error.issues);
    }

    try {
      const code = await credentialService.toggleAccessCode(requireActor(request), params.data.id);
      return reply.status(200).send(toAccessCodeResponse(code));
    } catch (err) {
      return mapCredentialError(err);
    }
  });

  app.delete('/access-codes/:id', { preHandler: [authenticate] }, async (request, reply) => {
    const params = AccessCodeParamsSchema.safeParse(request.params);
    if (!params.success) {
      throw validationError('Invalid access code id', params.error.issues);
    }

    try {
      await credentialService.deleteAccessCode(requireActor(request), params.data.id);
      return reply.status(204).send();
    } catch (err) {
      return mapCredentialError(err);
    }
  });
}
