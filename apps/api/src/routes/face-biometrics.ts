import { type FastifyInstance, type FastifyRequest } from 'fastify';
import { type FaceEnrollmentService } from '@gatehouse/domain';
import { EnrollFaceRequestSchema, RemoveFaceQuerySchema } from '@gatehouse/proto';
import { type createAuthMiddleware, requireActor } from '../plugins/auth';
import { mapCredentialError, validationError } from '../plugins/error-handler';
import { toFaceBiometricResponse } from '../serializers';

interface FaceBiometricRouteDeps {
  faceEnrollmentService: Pick<FaceEnrollmentService, 'get' | 'enroll' | 'remove'>;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function registerFaceBiometricRoutes(app: FastifyInstance, deps: FaceBiometricRouteDeps): void {
  const { faceEnrollmentService, authenticate } = deps;

  async function enroll(request: FastifyRequest) {
    const parsed = EnrollFaceRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw validationError('Invalid face enrollment data', parsed.error.issues);
    }

    const { deviceInfo, ...images } = parsed.data;
    try {
      const face = await faceEnrollmentService.enroll(requireActor(request), images, deviceInfo);
      return toFaceBiometricResponse(face);
    } catch (err) {
      return mapCredentialError(err);
    }
  }

  app.get('/face-biometric', { preHandler: [authenticate] }, async (request, reply) => {
    try {
      const face = await faceEnrollmentService.get(requireActor(request));
      return reply.status(200).send(toFaceBiometricResponse(face));
    } catch (err) {
      return mapCredentialError(err);
    }
  });

  app.post('/face-biometric', { preHandler: [authenticate] }, async (request, reply) => {
    return reply.status(201).send(await enroll(request));
  });

  // Re-enrollment replaces the active record, same as POST.
  app.put('/face-biometric', { preHandler: [authenticate] }, async (request, reply) => {
    return reply.status(200).send(await enroll(request));
  });

  app.delete('/face-biometric', { preHandler: [authenticate] }, async (request, reply) => {
    const parsed = RemoveFaceQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw validationError('Invalid query', parsed.error.issues);
    }

    try {
      await faceEnrollmentService.remove(requireActor(request), parsed.data.userId);
      return reply.status(204).send();
    } catch (err) {
      return mapCredentialError(err);
    }
  });
}
