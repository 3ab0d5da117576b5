import { type FastifyInstance } from 'fastify';
import { type AuditLogger } from '@gatehouse/domain';
import { accessLogQuerySchema } from '@gatehouse/proto';
import { type createAuthMiddleware, requireActor } from '../plugins/auth';
import { validationError } from '../plugins/error-handler';
import { toAccessLogResponse, toPageResponse } from '../serializers';

interface AccessLogRouteDeps {
  auditLogger: Pick<AuditLogger, 'listLogs'>;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  maxPageSize: number;
}

export function registerAccessLogRoutes(app: FastifyInstance, deps: AccessLogRouteDeps): void {
  const { auditLogger, authenticate } = deps;
  const querySchema = accessLogQuerySchema(deps.maxPageSize);

  app.get('/access-logs', { preHandler: [authenticate] }, async (request, reply) => {
    const parsed = querySchema.safeParse(request.query);
    if (!parsed.success) {
      throw validationError('Invalid query', parsed.error.issues);
    }

    const { codeId, ...rest } = parsed.data;
    const page = await auditLogger.listLogs(requireActor(request), { ...rest, accessCodeId: codeId });
    return reply.status(200).send(toPageResponse(page, parsed.data, toAccessLogResponse));
  });
}
