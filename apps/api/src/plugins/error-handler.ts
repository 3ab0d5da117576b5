import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@gatehouse/shared';
import { CredentialError, type CredentialErrorKind } from '@gatehouse/domain';

const logger = createLogger({ name: 'api:error' });

const CREDENTIAL_ERROR_CODES: Record<CredentialErrorKind, ErrorCode> = {
  VALIDATION: ErrorCode.VALIDATION,
  NOT_FOUND: ErrorCode.NOT_FOUND,
  FORBIDDEN: ErrorCode.FORBIDDEN,
  UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
};

export function mapCredentialError(err: unknown): never {
  if (err instanceof CredentialError) {
    throw new AppError(CREDENTIAL_ERROR_CODES[err.kind], err.message);
  }
  throw err;
}

export function validationError(message: string, issues: Array<{ path: PropertyKey[]; message: string }>): AppError {
  return new AppError(ErrorCode.VALIDATION, message, {
    issues: issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
  });
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn({ code: error.code, requestId: request.id }, error.message);
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ requestId: request.id, statusCode: error.statusCode }, error.message);
      return reply.status(error.statusCode).send({ code: ErrorCode.BAD_REQUEST, message: error.message });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
