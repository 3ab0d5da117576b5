import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, type TokenService } from '@gatehouse/shared';
import { type Actor } from '@gatehouse/domain';

declare module 'fastify' {
  interface FastifyRequest {
    actor?: Actor;
  }
}

export function createAuthMiddleware(tokenService: Pick<TokenService, 'verifyAccessToken'>) {
  return async function authenticate(request: FastifyRequest) {
    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Missing or invalid authorization header');
    }

    const token = header.slice(7);
    try {
      request.actor = await tokenService.verifyAccessToken(token);
    } catch {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid or expired access token');
    }
  };
}

/** Routes behind `authenticate` call this instead of asserting the field is set. */
export function requireActor(request: FastifyRequest): Actor {
  if (!request.actor) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
  }
  return request.actor;
}
