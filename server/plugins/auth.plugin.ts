import { FastifyRequest, FastifyReply } from 'fastify';
import { authService, JwtPayload } from '../services/auth.service';
import type { ActorContext } from '../../shared/types';
import { UnauthorizedError } from '../utils/errors';

declare module 'fastify' {
  interface FastifyRequest {
    user?: JwtPayload;
  }
}

/**
 * Bearer token check - use as a preHandler
 * Usage: { preHandler: [authenticate] }
 */
export async function authenticate(request: FastifyRequest, reply: FastifyReply) {
  const authHeader = request.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return reply.code(401).send({ success: false, error: 'Authentication required' });
  }
  try {
    request.user = authService.verifyToken(authHeader.substring(7));
  } catch (err) {
    request.log.debug({ err }, 'Rejected bearer token');
    return reply.code(401).send({ success: false, error: 'Invalid or expired token' });
  }
}

/** The authenticated user as the actor of a mutation */
export function actorOf(request: FastifyRequest): ActorContext {
  if (!request.user) throw new UnauthorizedError('Authentication required');
  return authService.toActor(request.user);
}
