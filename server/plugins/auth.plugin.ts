import { FastifyRequest, FastifyReply } from 'fastify';
import { authService, JwtPayload } from '../services/auth.service';

declare module 'fastify' {
  interface FastifyRequest {
    user?: JwtPayload;
  }
}

/**
 * Bearer-token check, used as a route preHandler:
 * { preHandler: [authenticate] }
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

/** The authenticated user; routes reach this only after `authenticate`. */
export function currentUser(request: FastifyRequest): JwtPayload {
  if (!request.user) throw new Error('Route is missing the authenticate preHandler');
  return request.user;
}
