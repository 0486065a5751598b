// src/middleware/session.ts
import type { FastifyRequest, FastifyReply } from 'fastify';
import { getSession } from '../db/sessionDb.js';

declare module 'fastify' {
  interface FastifyRequest {
    userId?: string;
    sessionId?: string;
  }
}

/**
 * Session middleware - resolves the signed `session_id` cookie to a user.
 * Runs on every request; leaves the request anonymous when the cookie is
 * missing, tampered with or expired.
 */
export async function sessionMiddleware(
  request: FastifyRequest,
  _reply: FastifyReply
): Promise<void> {
  const signedCookie = request.cookies.session_id;
  if (!signedCookie) return;

  const unsignResult = request.unsignCookie(signedCookie);
  if (!unsignResult.valid || !unsignResult.value) return;

  const sessionId = unsignResult.value;
  const session = getSession(sessionId);

  if (session) {
    request.userId = session.user_id;
    request.sessionId = sessionId;
  }
}

/**
 * Authentication guard, 401 without a valid session
 */
export async function requireAuth(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | void> {
  if (!request.userId) {
    return reply.code(401).send({
      error: 'Unauthorized',
      message: 'Please log in to access this resource',
    });
  }
}
