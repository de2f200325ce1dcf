import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ForbiddenError } from '../lib/errors.js';
import { createCsrfToken, generateSessionId, verifyCsrfToken } from '../lib/csrf.js';

export const SESSION_COOKIE = 'orgchart_session';
export const CSRF_HEADER = 'x-csrf-token';

const MUTATING_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export interface CsrfPluginOptions {
  secretKey: string;
  enabled: boolean;
  secureCookies: boolean;
}

declare module 'fastify' {
  interface FastifyInstance {
    issueCsrfToken: (request: FastifyRequest, reply: FastifyReply) => string;
  }
}

async function csrfPlugin(fastify: FastifyInstance, options: CsrfPluginOptions): Promise<void> {
  const { secretKey, enabled, secureCookies } = options;

  /**
   * Return a token for the caller's session, starting a session (and
   * setting its cookie) when the request carries none.
   */
  fastify.decorate('issueCsrfToken', function (request: FastifyRequest, reply: FastifyReply) {
    let sessionId = request.cookies[SESSION_COOKIE];
    if (!sessionId) {
      sessionId = generateSessionId();
      reply.setCookie(SESSION_COOKIE, sessionId, {
        path: '/',
        httpOnly: true,
        sameSite: 'lax',
        secure: secureCookies,
      });
    }
    return createCsrfToken(secretKey, sessionId);
  });

  fastify.get('/api/csrf-token', async (request, reply) => {
    return { csrfToken: fastify.issueCsrfToken(request, reply) };
  });

  if (!enabled) {
    fastify.log.warn('CSRF protection is disabled');
    return;
  }

  fastify.addHook('onRequest', async (request) => {
    if (!MUTATING_METHODS.has(request.method) || !request.url.startsWith('/api/')) {
      return;
    }

    const sessionId = request.cookies[SESSION_COOKIE];
    const token = request.headers[CSRF_HEADER];
    if (!sessionId || typeof token !== 'string' || !verifyCsrfToken(secretKey, sessionId, token)) {
      throw new ForbiddenError('Invalid or missing CSRF token');
    }
  });
}

export default fp(csrfPlugin, {
  name: 'csrf',
  dependencies: ['@fastify/cookie'],
});
