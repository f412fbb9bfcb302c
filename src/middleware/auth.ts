import { FastifyRequest, FastifyReply, FastifyInstance } from 'fastify';
import { timingSafeEqual } from 'crypto';
import fp from 'fastify-plugin';
import { ErrorCode } from '../utils/errors.js';

export const AUTH_HEADER = 'x-api-token';

declare module 'fastify' {
  interface FastifyInstance {
    apiTokens: string[];
  }
}

function constantTimeEquals(a: string, b: string): boolean {
  const bufferA = Buffer.from(a, 'utf8');
  const bufferB = Buffer.from(b, 'utf8');
  if (bufferA.length !== bufferB.length) {
    // Compare anyway so a length mismatch takes as long as a content mismatch
    timingSafeEqual(bufferA, bufferA);
    return false;
  }
  return timingSafeEqual(bufferA, bufferB);
}

/**
 * An empty token list rejects every caller.
 */
export function validateToken(token: string, validTokens: string[]): boolean {
  return validTokens.some((validToken) => constantTimeEquals(token, validToken));
}

export interface AuthPluginOptions {
  tokens: string[];
}

async function authPluginImpl(fastify: FastifyInstance, options: AuthPluginOptions): Promise<void> {
  fastify.decorate('apiTokens', options.tokens);
}

export const authPlugin = fp(authPluginImpl, {
  name: 'auth-plugin',
});

export async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
  const token = request.headers[AUTH_HEADER];

  if (typeof token !== 'string' || token === '' || !validateToken(token, request.server.apiTokens)) {
    return reply.code(401).send({
      ok: false,
      error: {
        code: ErrorCode.UNAUTHORIZED,
        message: 'Authentication required',
      },
    });
  }
}
