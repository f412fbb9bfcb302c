import { FastifyRequest, FastifyReply, FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';

export const REQUEST_ID_HEADER = 'x-request-id';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

async function requestIdPluginImpl(fastify: FastifyInstance): Promise<void> {
  fastify.decorateRequest('correlationId', '');

  fastify.addHook('onRequest', async (request: FastifyRequest) => {
    // Honour a caller-supplied id so logs can be joined across services
    const incomingId = request.headers[REQUEST_ID_HEADER];
    request.correlationId = typeof incomingId === 'string' && incomingId !== '' ? incomingId : request.id;
  });

  fastify.addHook('onSend', async (request: FastifyRequest, reply: FastifyReply) => {
    void reply.header(REQUEST_ID_HEADER, request.correlationId);
  });
}

export const requestIdPlugin = fp(requestIdPluginImpl, {
  name: 'request-id-plugin',
});
