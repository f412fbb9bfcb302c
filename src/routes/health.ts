import { FastifyInstance } from 'fastify';

interface HealthResponse {
  status: 'ok';
}

interface ReadyResponse {
  status: 'ready' | 'not_ready';
  checks: {
    homgar_api: 'up' | 'down';
  };
}

export async function healthRoutes(server: FastifyInstance): Promise<void> {
  server.get<{
    Reply: HealthResponse;
  }>('/healthz', async (): Promise<HealthResponse> => {
    return { status: 'ok' };
  });

  server.get<{
    Reply: ReadyResponse;
  }>('/ready', async (_request, reply): Promise<ReadyResponse> => {
    const homgarUp = await server.homeService.ping();

    const response: ReadyResponse = {
      status: homgarUp ? 'ready' : 'not_ready',
      checks: {
        homgar_api: homgarUp ? 'up' : 'down',
      },
    };

    if (!homgarUp) {
      reply.status(503);
    }

    return response;
  });
}
