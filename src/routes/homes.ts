import { FastifyInstance } from 'fastify';
import type { Home } from '../types/index.js';
import type { DeviceSnapshot } from '../devices/device.js';
import type { StatusApplyResult } from '../devices/status.js';
import { deviceStatusParamsSchema, listDevicesParamsSchema } from '../schemas/tool.schema.js';
import { authenticate } from '../middleware/auth.js';

interface HomesResponse {
  ok: true;
  result: { homes: Home[] };
}

interface HubsResponse {
  ok: true;
  result: { hubs: DeviceSnapshot[]; cached: boolean; cacheAge: number };
}

interface HubStatusResponse {
  ok: true;
  result: StatusApplyResult & { hub: DeviceSnapshot };
}

interface HubParams {
  hid: string;
  mid: string;
}

export async function homesRoutes(server: FastifyInstance): Promise<void> {
  server.addHook('preHandler', authenticate);

  server.get<{ Reply: HomesResponse }>('/homes', async (): Promise<HomesResponse> => {
    const homes = await server.homeService.listHomes();
    return { ok: true, result: { homes } };
  });

  server.get<{ Params: Pick<HubParams, 'hid'>; Reply: HubsResponse }>(
    '/homes/:hid/hubs',
    async (request): Promise<HubsResponse> => {
      // ZodError thrown here is mapped to a 400 by the error handler
      const { hid } = listDevicesParamsSchema.parse(request.params);
      const { hubs, cached, cacheAge } = await server.homeService.listHubs(hid);
      return {
        ok: true,
        result: { hubs: hubs.map((hub) => hub.toJSON()), cached, cacheAge },
      };
    }
  );

  server.get<{ Params: HubParams; Reply: HubStatusResponse }>(
    '/homes/:hid/hubs/:mid/status',
    async (request): Promise<HubStatusResponse> => {
      const { hid, mid } = deviceStatusParamsSchema.parse(request.params);
      const { hub, result } = await server.homeService.getHubStatus(hid, mid);
      return {
        ok: true,
        result: { hub: hub.toJSON(), ...result },
      };
    }
  );
}
