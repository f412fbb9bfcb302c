import { FastifyInstance } from 'fastify';
import type { ToolManifest } from '../services/tool.service.js';

export async function manifestRoutes(server: FastifyInstance): Promise<void> {
  // Public: describes the tools, exposes no account data
  server.get<{
    Reply: ToolManifest;
  }>('/manifest', async (): Promise<ToolManifest> => {
    return server.toolService.getManifest();
  });
}
