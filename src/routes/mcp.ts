import { FastifyInstance } from 'fastify';
import { mcpInvokeSchema } from '../schemas/tool.schema.js';
import { authenticate } from '../middleware/auth.js';
import { mapZodError } from '../utils/errors.js';
import type { ToolResult } from '../services/tool.service.js';

interface McpInvokeBody {
  tool: string;
  params?: Record<string, unknown>;
}

export async function mcpRoutes(server: FastifyInstance): Promise<void> {
  server.post<{
    Body: McpInvokeBody;
    Reply: ToolResult;
  }>(
    '/mcp/invoke',
    {
      preHandler: authenticate,
    },
    async (request): Promise<ToolResult> => {
      const parseResult = mcpInvokeSchema.safeParse(request.body);
      if (!parseResult.success) {
        const validationError = mapZodError(parseResult.error);
        return {
          ok: false,
          error: {
            code: validationError.code,
            message: validationError.message,
          },
        };
      }

      const { tool, params } = parseResult.data;
      request.log.debug({ tool, correlationId: request.correlationId }, 'Invoking tool');
      return server.toolService.invoke(tool, params);
    }
  );
}
