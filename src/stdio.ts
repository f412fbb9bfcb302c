#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { getConfig } from './config/index.js';
import { HomgarClient } from './clients/homgar.client.js';
import { FileSessionStore, MemorySessionStore } from './clients/session.store.js';
import { HomeService } from './services/home.service.js';
import { ToolService } from './services/tool.service.js';
import { createStderrLogger, fromPino } from './utils/logger.js';

async function main(): Promise<void> {
  const config = getConfig();
  // stdout carries MCP frames, so everything else goes to stderr
  const log = createStderrLogger('homgar-mcp', config.logLevel);
  const logger = fromPino(log);

  const sessionStore =
    config.sessionFile !== undefined ? new FileSessionStore(config.sessionFile, logger) : new MemorySessionStore();
  const homgarClient = HomgarClient.fromConfig(config, sessionStore, logger);
  const homeService = new HomeService(homgarClient, config, logger);
  const toolService = new ToolService(homeService);

  const server = new Server(
    {
      name: 'homgar-mcp-server',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const manifest = toolService.getManifest();
    return {
      tools: manifest.tools.map((tool) => ({
        name: tool.id,
        description: tool.description,
        inputSchema: {
          type: 'object' as const,
          properties: tool.input_schema.properties,
          required: tool.input_schema.required,
        },
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    log.info({ tool: name }, 'Tool call');
    const result = await toolService.invoke(name, args ?? {});

    if (result.ok) {
      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(result.result, null, 2),
          },
        ],
      };
    }

    return {
      content: [
        {
          type: 'text' as const,
          text: `Error: ${result.error.message}`,
        },
      ],
      isError: true,
    };
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  log.info('MCP server started');
}

main().catch((err) => {
  process.stderr.write(`Fatal error: ${String(err)}\n`);
  process.exit(1);
});
