import Fastify, { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'crypto';
import { getConfig, type Config } from './config/index.js';
import { healthRoutes } from './routes/health.js';
import { homesRoutes } from './routes/homes.js';
import { mcpRoutes } from './routes/mcp.js';
import { manifestRoutes } from './routes/manifest.js';
import { requestIdPlugin } from './middleware/requestId.js';
import { authPlugin } from './middleware/auth.js';
import { errorHandlerPlugin } from './utils/errorHandler.js';
import { fromPino } from './utils/logger.js';
import { HomgarClient } from './clients/homgar.client.js';
import { FileSessionStore, MemorySessionStore, type SessionStore } from './clients/session.store.js';
import { HomeService } from './services/home.service.js';
import { ToolService } from './services/tool.service.js';

declare module 'fastify' {
  interface FastifyInstance {
    homgarClient: HomgarClient;
    homeService: HomeService;
    toolService: ToolService;
  }
}

export interface ServerOptions {
  config?: Config;
  sessionStore?: SessionStore;
  // Where log lines go; stdout when omitted
  logStream?: { write(line: string): void };
}

export function createServer(options: ServerOptions = {}): FastifyInstance {
  const config = options.config ?? getConfig();
  const isDevelopment = config.nodeEnv === 'development';

  const server = Fastify({
    bodyLimit: 65536,
    connectionTimeout: 30000,
    requestTimeout: 30000,

    logger: {
      level: config.logLevel,
      ...(options.logStream !== undefined ? { stream: options.logStream } : {}),
      serializers: {
        req(request: FastifyRequest): Record<string, unknown> {
          return {
            method: request.method,
            url: request.url,
            requestId: request.id,
            userAgent: request.headers['user-agent'],
          };
        },
        err(error: Error): { [key: string]: unknown; type: string; message: string; stack: string } {
          return {
            type: error.name,
            message: error.message,
            // Stack traces only in development
            stack: isDevelopment && error.stack ? error.stack : '',
            ...('code' in error ? { code: error.code } : {}),
            ...('statusCode' in error ? { statusCode: error.statusCode } : {}),
          };
        },
      },
      redact: {
        paths: ['req.headers["x-api-token"]', 'req.headers["authorization"]'],
        censor: '[REDACTED]',
      },
    },
    genReqId: (): string => randomUUID(),
  });

  const logger = fromPino(server.log);
  const sessionStore =
    options.sessionStore ??
    (config.sessionFile !== undefined ? new FileSessionStore(config.sessionFile, logger) : new MemorySessionStore());

  void server.register(requestIdPlugin);
  void server.register(authPlugin, { tokens: config.apiTokens });
  void server.register(errorHandlerPlugin, { nodeEnv: config.nodeEnv });

  const homgarClient = HomgarClient.fromConfig(config, sessionStore, logger);
  const homeService = new HomeService(homgarClient, config, logger);
  const toolService = new ToolService(homeService);
  server.decorate('homgarClient', homgarClient);
  server.decorate('homeService', homeService);
  server.decorate('toolService', toolService);
  server.addHook('onClose', async () => {
    homeService.invalidateCache();
  });

  void server.register(healthRoutes);
  void server.register(homesRoutes);
  void server.register(mcpRoutes);
  void server.register(manifestRoutes);

  return server;
}
