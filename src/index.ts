import { createServer } from './server.js';
import { getConfig } from './config/index.js';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function main(): Promise<void> {
  const config = getConfig();
  const server = createServer({ config });

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      server.log.warn({ signal }, 'Shutdown already in progress, ignoring signal');
      return;
    }
    isShuttingDown = true;

    server.log.info({ signal }, 'Received shutdown signal, initiating graceful shutdown...');

    const timeoutId = setTimeout(() => {
      server.log.error('Shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      // close() stops accepting connections and waits for in-flight requests
      await server.close();

      clearTimeout(timeoutId);
      server.log.info('Server closed successfully');
      process.exit(0);
    } catch (err) {
      clearTimeout(timeoutId);
      server.log.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    server.log.fatal({ err }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason, promise) => {
    server.log.error({ reason, promise }, 'Unhandled promise rejection');
  });

  try {
    await server.listen({
      port: config.port,
      host: config.host,
    });
    server.log.info(`HomGar bridge listening on ${config.host}:${config.port}`);
  } catch (err) {
    server.log.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err) => {
  process.stderr.write(`Fatal error: ${String(err)}\n`);
  process.exit(1);
});
