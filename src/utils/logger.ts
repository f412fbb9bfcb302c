import { pino, destination, type BaseLogger, type Logger } from 'pino';
import type { HomgarLogger, LogLevel } from '../types/index.js';

type PinoLike = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Adapt a pino (or fastify) logger to the message-first HomgarLogger shape.
 */
export function fromPino(logger: PinoLike): HomgarLogger {
  return {
    debug: (message, context) => logger.debug(context ?? {}, message),
    info: (message, context) => logger.info(context ?? {}, message),
    warn: (message, context) => logger.warn(context ?? {}, message),
    error: (message, context) => logger.error(context ?? {}, message),
  };
}

/**
 * Logger for the CLI and the MCP stdio server. Writes to stderr so stdout stays
 * free for program output and protocol frames.
 */
export function createStderrLogger(name: string, level: LogLevel): Logger {
  return pino({ name, level }, destination(2));
}
