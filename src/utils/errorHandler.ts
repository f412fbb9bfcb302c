import { FastifyError, FastifyReply, FastifyRequest, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import fp from 'fastify-plugin';
import { AppError, ErrorCode, mapZodError } from './errors.js';

export interface ErrorResponse {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

function isFastifyError(error: unknown): error is FastifyError {
  return typeof error === 'object' && error !== null && 'code' in error && 'statusCode' in error;
}

export interface ErrorHandlerPluginOptions {
  nodeEnv: 'development' | 'production' | 'test';
}

async function errorHandlerPluginImpl(fastify: FastifyInstance, options: ErrorHandlerPluginOptions): Promise<void> {
  const isDevelopment = options.nodeEnv === 'development';

  fastify.setErrorHandler(
    async (error: Error, request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
      const correlationId = request.correlationId;

      if (error instanceof ZodError) {
        const validationError = mapZodError(error);
        request.log.warn({ correlationId, err: error }, 'Validation error');
        return reply.code(400).send({
          ok: false,
          error: validationError.toJSON(),
        } satisfies ErrorResponse);
      }

      if (error instanceof AppError) {
        const level = error.statusCode >= 500 ? 'error' : 'warn';
        request.log[level]({ correlationId, err: error }, error.message);
        return reply.code(error.statusCode).send({
          ok: false,
          error: error.toJSON(),
        } satisfies ErrorResponse);
      }

      if (isFastifyError(error)) {
        request.log.warn({ correlationId, err: error }, 'Fastify error');
        return reply.code(error.statusCode ?? 500).send({
          ok: false,
          error: {
            code: ErrorCode.INVALID_REQUEST,
            message: error.message,
          },
        } satisfies ErrorResponse);
      }

      request.log.error({ correlationId, err: error }, 'Unexpected error');
      return reply.code(500).send({
        ok: false,
        error: {
          code: ErrorCode.INTERNAL_ERROR,
          message: isDevelopment ? error.message : 'An internal error occurred',
        },
      } satisfies ErrorResponse);
    }
  );
}

export const errorHandlerPlugin = fp(errorHandlerPluginImpl, {
  name: 'error-handler-plugin',
});
