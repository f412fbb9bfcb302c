import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { createServer } from '../../../src/server.js';
import { resetConfig, type Config } from '../../../src/config/index.js';
import {
  AppError,
  DeviceStatusDecodeError,
  ErrorCode,
  HomgarApiError,
  NotFoundError,
  ValidationError,
} from '../../../src/utils/errors.js';
import { testConfig as baseConfig } from '../../integration/mocks/index.js';

function createTestServer(config: Config): FastifyInstance {
  const server = createServer({ config });

  server.get('/throw-validation', async () => {
    throw new ValidationError('Invalid field value', { field: 'hid', expected: 'string' });
  });

  server.get('/throw-app-error', async () => {
    throw new AppError(ErrorCode.INTERNAL_ERROR, 'Something went wrong', 500);
  });

  server.get('/throw-not-found', async () => {
    throw new NotFoundError('Hub not found: 7', { hid: '1001', mid: '7' });
  });

  server.get('/throw-homgar', async () => {
    throw HomgarApiError.rateLimited();
  });

  server.get('/throw-decode', async () => {
    throw new DeviceStatusDecodeError('garbled');
  });

  server.get('/throw-zod-error', async () => {
    z.object({ hid: z.string() }).parse({ hid: 123 });
  });

  server.get('/throw-unknown', async () => {
    throw new Error('Secret internals');
  });

  return server;
}

describe('Error Handler Plugin', () => {
  let server: FastifyInstance;

  beforeAll(async () => {
    server = createTestServer(baseConfig);
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
    resetConfig();
  });

  it('should handle ValidationError with 400 status', async () => {
    const response = await server.inject({ method: 'GET', url: '/throw-validation' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      ok: false,
      error: {
        code: ErrorCode.INVALID_REQUEST,
        message: 'Invalid field value',
        details: { field: 'hid', expected: 'string' },
      },
    });
  });

  it('should handle AppError with its own status code', async () => {
    const response = await server.inject({ method: 'GET', url: '/throw-app-error' });

    expect(response.statusCode).toBe(500);
    expect(response.json().error.code).toBe(ErrorCode.INTERNAL_ERROR);
  });

  it('should handle NotFoundError with 404 status', async () => {
    const response = await server.inject({ method: 'GET', url: '/throw-not-found' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: {
        code: ErrorCode.HUB_NOT_FOUND,
        message: 'Hub not found: 7',
        details: { hid: '1001', mid: '7' },
      },
    });
  });

  it('should map HomGar rate limiting to 503', async () => {
    const response = await server.inject({ method: 'GET', url: '/throw-homgar' });

    expect(response.statusCode).toBe(503);
    expect(response.json().error.code).toBe(ErrorCode.HOMGAR_RATE_LIMITED);
  });

  it('should map decode failures to 502', async () => {
    const response = await server.inject({ method: 'GET', url: '/throw-decode' });

    expect(response.statusCode).toBe(502);
    expect(response.json().error.code).toBe(ErrorCode.STATUS_DECODE_FAILED);
  });

  it('should handle ZodError with 400 status', async () => {
    const response = await server.inject({ method: 'GET', url: '/throw-zod-error' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      ok: false,
      error: {
        code: ErrorCode.INVALID_REQUEST,
        message: 'Expected string, received number',
        details: { field: 'hid' },
      },
    });
  });

  it('should hide the message of unknown errors outside development', async () => {
    const response = await server.inject({ method: 'GET', url: '/throw-unknown' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: ErrorCode.INTERNAL_ERROR, message: 'An internal error occurred' },
    });
  });

  it('should show the message of unknown errors in development', async () => {
    const devServer = createTestServer({ ...baseConfig, nodeEnv: 'development' });
    await devServer.ready();

    const response = await devServer.inject({ method: 'GET', url: '/throw-unknown' });

    expect(response.json().error.message).toBe('Secret internals');
    await devServer.close();
  });

  it('should return JSON content type', async () => {
    const response = await server.inject({ method: 'GET', url: '/throw-validation' });

    expect(response.headers['content-type']).toContain('application/json');
  });
});
