import { createHash, randomBytes } from 'crypto';
import type { z } from 'zod';
import type { Config } from '../config/index.js';
import type { Home, HomgarLogger, HomgarSession } from '../types/index.js';
import {
  deviceListSchema,
  deviceStatusSchema,
  envelopeSchema,
  homeListSchema,
  loginDataSchema,
  type Envelope,
  type HubRecord,
} from '../schemas/homgar.schema.js';
import { buildDeviceTree } from '../devices/tree.js';
import { applyDeviceStatus, type StatusApplyResult } from '../devices/status.js';
import type { HubDevice } from '../devices/device.js';
import { HomgarApiError, UnauthorizedError } from '../utils/errors.js';
import { RetryHandler } from '../utils/retry.js';
import { MemorySessionStore, type SessionStore } from './session.store.js';

const HOMGAR_API_BASE_URL = 'https://region3.homgarus.com';
const REQUEST_TIMEOUT_MS = 10000;
const DEFAULT_AREA_CODE = '31';
// Log in again when the token has less than this left
const TOKEN_RENEW_MARGIN_MS = 60 * 60 * 1000;

export interface HomgarClientOptions {
  baseUrl?: string;
  areaCode?: string;
  timeoutMs?: number;
  maxRetries?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  sessionStore?: SessionStore;
  logger?: HomgarLogger;
}

interface RequestOptions {
  body?: unknown;
  query?: Record<string, string>;
  withAuth?: boolean;
}

type Method = 'GET' | 'POST';

export class HomgarClient {
  private readonly baseUrl: string;
  private readonly areaCode: string;
  private readonly timeoutMs: number;
  private readonly retryHandler: RetryHandler;
  private readonly sessionStore: SessionStore;
  private readonly logger?: HomgarLogger;
  private session: HomgarSession | null = null;
  private sessionLoaded = false;

  constructor(options: HomgarClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? HOMGAR_API_BASE_URL;
    this.areaCode = options.areaCode ?? DEFAULT_AREA_CODE;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.sessionStore = options.sessionStore ?? new MemorySessionStore();
    this.logger = options.logger;
    this.retryHandler = new RetryHandler({
      maxRetries: options.maxRetries ?? 3,
      initialBackoffMs: options.initialBackoffMs ?? 1000,
      maxBackoffMs: options.maxBackoffMs ?? 10000,
      logger: this.logger,
    });
  }

  static fromConfig(config: Config, sessionStore?: SessionStore, logger?: HomgarLogger): HomgarClient {
    return new HomgarClient({
      baseUrl: config.homgarBaseUrl,
      areaCode: config.homgarAreaCode,
      timeoutMs: config.requestTimeoutMs,
      maxRetries: config.maxRetries,
      initialBackoffMs: config.initialBackoffMs,
      maxBackoffMs: config.maxBackoffMs,
      sessionStore,
      logger,
    });
  }

  /**
   * Log in with email and password. The password is sent as its MD5 hex digest,
   * together with a random per-login device id.
   */
  async login(email: string, password: string): Promise<HomgarSession> {
    const data = await this.requestJson('POST', '/auth/basic/app/login', loginDataSchema, {
      body: {
        areaCode: this.areaCode,
        phoneOrEmail: email,
        password: createHash('md5').update(password, 'utf8').digest('hex'),
        deviceId: randomBytes(16).toString('hex'),
      },
      withAuth: false,
    });

    const session: HomgarSession = {
      email,
      token: data.token,
      tokenExpiresAt: Date.now() + data.tokenExpired * 1000,
      ...(data.refreshToken ? { refreshToken: data.refreshToken } : {}),
    };
    this.session = session;
    this.sessionLoaded = true;
    await this.sessionStore.save(session);
    this.logger?.info('Logged in to HomGar', { email });
    return session;
  }

  /**
   * Reuse the stored session unless it belongs to another account or expires
   * within the hour.
   */
  async ensureLoggedIn(email: string, password: string): Promise<void> {
    const session = await this.loadSession();
    if (
      session === null ||
      session.email !== email ||
      session.tokenExpiresAt - Date.now() < TOKEN_RENEW_MARGIN_MS
    ) {
      await this.login(email, password);
    }
  }

  async getHomes(): Promise<Home[]> {
    const data = await this.requestJson('GET', '/app/member/appHome/list', homeListSchema);
    return data.map((h) => ({ hid: h.hid, name: h.homeName ?? '' }));
  }

  /**
   * Raw hub records for a home, validated but not yet turned into devices.
   */
  async getDeviceRecords(hid: string | number): Promise<HubRecord[]> {
    return this.requestJson('GET', '/app/device/getDeviceByHid', deviceListSchema, {
      query: { hid: String(hid) },
    });
  }

  async getDevicesForHome(hid: string | number): Promise<HubDevice[]> {
    const records = await this.getDeviceRecords(hid);
    return buildDeviceTree(records, this.logger);
  }

  /**
   * Fetch the status of a hub's sensor network and decode it into the hub and
   * its subdevices.
   */
  async getDeviceStatus(hub: HubDevice): Promise<StatusApplyResult> {
    const data = await this.requestJson('GET', '/app/device/getDeviceStatus', deviceStatusSchema, {
      query: { mid: String(hub.mid) },
    });
    if (data.malformed > 0) {
      this.logger?.debug(`Dropped ${data.malformed} malformed status record(s)`, { mid: hub.mid });
    }
    return applyDeviceStatus(hub, data.subDeviceStatus, this.logger);
  }

  /**
   * Single attempt, no retry.
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.request('GET', '/app/member/appHome/list', {});
      return true;
    } catch {
      return false;
    }
  }

  private async loadSession(): Promise<HomgarSession | null> {
    if (!this.sessionLoaded) {
      this.session = await this.sessionStore.load();
      this.sessionLoaded = true;
    }
    return this.session;
  }

  private async requestJson<T>(
    method: Method,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const envelope = await this.retryHandler.execute(() => this.request(method, path, options));

    if (envelope.code !== 0) {
      this.logger?.warn(`HomGar API rejected ${method} ${path}`, {
        method,
        path,
        homgarCode: envelope.code,
        msg: envelope.msg,
      });
      throw HomgarApiError.rejected(envelope.code, envelope.msg);
    }

    const parsed = schema.safeParse(envelope.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw HomgarApiError.invalidResponse(`Unexpected response from ${path}`, {
        field: issue?.path.join('.'),
        expected: issue?.message,
      });
    }
    return parsed.data;
  }

  private async request(method: Method, path: string, options: RequestOptions): Promise<Envelope> {
    const withAuth = options.withAuth ?? true;
    const query = options.query ? `?${new URLSearchParams(options.query).toString()}` : '';
    const url = `${this.baseUrl}${path}${query}`;

    const headers: Record<string, string> = { lang: 'en', appCode: '1' };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (withAuth) {
      const session = await this.loadSession();
      if (session === null) {
        throw new UnauthorizedError('Not logged in to HomGar');
      }
      headers['auth'] = session.token;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const startTime = Date.now();

    // Never log headers or body: they carry the token and the password hash
    this.logger?.debug(`HomGar API request: ${method} ${path}`, { method, path, query: options.query });

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
      clearTimeout(timeoutId);
      const durationMs = Date.now() - startTime;

      if (!response.ok) {
        this.logger?.warn(`HomGar API error response: ${response.status}`, {
          method,
          path,
          statusCode: response.status,
          durationMs,
        });
        throw this.httpError(response.status);
      }

      const envelope = envelopeSchema.safeParse(await response.json());
      if (!envelope.success) {
        throw HomgarApiError.invalidResponse(`Malformed response envelope from ${path}`);
      }

      this.logger?.debug(`HomGar API response: ${response.status}`, {
        method,
        path,
        statusCode: response.status,
        homgarCode: envelope.data.code,
        durationMs,
      });
      return envelope.data;
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof HomgarApiError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        this.logger?.error('HomGar API request timed out', { method, path, timeoutMs: this.timeoutMs });
        throw HomgarApiError.unavailable('HomGar API request timed out');
      }
      if (error instanceof SyntaxError) {
        throw HomgarApiError.invalidResponse(`Response from ${path} is not JSON`);
      }
      if (error instanceof TypeError) {
        this.logger?.error('HomGar API network error', { method, path, error: error.message });
        throw HomgarApiError.unavailable('Failed to connect to HomGar API');
      }
      throw error;
    }
  }

  private httpError(status: number): HomgarApiError {
    if (status === 429) {
      return HomgarApiError.rateLimited();
    }
    if (status >= 500) {
      return HomgarApiError.unavailable(`HomGar API server error: ${status}`, status);
    }
    return HomgarApiError.httpError(`HomGar API HTTP error: ${status}`, status);
  }
}
