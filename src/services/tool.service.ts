import type { z } from 'zod';
import type { HomeService } from './home.service.js';
import { listDevicesParamsSchema, deviceStatusParamsSchema } from '../schemas/tool.schema.js';
import { AppError, ErrorCode, mapZodError } from '../utils/errors.js';

export interface ToolError {
  code: string;
  message: string;
}

export type ToolResult = { ok: true; result: unknown } | { ok: false; error: ToolError };

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export interface Tool {
  id: string;
  description: string;
  input_schema: ToolInputSchema;
}

export interface ToolManifest {
  tools: Tool[];
}

type ToolHandler = (params: unknown) => Promise<ToolResult>;

const ID_PROPERTY = {
  type: ['string', 'integer'],
};

export class ToolService {
  private readonly homeService: HomeService;
  private readonly toolHandlers: Map<string, ToolHandler>;

  constructor(homeService: HomeService) {
    this.homeService = homeService;
    this.toolHandlers = this.createToolHandlers();
  }

  /**
   * Dispatch and execute a tool call. Never throws.
   */
  async invoke(tool: string, params: unknown): Promise<ToolResult> {
    const handler = this.toolHandlers.get(tool);

    if (handler === undefined) {
      return {
        ok: false,
        error: {
          code: ErrorCode.INVALID_REQUEST,
          message: `Unknown tool: ${tool}`,
        },
      };
    }

    try {
      return await handler(params);
    } catch (error) {
      return { ok: false, error: this.toToolError(error) };
    }
  }

  getManifest(): ToolManifest {
    return {
      tools: [
        {
          id: 'list_homes',
          description: 'List the HomGar homes of the configured account',
          input_schema: {
            type: 'object',
            properties: {},
          },
        },
        {
          id: 'list_devices',
          description: 'List the hubs of a home together with their sensors and timers',
          input_schema: {
            type: 'object',
            properties: {
              hid: { ...ID_PROPERTY, description: 'Home id, as returned by list_homes' },
            },
            required: ['hid'],
          },
        },
        {
          id: 'get_device_status',
          description:
            'Read the current status of a hub and its subdevices: temperature, humidity, pressure, soil moisture, light, rainfall and signal strength',
          input_schema: {
            type: 'object',
            properties: {
              hid: { ...ID_PROPERTY, description: 'Home id, as returned by list_homes' },
              mid: { ...ID_PROPERTY, description: 'Sensor network id of the hub, as returned by list_devices' },
            },
            required: ['hid', 'mid'],
          },
        },
      ],
    };
  }

  private createToolHandlers(): Map<string, ToolHandler> {
    const handlers = new Map<string, ToolHandler>();

    handlers.set('list_homes', async () => {
      const homes = await this.homeService.listHomes();
      return { ok: true, result: { homes } };
    });

    handlers.set('list_devices', async (params: unknown) => {
      const parsed = this.validateParams(listDevicesParamsSchema, params);
      if (!parsed.ok) return parsed;
      const { hubs, cached, cacheAge } = await this.homeService.listHubs(parsed.value.hid);
      return {
        ok: true,
        result: { hubs: hubs.map((hub) => hub.toJSON()), cached, cacheAge },
      };
    });

    handlers.set('get_device_status', async (params: unknown) => {
      const parsed = this.validateParams(deviceStatusParamsSchema, params);
      if (!parsed.ok) return parsed;
      const { hub, result } = await this.homeService.getHubStatus(parsed.value.hid, parsed.value.mid);
      return {
        ok: true,
        result: { hub: hub.toJSON(), ...result },
      };
    });

    return handlers;
  }

  private validateParams<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: unknown
  ): { ok: true; value: T } | { ok: false; error: ToolError } {
    const result = schema.safeParse(params);
    if (!result.success) {
      const validationError = mapZodError(result.error);
      return {
        ok: false,
        error: {
          code: validationError.code,
          message: validationError.message,
        },
      };
    }
    return { ok: true, value: result.data };
  }

  private toToolError(error: unknown): ToolError {
    if (error instanceof AppError) {
      return { code: error.code, message: error.message };
    }
    return {
      code: ErrorCode.INTERNAL_ERROR,
      message: error instanceof Error ? error.message : 'An unexpected error occurred',
    };
  }
}
