import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ToolService } from '../../../src/services/tool.service.js';
import { HomeService } from '../../../src/services/home.service.js';
import { HomgarClient } from '../../../src/clients/homgar.client.js';
import { MemorySessionStore } from '../../../src/clients/session.store.js';
import { ErrorCode } from '../../../src/utils/errors.js';
import {
  createErrorEnvelope,
  createFetchMock,
  jsonResponse,
  testConfig,
  TEST_HID,
  TEST_MID,
} from '../../integration/mocks/index.js';

describe('ToolService', () => {
  let mockFetch: ReturnType<typeof createFetchMock>;
  let homeService: HomeService;
  let service: ToolService;

  beforeEach(() => {
    mockFetch = createFetchMock();
    vi.stubGlobal('fetch', mockFetch);
    const client = HomgarClient.fromConfig(testConfig, new MemorySessionStore());
    homeService = new HomeService(client, testConfig);
    service = new ToolService(homeService);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('invoke', () => {
    describe('list_homes tool', () => {
      it('should return the homes', async () => {
        const result = await service.invoke('list_homes', {});

        expect(result).toEqual({
          ok: true,
          result: {
            homes: [
              { hid: 1001, name: 'Garden' },
              { hid: '1002', name: '' },
            ],
          },
        });
      });
    });

    describe('list_devices tool', () => {
      it('should return hub snapshots for a numeric hid', async () => {
        const result = await service.invoke('list_devices', { hid: TEST_HID });

        expect(result.ok).toBe(true);
        if (result.ok) {
          expect(result.result).toMatchObject({ cached: false, cacheAge: 0 });
          expect(result.result).toHaveProperty('hubs.0.description', 'Irrigation Display Hub');
          expect(result.result).toHaveProperty('hubs.0.subdevices.3.description', '2-Zone Water Timer');
          expect(result.result).toHaveProperty('hubs.0.subdevices.1.description', 'High Precision Rain Sensor');
        }
      });

      it('should accept a string hid', async () => {
        const result = await service.invoke('list_devices', { hid: '1001' });
        expect(result.ok).toBe(true);
      });

      it('should reject a missing hid', async () => {
        const result = await service.invoke('list_devices', {});

        expect(result).toEqual({
          ok: false,
          error: { code: ErrorCode.INVALID_REQUEST, message: 'Invalid input' },
        });
        expect(mockFetch).not.toHaveBeenCalled();
      });

      it('should reject unknown params', async () => {
        const result = await service.invoke('list_devices', { hid: 1, extra: true });

        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error.code).toBe(ErrorCode.INVALID_REQUEST);
        }
      });
    });

    describe('get_device_status tool', () => {
      it('should return the decoded hub and the apply result', async () => {
        const result = await service.invoke('get_device_status', { hid: TEST_HID, mid: TEST_MID });

        expect(result.ok).toBe(true);
        if (result.ok) {
          expect(result.result).toMatchObject({
            applied: ['connected', 'state', 'D01', 'D02', 'D03', 'D04', 'D05'],
            ignored: ['D09'],
            failures: [],
          });
          expect(result.result).toHaveProperty('hub.readings.tempMkCurrent', 298761);
          expect(result.result).toHaveProperty('hub.subdevices.0.readings.lightLuxCurrent', 3135.1);
          expect(result.result).toHaveProperty('hub.subdevices.2.rfRssi', -68);
        }
      });

      it('should report an unknown hub', async () => {
        const result = await service.invoke('get_device_status', { hid: TEST_HID, mid: 9999 });

        expect(result).toEqual({
          ok: false,
          error: { code: ErrorCode.HUB_NOT_FOUND, message: 'Hub not found: 9999' },
        });
      });

      it('should require mid', async () => {
        const result = await service.invoke('get_device_status', { hid: TEST_HID });

        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error).toEqual({ code: ErrorCode.INVALID_REQUEST, message: 'Invalid input' });
        }
      });
    });

    it('should reject an unknown tool', async () => {
      const result = await service.invoke('water_garden', {});

      expect(result).toEqual({
        ok: false,
        error: { code: ErrorCode.INVALID_REQUEST, message: 'Unknown tool: water_garden' },
      });
    });

    it('should turn HomGar errors into tool errors', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(createErrorEnvelope(1001, 'wrong password')));

      const result = await service.invoke('list_homes', {});

      expect(result).toEqual({
        ok: false,
        error: {
          code: ErrorCode.HOMGAR_API_ERROR,
          message: "HomGar API returned code 1001 ('wrong password')",
        },
      });
    });

    it('should turn unexpected errors into INTERNAL_ERROR', async () => {
      vi.spyOn(homeService, 'listHomes').mockRejectedValueOnce(new Error('disk on fire'));

      const result = await service.invoke('list_homes', {});

      expect(result).toEqual({
        ok: false,
        error: { code: ErrorCode.INTERNAL_ERROR, message: 'disk on fire' },
      });
    });
  });

  describe('getManifest', () => {
    it('should describe the three tools', () => {
      const manifest = service.getManifest();

      expect(manifest.tools.map((t) => t.id)).toEqual(['list_homes', 'list_devices', 'get_device_status']);
    });

    it('should declare the required ids', () => {
      const manifest = service.getManifest();
      const [listHomes, listDevices, getStatus] = manifest.tools;

      expect(listHomes?.input_schema.required).toBeUndefined();
      expect(listDevices?.input_schema.required).toEqual(['hid']);
      expect(getStatus?.input_schema.required).toEqual(['hid', 'mid']);
      expect(getStatus?.input_schema.properties['mid']).toMatchObject({ type: ['string', 'integer'] });
    });
  });
});
