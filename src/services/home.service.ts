import type { Config } from '../config/index.js';
import type { Home, HomgarLogger } from '../types/index.js';
import type { HubRecord } from '../schemas/homgar.schema.js';
import type { HubDevice } from '../devices/device.js';
import type { StatusApplyResult } from '../devices/status.js';
import { buildDeviceTree } from '../devices/tree.js';
import { HomgarClient } from '../clients/homgar.client.js';
import { LRUCache } from '../utils/cache.js';
import { NotFoundError } from '../utils/errors.js';

export interface HubListResult {
  hubs: HubDevice[];
  cached: boolean;
  cacheAge: number;
}

export interface HubStatusResult {
  hub: HubDevice;
  result: StatusApplyResult;
}

export class HomeService {
  private readonly client: HomgarClient;
  private readonly email: string;
  private readonly password: string;
  private readonly listings: LRUCache<HubRecord[]>;
  private readonly logger?: HomgarLogger;

  constructor(client: HomgarClient, config: Config, logger?: HomgarLogger) {
    this.client = client;
    this.email = config.homgarEmail;
    this.password = config.homgarPassword;
    this.listings = new LRUCache<HubRecord[]>({ defaultTtlMs: config.deviceCacheTtlMs });
    this.logger = logger;
  }

  async listHomes(): Promise<Home[]> {
    await this.login();
    return this.client.getHomes();
  }

  /**
   * Hubs of a home with their subdevices. The raw listing is cached; the
   * device objects are built fresh on every call.
   */
  async listHubs(hid: string): Promise<HubListResult> {
    const cacheEntry = this.listings.get(hid);
    if (cacheEntry !== null) {
      return {
        hubs: buildDeviceTree(cacheEntry.value, this.logger),
        cached: true,
        cacheAge: LRUCache.getCacheAgeSeconds(cacheEntry),
      };
    }

    await this.login();
    const records = await this.client.getDeviceRecords(hid);
    this.listings.set(hid, records);
    return {
      hubs: buildDeviceTree(records, this.logger),
      cached: false,
      cacheAge: 0,
    };
  }

  /**
   * A mid missing from a cached listing may belong to a hub added since, so the
   * listing is fetched again once before giving up.
   */
  async getHub(hid: string, mid: string): Promise<HubDevice> {
    const listing = await this.listHubs(hid);
    let hub = listing.hubs.find((h) => String(h.mid) === mid);
    if (hub === undefined && listing.cached) {
      this.listings.delete(hid);
      const { hubs } = await this.listHubs(hid);
      hub = hubs.find((h) => String(h.mid) === mid);
    }
    if (hub === undefined) {
      throw new NotFoundError(`Hub not found: ${mid}`, { hid, mid });
    }
    return hub;
  }

  /**
   * Fetch and decode the current status of one hub's sensor network.
   */
  async getHubStatus(hid: string, mid: string): Promise<HubStatusResult> {
    const hub = await this.getHub(hid, mid);
    await this.login();
    const result = await this.client.getDeviceStatus(hub);
    return { hub, result };
  }

  /**
   * True when HomGar accepts our session.
   */
  async ping(): Promise<boolean> {
    try {
      await this.login();
    } catch (error) {
      this.logger?.warn('HomGar login failed during readiness check', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
    return this.client.healthCheck();
  }

  invalidateCache(): void {
    this.listings.clear();
  }

  private async login(): Promise<void> {
    await this.client.ensureLoggedIn(this.email, this.password);
  }
}
