import type { HomgarLogger } from '../types/index.js';
import type { HubRecord, SubDeviceRecord } from '../schemas/homgar.schema.js';
import type { DeviceProps, HubDevice, SubDevice } from './device.js';
import { GENERIC_HUB, resolveHubVariant, resolveSubDeviceVariant } from './registry.js';

// The display hub is listed once more among its own subdevices with did 1
const DISPLAY_DUPLICATE_DID = '1';

function deviceProps(record: SubDeviceRecord, modelCode: number): DeviceProps {
  return {
    model: record.model,
    modelCode,
    name: record.name,
    did: record.did,
    mid: record.mid,
    alerts: record.alerts,
  };
}

function buildSubDevice(record: SubDeviceRecord, logger?: HomgarLogger): SubDevice | null {
  const variant = resolveSubDeviceVariant(record, logger);
  if (variant === undefined || record.modelCode === null) {
    return null;
  }
  if (record.addr === null) {
    logger?.warn(`Subdevice '${record.name ?? ''}' has no address, skipping`, {
      did: record.did,
      modelCode: record.modelCode,
    });
    return null;
  }
  return variant.create({
    ...deviceProps(record, record.modelCode),
    address: record.addr,
    portNumber: record.portNumber,
  });
}

/**
 * Build hub objects (with their subdevices) from a /app/device/getDeviceByHid listing.
 * Unknown hubs fall back to the generic hub; unknown subdevices are left out.
 * Input order is kept for hubs and for the subdevices of each hub.
 */
export function buildDeviceTree(records: HubRecord[], logger?: HomgarLogger): HubDevice[] {
  return records.map((hubRecord) => {
    const subdevices: SubDevice[] = [];
    for (const subRecord of hubRecord.subDevices) {
      if (String(subRecord.did) === DISPLAY_DUPLICATE_DID) {
        continue;
      }
      const subdevice = buildSubDevice(subRecord, logger);
      if (subdevice !== null) {
        subdevices.push(subdevice);
      }
    }

    const variant = resolveHubVariant(hubRecord, logger) ?? GENERIC_HUB;
    return variant.create(deviceProps(hubRecord, hubRecord.modelCode), subdevices);
  });
}
