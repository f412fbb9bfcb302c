import type { HomgarLogger, StatusRecord } from '../types/index.js';
import { DeviceStatusDecodeError } from '../utils/errors.js';
import type { DeviceId, HomgarDevice, HubDevice } from './device.js';

export interface StatusDecodeFailure {
  statusId: string;
  did: DeviceId;
  message: string;
}

export interface StatusApplyResult {
  applied: string[];
  ignored: string[];
  failures: StatusDecodeFailure[];
}

/**
 * Map every status id declared by the hub and its subdevices to its owner.
 * Hub first, then subdevices in order; a later registration of the same id wins.
 */
export function buildStatusIdMap(hub: HubDevice): Map<string, HomgarDevice> {
  const idMap = new Map<string, HomgarDevice>();
  for (const device of [hub, ...hub.subdevices]) {
    for (const statusId of device.getStatusIds()) {
      idMap.set(statusId, device);
    }
  }
  return idMap;
}

/**
 * Route $.data.subDeviceStatus records to the devices that own them.
 *
 * Records with an id no device claims are ignored. A record that fails to decode
 * is logged and reported in the result; the remaining records are still applied
 * and the failing device keeps its previous readings.
 */
export function applyDeviceStatus(
  hub: HubDevice,
  records: StatusRecord[],
  logger?: HomgarLogger
): StatusApplyResult {
  const idMap = buildStatusIdMap(hub);
  const result: StatusApplyResult = { applied: [], ignored: [], failures: [] };

  for (const record of records) {
    const device = idMap.get(record.id);
    if (device === undefined) {
      result.ignored.push(record.id);
      continue;
    }

    try {
      device.applyStatus(record);
      result.applied.push(record.id);
    } catch (error) {
      if (!(error instanceof DeviceStatusDecodeError)) {
        throw error;
      }
      logger?.warn(`Could not decode status ${record.id} for device ${device.did}: ${error.message}`, {
        statusId: record.id,
        did: device.did,
        mid: hub.mid,
        value: record.value,
      });
      result.failures.push({ statusId: record.id, did: device.did, message: error.message });
    }
  }

  return result;
}
