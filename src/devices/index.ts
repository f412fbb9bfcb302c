export {
  HomgarDevice,
  HubDevice,
  SubDevice,
  statusIdForAddress,
  type DeviceId,
  type DeviceProps,
  type DeviceSnapshot,
  type Reading,
  type SubDeviceProps,
} from './device.js';

export {
  RainPoint2ZoneTimer,
  RainPointAirSensor,
  RainPointDisplayHub,
  RainPointRainSensor,
  RainPointSoilMoistureSensor,
} from './rainpoint.js';

export {
  GENERIC_HUB,
  MODEL_CODE_MAPPING,
  resolveDeviceVariant,
  resolveHubVariant,
  resolveSubDeviceVariant,
  type DeviceVariant,
  type HubVariant,
  type SubDeviceVariant,
} from './registry.js';

export { buildDeviceTree } from './tree.js';

export {
  applyDeviceStatus,
  buildStatusIdMap,
  type StatusApplyResult,
  type StatusDecodeFailure,
} from './status.js';

export {
  parseStatsValue,
  tempToMilliKelvin,
  type MaybeStatsValue,
  type StatsValue,
} from './stats.js';
