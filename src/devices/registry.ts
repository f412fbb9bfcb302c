import type { HomgarLogger } from '../types/index.js';
import { HubDevice, SubDevice, type DeviceProps, type SubDeviceProps } from './device.js';
import {
  RainPoint2ZoneTimer,
  RainPointAirSensor,
  RainPointDisplayHub,
  RainPointRainSensor,
  RainPointSoilMoistureSensor,
} from './rainpoint.js';

export interface HubVariant {
  role: 'hub';
  description: string;
  create: (props: DeviceProps, subdevices: SubDevice[]) => HubDevice;
}

export interface SubDeviceVariant {
  role: 'subdevice';
  description: string;
  create: (props: SubDeviceProps) => SubDevice;
}

export type DeviceVariant = HubVariant | SubDeviceVariant;

interface HubClass {
  readonly MODEL_CODES: readonly number[];
  readonly DESCRIPTION: string;
  new (props: DeviceProps, subdevices: SubDevice[]): HubDevice;
}

interface SubDeviceClass {
  readonly MODEL_CODES: readonly number[];
  readonly DESCRIPTION: string;
  new (props: SubDeviceProps): SubDevice;
}

const HUB_CLASSES: HubClass[] = [RainPointDisplayHub];

const SUBDEVICE_CLASSES: SubDeviceClass[] = [
  RainPointSoilMoistureSensor,
  RainPointRainSensor,
  RainPointAirSensor,
  RainPoint2ZoneTimer,
];

function buildMapping(): ReadonlyMap<number, DeviceVariant> {
  const mapping = new Map<number, DeviceVariant>();

  for (const Hub of HUB_CLASSES) {
    const variant: HubVariant = {
      role: 'hub',
      description: Hub.DESCRIPTION,
      create: (props, subdevices) => new Hub(props, subdevices),
    };
    for (const code of Hub.MODEL_CODES) {
      mapping.set(code, variant);
    }
  }

  for (const Sub of SUBDEVICE_CLASSES) {
    const variant: SubDeviceVariant = {
      role: 'subdevice',
      description: Sub.DESCRIPTION,
      create: (props) => new Sub(props),
    };
    for (const code of Sub.MODEL_CODES) {
      mapping.set(code, variant);
    }
  }

  return mapping;
}

export const MODEL_CODE_MAPPING: ReadonlyMap<number, DeviceVariant> = buildMapping();

/**
 * Look up the variant for a model code. Never throws; unknown codes give undefined.
 */
export function resolveDeviceVariant(modelCode: number): DeviceVariant | undefined {
  return MODEL_CODE_MAPPING.get(modelCode);
}

interface ModelIdentity {
  model: string | null;
  modelCode: number | null;
}

function variantFor(device: ModelIdentity): DeviceVariant | undefined {
  return device.modelCode === null ? undefined : resolveDeviceVariant(device.modelCode);
}

function warnUnknown(device: ModelIdentity, role: DeviceVariant['role'], logger?: HomgarLogger): void {
  logger?.warn(`Unknown device '${device.model ?? ''}' with modelCode ${device.modelCode}`, {
    model: device.model,
    modelCode: device.modelCode,
    role,
  });
}

export function resolveHubVariant(device: ModelIdentity, logger?: HomgarLogger): HubVariant | undefined {
  const variant = variantFor(device);
  if (variant?.role !== 'hub') {
    warnUnknown(device, 'hub', logger);
    return undefined;
  }
  return variant;
}

export function resolveSubDeviceVariant(device: ModelIdentity, logger?: HomgarLogger): SubDeviceVariant | undefined {
  const variant = variantFor(device);
  if (variant?.role !== 'subdevice') {
    warnUnknown(device, 'subdevice', logger);
    return undefined;
  }
  return variant;
}

export const GENERIC_HUB: HubVariant = {
  role: 'hub',
  description: HubDevice.DESCRIPTION,
  create: (props, subdevices) => new HubDevice(props, subdevices),
};
