import type { StatusRecord } from '../types/index.js';
import { parseInteger, splitFields } from './stats.js';

export type DeviceId = string | number;

export type Reading = number | boolean | null;

/**
 * Identity and network properties shared by every device, as taken from a
 * /app/device/getDeviceByHid record.
 */
export interface DeviceProps {
  model: string | null;
  modelCode: number;
  name: string | null;
  did: DeviceId;
  mid: DeviceId;
  alerts: unknown;
}

export interface SubDeviceProps extends DeviceProps {
  address: number;
  portNumber: number | null;
}

export interface DeviceSnapshot {
  description: string;
  model: string | null;
  modelCode: number;
  name: string | null;
  did: DeviceId;
  mid: DeviceId;
  address: number;
  rfRssi: number | null;
  alerts: unknown;
  readings: Record<string, Reading>;
  portNumber?: number | null;
  subdevices?: DeviceSnapshot[];
}

export function statusIdForAddress(address: number): string {
  return `D${String(address).padStart(2, '0')}`;
}

/**
 * Base class for HomGar devices, both hubs and subdevices.
 *
 * Status updates arrive as `{ id, value }` records from /app/device/getDeviceStatus.
 * A device declares which ids it owns through {@link getStatusIds}; the dispatcher
 * then calls {@link applyStatus} for each matching record.
 */
export abstract class HomgarDevice {
  readonly model: string | null;
  readonly modelCode: number;
  readonly name: string | null;
  readonly did: DeviceId;
  readonly mid: DeviceId;
  readonly alerts: unknown;

  /** Position within the sensor network. The hub is always 1. */
  abstract readonly address: number;

  rfRssi: number | null = null;

  constructor(props: DeviceProps) {
    this.model = props.model;
    this.modelCode = props.modelCode;
    this.name = props.name;
    this.did = props.did;
    this.mid = props.mid;
    this.alerts = props.alerts;
  }

  abstract get description(): string;

  /**
   * Ids in $.data.subDeviceStatus this device listens to. Empty unless overridden.
   */
  getStatusIds(): string[] {
    return [];
  }

  /**
   * Decode and apply one status record. Throws DeviceStatusDecodeError when the
   * payload is malformed, in which case no field is modified.
   */
  applyStatus(record: StatusRecord): void {
    if (record.id === statusIdForAddress(this.address)) {
      this.applyDStatus(record.value);
    }
  }

  /**
   * `<general>;<specific>`. The general part is common to all devices; the
   * specific part is decoded by the model.
   */
  protected applyDStatus(value: string): void {
    const [general, specific] = splitFields(value, ';', 2, 'status value');
    const rfRssi = this.parseGeneralStatus(general);
    const commit = this.decodeSpecificStatus(specific);
    commit();
    this.rfRssi = rfRssi;
  }

  /**
   * `<reserved>,<rssi dBm>,<reserved>`. Both reserved fields have only ever been
   * seen as 1 and are left unparsed.
   */
  protected parseGeneralStatus(s: string): number {
    const [, rfRssi] = splitFields(s, ',', 3, 'general status');
    return parseInteger(rfRssi, 'rf rssi');
  }

  /**
   * Parse the model-specific part of a Dxx value. Returns a function that
   * assigns the parsed fields, so nothing is written until every part of the
   * value has been parsed.
   */
  protected decodeSpecificStatus(_s: string): () => void {
    return () => undefined;
  }

  protected readings(): Record<string, Reading> {
    return {};
  }

  toJSON(): DeviceSnapshot {
    return {
      description: this.description,
      model: this.model,
      modelCode: this.modelCode,
      name: this.name,
      did: this.did,
      mid: this.mid,
      address: this.address,
      rfRssi: this.rfRssi,
      alerts: this.alerts,
      readings: this.readings(),
    };
  }

  toString(): string {
    return `${this.description} "${this.name ?? ''}" (DID ${this.did})`;
  }
}

/**
 * A hub acts as a gateway for sensors and actuators. A home has any number of
 * hubs, each owning any number of subdevices.
 */
export class HubDevice extends HomgarDevice {
  static readonly DESCRIPTION: string = 'Unknown HomGar hub';

  readonly address = 1;
  readonly subdevices: SubDevice[];

  constructor(props: DeviceProps, subdevices: SubDevice[]) {
    super(props);
    this.subdevices = subdevices;
  }

  get description(): string {
    return HubDevice.DESCRIPTION;
  }

  getStatusIds(): string[] {
    return [statusIdForAddress(this.address)];
  }

  toJSON(): DeviceSnapshot {
    return {
      ...super.toJSON(),
      subdevices: this.subdevices.map((subdevice) => subdevice.toJSON()),
    };
  }

  toString(): string {
    return `${super.toString()} with ${this.subdevices.length} subdevices`;
  }
}

/**
 * A sensor or actuator addressed within a hub's network.
 */
export class SubDevice extends HomgarDevice {
  static readonly DESCRIPTION: string = 'Unknown HomGar device';

  readonly address: number;
  /** Number of physical ports, e.g. 2 for the 2-zone water timer. */
  readonly portNumber: number | null;

  constructor(props: SubDeviceProps) {
    super(props);
    this.address = props.address;
    this.portNumber = props.portNumber;
  }

  get description(): string {
    return SubDevice.DESCRIPTION;
  }

  getStatusIds(): string[] {
    return [statusIdForAddress(this.address)];
  }

  toJSON(): DeviceSnapshot {
    return {
      ...super.toJSON(),
      portNumber: this.portNumber,
    };
  }

  toString(): string {
    return `${super.toString()} at address ${this.address}`;
  }
}
