export {
  listDevicesParamsSchema,
  deviceStatusParamsSchema,
  mcpInvokeSchema,
  type ListDevicesParams,
  type DeviceStatusParams,
  type McpInvokeRequest,
} from './tool.schema.js';

export {
  envelopeSchema,
  loginDataSchema,
  homeListSchema,
  deviceListSchema,
  deviceStatusSchema,
  hubRecordSchema,
  subDeviceRecordSchema,
  statusRecordSchema,
  sessionSchema,
  type Envelope,
  type LoginData,
  type HomeRecord,
  type HubRecord,
  type HubRecordInput,
  type SubDeviceRecord,
  type DeviceStatusData,
} from './homgar.schema.js';
