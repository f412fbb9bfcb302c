import { z } from 'zod';

// HomGar ids are numeric in some responses and strings in others
const idParam = z.union([z.string().min(1), z.number().int()]).transform(String);

export const listDevicesParamsSchema = z.object({
  hid: idParam,
}).strict();

export type ListDevicesParams = z.infer<typeof listDevicesParamsSchema>;

export const deviceStatusParamsSchema = z.object({
  hid: idParam,
  mid: idParam,
}).strict();

export type DeviceStatusParams = z.infer<typeof deviceStatusParamsSchema>;

export const mcpInvokeSchema = z.object({
  tool: z.enum(['list_homes', 'list_devices', 'get_device_status'], {
    errorMap: () => ({ message: "Invalid tool. Must be 'list_homes', 'list_devices', or 'get_device_status'" }),
  }),
  params: z.record(z.unknown()).optional().default({}),
}).strict();

export type McpInvokeRequest = z.infer<typeof mcpInvokeSchema>;
