import { z } from 'zod';
import type { StatusRecord } from '../types/index.js';

/**
 * Shapes of the HomGar cloud responses this project reads.
 * Fields the API omits or sends as null become null rather than defaults.
 */

export const idSchema = z.union([z.number(), z.string()]);

export const envelopeSchema = z.object({
  code: z.number().int().nullable(),
  msg: z.string().nullish(),
  data: z.unknown().optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

export const loginDataSchema = z.object({
  token: z.string().min(1),
  tokenExpired: z.number(), // seconds until expiry
  refreshToken: z.string().nullish(),
});

export type LoginData = z.infer<typeof loginDataSchema>;

export const homeRecordSchema = z.object({
  hid: idSchema,
  homeName: z.string().nullish(),
});

export const homeListSchema = z.array(homeRecordSchema);

export type HomeRecord = z.infer<typeof homeRecordSchema>;

const deviceFieldsSchema = z.object({
  model: z.string().nullish().transform((v) => v ?? null),
  modelCode: z.number().int(),
  name: z.string().nullish().transform((v) => v ?? null),
  did: idSchema,
  mid: idSchema,
  addr: z.number().int().nullish().transform((v) => v ?? null),
  portNumber: z.number().int().nullish().transform((v) => v ?? null),
  alerts: z.unknown().optional().transform((v) => v ?? null),
});

// A subdevice entry without a model code is kept here and dropped as unknown when the tree is built
export const subDeviceRecordSchema = deviceFieldsSchema.extend({
  modelCode: z.number().int().nullish().transform((v) => v ?? null),
});

export type SubDeviceRecord = z.infer<typeof subDeviceRecordSchema>;

export const hubRecordSchema = deviceFieldsSchema.extend({
  subDevices: z.array(subDeviceRecordSchema).nullish().transform((v) => v ?? []),
});

export type HubRecord = z.infer<typeof hubRecordSchema>;
export type HubRecordInput = z.input<typeof hubRecordSchema>;

export const deviceListSchema = z.array(hubRecordSchema);

export const statusRecordSchema = z.object({
  id: z.string(),
  value: z.string(),
});

// Entries that are not {id: string, value: string} are left out and counted in `malformed`
export const deviceStatusSchema = z
  .object({
    subDeviceStatus: z.array(z.unknown()).nullish(),
  })
  .transform(({ subDeviceStatus }) => {
    const records: StatusRecord[] = [];
    let malformed = 0;
    for (const entry of subDeviceStatus ?? []) {
      const parsed = statusRecordSchema.safeParse(entry);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        malformed += 1;
      }
    }
    return { subDeviceStatus: records, malformed };
  });

export type DeviceStatusData = z.infer<typeof deviceStatusSchema>;

export const sessionSchema = z.object({
  email: z.string(),
  token: z.string(),
  tokenExpiresAt: z.number(),
  refreshToken: z.string().optional(),
});
