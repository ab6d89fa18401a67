import { z } from 'zod';
import { DynamicValue, decodeDynamicValue } from './dynamicValue';

export type ApiSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ResponseEnvelope<T> {
  errorCode: number;
  result?: T;
}

// Only the envelope is checked here; `result` is decoded once `errno` says it is authoritative.
export const ResponseEnvelopeSchema: ApiSchema<ResponseEnvelope<unknown>> = z
  .object({
    errno: z.number().int(),
    result: z.unknown(),
  })
  .transform(({ errno, result }) => ({
    errorCode: errno,
    result: result === null ? undefined : result,
  }));

const OptionalText = z.string().nullish().transform(v => v ?? '');
const OptionalFlag = z.boolean().nullish().transform(v => v ?? false);

export const DeviceSchema = z.object({
  deviceSN: z.string(),
  stationName: OptionalText,
  stationID: OptionalText,
  moduleSN: OptionalText,
  deviceType: OptionalText,
  hasPV: OptionalFlag,
  hasBattery: OptionalFlag,
});

export type Device = z.infer<typeof DeviceSchema>;

export const PagedDeviceListSchema = z.object({
  currentPage: z.number().optional(),
  pageSize: z.number().optional(),
  total: z.number().optional(),
  data: z.array(DeviceSchema),
});

export type PagedDeviceList = z.infer<typeof PagedDeviceListSchema>;

export interface TelemetryPoint {
  key: string;
  value: DynamicValue;
  displayName: string;
  unit?: string;
}

export const TelemetryPointSchema: ApiSchema<TelemetryPoint> = z
  .object({
    variable: z.string(),
    value: z.unknown(),
    name: z.string().nullish(),
    unit: z.string().nullish(),
  })
  .transform(({ variable, value, name, unit }) => ({
    key: variable,
    value: decodeDynamicValue(value),
    displayName: name ?? variable,
    ...(unit != null ? { unit } : {}),
  }));

export const RealtimeBlockSchema = z.object({
  deviceSN: z.string(),
  datas: z.array(TelemetryPointSchema).default([]),
});

export type RealtimeBlock = z.infer<typeof RealtimeBlockSchema>;

export const RealtimeResponseSchema = z.array(RealtimeBlockSchema);

export interface DeviceListRequest {
  currentPage: number;
  pageSize: number;
}

export interface RealtimeQueryRequest {
  deviceSN: string;
  variables: readonly string[];
}
