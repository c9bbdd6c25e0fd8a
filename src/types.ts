import type { Logger } from 'homebridge';

/**
 * The slice of the Homebridge logger the device code writes to
 */
export type DeviceLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export type SensorValue = boolean | number | string;

export interface SensorRecord {
  key: string;
  value: SensorValue;
  unit: string | null;
}

/**
 * One complete refresh. Frozen once built; replaced as a whole.
 */
export type SensorSnapshot = ReadonlyMap<string, Readonly<SensorRecord>>;

export interface DeviceMeta {
  firmwareVersion?: string;
  serialNumber?: string;
  modelCode?: string;
  language?: string;
}

export interface HeatingCircuit {
  index: number;
  name: string;
  dayTemp?: number;
  nightTemp?: number;
  mode?: string;
}

export interface TemperatureConstraints {
  min: number;
  max: number;
  step: number;
}

export type SetpointKind = 'day' | 'night';

export type ApiGeneration = 'modern' | 'legacy';

export interface ConnectionTestResult {
  ok: boolean;
  generation: ApiGeneration | null;
}

/**
 * Result of parsing one status.cgi payload
 */
export interface StatusParseResult {
  snapshot: SensorSnapshot;
  meta?: DeviceMeta;
  circuits?: readonly HeatingCircuit[];
  constraints?: TemperatureConstraints;
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function freezeSnapshot(records: Map<string, SensorRecord>): SensorSnapshot {
  for (const record of records.values()) {
    Object.freeze(record);
  }
  return records;
}
