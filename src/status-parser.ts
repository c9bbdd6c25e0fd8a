import { STATUS_LABELS } from './settings';
import { freezeSnapshot, isJsonObject } from './types';
import type {
  DeviceMeta,
  HeatingCircuit,
  JsonObject,
  SensorRecord,
  SensorValue,
  StatusParseResult,
  TemperatureConstraints,
} from './types';

const TOP_LEVEL_FIELDS: ReadonlyArray<{ field: string; label: string; unit: string | null }> = [
  { field: 'temp', label: STATUS_LABELS.boilerTemperature, unit: '°C' },
  { field: 'ext_temp', label: STATUS_LABELS.outsideTemperature, unit: '°C' },
  { field: 'co2', label: STATUS_LABELS.co2, unit: '%' },
  { field: 'fumes', label: STATUS_LABELS.flueGas, unit: '%' },
  { field: 'fuel', label: STATUS_LABELS.fuel, unit: '%' },
  { field: 'cleaning_in', label: STATUS_LABELS.cleaningIn, unit: 'h' },
  { field: 'state', label: STATUS_LABELS.state, unit: null },
  { field: 'mode', label: STATUS_LABELS.mode, unit: null },
  { field: 'name', label: STATUS_LABELS.name, unit: null },
  { field: 'timestamp', label: STATUS_LABELS.timestamp, unit: null },
];

const META_FIELDS: ReadonlyArray<{ field: string; label: string; target: keyof DeviceMeta }> = [
  { field: 'sw_version', label: STATUS_LABELS.firmwareVersion, target: 'firmwareVersion' },
  { field: 'sn', label: STATUS_LABELS.serialNumber, target: 'serialNumber' },
  { field: 'typ', label: STATUS_LABELS.model, target: 'modelCode' },
  { field: 'language', label: STATUS_LABELS.language, target: 'language' },
];

/**
 * Anything that is not boolean/number/string is stringified; null and
 * undefined mean "field absent".
 */
export function toSensorValue(value: unknown): SensorValue | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value);
}

function toOptionalNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function objectEntries(value: unknown): JsonObject[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isJsonObject);
}

function circuitLabel(circuit: JsonObject, position: number): string | number {
  const name = toSensorValue(circuit.name);
  return name === undefined ? position : String(name);
}

export function parseDeviceMeta(meta: JsonObject): DeviceMeta {
  const result: DeviceMeta = {};
  for (const { field, target } of META_FIELDS) {
    const value = toSensorValue(meta[field]);
    if (value !== undefined) {
      result[target] = String(value);
    }
  }
  return result;
}

export function parseHeatingCircuits(entries: unknown): HeatingCircuit[] {
  return objectEntries(entries).map((circuit, position) => {
    const index = toOptionalNumber(circuit.nr);
    const resolvedIndex = index === undefined ? position : Math.trunc(index);
    const name = toSensorValue(circuit.name);
    const mode = toSensorValue(circuit.mode);
    return {
      index: resolvedIndex,
      name: name === undefined ? `Circuit ${resolvedIndex}` : String(name),
      dayTemp: toOptionalNumber(circuit.day_temp),
      nightTemp: toOptionalNumber(circuit.night_temp),
      mode: mode === undefined ? undefined : String(mode),
    };
  });
}

/**
 * Device sends min/max/inc; fields it leaves out keep their previous value.
 */
export function parseTemperatureConstraints(
  raw: JsonObject,
  previous: TemperatureConstraints,
): TemperatureConstraints {
  return {
    min: toOptionalNumber(raw.min) ?? previous.min,
    max: toOptionalNumber(raw.max) ?? previous.max,
    step: toOptionalNumber(raw.inc) ?? toOptionalNumber(raw.step) ?? previous.step,
  };
}

export function parseStatusPayload(
  payload: JsonObject,
  previousConstraints: TemperatureConstraints,
): StatusParseResult {
  const records = new Map<string, SensorRecord>();
  const put = (key: string, raw: unknown, unit: string | null) => {
    const value = toSensorValue(raw);
    if (value !== undefined) {
      records.set(key, { key, value, unit });
    }
  };

  for (const { field, label, unit } of TOP_LEVEL_FIELDS) {
    put(label, payload[field], unit);
  }

  let meta: DeviceMeta | undefined;
  if (isJsonObject(payload.meta)) {
    meta = parseDeviceMeta(payload.meta);
    for (const { field, label } of META_FIELDS) {
      put(label, payload.meta[field], null);
    }
  }

  let circuits: HeatingCircuit[] | undefined;
  // Anything but a list leaves the cached circuits alone
  if (Array.isArray(payload.heat_circ)) {
    circuits = parseHeatingCircuits(payload.heat_circ);
    objectEntries(payload.heat_circ).forEach((circuit, position) => {
      const prefix = STATUS_LABELS.circuitPrefix(circuitLabel(circuit, position));
      put(`${prefix}${STATUS_LABELS.dayTemperature}`, circuit.day_temp, '°C');
      put(`${prefix}${STATUS_LABELS.nightTemperature}`, circuit.night_temp, '°C');
      put(`${prefix}${STATUS_LABELS.circuitMode}`, circuit.mode, null);
    });
  }

  let constraints: TemperatureConstraints | undefined;
  if (isJsonObject(payload.heat_constraints)) {
    constraints = parseTemperatureConstraints(payload.heat_constraints, previousConstraints);
  }

  objectEntries(payload.water_circ).forEach((circuit, position) => {
    const prefix = STATUS_LABELS.hotWaterPrefix(circuitLabel(circuit, position));
    put(`${prefix}${STATUS_LABELS.temperature}`, circuit.temp, '°C');
    put(`${prefix}${STATUS_LABELS.circuitMode}`, circuit.mode, null);
  });

  if (Array.isArray(payload.error) && payload.error.length > 0) {
    put(STATUS_LABELS.activeErrors, payload.error.length, null);
    payload.error.forEach((entry: unknown, i: number) => {
      put(STATUS_LABELS.error(i), typeof entry === 'string' ? entry : JSON.stringify(entry), null);
    });
  }

  return {
    snapshot: freezeSnapshot(records),
    meta,
    circuits,
    constraints,
  };
}
