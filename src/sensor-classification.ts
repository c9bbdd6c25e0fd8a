import { DEFAULT_ICON, DIAGNOSTIC_KEYWORDS, ICON_KEYWORDS } from './vocabulary';
import type { SensorRecord, SensorSnapshot } from './types';

export type SensorDeviceClass = 'temperature' | 'power_factor';

export interface SensorClassification {
  deviceClass: SensorDeviceClass | null;
  diagnostic: boolean;
  icon: string;
  numeric: boolean;
}

// Units the keyword icons apply to, with the class of value they carry
const UNIT_CLASSES: ReadonlyMap<string, SensorDeviceClass | null> = new Map<string, SensorDeviceClass | null>([
  ['°C', 'temperature'],
  ['%', 'power_factor'],
  ['h', null],
  ['d', null],
]);

export function iconForKey(key: string): string {
  const lower = key.toLowerCase();
  return ICON_KEYWORDS.find(entry => lower.includes(entry.keyword))?.icon ?? DEFAULT_ICON;
}

export function isDiagnosticKey(key: string): boolean {
  const lower = key.toLowerCase();
  return DIAGNOSTIC_KEYWORDS.some(keyword => lower.includes(keyword));
}

export function classifySensor(record: Readonly<SensorRecord>): SensorClassification {
  const unitClass = record.unit === null ? undefined : UNIT_CLASSES.get(record.unit);
  const numeric = typeof record.value === 'number';

  return {
    // a unit only classifies values that actually parsed as numbers
    deviceClass: numeric ? unitClass ?? null : null,
    diagnostic: isDiagnosticKey(record.key),
    icon: unitClass === undefined ? DEFAULT_ICON : iconForKey(record.key),
    numeric,
  };
}

/**
 * Temperature records shown as HomeKit sensors: numeric °C values that are
 * not diagnostic.
 */
export function isExposedTemperature(record: Readonly<SensorRecord>): boolean {
  const classification = classifySensor(record);
  return classification.numeric && classification.deviceClass === 'temperature' && !classification.diagnostic;
}

export interface PlannedSensor {
  key: string;
  subtype: string;
  name: string;
}

export const RECORD_SENSOR_PREFIX = 'record:';

/**
 * One temperature sensor per exposed record, in snapshot order. Records the
 * caller already shows some other way are left out.
 */
export function planTemperatureSensors(
  snapshot: SensorSnapshot,
  shownElsewhere: (key: string) => boolean,
): PlannedSensor[] {
  const planned: PlannedSensor[] = [];
  for (const record of snapshot.values()) {
    if (!isExposedTemperature(record) || shownElsewhere(record.key)) {
      continue;
    }
    planned.push({
      key: record.key,
      subtype: `${RECORD_SENSOR_PREFIX}${record.key}`,
      name: record.key.replace(/^_/, '').trim(),
    });
  }
  return planned;
}
