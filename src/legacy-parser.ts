import { freezeSnapshot } from './types';
import type { SensorRecord, SensorSnapshot, SensorValue } from './types';
import {
  BOOLEAN_FALSE_TOKENS,
  BOOLEAN_TRUE_TOKENS,
  FLOAT_UNITS,
  INTEGER_UNITS,
  isExcludedKey,
} from './vocabulary';

/**
 * Split a daqdesc/daqdata body into lines. The controller terminates every
 * line, so the final element after the split is an artifact and is dropped.
 */
export function splitLegacyLines(text: string): string[] {
  return text.split('\n').slice(0, -1);
}

/**
 * Parse "key;unit". Returns null unless the line has exactly two fields.
 */
export function parseDescriptionLine(line: string): { key: string; unit: string | null } | null {
  const fields = line.split(';');
  if (fields.length !== 2) {
    return null;
  }
  const unit = fields[1].trim();
  return { key: fields[0], unit: unit === '' ? null : unit };
}

function parseFloatStrict(raw: string): number | null {
  if (raw === '') {
    return null;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : null;
}

export function coerceLegacyValue(raw: string, unit: string | null): SensorValue {
  if (BOOLEAN_TRUE_TOKENS.has(raw)) {
    return true;
  }
  if (BOOLEAN_FALSE_TOKENS.has(raw)) {
    return false;
  }
  if (unit !== null && FLOAT_UNITS.has(unit)) {
    return parseFloatStrict(raw) ?? raw;
  }
  if (unit !== null && INTEGER_UNITS.has(unit)) {
    const parsed = parseFloatStrict(raw);
    return parsed === null ? raw : Math.trunc(parsed);
  }
  return raw;
}

/**
 * Pair the description and value streams line by line.
 * Malformed description lines and reserved channels are skipped, extra lines
 * on either side are ignored.
 */
export function parseLegacyPayloads(descriptionText: string, valuesText: string): SensorSnapshot {
  const descriptions = splitLegacyLines(descriptionText);
  const values = splitLegacyLines(valuesText);
  const records = new Map<string, SensorRecord>();

  const count = Math.min(descriptions.length, values.length);
  for (let i = 0; i < count; i++) {
    const description = parseDescriptionLine(descriptions[i]);
    if (!description || isExcludedKey(description.key)) {
      continue;
    }

    const raw = values[i].trim();
    records.set(description.key, {
      key: description.key,
      value: coerceLegacyValue(raw, description.unit),
      unit: description.unit,
    });
  }

  return freezeSnapshot(records);
}
