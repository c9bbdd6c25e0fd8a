import sensorKeywords from './data/sensor-keywords.json';

/**
 * Locale tokens used by the legacy API. The controller answers in the language
 * configured on its display, so every table carries German, English and French
 * variants. Add a locale by extending the sets.
 */
export const BOOLEAN_TRUE_TOKENS: ReadonlySet<string> = new Set(['AN', 'ON', 'MARCHE']);
export const BOOLEAN_FALSE_TOKENS: ReadonlySet<string> = new Set(['AUS', 'OFF', 'ARRÊT']);

// Placeholder rows the controller emits for unused channels
export const EXCLUDED_KEYWORDS: readonly string[] = ['réservé', 'reserved', 'reserviert'];

export const FLOAT_UNITS: ReadonlySet<string> = new Set(['°C', '%']);
export const INTEGER_UNITS: ReadonlySet<string> = new Set(['d', 'h']);

export interface IconKeyword {
  keyword: string;
  icon: string;
}

export const ICON_KEYWORDS: readonly IconKeyword[] = sensorKeywords.icons;
export const DEFAULT_ICON: string = sensorKeywords.defaultIcon;
export const DIAGNOSTIC_KEYWORDS: readonly string[] = sensorKeywords.diagnostic;

export function isExcludedKey(key: string): boolean {
  const lower = key.toLowerCase();
  return EXCLUDED_KEYWORDS.some(keyword => lower.includes(keyword));
}
