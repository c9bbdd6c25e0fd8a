import { FetchFailedError } from './errors';
import type { SensorRecord, SensorSnapshot } from './types';

export interface MergeReport {
  snapshot: SensorSnapshot;
  statusCount: number;
  legacyCount: number;
  // Legacy failed but status data carried the refresh
  degraded: boolean;
  legacyError?: FetchFailedError;
}

/**
 * Combine the two partial results of one refresh. Status keys win; legacy
 * keys only fill gaps. A legacy failure is fatal only when status produced
 * nothing.
 */
export function mergeSources(
  status: SensorSnapshot | null,
  legacy: SensorSnapshot | FetchFailedError,
): MergeReport {
  const statusCount = status?.size ?? 0;

  if (legacy instanceof FetchFailedError) {
    if (!status || status.size === 0) {
      throw legacy;
    }
    return {
      snapshot: status,
      statusCount,
      legacyCount: 0,
      degraded: true,
      legacyError: legacy,
    };
  }

  const merged = new Map<string, Readonly<SensorRecord>>(status ?? []);
  let legacyCount = 0;
  for (const [key, record] of legacy) {
    if (!merged.has(key)) {
      merged.set(key, record);
      legacyCount++;
    }
  }

  return {
    snapshot: merged,
    statusCount,
    legacyCount,
    degraded: false,
  };
}
