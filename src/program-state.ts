import type { SensorSnapshot } from './types';

/**
 * Heating programs accepted by PR001, in the order they are offered
 */
export const PROGRAM_OPTIONS = {
  off: 0,
  normal: 1,
  heat: 2,
  lower: 3,
} as const;

export type ProgramName = keyof typeof PROGRAM_OPTIONS;

export const PROGRAM_NAMES: readonly ProgramName[] = ['off', 'normal', 'heat', 'lower'];

export function programName(code: number): ProgramName | null {
  return PROGRAM_NAMES.find(name => PROGRAM_OPTIONS[name] === code) ?? null;
}

export function isProgramName(value: string): value is ProgramName {
  return PROGRAM_NAMES.some(name => name === value);
}

/**
 * Best-effort guess of the active program. No device field states it
 * explicitly, so any record whose label mentions "prog" is taken as a hint.
 * Unrelated labels containing that substring can produce a wrong answer.
 */
export function inferCurrentProgram(snapshot: SensorSnapshot | null): ProgramName | null {
  if (!snapshot) {
    return null;
  }

  for (const record of snapshot.values()) {
    if (!record.key.toLowerCase().includes('prog')) {
      continue;
    }

    if (typeof record.value === 'number') {
      const name = programName(record.value);
      if (name) {
        return name;
      }
    } else if (typeof record.value === 'string') {
      const lower = record.value.toLowerCase();
      const name = PROGRAM_NAMES.find(option => lower.includes(option));
      if (name) {
        return name;
      }
    }
  }

  return null;
}
