import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PROGRAM_OPTIONS, inferCurrentProgram, isProgramName, programName } from '../src/program-state';
import type { SensorRecord, SensorSnapshot } from '../src/types';

function snapshotOf(...records: SensorRecord[]): SensorSnapshot {
  return new Map(records.map(record => [record.key, record]));
}

describe('program codes', () => {
  it('maps every option name to its code and back', () => {
    assert.deepEqual(PROGRAM_OPTIONS, { off: 0, normal: 1, heat: 2, lower: 3 });
    assert.equal(programName(2), 'heat');
    assert.equal(programName(7), null);
  });

  it('recognizes option names', () => {
    assert.equal(isProgramName('lower'), true);
    assert.equal(isProgramName('Lower'), false);
    assert.equal(isProgramName('eco'), false);
  });
});

describe('inferCurrentProgram', () => {
  it('returns null without a snapshot or a program record', () => {
    assert.equal(inferCurrentProgram(null), null);
    assert.equal(inferCurrentProgram(snapshotOf({ key: 'Kessel', value: 60, unit: '°C' })), null);
  });

  it('reads a numeric program code', () => {
    const snapshot = snapshotOf({ key: 'Programme', value: 3, unit: null });
    assert.equal(inferCurrentProgram(snapshot), 'lower');
  });

  it('matches an option name inside a text value', () => {
    const snapshot = snapshotOf({ key: 'Programm HK1', value: 'Mode NORMAL', unit: null });
    assert.equal(inferCurrentProgram(snapshot), 'normal');
  });

  it('skips program records it cannot interpret', () => {
    const snapshot = snapshotOf(
      { key: 'Program A', value: 9, unit: null },
      { key: 'Program B', value: true, unit: null },
      { key: 'Program C', value: 'OFF', unit: null },
    );
    assert.equal(inferCurrentProgram(snapshot), 'off');
  });
});
