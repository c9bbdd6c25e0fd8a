import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { findTemperature, planRecordSensors } from '../src/accessories/boiler-accessory';
import { circuitSetpoint, clampSetpoint } from '../src/accessories/heating-circuit-accessory';
import type { SensorRecord, SensorSnapshot } from '../src/types';

function snapshotOf(...records: SensorRecord[]): SensorSnapshot {
  return new Map(records.map(record => [record.key, record]));
}

describe('clampSetpoint', () => {
  const constraints = { min: 15, max: 30, step: 0.5 };

  it('snaps to the device step', () => {
    assert.equal(clampSetpoint(21.3, constraints), 21.5);
    assert.equal(clampSetpoint(21.2, constraints), 21);
  });

  it('clamps into the device range', () => {
    assert.equal(clampSetpoint(40, constraints), 30);
    assert.equal(clampSetpoint(10, constraints), 15);
  });

  it('never rounds past the maximum', () => {
    assert.equal(clampSetpoint(27, { min: 10, max: 28, step: 3 }), 28);
  });

  it('only clamps when the step is not positive', () => {
    assert.equal(clampSetpoint(21.37, { min: 15, max: 30, step: 0 }), 21.37);
  });
});

describe('circuitSetpoint', () => {
  const constraints = { min: 15, max: 30, step: 0.5 };
  const circuit = { index: 0, name: 'Main', dayTemp: 21.2, nightTemp: 12 };

  it('reads the day and night set-points separately', () => {
    assert.equal(circuitSetpoint(circuit, 'day', constraints), 21);
    assert.equal(circuitSetpoint(circuit, 'night', constraints), 15);
  });

  it('shows the range minimum before the device reports a value', () => {
    assert.equal(circuitSetpoint({ index: 1, name: 'Floor', dayTemp: 22 }, 'night', constraints), 15);
    assert.equal(circuitSetpoint(undefined, 'day', constraints), 15);
  });
});

describe('findTemperature', () => {
  it('returns null without a snapshot', () => {
    assert.equal(findTemperature(null, '_Boiler temperature', 'mdi:fire'), null);
  });

  it('prefers the status record', () => {
    const snapshot = snapshotOf(
      { key: 'Kesseltemperatur', value: 61, unit: '°C' },
      { key: '_Boiler temperature', value: 55.2, unit: '°C' },
    );
    assert.equal(findTemperature(snapshot, '_Boiler temperature', 'mdi:fire'), 55.2);
  });

  it('falls back to a legacy temperature with the matching icon', () => {
    const snapshot = snapshotOf(
      { key: 'Puffer oben', value: 64.5, unit: '°C' },
      { key: 'Außentemperatur', value: 5.3, unit: '°C' },
    );
    assert.equal(findTemperature(snapshot, '_Outside temperature', 'mdi:sun-thermometer-outline'), 5.3);
    assert.equal(findTemperature(snapshot, '_Boiler temperature', 'mdi:fire'), null);
  });

  it('skips legacy values that did not parse', () => {
    const snapshot = snapshotOf({ key: 'Kessel', value: '---', unit: '°C' });
    assert.equal(findTemperature(snapshot, '_Boiler temperature', 'mdi:fire'), null);
  });
});

describe('planRecordSensors', () => {
  it('skips the boiler, outside and circuit set-point records', () => {
    const snapshot = snapshotOf(
      { key: '_Boiler temperature', value: 55.2, unit: '°C' },
      { key: 'Außentemperatur', value: 5.3, unit: '°C' },
      { key: '_Circuit Main - Day temperature', value: 21, unit: '°C' },
      { key: 'Puffer oben', value: 64.5, unit: '°C' },
    );

    assert.deepEqual(planRecordSensors(snapshot), [
      { key: 'Puffer oben', subtype: 'record:Puffer oben', name: 'Puffer oben' },
    ]);
  });

  it('keeps a second legacy boiler reading once the status record is used', () => {
    const snapshot = snapshotOf(
      { key: '_Boiler temperature', value: 55.2, unit: '°C' },
      { key: 'Kesseltemperatur', value: 61, unit: '°C' },
    );

    assert.deepEqual(planRecordSensors(snapshot).map(sensor => sensor.key), ['Kesseltemperatur']);
  });
});
