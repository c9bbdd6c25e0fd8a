import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  classifySensor,
  iconForKey,
  isDiagnosticKey,
  isExposedTemperature,
  planTemperatureSensors,
} from '../src/sensor-classification';
import type { SensorRecord, SensorSnapshot } from '../src/types';

function snapshotOf(...records: SensorRecord[]): SensorSnapshot {
  return new Map(records.map(record => [record.key, record]));
}

describe('iconForKey', () => {
  it('picks the first keyword found in the lowercased label', () => {
    assert.equal(iconForKey('Température extérieure'), 'mdi:sun-thermometer-outline');
    assert.equal(iconForKey('Kesseltemperatur'), 'mdi:fire');
    assert.equal(iconForKey('Puffer oben'), 'mdi:water-boiler');
  });

  it('falls back to the default icon', () => {
    assert.equal(iconForKey('Rauchgas'), 'mdi:gauge');
  });
});

describe('isDiagnosticKey', () => {
  it('flags version, serial and fault labels', () => {
    assert.equal(isDiagnosticKey('_Firmware version'), true);
    assert.equal(isDiagnosticKey('Numéro de série'), true);
    assert.equal(isDiagnosticKey('Störung 1'), true);
    assert.equal(isDiagnosticKey('Kessel'), false);
  });
});

describe('classifySensor', () => {
  it('classifies a numeric temperature', () => {
    assert.deepEqual(classifySensor({ key: 'Kessel', value: 61.5, unit: '°C' }), {
      deviceClass: 'temperature',
      diagnostic: false,
      icon: 'mdi:fire',
      numeric: true,
    });
  });

  it('gives operating hours no device class', () => {
    const classification = classifySensor({ key: 'Betriebsstunden', value: 1200, unit: 'h' });
    assert.equal(classification.deviceClass, null);
    assert.equal(classification.diagnostic, true);
    assert.equal(classification.icon, 'mdi:counter');
  });

  it('leaves values that did not parse unclassified', () => {
    const classification = classifySensor({ key: 'Kessel', value: '---', unit: '°C' });
    assert.equal(classification.deviceClass, null);
    assert.equal(classification.numeric, false);
  });

  it('uses the default icon for records without a known unit', () => {
    assert.equal(classifySensor({ key: 'Kesselpumpe', value: true, unit: null }).icon, 'mdi:gauge');
  });
});

describe('isExposedTemperature', () => {
  it('accepts numeric non-diagnostic temperatures only', () => {
    assert.equal(isExposedTemperature({ key: 'Außentemperatur', value: 5.3, unit: '°C' }), true);
    assert.equal(isExposedTemperature({ key: 'Fault temperature', value: 90, unit: '°C' }), false);
    assert.equal(isExposedTemperature({ key: 'CO2', value: 9.5, unit: '%' }), false);
  });
});

describe('planTemperatureSensors', () => {
  const snapshot = snapshotOf(
    { key: '_Boiler temperature', value: 55.2, unit: '°C' },
    { key: 'Puffer oben', value: 64.5, unit: '°C' },
    { key: 'Puffer unten', value: '---', unit: '°C' },
    { key: 'Fault temperature', value: 90, unit: '°C' },
    { key: 'CO2', value: 9.5, unit: '%' },
    { key: '_Hot water 1 - Temperature', value: 48, unit: '°C' },
  );

  it('plans one sensor per exposed temperature record', () => {
    assert.deepEqual(planTemperatureSensors(snapshot, () => false), [
      { key: '_Boiler temperature', subtype: 'record:_Boiler temperature', name: 'Boiler temperature' },
      { key: 'Puffer oben', subtype: 'record:Puffer oben', name: 'Puffer oben' },
      { key: '_Hot water 1 - Temperature', subtype: 'record:_Hot water 1 - Temperature', name: 'Hot water 1 - Temperature' },
    ]);
  });

  it('leaves out records shown elsewhere', () => {
    const keys = planTemperatureSensors(snapshot, key => key === '_Boiler temperature').map(sensor => sensor.key);
    assert.deepEqual(keys, ['Puffer oben', '_Hot water 1 - Temperature']);
  });
});
