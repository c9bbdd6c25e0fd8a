import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  parseDeviceMeta,
  parseHeatingCircuits,
  parseStatusPayload,
  parseTemperatureConstraints,
  toSensorValue,
} from '../src/status-parser';
import { DEFAULT_TEMPERATURE_CONSTRAINTS } from '../src/settings';

const DEFAULTS = { ...DEFAULT_TEMPERATURE_CONSTRAINTS };

describe('toSensorValue', () => {
  it('keeps primitives', () => {
    assert.equal(toSensorValue(21.5), 21.5);
    assert.equal(toSensorValue('Heizen'), 'Heizen');
    assert.equal(toSensorValue(false), false);
  });

  it('treats null and undefined as absent', () => {
    assert.equal(toSensorValue(null), undefined);
    assert.equal(toSensorValue(undefined), undefined);
  });

  it('stringifies structured values', () => {
    assert.equal(toSensorValue({ a: 1 }), '{"a":1}');
    assert.equal(toSensorValue([1, 2]), '[1,2]');
  });
});

describe('parseStatusPayload', () => {
  it('maps the top-level fields with their units', () => {
    const { snapshot } = parseStatusPayload({
      temp: 68.4,
      ext_temp: -2.5,
      co2: 11.2,
      fumes: 140,
      fuel: 55,
      cleaning_in: 12,
      state: 'Heizen',
      mode: 'Normal',
      name: 'Biostar 15',
      timestamp: '2024-01-15 08:30',
    }, DEFAULTS);

    assert.deepEqual(snapshot.get('_Boiler temperature'), { key: '_Boiler temperature', value: 68.4, unit: '°C' });
    assert.deepEqual(snapshot.get('_Outside temperature'), { key: '_Outside temperature', value: -2.5, unit: '°C' });
    assert.equal(snapshot.get('_CO2')?.unit, '%');
    assert.equal(snapshot.get('_Flue gas')?.value, 140);
    assert.equal(snapshot.get('_Fuel level')?.unit, '%');
    assert.equal(snapshot.get('_Cleaning in')?.unit, 'h');
    assert.deepEqual(snapshot.get('_State'), { key: '_State', value: 'Heizen', unit: null });
    assert.equal(snapshot.get('_Mode')?.value, 'Normal');
    assert.equal(snapshot.get('_Name')?.value, 'Biostar 15');
    assert.equal(snapshot.get('_Last update')?.value, '2024-01-15 08:30');
    assert.equal(snapshot.size, 10);
  });

  it('emits nothing for absent or null fields', () => {
    const result = parseStatusPayload({ temp: null, co2: 9 }, DEFAULTS);
    assert.deepEqual([...result.snapshot.keys()], ['_CO2']);
    assert.equal(result.meta, undefined);
    assert.equal(result.circuits, undefined);
    assert.equal(result.constraints, undefined);
  });

  it('stringifies structured field values', () => {
    const { snapshot } = parseStatusPayload({ state: { code: 3 } }, DEFAULTS);
    assert.equal(snapshot.get('_State')?.value, '{"code":3}');
  });

  it('reads meta into records and DeviceMeta', () => {
    const result = parseStatusPayload({
      meta: { sw_version: '32.1', sn: 'SN-0001', typ: 'BIOSTAR 23', language: 'DE' },
    }, DEFAULTS);

    assert.deepEqual(result.meta, {
      firmwareVersion: '32.1',
      serialNumber: 'SN-0001',
      modelCode: 'BIOSTAR 23',
      language: 'DE',
    });
    assert.equal(result.snapshot.get('_Firmware version')?.value, '32.1');
    assert.equal(result.snapshot.get('_Serial number')?.value, 'SN-0001');
    assert.equal(result.snapshot.get('_Model')?.value, 'BIOSTAR 23');
    assert.equal(result.snapshot.get('_Language')?.unit, null);
  });

  it('emits circuit records using the name, or the position when unnamed', () => {
    const result = parseStatusPayload({
      heat_circ: [
        { nr: 0, name: 'Ground floor', day_temp: 21, night_temp: 17, mode: 'auto' },
        { nr: 1, day_temp: 20.5 },
      ],
    }, DEFAULTS);

    const { snapshot } = result;
    assert.deepEqual(snapshot.get('_Circuit Ground floor - Day temperature'), {
      key: '_Circuit Ground floor - Day temperature',
      value: 21,
      unit: '°C',
    });
    assert.equal(snapshot.get('_Circuit Ground floor - Night temperature')?.value, 17);
    assert.equal(snapshot.get('_Circuit Ground floor - Mode')?.value, 'auto');
    assert.equal(snapshot.get('_Circuit 1 - Day temperature')?.value, 20.5);
    assert.equal(snapshot.has('_Circuit 1 - Night temperature'), false);

    assert.deepEqual(result.circuits, [
      { index: 0, name: 'Ground floor', dayTemp: 21, nightTemp: 17, mode: 'auto' },
      { index: 1, name: 'Circuit 1', dayTemp: 20.5, nightTemp: undefined, mode: undefined },
    ]);
  });

  it('reports no circuits when heat_circ is not a list', () => {
    for (const heatCirc of [{ nr: 0, day_temp: 21 }, 'none', 3]) {
      const result = parseStatusPayload({ temp: 60, heat_circ: heatCirc }, DEFAULTS);
      assert.equal(result.circuits, undefined);
      assert.deepEqual([...result.snapshot.keys()], ['_Boiler temperature']);
    }
  });

  it('emits hot water records', () => {
    const { snapshot } = parseStatusPayload({
      water_circ: [{ name: 'Boiler', temp: 52.5, mode: 'eco' }, { temp: 40 }],
    }, DEFAULTS);
    assert.deepEqual(snapshot.get('_Hot water Boiler - Temperature'), {
      key: '_Hot water Boiler - Temperature',
      value: 52.5,
      unit: '°C',
    });
    assert.equal(snapshot.get('_Hot water Boiler - Mode')?.value, 'eco');
    assert.equal(snapshot.get('_Hot water 1 - Temperature')?.value, 40);
  });

  it('emits the error count and one record per error', () => {
    const { snapshot } = parseStatusPayload({ error: ['E101 ignition', { code: 7 }] }, DEFAULTS);
    assert.equal(snapshot.get('_Active errors')?.value, 2);
    assert.equal(snapshot.get('_Error 0')?.value, 'E101 ignition');
    assert.equal(snapshot.get('_Error 1')?.value, '{"code":7}');
  });

  it('emits nothing for an empty error list', () => {
    const { snapshot } = parseStatusPayload({ error: [] }, DEFAULTS);
    assert.equal(snapshot.size, 0);
  });

  it('refreshes constraints from heat_constraints', () => {
    const result = parseStatusPayload({ heat_constraints: { min: 10, max: 28, inc: 1 } }, DEFAULTS);
    assert.deepEqual(result.constraints, { min: 10, max: 28, step: 1 });
  });
});

describe('parseHeatingCircuits', () => {
  it('falls back to the position when nr is missing or not numeric', () => {
    const circuits = parseHeatingCircuits([{ name: 'A' }, { nr: 'x', name: 'B' }, { nr: '4', name: 'C' }]);
    assert.deepEqual(circuits.map(circuit => circuit.index), [0, 1, 4]);
  });

  it('skips entries that are not objects', () => {
    assert.deepEqual(parseHeatingCircuits([null, 3, 'x']), []);
    assert.deepEqual(parseHeatingCircuits('not a list'), []);
  });
});

describe('parseTemperatureConstraints', () => {
  it('accepts step as well as inc', () => {
    assert.deepEqual(parseTemperatureConstraints({ step: 0.2 }, DEFAULTS), { min: 15, max: 30, step: 0.2 });
  });

  it('keeps previous values for missing or non-numeric fields', () => {
    const previous = { min: 12, max: 26, step: 1 };
    assert.deepEqual(parseTemperatureConstraints({ max: 'high', min: 14 }, previous), { min: 14, max: 26, step: 1 });
  });
});

describe('parseDeviceMeta', () => {
  it('stringifies numeric meta values and skips absent ones', () => {
    assert.deepEqual(parseDeviceMeta({ sw_version: 32, sn: null }), { firmwareVersion: '32' });
  });
});
