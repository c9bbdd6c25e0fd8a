import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';
import type { BiostarPlatform } from '../platform';
import { DEFAULT_TEMPERATURE_CONSTRAINTS, MANUFACTURER } from '../settings';
import type { HeatingCircuit, SetpointKind, TemperatureConstraints } from '../types';

/**
 * Clamp a set-point into the device range and snap it to the device step,
 * so HomeKit never receives a value outside the characteristic props.
 */
export function clampSetpoint(value: number, constraints: TemperatureConstraints): number {
  const bounded = Math.min(Math.max(value, constraints.min), constraints.max);
  if (constraints.step <= 0) {
    return bounded;
  }
  const steps = Math.round((bounded - constraints.min) / constraints.step);
  return Math.min(constraints.min + steps * constraints.step, constraints.max);
}

/**
 * The value a set-point thermostat shows: the circuit's day or night
 * temperature, clamped, or the range minimum before the device reports one.
 */
export function circuitSetpoint(
  circuit: HeatingCircuit | undefined,
  kind: SetpointKind,
  constraints: TemperatureConstraints,
): number {
  const raw = kind === 'day' ? circuit?.dayTemp : circuit?.nightTemp;
  return clampSetpoint(raw ?? constraints.min, constraints);
}

// Thermostat service subtype per set-point
const SETPOINT_SUBTYPES: Readonly<Record<SetpointKind, string>> = {
  day: 'day-setpoint',
  night: 'night-setpoint',
};

interface SetpointControl {
  kind: SetpointKind;
  service: Service;
  applied: TemperatureConstraints | null;
}

/**
 * One heating circuit as two thermostats, one per set-point. The device has
 * no room probe per circuit, so CurrentTemperature mirrors the set-point.
 */
export class HeatingCircuitAccessory {
  private informationService: Service;
  private readonly controls: SetpointControl[];

  constructor(
    private readonly platform: BiostarPlatform,
    private readonly accessory: PlatformAccessory,
    private readonly circuitIndex: number,
  ) {
    this.informationService = this.accessory.getService(this.platform.Service.AccessoryInformation) ||
      this.accessory.addService(this.platform.Service.AccessoryInformation);
    this.informationService
      .setCharacteristic(this.platform.Characteristic.Manufacturer, MANUFACTURER)
      .setCharacteristic(this.platform.Characteristic.Model, `Heating Circuit ${circuitIndex}`)
      .setCharacteristic(this.platform.Characteristic.SerialNumber, `${this.platform.settings?.host ?? 'biostar'}-HC${circuitIndex}`);

    this.controls = [
      { kind: 'day', service: this.thermostat(SETPOINT_SUBTYPES.day, `${accessory.displayName} Day`), applied: null },
      { kind: 'night', service: this.thermostat(SETPOINT_SUBTYPES.night, `${accessory.displayName} Night`), applied: null },
    ];
    for (const control of this.controls) {
      this.setupCharacteristics(control);
    }
    this.update();
  }

  private thermostat(subtype: string, name: string): Service {
    const service = this.accessory.getServiceById(this.platform.Service.Thermostat, subtype) ||
      this.accessory.addService(this.platform.Service.Thermostat, name, subtype);
    service.setCharacteristic(this.platform.Characteristic.Name, name);
    return service;
  }

  private circuit(): HeatingCircuit | undefined {
    return this.platform.coordinator?.getHeatingCircuits().find(circuit => circuit.index === this.circuitIndex);
  }

  private constraints(): TemperatureConstraints {
    return this.platform.coordinator?.getTemperatureConstraints() ?? DEFAULT_TEMPERATURE_CONSTRAINTS;
  }

  private setpoint(kind: SetpointKind): number {
    return circuitSetpoint(this.circuit(), kind, this.constraints());
  }

  private setupCharacteristics(control: SetpointControl) {
    const { Characteristic } = this.platform;
    const { service, kind } = control;

    // The boiler only heats
    service.getCharacteristic(Characteristic.TargetHeatingCoolingState)
      .updateValue(Characteristic.TargetHeatingCoolingState.HEAT)
      .setProps({
        validValues: [Characteristic.TargetHeatingCoolingState.HEAT],
      })
      .onGet(() => Characteristic.TargetHeatingCoolingState.HEAT)
      .onSet(() => {}); // Read-only

    service.getCharacteristic(Characteristic.CurrentHeatingCoolingState)
      .onGet(() => this.platform.coordinator?.getCurrentProgram() === 'off'
        ? Characteristic.CurrentHeatingCoolingState.OFF
        : Characteristic.CurrentHeatingCoolingState.HEAT);

    service.getCharacteristic(Characteristic.CurrentTemperature)
      .onGet(() => this.setpoint(kind));

    this.applyConstraints(control);
    service.getCharacteristic(Characteristic.TargetTemperature)
      .onGet(() => this.setpoint(kind))
      .onSet(async (value: CharacteristicValue) => this.setTargetTemperature(control, value));

    service.getCharacteristic(Characteristic.TemperatureDisplayUnits)
      .onGet(() => Characteristic.TemperatureDisplayUnits.CELSIUS)
      .onSet(() => {}); // Read-only
  }

  private applyConstraints(control: SetpointControl) {
    const constraints = this.constraints();
    const applied = control.applied;
    if (applied && applied.min === constraints.min && applied.max === constraints.max && applied.step === constraints.step) {
      return;
    }

    // Set a valid value first, props are checked against it
    control.service.getCharacteristic(this.platform.Characteristic.TargetTemperature)
      .updateValue(this.setpoint(control.kind))
      .setProps({
        minValue: constraints.min,
        maxValue: constraints.max,
        minStep: constraints.step,
      });
    control.applied = { ...constraints };
  }

  private async setTargetTemperature(control: SetpointControl, value: CharacteristicValue) {
    const coordinator = this.platform.coordinator;
    if (!coordinator || !coordinator.hasWriteAccess()) {
      this.platform.log.warn(`Heating circuit ${this.circuitIndex} is read-only: no write key configured`);
      setTimeout(() => {
        control.service.updateCharacteristic(this.platform.Characteristic.TargetTemperature, this.setpoint(control.kind));
      }, 100);
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.READ_ONLY_CHARACTERISTIC);
    }

    const target = clampSetpoint(Number(value), this.constraints());
    this.platform.log.info(`Setting ${control.kind} temperature of circuit ${this.circuitIndex} to ${target}°C`);

    const ok = await coordinator.setTemperature(this.circuitIndex, control.kind, target);
    if (!ok) {
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
  }

  public update() {
    if (!this.platform.coordinator) {
      return;
    }

    const circuit = this.circuit();
    for (const control of this.controls) {
      this.applyConstraints(control);
      const raw = control.kind === 'day' ? circuit?.dayTemp : circuit?.nightTemp;
      if (raw === undefined) {
        continue;
      }
      const value = circuitSetpoint(circuit, control.kind, this.constraints());
      control.service.updateCharacteristic(this.platform.Characteristic.TargetTemperature, value);
      control.service.updateCharacteristic(this.platform.Characteristic.CurrentTemperature, value);
    }
  }
}
