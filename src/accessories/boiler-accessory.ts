import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';
import type { BiostarPlatform } from '../platform';
import { PROGRAM_NAMES, PROGRAM_OPTIONS } from '../program-state';
import type { ProgramName } from '../program-state';
import { RECORD_SENSOR_PREFIX, iconForKey, isExposedTemperature, planTemperatureSensors } from '../sensor-classification';
import { DEFAULT_MODEL, MANUFACTURER, PLUGIN_VERSION, STATUS_LABELS } from '../settings';
import type { SensorRecord, SensorSnapshot } from '../types';

// Icons that mark the boiler and the outside probe among legacy labels
const BOILER_ICON = 'mdi:fire';
const OUTSIDE_ICON = 'mdi:sun-thermometer-outline';

const FIXED_SENSORS: ReadonlyArray<[string, string]> = [
  [STATUS_LABELS.boilerTemperature, BOILER_ICON],
  [STATUS_LABELS.outsideTemperature, OUTSIDE_ICON],
];

/**
 * Find a temperature record: the status label first, otherwise the first
 * numeric °C legacy record whose label maps to the given icon.
 */
export function findTemperatureRecord(
  snapshot: SensorSnapshot | null,
  statusLabel: string,
  icon: string,
): Readonly<SensorRecord> | null {
  if (!snapshot) {
    return null;
  }

  const fromStatus = snapshot.get(statusLabel);
  if (fromStatus && typeof fromStatus.value === 'number') {
    return fromStatus;
  }

  for (const record of snapshot.values()) {
    if (isExposedTemperature(record) && iconForKey(record.key) === icon) {
      return record;
    }
  }
  return null;
}

export function findTemperature(snapshot: SensorSnapshot | null, statusLabel: string, icon: string): number | null {
  const record = findTemperatureRecord(snapshot, statusLabel, icon);
  return record && typeof record.value === 'number' ? record.value : null;
}

const CIRCUIT_LABEL = STATUS_LABELS.circuitPrefix('');

/**
 * Temperature records that get a sensor of their own: everything exposed
 * except the two fixed sensors and the circuit set-points, which the
 * circuit thermostats already show.
 */
export function planRecordSensors(snapshot: SensorSnapshot) {
  const fixed = new Set<string>();
  for (const [label, icon] of FIXED_SENSORS) {
    const record = findTemperatureRecord(snapshot, label, icon);
    if (record) {
      fixed.add(record.key);
    }
  }
  return planTemperatureSensors(snapshot, key => fixed.has(key) || key.startsWith(CIRCUIT_LABEL));
}

export class BoilerAccessory {
  private informationService: Service;
  private boilerTemperatureService: Service;
  private outsideTemperatureService: Service;
  private readonly programServices = new Map<ProgramName, Service>();
  // Keyed by record key
  private readonly recordServices = new Map<string, Service>();

  // Set locally after a write until the next snapshot says otherwise
  private selectedProgram: ProgramName | null = null;

  constructor(
    private readonly platform: BiostarPlatform,
    private readonly accessory: PlatformAccessory,
  ) {
    const names = this.platform.settings?.customNames;

    this.informationService = this.accessory.getService(this.platform.Service.AccessoryInformation) ||
      this.accessory.addService(this.platform.Service.AccessoryInformation);
    this.informationService.setCharacteristic(this.platform.Characteristic.Manufacturer, MANUFACTURER);

    this.boilerTemperatureService = this.accessory.getServiceById(this.platform.Service.TemperatureSensor, 'boiler-temperature') ||
      this.accessory.addService(this.platform.Service.TemperatureSensor, names?.boiler ?? 'Boiler', 'boiler-temperature');
    this.outsideTemperatureService = this.accessory.getServiceById(this.platform.Service.TemperatureSensor, 'outside-temperature') ||
      this.accessory.addService(
        this.platform.Service.TemperatureSensor,
        names?.outsideTemperature ?? 'Outside Temperature',
        'outside-temperature',
      );

    this.setupTemperatureService(this.boilerTemperatureService, STATUS_LABELS.boilerTemperature, BOILER_ICON);
    this.setupTemperatureService(this.outsideTemperatureService, STATUS_LABELS.outsideTemperature, OUTSIDE_ICON);
    this.setupProgramServices();
    this.restoreRecordServices();
    this.update();
  }

  public getUUID(): string {
    return this.accessory.UUID;
  }

  private setupTemperatureService(service: Service, statusLabel: string, icon: string) {
    service.getCharacteristic(this.platform.Characteristic.CurrentTemperature)
      .setProps({
        minValue: -50,
        maxValue: 150,
        minStep: 0.1,
      })
      .onGet(() => findTemperature(this.platform.coordinator?.getSnapshot() ?? null, statusLabel, icon) ?? 0);
  }

  /**
   * One switch per heating program, only with a write key. Turning a switch
   * on selects that program; turning the active one off is refused.
   */
  private setupProgramServices() {
    const hasWriteAccess = this.platform.coordinator?.hasWriteAccess() ?? false;

    for (const name of PROGRAM_NAMES) {
      const subtype = `program-${name}`;
      const existing = this.accessory.getServiceById(this.platform.Service.Switch, subtype);

      if (!hasWriteAccess) {
        if (existing) {
          this.accessory.removeService(existing);
          this.platform.log.debug(`Removed program switch ${name}: no write key`);
        }
        continue;
      }

      const displayName = `Program ${name.charAt(0).toUpperCase()}${name.slice(1)}`;
      const service = existing || this.accessory.addService(this.platform.Service.Switch, displayName, subtype);
      service.setCharacteristic(this.platform.Characteristic.Name, displayName);

      service.getCharacteristic(this.platform.Characteristic.On)
        .onGet(() => this.currentProgram() === name)
        .onSet(async (value: CharacteristicValue) => this.setProgram(name, value));

      this.programServices.set(name, service);
    }
  }

  // Record sensors restored from the Homebridge cache
  private restoreRecordServices() {
    for (const service of this.accessory.services) {
      const subtype = service.subtype;
      if (subtype?.startsWith(RECORD_SENSOR_PREFIX)) {
        this.setupRecordService(subtype.slice(RECORD_SENSOR_PREFIX.length), service);
      }
    }
  }

  private setupRecordService(key: string, service: Service) {
    service.getCharacteristic(this.platform.Characteristic.CurrentTemperature)
      .setProps({
        minValue: -50,
        maxValue: 1000,
        minStep: 0.1,
      })
      .onGet(() => {
        const value = this.platform.coordinator?.getSnapshot()?.get(key)?.value;
        return typeof value === 'number' ? value : 0;
      });
    this.recordServices.set(key, service);
  }

  /**
   * Add a sensor for every newly exposed record. A sensor whose record is
   * missing from a later snapshot stays and reports a fault.
   */
  private syncRecordServices(snapshot: SensorSnapshot) {
    for (const sensor of planRecordSensors(snapshot)) {
      if (this.recordServices.has(sensor.key)) {
        continue;
      }
      const service = this.accessory.addService(this.platform.Service.TemperatureSensor, sensor.name, sensor.subtype);
      service.setCharacteristic(this.platform.Characteristic.Name, sensor.name);
      this.setupRecordService(sensor.key, service);
      this.platform.log.debug(`Added temperature sensor: ${sensor.name}`);
    }
  }

  private currentProgram(): ProgramName | null {
    return this.platform.coordinator?.getCurrentProgram() ?? this.selectedProgram;
  }

  private async setProgram(name: ProgramName, value: CharacteristicValue) {
    const coordinator = this.platform.coordinator;

    if (!value) {
      setTimeout(() => {
        this.programServices.get(name)?.updateCharacteristic(this.platform.Characteristic.On, this.currentProgram() === name);
      }, 100);
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.NOT_ALLOWED_IN_CURRENT_STATE);
    }

    if (!coordinator) {
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }

    this.platform.log.info(`Setting heating program to: ${name} (ID: ${PROGRAM_OPTIONS[name]})`);
    const ok = await coordinator.setProgram(PROGRAM_OPTIONS[name]);
    if (!ok) {
      this.platform.log.error(`Failed to set program to ${name}`);
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }

    this.selectedProgram = name;
    for (const [other, service] of this.programServices) {
      if (other !== name) {
        service.updateCharacteristic(this.platform.Characteristic.On, false);
      }
    }
  }

  /**
   * Push the latest coordinator state to HomeKit
   */
  public update() {
    const coordinator = this.platform.coordinator;
    if (!coordinator) {
      return;
    }

    const meta = coordinator.getDeviceMeta();
    this.informationService
      .setCharacteristic(this.platform.Characteristic.Model, meta?.modelCode ?? DEFAULT_MODEL)
      .setCharacteristic(this.platform.Characteristic.SerialNumber, meta?.serialNumber ?? this.platform.settings?.host ?? 'unknown')
      .setCharacteristic(this.platform.Characteristic.FirmwareRevision, meta?.firmwareVersion ?? PLUGIN_VERSION);

    const snapshot = coordinator.getSnapshot();
    const fault = coordinator.getState() === 'failed'
      ? this.platform.Characteristic.StatusFault.GENERAL_FAULT
      : this.platform.Characteristic.StatusFault.NO_FAULT;

    const sensors: Array<[Service, string, string]> = [
      [this.boilerTemperatureService, STATUS_LABELS.boilerTemperature, BOILER_ICON],
      [this.outsideTemperatureService, STATUS_LABELS.outsideTemperature, OUTSIDE_ICON],
    ];
    for (const [service, label, icon] of sensors) {
      const temperature = findTemperature(snapshot, label, icon);
      if (temperature !== null) {
        service.updateCharacteristic(this.platform.Characteristic.CurrentTemperature, temperature);
      }
      service.updateCharacteristic(this.platform.Characteristic.StatusFault, fault);
    }

    if (snapshot) {
      this.syncRecordServices(snapshot);
    }
    for (const [key, service] of this.recordServices) {
      const value = snapshot?.get(key)?.value;
      if (typeof value === 'number') {
        service.updateCharacteristic(this.platform.Characteristic.CurrentTemperature, value);
      }
      service.updateCharacteristic(
        this.platform.Characteristic.StatusFault,
        value === undefined ? this.platform.Characteristic.StatusFault.GENERAL_FAULT : fault,
      );
    }

    const program = coordinator.getCurrentProgram();
    if (program) {
      this.selectedProgram = program;
    }
    for (const [name, service] of this.programServices) {
      service.updateCharacteristic(this.platform.Characteristic.On, this.currentProgram() === name);
    }
  }
}
