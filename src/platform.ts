import {
  API,
  APIEvent,
  Characteristic,
  DynamicPlatformPlugin,
  Logger,
  PlatformAccessory,
  PlatformConfig,
  Service,
} from 'homebridge';

import { BoilerAccessory } from './accessories/boiler-accessory';
import { HeatingCircuitAccessory } from './accessories/heating-circuit-accessory';
import { resolveConfig } from './config';
import type { ResolvedConfig } from './config';
import { DeviceClient } from './device-client';
import { ConfigError, errorMessage } from './errors';
import { PLATFORM_NAME, PLUGIN_NAME, PLUGIN_VERSION } from './settings';
import type { HeatingCircuit } from './types';
import { UpdateCoordinator } from './update-coordinator';
import type { CoordinatorEvent } from './update-coordinator';

const HEALTH_REPORT_INTERVAL = 60 * 60 * 1000; // 1 hour

export class BiostarPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  public readonly accessories: PlatformAccessory[] = [];
  public readonly settings: ResolvedConfig | null = null;
  public coordinator: UpdateCoordinator | null = null;

  private boilerAccessory: BoilerAccessory | null = null;
  private readonly circuitAccessories = new Map<string, HeatingCircuitAccessory>();
  private healthMonitoringTimer?: NodeJS.Timeout;

  constructor(
    public readonly log: Logger,
    config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = this.api.hap.Service;
    this.Characteristic = this.api.hap.Characteristic;

    let settings: ResolvedConfig;
    try {
      settings = resolveConfig(config);
    } catch (error) {
      if (!(error instanceof ConfigError)) {
        throw error;
      }
      this.log.error(`❌ Invalid configuration, plugin not started: ${error.message}`);
      return;
    }
    this.settings = settings;

    this.log.debug('Finished initializing platform:', settings.name);

    this.api.on(APIEvent.DID_FINISH_LAUNCHING, () => {
      log.debug('Executed didFinishLaunching callback');
      this.launch(settings).catch((error: unknown) => {
        this.log.error(`Failed to start ${PLUGIN_NAME}: ${errorMessage(error)}`);
      });
    });

    this.api.on(APIEvent.SHUTDOWN, () => {
      if (this.healthMonitoringTimer) {
        clearInterval(this.healthMonitoringTimer);
      }
      this.coordinator?.stop();
    });
  }

  configureAccessory(accessory: PlatformAccessory) {
    this.log.info('Loading accessory from cache:', accessory.displayName);
    this.accessories.push(accessory);
  }

  private async launch(settings: ResolvedConfig): Promise<void> {
    this.log.info(`🔥 Starting ${PLUGIN_NAME} v${PLUGIN_VERSION} for ${settings.host}`);

    const client = new DeviceClient(this.log, {
      host: settings.host,
      port: settings.port,
      apiKey: settings.apiKey,
      writeKey: settings.writeKey,
      requestTimeout: settings.requestTimeout,
      writeTimeout: settings.writeTimeout,
      userAgent: settings.userAgent,
    });

    const connection = await client.testConnection();
    if (connection.ok) {
      this.log.info(`✅ Connected to boiler (${connection.generation === 'modern' ? 'JSON status API' : 'legacy API'})`);
    } else {
      this.log.warn('⚠️ Boiler did not answer the connection test, will keep polling');
    }

    if (!client.hasWriteAccess()) {
      this.log.info('No write key configured, controls are read-only');
    }

    this.coordinator = new UpdateCoordinator(this.log, client, {
      refreshInterval: settings.refreshInterval,
      refreshTimeout: settings.refreshTimeout,
    });
    this.coordinator.addListener(event => this.handleCoordinatorEvent(event));

    this.setupBoilerAccessory(settings);
    await this.coordinator.start();
    this.startHealthMonitoring(client);
  }

  private handleCoordinatorEvent(event: CoordinatorEvent): void {
    if (event.type === 'update') {
      this.syncCircuitAccessories();
      if (event.health === 'poor' || event.health === 'critical') {
        this.log.warn(`⚠️ Boiler API health is ${event.health}`);
      }
    }

    this.boilerAccessory?.update();
    for (const circuitAccessory of this.circuitAccessories.values()) {
      circuitAccessory.update();
    }
  }

  private findOrCreateAccessory(uuid: string, displayName: string): PlatformAccessory {
    const existing = this.accessories.find(accessory => accessory.UUID === uuid);
    if (existing) {
      this.log.info('Restoring existing accessory from cache:', existing.displayName);
      return existing;
    }

    this.log.info('Adding new accessory:', displayName);
    const accessory = new this.api.platformAccessory(displayName, uuid);
    this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
    this.accessories.push(accessory);
    return accessory;
  }

  private setupBoilerAccessory(settings: ResolvedConfig): void {
    const uuid = this.api.hap.uuid.generate(`${PLUGIN_NAME}:${settings.host}:boiler`);
    const accessory = this.findOrCreateAccessory(uuid, `${settings.name} ${settings.customNames.boiler}`);
    this.boilerAccessory = new BoilerAccessory(this, accessory);
  }

  private circuitUUID(circuit: HeatingCircuit): string {
    return this.api.hap.uuid.generate(`${PLUGIN_NAME}:${this.settings?.host}:circuit-${circuit.index}`);
  }

  /**
   * One Thermostat per circuit reported by status.cgi. Circuits that
   * disappeared after a successful refresh are unregistered.
   */
  private syncCircuitAccessories(): void {
    if (!this.coordinator || !this.settings) {
      return;
    }

    const circuits = this.coordinator.getHeatingCircuits();
    const wanted = new Set<string>();

    for (const circuit of circuits) {
      const uuid = this.circuitUUID(circuit);
      wanted.add(uuid);
      if (this.circuitAccessories.has(uuid)) {
        continue;
      }
      const displayName = `${this.settings.customNames.heatingCircuit} ${circuit.name}`;
      const accessory = this.findOrCreateAccessory(uuid, displayName);
      this.circuitAccessories.set(uuid, new HeatingCircuitAccessory(this, accessory, circuit.index));
    }

    const boilerUUID = this.boilerAccessory?.getUUID();
    const stale = this.accessories.filter(accessory => accessory.UUID !== boilerUUID && !wanted.has(accessory.UUID));
    if (stale.length > 0) {
      this.log.info(`Removing ${stale.length} stale accessories: ${stale.map(accessory => accessory.displayName).join(', ')}`);
      this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
      for (const accessory of stale) {
        this.circuitAccessories.delete(accessory.UUID);
        this.accessories.splice(this.accessories.indexOf(accessory), 1);
      }
    }
  }

  private startHealthMonitoring(client: DeviceClient): void {
    this.healthMonitoringTimer = setInterval(() => {
      client.getApiClient().getHealthMonitor().logHealthReport();
    }, HEALTH_REPORT_INTERVAL);

    this.log.debug('🩺 Health monitoring started - reports every hour');
  }
}
