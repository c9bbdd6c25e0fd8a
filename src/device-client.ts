import { APIClient } from './api-client';
import type { DeviceResponse, QueryParams } from './api-client';
import { CommandDispatcher } from './command-dispatcher';
import type { WriteResult } from './command-dispatcher';
import { FetchFailedError, TransportError, errorMessage } from './errors';
import { parseLegacyPayloads } from './legacy-parser';
import { mergeSources } from './merge';
import type { MergeReport } from './merge';
import { DEFAULT_CONFIG, DEFAULT_TEMPERATURE_CONSTRAINTS, DEVICE_API } from './settings';
import { parseStatusPayload } from './status-parser';
import { isJsonObject } from './types';
import type {
  ConnectionTestResult,
  DeviceLogger,
  DeviceMeta,
  HeatingCircuit,
  JsonObject,
  SensorSnapshot,
  SetpointKind,
  StatusParseResult,
  TemperatureConstraints,
} from './types';

export interface DeviceClientConfig {
  host: string;
  port?: number;
  apiKey: string;
  writeKey?: string;
  requestTimeout?: number;
  writeTimeout?: number;
  userAgent?: string;
  // Tests plug an in-process axios adapter here
  apiClient?: APIClient;
}

/**
 * Everything the plugin knows how to ask the boiler. Metadata, circuits and
 * constraints are cached from the last status payload that carried them and
 * survive failed refreshes.
 */
export class DeviceClient {
  private readonly apiClient: APIClient;
  private readonly dispatcher: CommandDispatcher;
  private readonly legacyDecoder = new TextDecoder(DEVICE_API.legacyEncoding);

  private deviceMeta: Readonly<DeviceMeta> | null = null;
  private heatingCircuits: readonly HeatingCircuit[] = [];
  private temperatureConstraints: Readonly<TemperatureConstraints> = { ...DEFAULT_TEMPERATURE_CONSTRAINTS };

  constructor(
    private readonly log: DeviceLogger,
    private readonly config: DeviceClientConfig,
  ) {
    this.apiClient = config.apiClient ?? new APIClient(log, {
      host: config.host,
      port: config.port,
      requestTimeout: config.requestTimeout ?? DEFAULT_CONFIG.requestTimeout,
      userAgent: config.userAgent,
    });

    this.dispatcher = new CommandDispatcher(log, this.apiClient, {
      writeKey: config.writeKey,
      writeTimeout: config.writeTimeout ?? DEFAULT_CONFIG.writeTimeout,
    });
  }

  private readParams(): QueryParams {
    return { key: this.config.apiKey };
  }

  /**
   * status.cgi is optional on older firmware. Any failure here yields null
   * and the refresh carries on with the legacy endpoints.
   */
  public async fetchStatus(signal?: AbortSignal): Promise<StatusParseResult | null> {
    let response: DeviceResponse;
    try {
      response = await this.apiClient.get(DEVICE_API.status, this.readParams(), { signal });
    } catch (error) {
      if (error instanceof TransportError && error.aborted) {
        throw error;
      }
      this.log.debug(`status.cgi unavailable: ${errorMessage(error)}`);
      return null;
    }

    if (response.status !== 200) {
      this.log.debug(`status.cgi returned HTTP ${response.status}`);
      return null;
    }

    const payload = decodeJsonObject(response.body);
    if (!payload) {
      this.log.debug('status.cgi did not return a JSON object');
      return null;
    }

    return parseStatusPayload(payload, this.temperatureConstraints);
  }

  /**
   * daqdesc.cgi then daqdata.cgi, both windows-1252 text.
   */
  public async fetchLegacy(signal?: AbortSignal): Promise<SensorSnapshot> {
    const descriptionText = await this.fetchLegacyText(DEVICE_API.legacyDescription, signal);
    const valuesText = await this.fetchLegacyText(DEVICE_API.legacyValues, signal);
    return parseLegacyPayloads(descriptionText, valuesText);
  }

  private async fetchLegacyText(path: string, signal?: AbortSignal): Promise<string> {
    let response: DeviceResponse;
    try {
      response = await this.apiClient.get(path, this.readParams(), { signal });
    } catch (error) {
      if (error instanceof TransportError && error.aborted) {
        throw error;
      }
      throw new FetchFailedError(`Failed to fetch ${path}: ${errorMessage(error)}`, path, undefined, error);
    }

    if (response.status !== 200) {
      throw new FetchFailedError(`${path} returned HTTP ${response.status}`, path, response.status);
    }
    return this.legacyDecoder.decode(response.body);
  }

  /**
   * One full refresh: status first, legacy second, merged with status keys
   * winning.
   */
  public async fetchSnapshot(signal?: AbortSignal): Promise<MergeReport> {
    const status = await this.fetchStatus(signal);

    let legacy: SensorSnapshot | FetchFailedError;
    try {
      legacy = await this.fetchLegacy(signal);
    } catch (error) {
      if (!(error instanceof FetchFailedError)) {
        throw error;
      }
      legacy = error;
    }

    const report = mergeSources(status?.snapshot ?? null, legacy);
    if (status) {
      this.absorbStatus(status);
    }
    if (report.degraded && report.legacyError) {
      this.log.warn(`⚠️ Legacy endpoints failed, using status data only: ${report.legacyError.message}`);
    }

    this.log.info(
      `📊 Refreshed ${report.snapshot.size} sensors (${report.statusCount} from status, ${report.legacyCount} from legacy)`,
    );
    this.log.debug(`Sensor keys: ${[...report.snapshot.keys()].join(', ')}`);
    return report;
  }

  private absorbStatus(status: StatusParseResult): void {
    if (status.meta) {
      this.deviceMeta = Object.freeze({ ...status.meta });
    }
    if (status.circuits) {
      this.heatingCircuits = Object.freeze(status.circuits.map(circuit => Object.freeze({ ...circuit })));
    }
    if (status.constraints) {
      this.temperatureConstraints = Object.freeze({ ...status.constraints });
    }
  }

  public getDeviceMeta(): Readonly<DeviceMeta> | null {
    return this.deviceMeta;
  }

  public getHeatingCircuits(): readonly HeatingCircuit[] {
    return this.heatingCircuits;
  }

  public getTemperatureConstraints(): Readonly<TemperatureConstraints> {
    return this.temperatureConstraints;
  }

  public hasWriteAccess(): boolean {
    return this.dispatcher.hasWriteAccess();
  }

  public async setProgram(code: number): Promise<boolean> {
    return this.dispatcher.setProgram(code);
  }

  public async setTemperature(circuitIndex: number, kind: SetpointKind, value: number): Promise<boolean> {
    return this.dispatcher.setTemperature(circuitIndex, kind, value);
  }

  public async executeSetProgram(code: number): Promise<WriteResult> {
    return this.dispatcher.executeSetProgram(code);
  }

  public async executeSetTemperature(circuitIndex: number, kind: SetpointKind, value: number): Promise<WriteResult> {
    return this.dispatcher.executeSetTemperature(circuitIndex, kind, value);
  }

  /**
   * Probe the JSON API first, then the legacy one. Used at startup to report
   * which firmware generation answered.
   */
  public async testConnection(): Promise<ConnectionTestResult> {
    try {
      const response = await this.apiClient.get(DEVICE_API.status, this.readParams(), {
        timeoutMs: DEFAULT_CONFIG.connectionTest.statusTimeout,
      });
      if (response.status === 200 && decodeJson(response.body) !== undefined) {
        this.log.debug(`Connected to ${this.apiClient.getBaseURL()} (JSON API)`);
        return { ok: true, generation: 'modern' };
      }
      this.log.debug('status.cgi did not return valid JSON');
    } catch (error) {
      this.log.debug(`status.cgi probe failed: ${errorMessage(error)}`);
    }

    try {
      const response = await this.apiClient.get(DEVICE_API.legacyDescription, this.readParams(), {
        timeoutMs: DEFAULT_CONFIG.connectionTest.legacyTimeout,
      });
      if (response.status === 200) {
        this.log.debug(`Connected to ${this.apiClient.getBaseURL()} (legacy API)`);
        return { ok: true, generation: 'legacy' };
      }
      this.log.warn(`Connection test failed with status ${response.status}`);
    } catch (error) {
      this.log.warn(`Connection test failed: ${errorMessage(error)}`);
    }

    return { ok: false, generation: null };
  }

  public getApiClient(): APIClient {
    return this.apiClient;
  }
}

function decodeJson(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString('utf-8'));
  } catch {
    return undefined;
  }
}

function decodeJsonObject(body: Buffer): JsonObject | null {
  const parsed = decodeJson(body);
  return isJsonObject(parsed) ? parsed : null;
}
