import type { APIClient, DeviceResponse, QueryParams } from './api-client';
import { WriteDeniedError, WriteRejectedError, errorMessage } from './errors';
import type { DeviceError } from './errors';
import { DEVICE_API, WRITE_CODES } from './settings';
import { isJsonObject } from './types';
import type { DeviceLogger, SetpointKind } from './types';

export type AttemptOutcome =
  | { kind: 'success'; via: string }
  | { kind: 'rejected'; error: WriteRejectedError }
  | { kind: 'inconclusive'; reason: string };

export interface WriteCommand {
  syn: string;
  value: string;
  description: string;
}

/**
 * One step of the fallback chain. Strategies sharing an endpoint share the
 * response through the context, so the device is only hit once per endpoint.
 */
export interface WriteStrategy {
  name: string;
  attempt(command: WriteCommand, context: AttemptContext): Promise<AttemptOutcome>;
}

export interface WriteResult {
  ok: boolean;
  via?: string;
  error?: DeviceError;
}

interface AttemptContext {
  fetch(path: string): Promise<DeviceResponse | null>;
}

function decodeJson(body: Buffer): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(body.toString('utf-8')) };
  } catch {
    return { ok: false };
  }
}

/**
 * ext/parset.cgi, JSON body: "ack" is success, "err" is an explicit refusal.
 * A body that is JSON but holds neither is inconclusive.
 */
export const extendedJsonStrategy: WriteStrategy = {
  name: 'extended-json',
  async attempt(command, context) {
    const response = await context.fetch(DEVICE_API.extendedWrite);
    if (!response) {
      return { kind: 'inconclusive', reason: 'extended endpoint unreachable' };
    }
    if (response.status !== 200) {
      return { kind: 'inconclusive', reason: `extended endpoint returned ${response.status}` };
    }

    const decoded = decodeJson(response.body);
    if (!decoded.ok) {
      return { kind: 'inconclusive', reason: 'not-json' };
    }
    const body = decoded.value;

    if (isJsonObject(body) && 'ack' in body) {
      return { kind: 'success', via: 'ext API' };
    }
    if (isJsonObject(body) && 'err' in body) {
      const deviceMessage = String(body.err);
      return {
        kind: 'rejected',
        error: new WriteRejectedError(`Device rejected ${command.description}: ${deviceMessage}`, command.syn, deviceMessage),
      };
    }
    return { kind: 'inconclusive', reason: 'json without ack or err' };
  },
};

/**
 * Older firmware answers the extended endpoint with plain text. JSON bodies
 * were already judged by the JSON stage and are not searched for "OK".
 */
export const extendedTextStrategy: WriteStrategy = {
  name: 'extended-text',
  async attempt(_command, context) {
    const response = await context.fetch(DEVICE_API.extendedWrite);
    if (!response || response.status !== 200) {
      return { kind: 'inconclusive', reason: 'extended endpoint unavailable' };
    }
    if (decodeJson(response.body).ok) {
      return { kind: 'inconclusive', reason: 'json body is not a text acknowledgement' };
    }
    const text = response.body.toString('utf-8');
    if (text.includes('OK') || text.toLowerCase().includes('ack')) {
      return { kind: 'success', via: 'ext API' };
    }
    return { kind: 'inconclusive', reason: 'no acknowledgement in text body' };
  },
};

/**
 * Plain parset.cgi, which has no acknowledgement body: HTTP 200 is success.
 */
export const legacyStrategy: WriteStrategy = {
  name: 'legacy',
  async attempt(command, context) {
    const response = await context.fetch(DEVICE_API.legacyWrite);
    if (!response) {
      return { kind: 'inconclusive', reason: 'legacy endpoint unreachable' };
    }
    if (response.status === 200) {
      return { kind: 'success', via: 'legacy API' };
    }
    return {
      kind: 'rejected',
      error: new WriteRejectedError(`Legacy parset.cgi returned ${response.status} for ${command.description}`, command.syn),
    };
  },
};

export const PROGRAM_CHAIN: readonly WriteStrategy[] = [extendedJsonStrategy, extendedTextStrategy, legacyStrategy];
export const TEMPERATURE_CHAIN: readonly WriteStrategy[] = [extendedJsonStrategy, extendedTextStrategy];

export interface CommandDispatcherConfig {
  writeKey?: string;
  writeTimeout: number;
}

export class CommandDispatcher {
  constructor(
    private readonly log: DeviceLogger,
    private readonly apiClient: APIClient,
    private readonly config: CommandDispatcherConfig,
  ) {}

  public hasWriteAccess(): boolean {
    return typeof this.config.writeKey === 'string' && this.config.writeKey.length > 0;
  }

  public async setProgram(code: number): Promise<boolean> {
    return (await this.executeSetProgram(code)).ok;
  }

  public async setTemperature(circuitIndex: number, kind: SetpointKind, value: number): Promise<boolean> {
    return (await this.executeSetTemperature(circuitIndex, kind, value)).ok;
  }

  public async executeSetProgram(code: number): Promise<WriteResult> {
    const command: WriteCommand = {
      syn: WRITE_CODES.program,
      value: String(code),
      description: `program ${code}`,
    };
    return this.dispatch('set program', command, PROGRAM_CHAIN);
  }

  public async executeSetTemperature(circuitIndex: number, kind: SetpointKind, value: number): Promise<WriteResult> {
    const command: WriteCommand = {
      syn: WRITE_CODES.circuit(circuitIndex, kind),
      value: formatSetpoint(value),
      description: `${kind} temperature ${value}°C for circuit ${circuitIndex}`,
    };
    return this.dispatch('set temperature', command, TEMPERATURE_CHAIN);
  }

  private async dispatch(operation: string, command: WriteCommand, chain: readonly WriteStrategy[]): Promise<WriteResult> {
    const writeKey = this.config.writeKey;
    if (writeKey === undefined || writeKey.length === 0) {
      const error = new WriteDeniedError(operation);
      this.log.error(`❌ ${error.message}`);
      return { ok: false, error };
    }

    const params: QueryParams = { syn: command.syn, value: command.value, key: writeKey };
    const responses = new Map<string, DeviceResponse | null>();
    const context: AttemptContext = {
      fetch: async (path: string) => {
        const cached = responses.get(path);
        if (cached !== undefined) {
          return cached;
        }
        let response: DeviceResponse | null = null;
        try {
          response = await this.apiClient.get(path, params, { timeoutMs: this.config.writeTimeout });
        } catch (error) {
          this.log.debug(`${path} failed: ${errorMessage(error)}`);
        }
        responses.set(path, response);
        return response;
      },
    };

    for (const strategy of chain) {
      const outcome = await strategy.attempt(command, context);
      if (outcome.kind === 'success') {
        this.log.info(`✅ ${capitalize(command.description)} set via ${outcome.via}`);
        return { ok: true, via: outcome.via };
      }
      if (outcome.kind === 'rejected') {
        this.log.error(`❌ Error during ${operation}: ${outcome.error.message}`);
        return { ok: false, error: outcome.error };
      }

      this.log.debug(`${strategy.name}: ${outcome.reason}`);
    }

    const error = new WriteRejectedError(`No acknowledgement for ${command.description}`, command.syn);
    this.log.error(`❌ Failed to ${operation}: ${error.message}`);
    return { ok: false, error };
  }
}

/**
 * Set-points always carry a decimal ("21.0"), as the controller's own UI sends them.
 */
export function formatSetpoint(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
