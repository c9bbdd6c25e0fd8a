import type { PlatformConfig } from 'homebridge';
import { ConfigError } from './errors';
import { DEFAULT_CONFIG, VALIDATION_PATTERNS } from './settings';

/**
 * Platform block from config.json with every default applied.
 * Field names follow config.schema.json.
 */
export interface ResolvedConfig {
  name: string;
  host: string;
  port?: number;
  apiKey: string;
  writeKey?: string;
  refreshInterval: number;
  refreshTimeout: number;
  requestTimeout: number;
  writeTimeout: number;
  userAgent: string;
  customNames: {
    boiler: string;
    outsideTemperature: string;
    heatingCircuit: string;
  };
}

const MIN_REFRESH_INTERVAL = 10000;

function optionalString(config: PlatformConfig, key: string): string | undefined {
  const value: unknown = config[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`"${key}" must be a string`);
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function requiredString(config: PlatformConfig, key: string): string {
  const value = optionalString(config, key);
  if (value === undefined) {
    throw new ConfigError(`"${key}" is required`);
  }
  return value;
}

function optionalPositiveInteger(config: PlatformConfig, key: string): number | undefined {
  const value: unknown = config[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`"${key}" must be a positive integer`);
  }
  return value;
}

function nestedString(section: unknown, key: string): string | undefined {
  if (typeof section !== 'object' || section === null || !(key in section)) {
    return undefined;
  }
  const value: unknown = Reflect.get(section, key);
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Validate the raw platform block from config.json. Throws ConfigError on the
 * first problem found.
 */
export function resolveConfig(config: PlatformConfig): ResolvedConfig {
  const host = requiredString(config, 'host').replace(/^https?:\/\//, '').replace(/\/+$/, '');
  if (!VALIDATION_PATTERNS.ipv4.test(host) && !VALIDATION_PATTERNS.hostname.test(host)) {
    throw new ConfigError(`"host" is not a valid IP address or hostname: ${host}`);
  }

  const port = optionalPositiveInteger(config, 'port');
  if (port !== undefined && port > 65535) {
    throw new ConfigError('"port" must be between 1 and 65535');
  }

  const refreshInterval = optionalPositiveInteger(config, 'refreshInterval') ?? DEFAULT_CONFIG.refreshInterval;
  if (refreshInterval < MIN_REFRESH_INTERVAL) {
    throw new ConfigError(`"refreshInterval" must be at least ${MIN_REFRESH_INTERVAL} ms`);
  }

  const refreshTimeout = optionalPositiveInteger(config, 'refreshTimeout') ?? DEFAULT_CONFIG.refreshTimeout;
  const requestTimeout = optionalPositiveInteger(config, 'requestTimeout') ?? DEFAULT_CONFIG.requestTimeout;
  if (requestTimeout > refreshTimeout) {
    throw new ConfigError('"requestTimeout" cannot exceed "refreshTimeout"');
  }

  return {
    name: optionalString(config, 'name') ?? 'Guntamatic Biostar',
    host,
    port,
    apiKey: requiredString(config, 'apiKey'),
    writeKey: optionalString(config, 'writeKey'),
    refreshInterval,
    refreshTimeout,
    requestTimeout,
    writeTimeout: optionalPositiveInteger(config, 'writeTimeout') ?? DEFAULT_CONFIG.writeTimeout,
    userAgent: nestedString(config.advanced, 'userAgent') ?? DEFAULT_CONFIG.advanced.userAgent,
    customNames: {
      boiler: nestedString(config.customNames, 'boiler') ?? 'Boiler',
      outsideTemperature: nestedString(config.customNames, 'outsideTemperature') ?? 'Outside Temperature',
      heatingCircuit: nestedString(config.customNames, 'heatingCircuit') ?? 'Heating Circuit',
    },
  };
}
