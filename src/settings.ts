/**
 * This is the name of the platform that users will use to register the plugin in the Homebridge config.json
 */
export const PLATFORM_NAME = 'GuntamaticBiostar';

/**
 * This must match the name of your plugin as defined the package.json
 */
export const PLUGIN_NAME = 'homebridge-guntamatic-biostar';

/**
 * Plugin version for User-Agent and logging
 */
export const PLUGIN_VERSION = '1.0.0';

export const MANUFACTURER = 'Guntamatic';
export const DEFAULT_MODEL = 'Biostar';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  refreshInterval: 60000, // 1 minute
  refreshTimeout: 15000, // 15 seconds for a full status + legacy cycle
  requestTimeout: 10000, // 10 seconds per HTTP call
  writeTimeout: 5000, // 5 seconds per write attempt
  connectionTest: {
    statusTimeout: 5000,
    legacyTimeout: 10000,
  },
  advanced: {
    userAgent: `homebridge-guntamatic-biostar/${PLUGIN_VERSION}`,
  },
};

/**
 * Local device endpoints. Every call carries `key=<secret>`.
 */
export const DEVICE_API = {
  status: '/status.cgi',
  legacyDescription: '/daqdesc.cgi',
  legacyValues: '/daqdata.cgi',
  extendedWrite: '/ext/parset.cgi',
  legacyWrite: '/parset.cgi',
  legacyEncoding: 'windows-1252',
};

/**
 * Parameter codes accepted by parset.cgi
 */
export const WRITE_CODES = {
  program: 'PR001',
  circuit: (circuitIndex: number, kind: 'day' | 'night') =>
    `HK${circuitIndex + 1}${kind === 'day' ? '02' : '03'}`,
};

export const DEFAULT_TEMPERATURE_CONSTRAINTS = {
  min: 15.0,
  max: 30.0,
  step: 0.5,
};

/**
 * Labels for records derived from status.cgi. The leading underscore keeps them
 * apart from the device-language labels of the legacy API.
 */
export const STATUS_LABELS = {
  boilerTemperature: '_Boiler temperature',
  outsideTemperature: '_Outside temperature',
  co2: '_CO2',
  flueGas: '_Flue gas',
  fuel: '_Fuel level',
  cleaningIn: '_Cleaning in',
  state: '_State',
  mode: '_Mode',
  name: '_Name',
  timestamp: '_Last update',
  firmwareVersion: '_Firmware version',
  serialNumber: '_Serial number',
  model: '_Model',
  language: '_Language',
  activeErrors: '_Active errors',
  error: (i: number) => `_Error ${i}`,
  circuitPrefix: (name: string | number) => `_Circuit ${name}`,
  hotWaterPrefix: (name: string | number) => `_Hot water ${name}`,
  dayTemperature: ' - Day temperature',
  nightTemperature: ' - Night temperature',
  temperature: ' - Temperature',
  circuitMode: ' - Mode',
};

/**
 * Error codes and messages
 */
export const ERROR_CODES = {
  CONFIG_INVALID: 'BIOSTAR_INVALID_CONFIG',
  TRANSPORT_ERROR: 'BIOSTAR_NETWORK_ERROR',
  FETCH_FAILED: 'BIOSTAR_FETCH_FAILED',
  WRITE_DENIED: 'BIOSTAR_WRITE_DENIED',
  WRITE_REJECTED: 'BIOSTAR_WRITE_REJECTED',
  TIMEOUT: 'BIOSTAR_TIMEOUT',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Performance thresholds and monitoring
 */
export const PERFORMANCE_THRESHOLDS = {
  api: {
    goodResponseTime: 1000, // local device, 1 second
    slowResponseTime: 3000,
    poorHealthScore: 50,
    fairHealthScore: 70,
    goodHealthScore: 85,
    excellentHealthScore: 95,
  },
};

/**
 * Regular expressions for validation
 */
export const VALIDATION_PATTERNS = {
  ipv4: /^(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.){3}(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$/,
  hostname: /^(?=.{1,253}$)[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/,
};
