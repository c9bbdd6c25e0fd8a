import { ERROR_CODES } from './settings';
import type { ErrorCode } from './settings';

/**
 * Base class for everything this plugin throws on purpose
 */
export class DeviceError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DeviceError';
  }
}

export class ConfigError extends DeviceError {
  constructor(message: string) {
    super(message, ERROR_CODES.CONFIG_INVALID);
    this.name = 'ConfigError';
  }
}

/**
 * Network-level failure: DNS, refused connection, timeout or abort.
 */
export class TransportError extends DeviceError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly timedOut: boolean,
    public readonly aborted: boolean,
    cause?: unknown,
  ) {
    super(message, timedOut ? ERROR_CODES.TIMEOUT : ERROR_CODES.TRANSPORT_ERROR, cause);
    this.name = 'TransportError';
  }
}

export class FetchFailedError extends DeviceError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, ERROR_CODES.FETCH_FAILED, cause);
    this.name = 'FetchFailedError';
  }
}

export class WriteDeniedError extends DeviceError {
  constructor(operation: string) {
    super(`Cannot ${operation}: no write key configured`, ERROR_CODES.WRITE_DENIED);
    this.name = 'WriteDeniedError';
  }
}

export class WriteRejectedError extends DeviceError {
  constructor(
    message: string,
    public readonly syn: string,
    public readonly deviceMessage?: string,
  ) {
    super(message, ERROR_CODES.WRITE_REJECTED);
    this.name = 'WriteRejectedError';
  }
}

export class RefreshTimeoutError extends DeviceError {
  constructor(public readonly timeoutMs: number) {
    super(`Refresh did not complete within ${timeoutMs} ms`, ERROR_CODES.TIMEOUT);
    this.name = 'RefreshTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
