import type { HealthStatus } from './api-health-monitor';
import type { DeviceClient } from './device-client';
import { DeviceError, RefreshTimeoutError, errorMessage } from './errors';
import type { MergeReport } from './merge';
import { inferCurrentProgram } from './program-state';
import type { ProgramName } from './program-state';
import { DEFAULT_CONFIG, ERROR_CODES } from './settings';
import type {
  DeviceLogger,
  DeviceMeta,
  HeatingCircuit,
  SensorSnapshot,
  SetpointKind,
  TemperatureConstraints,
} from './types';

export type CoordinatorState = 'idle' | 'refreshing' | 'failed';

export type CoordinatorEvent =
  | { type: 'update'; snapshot: SensorSnapshot; report: MergeReport; health: HealthStatus }
  | { type: 'update-failed'; error: DeviceError; health: HealthStatus };

export type CoordinatorListener = (event: CoordinatorEvent) => void;

export interface UpdateCoordinatorOptions {
  refreshInterval?: number;
  refreshTimeout?: number;
  now?: () => number;
}

/**
 * Owns the refresh cycle of one boiler: periodic timer, refresh after writes,
 * one refresh in flight at a time and an overall deadline per refresh.
 * The last good snapshot is kept through failures.
 */
export class UpdateCoordinator {
  private readonly refreshInterval: number;
  private readonly refreshTimeout: number;
  private readonly now: () => number;

  private state: CoordinatorState = 'idle';
  private snapshot: SensorSnapshot | null = null;
  private lastError: DeviceError | null = null;
  private lastUpdateTime = 0;

  private refreshTimer?: NodeJS.Timeout;
  private inFlight: Promise<boolean> | null = null;
  private abortController: AbortController | null = null;
  private stopped = false;
  private readonly listeners = new Set<CoordinatorListener>();

  constructor(
    private readonly log: DeviceLogger,
    private readonly client: DeviceClient,
    options: UpdateCoordinatorOptions = {},
  ) {
    this.refreshInterval = options.refreshInterval ?? DEFAULT_CONFIG.refreshInterval;
    this.refreshTimeout = options.refreshTimeout ?? DEFAULT_CONFIG.refreshTimeout;
    this.now = options.now ?? Date.now;
  }

  /**
   * First refresh right away, then one per interval.
   */
  public start(): Promise<boolean> {
    if (this.stopped) {
      return Promise.resolve(false);
    }
    if (!this.refreshTimer) {
      this.refreshTimer = setInterval(() => this.requestRefresh(), this.refreshInterval);
      this.log.debug(`⏰ Refresh every ${this.refreshInterval / 1000}s`);
    }
    return this.refresh();
  }

  public stop(): void {
    this.stopped = true;
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = undefined;
    }
    this.abortController?.abort();
    this.listeners.clear();
  }

  /**
   * Resolves true when the refresh succeeded. Concurrent callers share the
   * refresh already running.
   */
  public refresh(): Promise<boolean> {
    if (this.stopped) {
      return Promise.resolve(false);
    }
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.runRefresh().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  public requestRefresh(): void {
    this.refresh().catch((error: unknown) => {
      this.log.error(`Refresh request failed: ${errorMessage(error)}`);
    });
  }

  private async runRefresh(): Promise<boolean> {
    const controller = new AbortController();
    this.abortController = controller;
    this.state = 'refreshing';

    let deadline: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      deadline = setTimeout(() => {
        reject(new RefreshTimeoutError(this.refreshTimeout));
        controller.abort();
      }, this.refreshTimeout);
    });

    try {
      const report = await Promise.race([this.client.fetchSnapshot(controller.signal), timeout]);
      if (this.stopped) {
        return false;
      }

      this.snapshot = report.snapshot;
      this.lastUpdateTime = this.now();
      this.lastError = null;
      this.state = 'idle';
      this.emit({ type: 'update', snapshot: report.snapshot, report, health: this.healthStatus() });
      return true;
    } catch (error) {
      if (this.stopped) {
        return false;
      }

      const failure = error instanceof DeviceError
        ? error
        : new DeviceError(`Refresh failed: ${errorMessage(error)}`, ERROR_CODES.FETCH_FAILED, error);
      this.lastError = failure;
      this.state = 'failed';
      this.log.error(`❌ Refresh failed, keeping last known data: ${failure.message}`);
      this.emit({ type: 'update-failed', error: failure, health: this.healthStatus() });
      return false;
    } finally {
      clearTimeout(deadline);
      this.abortController = null;
      this.client.getApiClient().getHealthMonitor().resetMetricsIfNeeded();
    }
  }

  private healthStatus(): HealthStatus {
    return this.client.getApiClient().getHealthMonitor().getHealthStatus();
  }

  public addListener(listener: CoordinatorListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emit(event: CoordinatorEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error(`Listener failed on ${event.type}: ${errorMessage(error)}`);
      }
    }
  }

  public async setProgram(code: number): Promise<boolean> {
    const ok = await this.client.setProgram(code);
    if (ok) {
      this.requestRefresh();
    }
    return ok;
  }

  public async setTemperature(circuitIndex: number, kind: SetpointKind, value: number): Promise<boolean> {
    const ok = await this.client.setTemperature(circuitIndex, kind, value);
    if (ok) {
      this.requestRefresh();
    }
    return ok;
  }

  public getSnapshot(): SensorSnapshot | null {
    return this.snapshot;
  }

  public getDeviceMeta(): Readonly<DeviceMeta> | null {
    return this.client.getDeviceMeta();
  }

  public getHeatingCircuits(): readonly HeatingCircuit[] {
    return this.client.getHeatingCircuits();
  }

  public getTemperatureConstraints(): Readonly<TemperatureConstraints> {
    return this.client.getTemperatureConstraints();
  }

  public hasWriteAccess(): boolean {
    return this.client.hasWriteAccess();
  }

  public getState(): CoordinatorState {
    return this.state;
  }

  public getLastError(): DeviceError | null {
    return this.lastError;
  }

  public getLastUpdateTime(): number {
    return this.lastUpdateTime;
  }

  public getCurrentProgram(): ProgramName | null {
    return inferCurrentProgram(this.snapshot);
  }
}
