import axios from 'axios';
import type { AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { TransportError } from './errors';
import { APIHealthMonitor } from './api-health-monitor';
import type { DeviceLogger } from './types';

export interface APIClientConfig {
  host: string;
  port?: number;
  requestTimeout: number;
  userAgent?: string;
  // Injected instance, used by tests to plug an in-process adapter
  httpClient?: AxiosInstance;
}

export interface RequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface DeviceResponse {
  status: number;
  body: Buffer;
}

export type QueryParams = Record<string, string>;

export function buildBaseURL(host: string, port?: number): string {
  const trimmed = host.replace(/^https?:\/\//, '').replace(/\/+$/, '');
  return port ? `http://${trimmed}:${port}` : `http://${trimmed}`;
}

export function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf-8');
  }
  return Buffer.alloc(0);
}

/**
 * Thin GET transport for the boiler's CGI endpoints. Status codes come back
 * as values; only network-level failures throw, as TransportError.
 */
export class APIClient {
  private readonly baseURL: string;
  private readonly httpClient: AxiosInstance;
  private readonly healthMonitor: APIHealthMonitor;
  private readonly startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

  constructor(
    private readonly log: DeviceLogger,
    private readonly config: APIClientConfig,
  ) {
    this.baseURL = buildBaseURL(config.host, config.port);
    this.healthMonitor = new APIHealthMonitor(this.log);

    this.httpClient = config.httpClient ?? axios.create({
      timeout: this.config.requestTimeout,
    });

    this.log.debug(`🔗 API Client initialized with base URL: ${this.baseURL}`);
    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.httpClient.interceptors.request.use(
      (config) => {
        this.startTimes.set(config, Date.now());
        this.log.debug(`🌐 Device request: ${config.method?.toUpperCase()} ${config.url}`);
        return config;
      },
      (error) => Promise.reject(error)
    );

    this.httpClient.interceptors.response.use(
      (response) => {
        const duration = this.elapsed(response.config);
        this.healthMonitor.recordRequest(response.config.url ?? 'unknown', response.status === 200, duration);
        this.log.debug(`📡 ${response.config.url} → HTTP ${response.status} in ${duration}ms`);
        return response;
      },
      (error: AxiosError) => {
        this.healthMonitor.recordRequest(error.config?.url ?? 'unknown', false, this.elapsed(error.config), isTimeout(error));
        return Promise.reject(error);
      }
    );
  }

  private elapsed(config: InternalAxiosRequestConfig | undefined): number {
    const startTime = config ? this.startTimes.get(config) : undefined;
    return startTime === undefined ? 0 : Date.now() - startTime;
  }

  public async get(path: string, params: QueryParams, options: RequestOptions = {}): Promise<DeviceResponse> {
    try {
      const response = await this.httpClient.get<unknown>(path, {
        baseURL: this.baseURL,
        headers: {
          'User-Agent': this.config.userAgent || 'homebridge-guntamatic-biostar',
        },
        params,
        timeout: options.timeoutMs ?? this.config.requestTimeout,
        signal: options.signal,
        responseType: 'arraybuffer',
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });
      return { status: response.status, body: toBuffer(response.data) };
    } catch (error) {
      const timedOut = isTimeout(error);
      const aborted = axios.isCancel(error) || options.signal?.aborted === true;
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`GET ${path} failed: ${reason}`, path, timedOut, aborted, error);
    }
  }

  public getHealthMonitor(): APIHealthMonitor {
    return this.healthMonitor;
  }

  public getBaseURL(): string {
    return this.baseURL;
  }
}

function isTimeout(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}
