import { PERFORMANCE_THRESHOLDS } from './settings';
import type { DeviceLogger } from './types';

export interface EndpointStats {
  requests: number;
  failures: number;
  lastStatus: 'ok' | 'failed' | null;
}

export interface APIMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  timeouts: number;
  averageResponseTime: number;
  lastSuccessfulRequest: number;
  lastFailedRequest: number;
  errorRate: number;
  lastResetTime: number;
  endpoints: Record<string, EndpointStats>;
}

export type HealthStatus = 'excellent' | 'good' | 'fair' | 'poor' | 'critical';

const RESPONSE_TIME_WINDOW = 50;
const METRICS_RESET_INTERVAL = 24 * 60 * 60 * 1000;

/**
 * Rolling view of how the boiler's CGI endpoints behave, fed by the
 * transport interceptors. Non-200 answers count as failures.
 */
export class APIHealthMonitor {
  private metrics: APIMetrics;
  private responseTimes: number[] = [];

  constructor(
    private readonly log: DeviceLogger,
    private readonly now: () => number = Date.now,
  ) {
    this.metrics = this.emptyMetrics();
  }

  private emptyMetrics(): APIMetrics {
    return {
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      timeouts: 0,
      averageResponseTime: 0,
      lastSuccessfulRequest: 0,
      lastFailedRequest: 0,
      errorRate: 0,
      lastResetTime: this.now(),
      endpoints: {},
    };
  }

  public recordRequest(path: string, success: boolean, responseTime: number, timedOut = false): void {
    if (responseTime < 0) {
      this.log.warn(`Invalid response time recorded for ${path}`);
      return;
    }

    const at = this.now();
    const endpoint = this.metrics.endpoints[path] ?? { requests: 0, failures: 0, lastStatus: null };
    endpoint.requests++;
    endpoint.lastStatus = success ? 'ok' : 'failed';
    this.metrics.endpoints[path] = endpoint;
    this.metrics.totalRequests++;

    if (success) {
      this.metrics.successfulRequests++;
      this.metrics.lastSuccessfulRequest = at;
    } else {
      endpoint.failures++;
      this.metrics.failedRequests++;
      this.metrics.lastFailedRequest = at;
      if (timedOut) {
        this.metrics.timeouts++;
      }
    }

    this.responseTimes.push(responseTime);
    if (this.responseTimes.length > RESPONSE_TIME_WINDOW) {
      this.responseTimes.shift();
    }
    this.metrics.averageResponseTime = this.responseTimes.reduce((sum, time) => sum + time, 0) / this.responseTimes.length;
    this.metrics.errorRate = (this.metrics.failedRequests / this.metrics.totalRequests) * 100;
  }

  /**
   * 100 minus up to 60 for failures, 20 for slow answers and 20 for timeouts
   */
  public getHealthScore(): number {
    const { totalRequests, successfulRequests, averageResponseTime, timeouts } = this.metrics;
    if (totalRequests === 0) {
      return 100;
    }

    let score = 100 - (1 - successfulRequests / totalRequests) * 60;
    const { slowResponseTime, goodResponseTime } = PERFORMANCE_THRESHOLDS.api;
    if (averageResponseTime > slowResponseTime) {
      score -= 20;
    } else if (averageResponseTime > goodResponseTime) {
      score -= 10;
    }
    score -= Math.min(20, timeouts * 5);

    return Math.round(Math.max(0, Math.min(100, score)));
  }

  public getMetrics(): APIMetrics {
    const endpoints: Record<string, EndpointStats> = {};
    for (const [path, stats] of Object.entries(this.metrics.endpoints)) {
      endpoints[path] = { ...stats };
    }
    return { ...this.metrics, endpoints };
  }

  public getHealthStatus(): HealthStatus {
    const score = this.getHealthScore();
    const { excellentHealthScore, goodHealthScore, fairHealthScore, poorHealthScore } = PERFORMANCE_THRESHOLDS.api;

    if (score >= excellentHealthScore) return 'excellent';
    if (score >= goodHealthScore) return 'good';
    if (score >= fairHealthScore) return 'fair';
    if (score >= poorHealthScore) return 'poor';
    return 'critical';
  }

  public logHealthReport(): void {
    const metrics = this.metrics;
    const successRate = metrics.totalRequests > 0
      ? ((metrics.successfulRequests / metrics.totalRequests) * 100).toFixed(1)
      : '0';

    this.log.info(`📊 Device API health: ${this.getHealthStatus()} (${this.getHealthScore()}/100)`);
    this.log.info(`  • Requests: ${metrics.totalRequests}, success rate ${successRate}%, timeouts ${metrics.timeouts}`);
    this.log.info(`  • Average response time: ${(metrics.averageResponseTime / 1000).toFixed(2)}s`);
    for (const [path, stats] of Object.entries(metrics.endpoints)) {
      this.log.info(`  • ${path}: ${stats.requests} requests, ${stats.failures} failed`);
    }
  }

  public resetMetricsIfNeeded(): void {
    if ((this.now() - this.metrics.lastResetTime) > METRICS_RESET_INTERVAL) {
      this.log.info('📊 Daily metrics reset');
      this.metrics = this.emptyMetrics();
      this.responseTimes = [];
    }
  }
}
