import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { APIHealthMonitor } from '../src/api-health-monitor';
import { RecordingLogger } from './helpers/fake-device';

describe('APIHealthMonitor', () => {
  it('starts healthy', () => {
    const monitor = new APIHealthMonitor(new RecordingLogger());
    assert.equal(monitor.getHealthScore(), 100);
    assert.equal(monitor.getHealthStatus(), 'excellent');
  });

  it('does not let callers mutate the recorded metrics', () => {
    const monitor = new APIHealthMonitor(new RecordingLogger());
    monitor.recordRequest('/status.cgi', true, 100);
    monitor.getMetrics().endpoints['/status.cgi'].requests = 99;
    assert.equal(monitor.getMetrics().endpoints['/status.cgi'].requests, 1);
  });

  it('scores failures, slow responses and timeouts', () => {
    const monitor = new APIHealthMonitor(new RecordingLogger());
    monitor.recordRequest('/status.cgi', true, 200);
    monitor.recordRequest('/daqdesc.cgi', false, 4000, true);

    // 100 - 30 (half failed) - 10 (average 2100 ms) - 5 (one timeout)
    assert.equal(monitor.getHealthScore(), 55);
    assert.equal(monitor.getHealthStatus(), 'poor');
    const metrics = monitor.getMetrics();
    assert.equal(metrics.errorRate, 50);
    assert.equal(metrics.timeouts, 1);
    assert.equal(metrics.averageResponseTime, 2100);
    assert.deepEqual(metrics.endpoints, {
      '/status.cgi': { requests: 1, failures: 0, lastStatus: 'ok' },
      '/daqdesc.cgi': { requests: 1, failures: 1, lastStatus: 'failed' },
    });
  });

  it('ignores negative response times', () => {
    const log = new RecordingLogger();
    const monitor = new APIHealthMonitor(log);
    monitor.recordRequest('/status.cgi', true, -1);
    assert.equal(monitor.getMetrics().totalRequests, 0);
    assert.deepEqual(log.messages('warn'), ['Invalid response time recorded for /status.cgi']);
  });

  it('resets the metrics once a day', () => {
    let now = 0;
    const log = new RecordingLogger();
    const monitor = new APIHealthMonitor(log, () => now);
    monitor.recordRequest('/status.cgi', false, 100);

    now = 60 * 60 * 1000;
    monitor.resetMetricsIfNeeded();
    assert.equal(monitor.getMetrics().totalRequests, 1);

    now = 25 * 60 * 60 * 1000;
    monitor.resetMetricsIfNeeded();
    assert.equal(monitor.getMetrics().totalRequests, 0);
    assert.deepEqual(log.messages('info'), ['📊 Daily metrics reset']);
  });

  it('logs a report with one line per endpoint', () => {
    const log = new RecordingLogger();
    const monitor = new APIHealthMonitor(log);
    monitor.recordRequest('/status.cgi', true, 500);
    monitor.logHealthReport();
    assert.deepEqual(log.messages('info'), [
      '📊 Device API health: excellent (100/100)',
      '  • Requests: 1, success rate 100.0%, timeouts 0',
      '  • Average response time: 0.50s',
      '  • /status.cgi: 1 requests, 0 failed',
    ]);
  });
});
