import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DataPointType, MetricReader, type ResourceMetrics } from '@opentelemetry/sdk-metrics';
import { pino } from 'pino';
import { TelemetryManager } from '@/telemetry/otel.js';
import { MetricsStore } from '@/monitoring/metrics-store.js';

const NOW = Date.UTC(2026, 3, 10);
const logger = pino({ level: 'silent' });

/**
 * In-process reader; metrics are pulled with collect()
 */
class TestMetricReader extends MetricReader {
  protected async onShutdown(): Promise<void> {}

  protected async onForceFlush(): Promise<void> {}
}

function valuesByName(resourceMetrics: ResourceMetrics): Map<string, number> {
  const values = new Map<string, number>();
  for (const scope of resourceMetrics.scopeMetrics) {
    for (const metric of scope.metrics) {
      if (metric.dataPointType === DataPointType.GAUGE || metric.dataPointType === DataPointType.SUM) {
        const point = metric.dataPoints[0];
        if (point) {
          values.set(metric.descriptor.name, point.value);
        }
      }
    }
  }
  return values;
}

describe('TelemetryManager', () => {
  let store: MetricsStore;

  beforeEach(() => {
    store = new MetricsStore({}, { logger, now: () => NOW });
  });

  describe('when disabled', () => {
    let telemetry: TelemetryManager;

    beforeEach(() => {
      telemetry = new TelemetryManager(store, { enabled: false, logger });
    });

    it('should not allow start() when disabled', async () => {
      await expect(telemetry.start()).rejects.toThrow('Telemetry is disabled');
    });

    it('should return false for isStarted()', () => {
      expect(telemetry.isEnabled()).toBe(false);
      expect(telemetry.isStarted()).toBe(false);
    });

    it('should throw when accessing instruments before start', () => {
      expect(() => telemetry.getInstruments()).toThrow('TelemetryManager not started');
    });

    it('should treat shutdown as a no-op', async () => {
      await expect(telemetry.shutdown()).resolves.toBeUndefined();
    });
  });

  describe('when enabled', () => {
    let reader: TestMetricReader;
    let telemetry: TelemetryManager;

    beforeEach(() => {
      reader = new TestMetricReader();
      telemetry = new TelemetryManager(store, { enabled: true, serviceName: 'test-service', reader, logger });
    });

    afterEach(async () => {
      await telemetry.shutdown();
    });

    it('should start and register instruments', async () => {
      await telemetry.start();

      expect(telemetry.isStarted()).toBe(true);
      expect(telemetry.getInstruments().cacheHits).toBeDefined();
    });

    it('should ignore a second start', async () => {
      await telemetry.start();
      await telemetry.start();

      expect(telemetry.isStarted()).toBe(true);
    });

    it('should publish store aggregates on collection', async () => {
      await telemetry.start();

      store.recordRequest({
        method: 'GET',
        path: '/api/models',
        statusCode: 200,
        responseTime: 0.5,
        bytesSent: 900,
        bytesReceived: 100,
        timestamp: NOW,
      });
      store.appendSystemSnapshot({
        cpuPercent: 12,
        memoryPercent: 34,
        diskUsagePercent: 56,
        diskReadBytes: 0,
        diskWriteBytes: 0,
        networkBytesSent: 0,
        networkBytesReceived: 0,
        timestamp: NOW,
      });
      store.recordCacheHit();
      store.recordCacheHit();
      store.recordCacheHit();
      store.recordCacheMiss();

      const { resourceMetrics, errors } = await reader.collect();
      expect(errors).toEqual([]);

      const values = valuesByName(resourceMetrics);
      expect(values.get('olah_http_requests_window')).toBe(1);
      expect(values.get('olah_http_request_duration_seconds')).toBe(0.5);
      expect(values.get('olah_http_bytes_transferred_window')).toBe(1000);
      expect(values.get('olah_system_cpu_percent')).toBe(12);
      expect(values.get('olah_system_memory_percent')).toBe(34);
      expect(values.get('olah_system_disk_usage_percent')).toBe(56);
      expect(values.get('olah_cache_requests_total')).toBe(4);
      expect(values.get('olah_cache_hits_total')).toBe(3);
      expect(values.get('olah_cache_misses_total')).toBe(1);
      expect(values.get('olah_cache_hit_rate_percent')).toBe(75);
    });

    it('should use the store metric prefix', async () => {
      const mirrorStore = new MetricsStore({ metricPrefix: 'mirror' }, { logger, now: () => NOW });
      const mirrorReader = new TestMetricReader();
      const mirror = new TelemetryManager(mirrorStore, { enabled: true, reader: mirrorReader, logger });
      await mirror.start();

      const { resourceMetrics } = await mirrorReader.collect();
      expect(valuesByName(resourceMetrics).get('mirror_cache_hits_total')).toBe(0);

      await mirror.shutdown();
    });

    it('should shut down idempotently', async () => {
      await telemetry.start();
      await telemetry.shutdown();
      await telemetry.shutdown();

      expect(telemetry.isStarted()).toBe(false);
      expect(() => telemetry.getInstruments()).toThrow('TelemetryManager not started');
    });
  });
});
