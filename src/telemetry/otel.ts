/**
 * OpenTelemetry bridge for the metrics store.
 *
 * Publishes the store's aggregates as observable instruments. Nothing is
 * pushed: every collection (a Prometheus scrape, or `collect()` on an injected
 * reader) runs one batch callback that reads the store at that moment.
 *
 * @module telemetry/otel
 */

import type { BatchObservableResult, Meter, Observable } from '@opentelemetry/api';
import { MeterProvider, type MetricReader } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { Logger } from 'pino';
import type { MetricsStore } from '../monitoring/metrics-store.js';
import { TELEMETRY } from '../config/defaults.js';

/**
 * Configuration options for the telemetry bridge.
 */
export interface TelemetryConfig {
  /**
   * Enable metrics publication (default: false).
   */
  enabled: boolean;
  /**
   * Meter name (default: 'olah-observability').
   */
  serviceName?: string;
  /**
   * Prometheus exporter port (default: 9464). Ignored when `reader` is given.
   */
  prometheusPort?: number;
  /**
   * Reader used instead of the Prometheus exporter.
   */
  reader?: MetricReader;
  logger?: Logger;
}

interface NormalizedTelemetryConfig {
  enabled: boolean;
  serviceName: string;
  prometheusPort: number;
  reader: MetricReader | undefined;
  logger: Logger | undefined;
}

/**
 * Instruments registered against the store.
 */
export interface StoreInstruments {
  httpRequests: Observable;
  httpRequestDuration: Observable;
  httpBytesTransferred: Observable;
  systemCpu: Observable;
  systemMemory: Observable;
  systemDiskUsage: Observable;
  cacheRequests: Observable;
  cacheHits: Observable;
  cacheMisses: Observable;
  cacheHitRate: Observable;
}

/**
 * Telemetry manager.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager(store, { enabled: true, prometheusPort: 9464 });
 * await telemetry.start();
 * // scrape http://localhost:9464/metrics
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager {
  private readonly store: MetricsStore;
  private readonly config: NormalizedTelemetryConfig;
  private meterProvider: MeterProvider | null = null;
  private meter: Meter | null = null;
  private instruments: StoreInstruments | null = null;
  private started = false;

  constructor(store: MetricsStore, config: TelemetryConfig) {
    this.store = store;
    this.config = {
      enabled: config.enabled,
      serviceName: config.serviceName || TELEMETRY.SERVICE_NAME,
      prometheusPort: config.prometheusPort ?? TELEMETRY.PROMETHEUS_PORT,
      reader: config.reader,
      logger: config.logger,
    };
  }

  public isEnabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Build the meter provider and register the instruments.
   *
   * @throws {Error} if telemetry is disabled.
   */
  public async start(): Promise<void> {
    if (!this.config.enabled) {
      throw new Error('Telemetry is disabled. Set telemetry.enabled: true in config.');
    }

    if (this.started) {
      this.config.logger?.warn('TelemetryManager already started');
      return;
    }

    try {
      const reader =
        this.config.reader ?? new PrometheusExporter({ port: this.config.prometheusPort });

      this.meterProvider = new MeterProvider({ readers: [reader] });
      this.meter = this.meterProvider.getMeter(this.config.serviceName);
      this.instruments = this.registerInstruments(this.meter);

      this.started = true;

      if (this.config.reader) {
        this.config.logger?.info({ serviceName: this.config.serviceName }, 'Telemetry started');
      } else {
        this.config.logger?.info(
          {
            serviceName: this.config.serviceName,
            endpoint: `http://localhost:${this.config.prometheusPort}/metrics`,
          },
          'Telemetry started, Prometheus metrics available'
        );
      }
    } catch (error) {
      this.config.logger?.error({ err: error }, 'Failed to start telemetry');
      throw error;
    }
  }

  /**
   * Shut the provider (and with it the exporter) down. Safe to call repeatedly.
   */
  public async shutdown(): Promise<void> {
    if (!this.started) {
      return;
    }

    const provider = this.meterProvider;
    this.started = false;
    this.instruments = null;
    this.meter = null;
    this.meterProvider = null;

    try {
      await provider?.shutdown();
      this.config.logger?.info('Telemetry shut down');
    } catch (error) {
      this.config.logger?.error({ err: error }, 'Failed to shutdown telemetry');
      throw error;
    }
  }

  public isStarted(): boolean {
    return this.started;
  }

  /**
   * Registered instruments. Throws if not started.
   */
  public getInstruments(): StoreInstruments {
    if (!this.instruments) {
      throw new Error('TelemetryManager not started. Call start() first.');
    }
    return this.instruments;
  }

  private registerInstruments(meter: Meter): StoreInstruments {
    const { metricPrefix: p, exportWindowMinutes } = this.store.getConfig();

    const instruments: StoreInstruments = {
      httpRequests: meter.createObservableGauge(`${p}_http_requests_window`, {
        description: `HTTP requests in the last ${exportWindowMinutes} minutes`,
        unit: '1',
      }),
      httpRequestDuration: meter.createObservableGauge(`${p}_http_request_duration_seconds`, {
        description: 'Average HTTP request duration',
        unit: 's',
      }),
      httpBytesTransferred: meter.createObservableGauge(`${p}_http_bytes_transferred_window`, {
        description: `Bytes transferred in the last ${exportWindowMinutes} minutes`,
        unit: 'By',
      }),
      systemCpu: meter.createObservableGauge(`${p}_system_cpu_percent`, {
        description: 'CPU usage percentage',
        unit: '%',
      }),
      systemMemory: meter.createObservableGauge(`${p}_system_memory_percent`, {
        description: 'Memory usage percentage',
        unit: '%',
      }),
      systemDiskUsage: meter.createObservableGauge(`${p}_system_disk_usage_percent`, {
        description: 'Disk usage percentage',
        unit: '%',
      }),
      cacheRequests: meter.createObservableCounter(`${p}_cache_requests_total`, {
        description: 'Total cache requests',
        unit: '1',
      }),
      cacheHits: meter.createObservableCounter(`${p}_cache_hits_total`, {
        description: 'Total cache hits',
        unit: '1',
      }),
      cacheMisses: meter.createObservableCounter(`${p}_cache_misses_total`, {
        description: 'Total cache misses',
        unit: '1',
      }),
      cacheHitRate: meter.createObservableGauge(`${p}_cache_hit_rate_percent`, {
        description: 'Cache hit rate percentage',
        unit: '%',
      }),
    };

    meter.addBatchObservableCallback(
      (result: BatchObservableResult) => {
        const requests = this.store.getRequestStats(exportWindowMinutes);
        const system = this.store.getSystemStats();
        const cache = this.store.getCacheStats();

        result.observe(instruments.httpRequests, requests.totalRequests);
        result.observe(instruments.httpRequestDuration, requests.avgResponseTime);
        result.observe(instruments.httpBytesTransferred, requests.totalBytesTransferred);
        result.observe(instruments.systemCpu, system.cpuPercent);
        result.observe(instruments.systemMemory, system.memoryPercent);
        result.observe(instruments.systemDiskUsage, system.diskUsagePercent);
        result.observe(instruments.cacheRequests, cache.totalRequests);
        result.observe(instruments.cacheHits, cache.cacheHits);
        result.observe(instruments.cacheMisses, cache.cacheMisses);
        result.observe(instruments.cacheHitRate, cache.hitRatePercent);
      },
      Object.values(instruments)
    );

    return instruments;
  }
}

/**
 * Create a telemetry manager for a store.
 */
export function createTelemetryManager(store: MetricsStore, config: TelemetryConfig): TelemetryManager {
  return new TelemetryManager(store, config);
}
