/**
 * Observability Runtime
 *
 * Builds the store, sampler, recorder, inventory and telemetry bridge from one
 * validated config and owns their start/stop lifecycle.
 */

import type { Logger } from 'pino';
import type { MetricReader } from '@opentelemetry/sdk-metrics';
import type { RuntimeConfig } from '../types/schemas/config.js';
import { MetricsStore } from '../monitoring/metrics-store.js';
import { SystemSampler } from '../monitoring/system-sampler.js';
import { SystemHostMetrics, type HostMetricsSource } from '../monitoring/host-metrics.js';
import { RequestRecorder } from '../monitoring/request-recorder.js';
import { CacheInventory } from '../inventory/cache-inventory.js';
import { TelemetryManager } from '../telemetry/otel.js';
import { createMetricsMiddleware, type MetricsMiddleware } from '../http/metrics-middleware.js';
import { createLogger } from '../utils/logger.js';

export interface ObservabilityRuntimeOptions {
  config: RuntimeConfig;
  logger?: Logger;
  /** Host reader for the sampler; defaults to the local machine */
  hostSource?: HostMetricsSource;
  /** Reader replacing the Prometheus exporter */
  telemetryReader?: MetricReader;
  now?: () => number;
}

/**
 * Composition root: one store shared by the request recorder, the system
 * sampler and the telemetry bridge, plus the cache inventory.
 *
 * @example
 * ```typescript
 * const runtime = new ObservabilityRuntime({ config: initializeConfig() });
 * await runtime.start();
 * app.use(runtime.createMetricsMiddleware());
 * ```
 */
export class ObservabilityRuntime {
  public readonly store: MetricsStore;
  public readonly sampler: SystemSampler;
  public readonly recorder: RequestRecorder;
  public readonly inventory: CacheInventory;
  public readonly telemetry: TelemetryManager;

  private readonly config: RuntimeConfig;
  private readonly logger: Logger;
  private started = false;

  constructor(options: ObservabilityRuntimeOptions) {
    const { config, now } = options;
    this.config = config;
    this.logger = options.logger ?? createLogger('ObservabilityRuntime', config.logging.level);

    this.store = new MetricsStore(
      {
        maxRequestHistory: config.metrics.max_request_history,
        maxSystemHistory: config.metrics.max_system_history,
        endpointSampleLimit: config.metrics.endpoint_sample_limit,
        endpointSampleRetain: config.metrics.endpoint_sample_retain,
        systemAverageWindow: config.metrics.system_average_window,
        exportWindowMinutes: config.metrics.export_window_minutes,
        metricPrefix: config.metrics.metric_prefix,
      },
      { logger: this.logger.child({ component: 'MetricsStore' }), now }
    );

    this.sampler = new SystemSampler(
      this.store,
      options.hostSource ??
        new SystemHostMetrics(config.sampler.disk_usage_path, this.logger.child({ component: 'HostMetrics' })),
      {
        intervalMs: config.sampler.interval_ms,
        retryIntervalMs: config.sampler.retry_interval_ms,
      },
      { logger: this.logger.child({ component: 'SystemSampler' }), now }
    );

    this.recorder = new RequestRecorder(this.store, {
      logger: this.logger.child({ component: 'RequestRecorder' }),
      now,
    });

    this.inventory = new CacheInventory(config.inventory.repos_path, {
      logger: this.logger.child({ component: 'CacheInventory' }),
      now,
      recentAccessDays: config.inventory.recent_access_days,
      staleAccessDays: config.inventory.stale_access_days,
      descriptionMaxChars: config.inventory.description_max_chars,
    });

    this.telemetry = new TelemetryManager(this.store, {
      enabled: config.telemetry.enabled,
      serviceName: config.telemetry.service_name,
      prometheusPort: config.telemetry.prometheus_port,
      reader: options.telemetryReader,
      logger: this.logger.child({ component: 'TelemetryManager' }),
    });
  }

  /**
   * Start the sampler and telemetry, each only when enabled
   */
  public async start(): Promise<void> {
    if (this.started) {
      this.logger.warn('ObservabilityRuntime already started');
      return;
    }

    if (this.config.telemetry.enabled) {
      await this.telemetry.start();
    }

    if (this.config.sampler.enabled) {
      this.sampler.start();
    }

    this.started = true;
    this.logger.info(
      {
        sampler: this.config.sampler.enabled,
        telemetry: this.config.telemetry.enabled,
        reposPath: this.config.inventory.repos_path,
      },
      'Observability runtime started'
    );
  }

  /**
   * Cancel the sampler and shut telemetry down
   */
  public async stop(): Promise<void> {
    if (!this.started) {
      return;
    }

    this.started = false;
    this.sampler.stop();
    await this.telemetry.shutdown();
    this.logger.info('Observability runtime stopped');
  }

  public isStarted(): boolean {
    return this.started;
  }

  /**
   * Request-metrics middleware bound to this runtime's recorder
   */
  public createMetricsMiddleware(): MetricsMiddleware {
    return createMetricsMiddleware(this.recorder);
  }
}
