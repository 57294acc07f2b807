/**
 * Monitoring Module
 *
 * Request, host and cache-hit metrics held in memory, with windowed
 * statistics and a Prometheus text export.
 */

export {
  MetricsStore,
  createDefaultStoreConfig,
  endpointKey,
  type MetricsStoreConfig,
  type MetricsStoreOptions,
} from './metrics-store.js';

export { BoundedHistory } from './bounded-history.js';

export {
  SystemSampler,
  type SystemSamplerConfig,
  type SystemSamplerEvents,
  type SystemSamplerOptions,
} from './system-sampler.js';

export {
  SystemHostMetrics,
  parseDiskStats,
  parseNetDev,
  type DiskIoCounters,
  type HostMetricsSource,
  type HostReading,
  type NetworkIoCounters,
} from './host-metrics.js';

export {
  RequestRecorder,
  type RequestObservation,
  type RequestRecorderOptions,
} from './request-recorder.js';

export {
  buildMetricFamilies,
  formatMetricFamily,
  renderExposition,
  type MetricFamily,
  type MetricKind,
} from './prometheus-text.js';
