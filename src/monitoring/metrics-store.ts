/**
 * Metrics Store
 *
 * In-memory aggregation of request metrics, host snapshots and cache hit/miss
 * counters, with windowed statistics and a Prometheus text export.
 *
 * Every method is synchronous, so each one runs to completion on the event
 * loop before any other caller can touch the store: writers never interleave,
 * `total === hits + misses` always holds, and histories never exceed their
 * capacity. Derived statistics copy the relevant buffer first and compute over
 * the copy.
 */

import type { Logger } from 'pino';
import type {
  CacheStats,
  EndpointStats,
  EndpointTotals,
  RequestMetric,
  RequestStats,
  SystemSnapshot,
  SystemStats,
} from '../types/metrics.js';
import { METRICS_STORE } from '../config/defaults.js';
import { safeAverage, safePercent } from '../utils/math-helpers.js';
import { BoundedHistory } from './bounded-history.js';
import { buildMetricFamilies, renderExposition } from './prometheus-text.js';

/**
 * Configuration for the metrics store
 */
export interface MetricsStoreConfig {
  // Request history capacity
  maxRequestHistory: number;

  // System snapshot history capacity
  maxSystemHistory: number;

  // A per-endpoint response-time list longer than this is trimmed...
  endpointSampleLimit: number;

  // ...down to this many most recent samples
  endpointSampleRetain: number;

  // Snapshots averaged for CPU/memory
  systemAverageWindow: number;

  // Request window of the text export (minutes)
  exportWindowMinutes: number;

  // Prefix of exported metric names
  metricPrefix: string;
}

export interface MetricsStoreOptions {
  logger?: Logger;
  /** Clock used for window cutoffs (epoch ms) */
  now?: () => number;
}

interface EndpointAccumulator {
  count: number;
  responseTimes: number[];
  bytes: number;
}

/**
 * Key under which per-endpoint figures are grouped
 */
export function endpointKey(method: string, path: string): string {
  return `${method} ${path}`;
}

/**
 * Create default store configuration
 */
export function createDefaultStoreConfig(): MetricsStoreConfig {
  return {
    maxRequestHistory: METRICS_STORE.MAX_REQUEST_HISTORY,
    maxSystemHistory: METRICS_STORE.MAX_SYSTEM_HISTORY,
    endpointSampleLimit: METRICS_STORE.ENDPOINT_SAMPLE_LIMIT,
    endpointSampleRetain: METRICS_STORE.ENDPOINT_SAMPLE_RETAIN,
    systemAverageWindow: METRICS_STORE.SYSTEM_AVERAGE_WINDOW,
    exportWindowMinutes: METRICS_STORE.EXPORT_WINDOW_MINUTES,
    metricPrefix: METRICS_STORE.METRIC_PREFIX,
  };
}

function emptyRequestStats(): RequestStats {
  return {
    totalRequests: 0,
    avgResponseTime: 0,
    totalBytesTransferred: 0,
    statusCodes: {},
    endpoints: {},
  };
}

function emptySystemStats(): SystemStats {
  return {
    cpuPercent: 0,
    memoryPercent: 0,
    diskUsagePercent: 0,
    diskIo: { readBytes: 0, writeBytes: 0 },
    networkIo: { bytesSent: 0, bytesReceived: 0 },
  };
}

/**
 * Metrics Store
 *
 * One instance per process, owned by the composition root and handed to the
 * HTTP layer, the proxy layer and the system sampler.
 *
 * @example
 * ```typescript
 * const store = new MetricsStore({ maxRequestHistory: 5000 }, { logger });
 * store.recordCacheHit();
 * store.getCacheStats(); // { totalRequests: 1, cacheHits: 1, cacheMisses: 0, hitRatePercent: 100 }
 * ```
 */
export class MetricsStore {
  private readonly config: MetricsStoreConfig;
  private readonly logger?: Logger;
  private readonly now: () => number;

  private readonly requestHistory: BoundedHistory<RequestMetric>;
  private readonly systemHistory: BoundedHistory<SystemSnapshot>;
  private readonly endpoints = new Map<string, EndpointAccumulator>();

  private cacheHitCount = 0;
  private cacheMissCount = 0;
  private cacheTotalCount = 0;

  private requestOverflowLogged = false;

  constructor(config: Partial<MetricsStoreConfig> = {}, options: MetricsStoreOptions = {}) {
    this.config = { ...createDefaultStoreConfig(), ...config };
    this.logger = options.logger;
    this.now = options.now ?? Date.now;

    this.requestHistory = new BoundedHistory(this.config.maxRequestHistory);
    this.systemHistory = new BoundedHistory(this.config.maxSystemHistory);
  }

  /**
   * Record one completed HTTP request
   */
  public recordRequest(metric: RequestMetric): void {
    const evicted = this.requestHistory.push(metric);
    if (evicted && !this.requestOverflowLogged) {
      this.requestOverflowLogged = true;
      this.logger?.debug(
        { capacity: this.requestHistory.capacity },
        'Request history full, evicting oldest entries'
      );
    }

    const key = endpointKey(metric.method, metric.path);
    let endpoint = this.endpoints.get(key);
    if (!endpoint) {
      endpoint = { count: 0, responseTimes: [], bytes: 0 };
      this.endpoints.set(key, endpoint);
    }

    endpoint.count++;

    if (endpoint.responseTimes.length > this.config.endpointSampleLimit) {
      endpoint.responseTimes = endpoint.responseTimes.slice(-this.config.endpointSampleRetain);
    }
    endpoint.responseTimes.push(metric.responseTime);

    endpoint.bytes += metric.bytesSent + metric.bytesReceived;
  }

  public recordCacheHit(): void {
    this.cacheHitCount++;
    this.cacheTotalCount++;
  }

  public recordCacheMiss(): void {
    this.cacheMissCount++;
    this.cacheTotalCount++;
  }

  /**
   * Append a host snapshot produced by the system sampler
   */
  public appendSystemSnapshot(snapshot: SystemSnapshot): void {
    this.systemHistory.push(snapshot);
  }

  /**
   * Request statistics over the last `windowMinutes`
   *
   * An empty window yields a zero-valued result.
   */
  public getRequestStats(windowMinutes = 60): RequestStats {
    const cutoff = this.now() - windowMinutes * 60_000;
    const recent = this.requestHistory.toArray().filter((req) => req.timestamp >= cutoff);

    if (recent.length === 0) {
      return emptyRequestStats();
    }

    let totalTime = 0;
    let totalBytes = 0;
    const statusCodes: Record<number, number> = {};
    const perEndpoint = new Map<string, { count: number; time: number; bytes: number }>();

    for (const req of recent) {
      const bytes = req.bytesSent + req.bytesReceived;
      totalTime += req.responseTime;
      totalBytes += bytes;
      statusCodes[req.statusCode] = (statusCodes[req.statusCode] ?? 0) + 1;

      const key = endpointKey(req.method, req.path);
      const entry = perEndpoint.get(key) ?? { count: 0, time: 0, bytes: 0 };
      entry.count++;
      entry.time += req.responseTime;
      entry.bytes += bytes;
      perEndpoint.set(key, entry);
    }

    const endpoints: Record<string, EndpointStats> = {};
    for (const [key, entry] of perEndpoint) {
      endpoints[key] = {
        count: entry.count,
        avgTime: entry.time / entry.count,
        bytes: entry.bytes,
      };
    }

    return {
      totalRequests: recent.length,
      avgResponseTime: totalTime / recent.length,
      totalBytesTransferred: totalBytes,
      statusCodes,
      endpoints,
    };
  }

  /**
   * Host statistics: latest disk/network figures, CPU and memory averaged over
   * the most recent snapshots
   */
  public getSystemStats(): SystemStats {
    const latest = this.systemHistory.latest();
    if (!latest) {
      return emptySystemStats();
    }

    const recent = this.systemHistory.tail(this.config.systemAverageWindow);

    return {
      cpuPercent: safeAverage(recent.map((s) => s.cpuPercent)),
      memoryPercent: safeAverage(recent.map((s) => s.memoryPercent)),
      diskUsagePercent: latest.diskUsagePercent,
      diskIo: {
        readBytes: latest.diskReadBytes,
        writeBytes: latest.diskWriteBytes,
      },
      networkIo: {
        bytesSent: latest.networkBytesSent,
        bytesReceived: latest.networkBytesReceived,
      },
    };
  }

  public getCacheStats(): CacheStats {
    return {
      totalRequests: this.cacheTotalCount,
      cacheHits: this.cacheHitCount,
      cacheMisses: this.cacheMissCount,
      hitRatePercent: safePercent(this.cacheHitCount, this.cacheTotalCount),
    };
  }

  /**
   * Lifetime per-endpoint totals, independent of the history window
   */
  public getEndpointTotals(): Record<string, EndpointTotals> {
    const totals: Record<string, EndpointTotals> = {};
    for (const [key, endpoint] of this.endpoints) {
      totals[key] = {
        count: endpoint.count,
        avgResponseTime: safeAverage(endpoint.responseTimes),
        retainedSamples: endpoint.responseTimes.length,
        bytes: endpoint.bytes,
      };
    }
    return totals;
  }

  /**
   * Copy of the request history, oldest first
   */
  public getRequestHistory(): RequestMetric[] {
    return this.requestHistory.toArray();
  }

  /**
   * Copy of the system snapshot history, oldest first
   */
  public getSystemHistory(): SystemSnapshot[] {
    return this.systemHistory.toArray();
  }

  /**
   * Prometheus text exposition of the request (export window), system and
   * cache aggregates
   */
  public exportPrometheus(): string {
    return renderExposition(
      buildMetricFamilies(
        this.config.metricPrefix,
        this.getRequestStats(this.config.exportWindowMinutes),
        this.getSystemStats(),
        this.getCacheStats()
      )
    );
  }

  public getConfig(): Readonly<MetricsStoreConfig> {
    return this.config;
  }
}
