/**
 * Metrics Types
 *
 * Records held by the MetricsStore and the result shapes of its queries.
 * Timestamps are epoch milliseconds; durations are seconds.
 */

/**
 * One completed HTTP request
 */
export interface RequestMetric {
  readonly method: string;
  readonly path: string;
  readonly statusCode: number;
  /** Wall-clock response time in seconds */
  readonly responseTime: number;
  readonly bytesSent: number;
  readonly bytesReceived: number;
  readonly timestamp: number;
}

/**
 * One periodic host-resource sample
 *
 * Disk and network fields are deltas since the previous sample, not
 * cumulative counters.
 */
export interface SystemSnapshot {
  readonly cpuPercent: number;
  readonly memoryPercent: number;
  readonly diskUsagePercent: number;
  readonly diskReadBytes: number;
  readonly diskWriteBytes: number;
  readonly networkBytesSent: number;
  readonly networkBytesReceived: number;
  readonly timestamp: number;
}

/**
 * Per-endpoint figures inside a request window
 */
export interface EndpointStats {
  count: number;
  /** Mean response time (seconds) of this endpoint's requests only */
  avgTime: number;
  bytes: number;
}

export interface RequestStats {
  totalRequests: number;
  avgResponseTime: number;
  totalBytesTransferred: number;
  /** Status code → occurrences */
  statusCodes: Record<number, number>;
  /** `"<METHOD> <path>"` → stats */
  endpoints: Record<string, EndpointStats>;
}

export interface SystemStats {
  /** Averaged over the most recent snapshots */
  cpuPercent: number;
  /** Averaged over the most recent snapshots */
  memoryPercent: number;
  diskUsagePercent: number;
  diskIo: {
    readBytes: number;
    writeBytes: number;
  };
  networkIo: {
    bytesSent: number;
    bytesReceived: number;
  };
}

export interface CacheStats {
  totalRequests: number;
  cacheHits: number;
  cacheMisses: number;
  hitRatePercent: number;
}

/**
 * Lifetime per-endpoint totals (not windowed)
 */
export interface EndpointTotals {
  count: number;
  /** Mean over the retained response-time samples */
  avgResponseTime: number;
  retainedSamples: number;
  bytes: number;
}
