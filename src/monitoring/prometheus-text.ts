/**
 * Prometheus Text Exposition
 *
 * Renders MetricsStore aggregates as `# HELP` / `# TYPE` / sample blocks.
 * Scrapers match these names by line prefix, so the suffixes below are part
 * of the published interface and must not change.
 */

import type { CacheStats, RequestStats, SystemStats } from '../types/metrics.js';

export type MetricKind = 'counter' | 'gauge';

export interface MetricFamily {
  name: string;
  help: string;
  type: MetricKind;
  value: number;
  /** Fixed decimals for the sample value; integers are printed as-is when omitted */
  decimals?: number;
}

function formatValue(family: MetricFamily): string {
  return family.decimals === undefined ? String(family.value) : family.value.toFixed(family.decimals);
}

/**
 * Render one family as its three lines
 */
export function formatMetricFamily(family: MetricFamily): string[] {
  return [
    `# HELP ${family.name} ${family.help}`,
    `# TYPE ${family.name} ${family.type}`,
    `${family.name} ${formatValue(family)}`,
  ];
}

/**
 * Render families in order, newline separated, without a trailing newline
 */
export function renderExposition(families: readonly MetricFamily[]): string {
  return families.flatMap(formatMetricFamily).join('\n');
}

/**
 * Metric families exported for the request, system and cache aggregates
 */
export function buildMetricFamilies(
  prefix: string,
  requests: RequestStats,
  system: SystemStats,
  cache: CacheStats
): MetricFamily[] {
  return [
    {
      name: `${prefix}_http_requests_total`,
      help: 'Total number of HTTP requests',
      type: 'counter',
      value: requests.totalRequests,
    },
    {
      name: `${prefix}_http_request_duration_seconds`,
      help: 'Average HTTP request duration',
      type: 'gauge',
      value: requests.avgResponseTime,
      decimals: 4,
    },
    {
      name: `${prefix}_http_bytes_transferred_total`,
      help: 'Total bytes transferred',
      type: 'counter',
      value: requests.totalBytesTransferred,
    },
    {
      name: `${prefix}_system_cpu_percent`,
      help: 'CPU usage percentage',
      type: 'gauge',
      value: system.cpuPercent,
      decimals: 2,
    },
    {
      name: `${prefix}_system_memory_percent`,
      help: 'Memory usage percentage',
      type: 'gauge',
      value: system.memoryPercent,
      decimals: 2,
    },
    {
      name: `${prefix}_system_disk_usage_percent`,
      help: 'Disk usage percentage',
      type: 'gauge',
      value: system.diskUsagePercent,
      decimals: 2,
    },
    {
      name: `${prefix}_cache_requests_total`,
      help: 'Total cache requests',
      type: 'counter',
      value: cache.totalRequests,
    },
    {
      name: `${prefix}_cache_hits_total`,
      help: 'Total cache hits',
      type: 'counter',
      value: cache.cacheHits,
    },
    {
      name: `${prefix}_cache_misses_total`,
      help: 'Total cache misses',
      type: 'counter',
      value: cache.cacheMisses,
    },
    {
      name: `${prefix}_cache_hit_rate_percent`,
      help: 'Cache hit rate percentage',
      type: 'gauge',
      value: cache.hitRatePercent,
      decimals: 2,
    },
  ];
}
