/**
 * Default Configuration Constants
 *
 * Values used when a component is constructed without a loaded config.
 * config/runtime.yaml carries the same defaults for the deployed service.
 */

/**
 * Metrics Store Configuration
 */
export const METRICS_STORE = {
  /** Request history capacity */
  MAX_REQUEST_HISTORY: 10_000,

  /** System snapshot history capacity (sampled, so smaller) */
  MAX_SYSTEM_HISTORY: 1_000,

  /** Per-endpoint response-time list length that triggers a trim */
  ENDPOINT_SAMPLE_LIMIT: 1_000,

  /** Samples kept after a trim */
  ENDPOINT_SAMPLE_RETAIN: 500,

  /** Snapshots averaged for CPU/memory in system stats */
  SYSTEM_AVERAGE_WINDOW: 10,

  /** Request window used by the text export (minutes) */
  EXPORT_WINDOW_MINUTES: 60,

  /** Prefix of every exported metric name */
  METRIC_PREFIX: 'olah',
} as const;

/**
 * System Sampler Configuration
 */
export const SYSTEM_SAMPLER = {
  /** Sampling period (ms) */
  INTERVAL_MS: 5_000,

  /** Delay before the next tick after a failed one (ms) */
  RETRY_INTERVAL_MS: 10_000,

  /** Path whose filesystem usage is reported */
  DISK_USAGE_PATH: '/',
} as const;

/**
 * Cache Inventory Configuration
 */
export const CACHE_INVENTORY = {
  /** Files accessed within this many days count as recent */
  RECENT_ACCESS_DAYS: 7,

  /** Files not accessed for more than this many days count as stale */
  STALE_ACCESS_DAYS: 30,

  /** Characters of README text kept as the description */
  DESCRIPTION_MAX_CHARS: 200,

  /** README variants, checked in this order */
  README_FILES: ['README.md', 'readme.md', 'README.txt', 'readme.txt'],

  /** Length of the abbreviated hash reported for a detached HEAD */
  SHORT_HASH_LENGTH: 8,
} as const;

/**
 * On-disk layout of the mirror cache, relative to the repos path
 */
export const CACHE_LAYOUT = {
  models: 'api/models',
  datasets: 'api/datasets',
  spaces: 'api/spaces',
  files: 'files',
  lfs: 'lfs',
} as const;

/**
 * Telemetry Configuration
 */
export const TELEMETRY = {
  SERVICE_NAME: 'olah-observability',
  PROMETHEUS_PORT: 9464,
} as const;
