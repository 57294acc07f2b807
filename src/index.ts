export * from './monitoring/index.js';
export * from './inventory/index.js';

export {
  createMetricsMiddleware,
  normalizePath,
  parseContentLength,
  type MetricsMiddleware,
  type ObservedRequest,
  type ObservedResponse,
} from './http/metrics-middleware.js';

export {
  TelemetryManager,
  createTelemetryManager,
  type StoreInstruments,
  type TelemetryConfig,
} from './telemetry/otel.js';

export { ObservabilityRuntime, type ObservabilityRuntimeOptions } from './services/observability-runtime.js';

export {
  getConfig,
  initializeConfig,
  loadConfig,
  resetConfig,
  validateConfig,
  type Environment,
} from './config/loader.js';
export type {
  InventoryConfig,
  MetricsConfig,
  RuntimeConfig,
  SamplerConfig,
  TelemetrySettings,
} from './types/schemas/config.js';

export {
  ConfigurationError,
  ObservabilityError,
  RecordingError,
  SamplingError,
  isObservabilityError,
  type ObservabilityErrorCode,
} from './utils/errors.js';
export { createLogger, type Logger } from './utils/logger.js';
export { formatBytes } from './utils/math-helpers.js';

export * from './types/index.js';
