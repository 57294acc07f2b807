/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml, with cross-field rules.
 *
 * @module schemas/config
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/**
 * Metrics Store Configuration
 */
export const MetricsConfigSchema = z
  .object({
    max_request_history: z.number().int().positive('Request history capacity must be positive'),
    max_system_history: z.number().int().positive('System history capacity must be positive'),
    endpoint_sample_limit: z.number().int().positive('must be positive'),
    endpoint_sample_retain: z.number().int().positive('must be positive'),
    system_average_window: z.number().int().positive('must be positive'),
    export_window_minutes: z.number().positive('must be positive'),
    metric_prefix: z
      .string()
      .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'must be a valid Prometheus metric name prefix'),
  })
  .refine((data) => data.endpoint_sample_retain <= data.endpoint_sample_limit, {
    message: 'must be <= endpoint_sample_limit',
    path: ['endpoint_sample_retain'],
  });

/**
 * System Sampler Configuration
 */
export const SamplerConfigSchema = z
  .object({
    enabled: z.boolean(),
    interval_ms: z.number().int().min(100, 'must be >= 100ms'),
    retry_interval_ms: z.number().int().min(100, 'must be >= 100ms'),
    disk_usage_path: z.string().min(1, 'Disk usage path cannot be empty'),
  })
  .refine((data) => data.retry_interval_ms >= data.interval_ms, {
    message: 'must be >= interval_ms',
    path: ['retry_interval_ms'],
  });

/**
 * Cache Inventory Configuration
 */
export const InventoryConfigSchema = z
  .object({
    repos_path: z.string().min(1, 'Repos path cannot be empty'),
    recent_access_days: z.number().positive('must be positive'),
    stale_access_days: z.number().positive('must be positive'),
    description_max_chars: z.number().int().positive('must be positive'),
  })
  .refine((data) => data.recent_access_days <= data.stale_access_days, {
    message: 'must be <= stale_access_days',
    path: ['recent_access_days'],
  });

/**
 * OpenTelemetry / Prometheus Exporter Configuration
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean(),
  service_name: z.string().min(1, 'Service name cannot be empty'),
  prometheus_port: z.number().int().min(1).max(65535, 'must be a valid port'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const RuntimeConfigSchema = z.object({
  metrics: MetricsConfigSchema,
  sampler: SamplerConfigSchema,
  inventory: InventoryConfigSchema,
  telemetry: TelemetryConfigSchema,
  logging: LoggingConfigSchema,
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type SamplerConfig = z.infer<typeof SamplerConfigSchema>;
export type InventoryConfig = z.infer<typeof InventoryConfigSchema>;
export type TelemetrySettings = z.infer<typeof TelemetryConfigSchema>;
