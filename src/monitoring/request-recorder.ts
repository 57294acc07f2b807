/**
 * Request Recorder
 *
 * The single seam between the HTTP layer and the MetricsStore: called once per
 * completed request. Recording must never break the request it observes, so
 * failures come back as an `Err` (and a warning in the log) instead of an
 * exception.
 */

import type { Logger } from 'pino';
import { Err, Ok, type Result } from 'ts-results';
import type { RequestMetric } from '../types/metrics.js';
import { RecordingError } from '../utils/errors.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { toByteCount } from '../utils/math-helpers.js';
import type { MetricsStore } from './metrics-store.js';

/**
 * What the HTTP layer knows about a finished request
 */
export interface RequestObservation {
  method: string;
  /** Normalized path, without query string */
  path: string;
  statusCode: number;
  /** Elapsed wall-clock time in seconds */
  responseTime: number;
  /** Response body size; omit or pass undefined when unknown */
  bytesSent?: number;
  /** Request body size; omit or pass undefined when unknown */
  bytesReceived?: number;
}

export interface RequestRecorderOptions {
  logger?: Logger;
  now?: () => number;
}

export class RequestRecorder {
  private readonly store: MetricsStore;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(store: MetricsStore, options: RequestRecorderOptions = {}) {
    this.store = store;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Build a RequestMetric from the observation and hand it to the store
   */
  public record(observation: RequestObservation): Result<RequestMetric, RecordingError> {
    try {
      const metric: RequestMetric = {
        method: observation.method.toUpperCase(),
        path: observation.path,
        statusCode: observation.statusCode,
        responseTime: Math.max(0, observation.responseTime),
        bytesSent: toByteCount(observation.bytesSent),
        bytesReceived: toByteCount(observation.bytesReceived),
        timestamp: this.now(),
      };

      this.store.recordRequest(metric);

      lazyLog(
        this.logger,
        'debug',
        () => ({
          method: metric.method,
          path: metric.path,
          statusCode: metric.statusCode,
          responseTime: metric.responseTime,
        }),
        'Request recorded'
      );

      return Ok(metric);
    } catch (error) {
      const recordingError = new RecordingError(
        'Failed to record request metrics',
        error instanceof Error ? error : new Error(String(error))
      );
      this.logger?.warn({ err: recordingError, path: observation.path }, 'Failed to record metrics');
      return Err(recordingError);
    }
  }
}
