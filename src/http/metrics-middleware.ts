/**
 * Metrics Middleware
 *
 * Express middleware that times every request and reports it to a
 * RequestRecorder once the response has been written.
 *
 * @example
 * ```typescript
 * const app = express();
 * app.use(createMetricsMiddleware(runtime.recorder));
 * ```
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { RequestRecorder } from '../monitoring/request-recorder.js';

/**
 * The parts of an Express request the middleware reads
 */
export interface ObservedRequest {
  method: string;
  originalUrl?: string;
  url: string;
  headers: IncomingHttpHeaders;
}

/**
 * The parts of an Express response the middleware reads
 */
export interface ObservedResponse {
  statusCode: number;
  getHeader(name: string): number | string | string[] | undefined;
  once(event: 'finish' | 'close', listener: () => void): unknown;
}

export type MetricsMiddleware = (req: ObservedRequest, res: ObservedResponse, next: () => void) => void;

/**
 * Parse a content-length header; anything missing or malformed is 0
 */
export function parseContentLength(value: number | string | string[] | undefined): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.floor(value) : 0;
  }
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    return 0;
  }
  return Number.parseInt(raw.trim(), 10);
}

/**
 * Path without the query string
 */
export function normalizePath(url: string): string {
  const queryStart = url.indexOf('?');
  const path = queryStart === -1 ? url : url.slice(0, queryStart);
  return path.length > 0 ? path : '/';
}

export function createMetricsMiddleware(recorder: RequestRecorder): MetricsMiddleware {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint();
    let recorded = false;

    const finish = (): void => {
      if (recorded) {
        return;
      }
      recorded = true;

      const elapsedSeconds = Number(process.hrtime.bigint() - startedAt) / 1e9;
      recorder.record({
        method: req.method,
        path: normalizePath(req.originalUrl ?? req.url),
        statusCode: res.statusCode,
        responseTime: elapsedSeconds,
        bytesSent: parseContentLength(res.getHeader('content-length')),
        bytesReceived: parseContentLength(req.headers['content-length']),
      });
    };

    res.once('finish', finish);
    res.once('close', finish);
    next();
  };
}
