import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import type { IncomingHttpHeaders } from 'node:http';
import type { RequestHandler } from 'express';
import { pino } from 'pino';
import { MetricsStore } from '@/monitoring/metrics-store.js';
import { RequestRecorder } from '@/monitoring/request-recorder.js';
import {
  createMetricsMiddleware,
  normalizePath,
  parseContentLength,
  type ObservedRequest,
} from '@/http/metrics-middleware.js';

const logger = pino({ level: 'silent' });

class FakeResponse extends EventEmitter {
  public statusCode = 200;
  public readonly headers: Record<string, string | number> = {};

  getHeader(name: string): string | number | undefined {
    return this.headers[name];
  }
}

function request(url: string, headers: IncomingHttpHeaders = {}, method = 'GET'): ObservedRequest {
  return { method, url, originalUrl: url, headers };
}

describe('parseContentLength', () => {
  it('should parse numeric values', () => {
    expect(parseContentLength('1024')).toBe(1024);
    expect(parseContentLength(' 42 ')).toBe(42);
    expect(parseContentLength(512)).toBe(512);
    expect(parseContentLength(['64', '128'])).toBe(64);
  });

  it('should return 0 for missing or malformed values', () => {
    expect(parseContentLength(undefined)).toBe(0);
    expect(parseContentLength('')).toBe(0);
    expect(parseContentLength('abc')).toBe(0);
    expect(parseContentLength('-5')).toBe(0);
    expect(parseContentLength('1.5')).toBe(0);
    expect(parseContentLength(-1)).toBe(0);
    expect(parseContentLength([])).toBe(0);
  });
});

describe('normalizePath', () => {
  it('should strip the query string', () => {
    expect(normalizePath('/api/models?search=bert')).toBe('/api/models');
  });

  it('should keep a path without query', () => {
    expect(normalizePath('/api/datasets/org/name')).toBe('/api/datasets/org/name');
  });

  it('should map an empty path to root', () => {
    expect(normalizePath('?x=1')).toBe('/');
  });
});

describe('createMetricsMiddleware', () => {
  let store: MetricsStore;
  let recorder: RequestRecorder;

  beforeEach(() => {
    store = new MetricsStore({}, { logger });
    recorder = new RequestRecorder(store, { logger });
  });

  it('should be usable as an Express request handler', () => {
    const handler: RequestHandler = createMetricsMiddleware(recorder);
    expect(typeof handler).toBe('function');
  });

  it('should call next immediately and record on finish', () => {
    const middleware = createMetricsMiddleware(recorder);
    const res = new FakeResponse();
    const next = vi.fn();

    middleware(request('/api/models/org/repo?revision=main', { 'content-length': '16' }, 'post'), res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(store.getRequestHistory()).toHaveLength(0);

    res.statusCode = 201;
    res.headers['content-length'] = '2048';
    res.emit('finish');

    const [metric] = store.getRequestHistory();
    expect(metric).toMatchObject({
      method: 'POST',
      path: '/api/models/org/repo',
      statusCode: 201,
      bytesSent: 2048,
      bytesReceived: 16,
    });
    expect(metric?.responseTime).toBeGreaterThanOrEqual(0);
  });

  it('should record once when both finish and close fire', () => {
    const middleware = createMetricsMiddleware(recorder);
    const res = new FakeResponse();

    middleware(request('/health'), res, () => undefined);
    res.emit('finish');
    res.emit('close');

    expect(store.getRequestHistory()).toHaveLength(1);
  });

  it('should record an aborted request on close', () => {
    const middleware = createMetricsMiddleware(recorder);
    const res = new FakeResponse();

    middleware(request('/lfs/abc'), res, () => undefined);
    res.emit('close');

    const [metric] = store.getRequestHistory();
    expect(metric?.path).toBe('/lfs/abc');
    expect(metric?.bytesSent).toBe(0);
    expect(metric?.bytesReceived).toBe(0);
  });

  it('should fall back to url when originalUrl is absent', () => {
    const middleware = createMetricsMiddleware(recorder);
    const res = new FakeResponse();

    middleware({ method: 'GET', url: '/files/x?y=1', headers: {} }, res, () => undefined);
    res.emit('finish');

    expect(store.getRequestHistory()[0]?.path).toBe('/files/x');
  });

  it('should not break the response when recording fails', () => {
    vi.spyOn(store, 'recordRequest').mockImplementation(() => {
      throw new Error('store unavailable');
    });
    const middleware = createMetricsMiddleware(recorder);
    const res = new FakeResponse();

    middleware(request('/fail'), res, () => undefined);

    expect(() => res.emit('finish')).not.toThrow();
  });
});
