/**
 * System Sampler
 *
 * Periodically reads the host and appends a SystemSnapshot to the store.
 * Cumulative disk and network counters are converted into per-interval deltas
 * against the previous reading; the first reading only establishes the
 * baseline and reports zero.
 *
 * Ticks are chained (the next one is scheduled when the previous finishes), so
 * a slow read never overlaps the next. A failed tick is logged and retried
 * after the longer retry interval; it never escapes to the host process.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { SystemSnapshot } from '../types/metrics.js';
import { SYSTEM_SAMPLER } from '../config/defaults.js';
import { SamplingError } from '../utils/errors.js';
import { counterDelta } from '../utils/math-helpers.js';
import { TimerGuard } from '../utils/timer-guard.js';
import type {
  DiskIoCounters,
  HostMetricsSource,
  HostReading,
  NetworkIoCounters,
} from './host-metrics.js';
import type { MetricsStore } from './metrics-store.js';

export interface SystemSamplerConfig {
  // Delay between successful ticks (ms)
  intervalMs: number;

  // Delay after a failed tick (ms)
  retryIntervalMs: number;
}

export interface SystemSamplerOptions {
  logger?: Logger;
  now?: () => number;
}

/**
 * Sampler events
 */
export interface SystemSamplerEvents {
  sample: (snapshot: SystemSnapshot) => void;
  error: (error: SamplingError) => void;
}

export class SystemSampler extends EventEmitter<SystemSamplerEvents> {
  private readonly store: MetricsStore;
  private readonly source: HostMetricsSource;
  private readonly config: SystemSamplerConfig;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly timer = new TimerGuard('system-sampler');

  private lastDiskIo: DiskIoCounters | null = null;
  private lastNetworkIo: NetworkIoCounters | null = null;
  private running = false;

  constructor(
    store: MetricsStore,
    source: HostMetricsSource,
    config: Partial<SystemSamplerConfig> = {},
    options: SystemSamplerOptions = {}
  ) {
    super();
    this.store = store;
    this.source = source;
    this.config = {
      intervalMs: config.intervalMs ?? SYSTEM_SAMPLER.INTERVAL_MS,
      retryIntervalMs: config.retryIntervalMs ?? SYSTEM_SAMPLER.RETRY_INTERVAL_MS,
    };
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Start sampling; the first tick runs on the next timer turn
   */
  public start(): void {
    if (this.running) {
      this.logger?.warn('SystemSampler already started');
      return;
    }

    this.running = true;
    this.logger?.info(
      { intervalMs: this.config.intervalMs, retryIntervalMs: this.config.retryIntervalMs },
      'Starting system sampler'
    );
    this.scheduleNext(0);
  }

  /**
   * Stop sampling; a tick already in flight finishes but schedules nothing
   */
  public stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.timer.clear();
    this.logger?.info('Stopped system sampler');
  }

  public isRunning(): boolean {
    return this.running;
  }

  /**
   * Take one sample, append it to the store and return it
   *
   * @throws {SamplingError} when the host cannot be read
   */
  public async sample(): Promise<SystemSnapshot> {
    let reading: HostReading;
    try {
      reading = await this.source.read();
    } catch (error) {
      throw new SamplingError(
        'Failed to read host metrics',
        error instanceof Error ? error : new Error(String(error))
      );
    }

    let diskReadBytes = 0;
    let diskWriteBytes = 0;
    if (reading.diskIo) {
      if (this.lastDiskIo) {
        diskReadBytes = counterDelta(reading.diskIo.readBytes, this.lastDiskIo.readBytes);
        diskWriteBytes = counterDelta(reading.diskIo.writeBytes, this.lastDiskIo.writeBytes);
      }
      this.lastDiskIo = reading.diskIo;
    }

    let networkBytesSent = 0;
    let networkBytesReceived = 0;
    if (reading.networkIo) {
      if (this.lastNetworkIo) {
        networkBytesSent = counterDelta(reading.networkIo.bytesSent, this.lastNetworkIo.bytesSent);
        networkBytesReceived = counterDelta(
          reading.networkIo.bytesReceived,
          this.lastNetworkIo.bytesReceived
        );
      }
      this.lastNetworkIo = reading.networkIo;
    }

    const snapshot: SystemSnapshot = {
      cpuPercent: reading.cpuPercent,
      memoryPercent: reading.memoryPercent,
      diskUsagePercent: reading.diskUsagePercent,
      diskReadBytes,
      diskWriteBytes,
      networkBytesSent,
      networkBytesReceived,
      timestamp: this.now(),
    };

    this.store.appendSystemSnapshot(snapshot);
    this.emit('sample', snapshot);
    return snapshot;
  }

  private scheduleNext(delayMs: number): void {
    this.timer.schedule(() => {
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    let nextDelay = this.config.intervalMs;

    try {
      await this.sample();
    } catch (error) {
      const samplingError =
        error instanceof SamplingError
          ? error
          : new SamplingError('System sampling failed', error instanceof Error ? error : undefined);
      this.logger?.error(
        { err: samplingError, retryInMs: this.config.retryIntervalMs },
        'Error collecting system metrics'
      );
      this.emit('error', samplingError);
      nextDelay = this.config.retryIntervalMs;
    }

    if (this.running) {
      this.scheduleNext(nextDelay);
    }
  }
}
