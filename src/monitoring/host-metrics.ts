/**
 * Host Metrics Source
 *
 * Reads raw host figures for the system sampler. CPU and memory come from
 * `node:os`, disk usage from `statfs` on the configured path. Cumulative disk
 * and network I/O counters are parsed from `/proc/diskstats` and
 * `/proc/net/dev`; on platforms without them the counters are reported as
 * unavailable. Turning counters into per-interval deltas is the sampler's job.
 */

import * as os from 'node:os';
import { readFile, statfs } from 'node:fs/promises';
import type { Logger } from 'pino';
import { SYSTEM_SAMPLER } from '../config/defaults.js';
import { errnoCode } from '../utils/errors.js';
import { safePercent } from '../utils/math-helpers.js';

const SECTOR_BYTES = 512;
const DISKSTATS_PATH = '/proc/diskstats';
const NET_DEV_PATH = '/proc/net/dev';

export interface DiskIoCounters {
  readBytes: number;
  writeBytes: number;
}

export interface NetworkIoCounters {
  bytesSent: number;
  bytesReceived: number;
}

/**
 * One raw reading of the host
 *
 * `diskIo` / `networkIo` are null when the platform does not expose the
 * counters.
 */
export interface HostReading {
  cpuPercent: number;
  memoryPercent: number;
  diskUsagePercent: number;
  diskIo: DiskIoCounters | null;
  networkIo: NetworkIoCounters | null;
}

export interface HostMetricsSource {
  read(): Promise<HostReading>;
}

/**
 * Sum read/written bytes over whole block devices in `/proc/diskstats`
 *
 * Partitions (`sda1`, `nvme0n1p2`) are skipped when their parent device is
 * listed, as are loop and ram devices, so no byte is counted twice.
 */
export function parseDiskStats(content: string): DiskIoCounters | null {
  const devices: string[] = [];
  let readBytes = 0;
  let writeBytes = 0;

  for (const line of content.split('\n')) {
    const fields = line.trim().split(/\s+/);
    // major minor name reads merged sectorsRead msRead writes merged sectorsWritten ...
    if (fields.length < 10) {
      continue;
    }

    const name = fields[2] ?? '';
    if (name.startsWith('loop') || name.startsWith('ram')) {
      continue;
    }
    if (devices.some((device) => name.startsWith(device) && /^p?\d+$/.test(name.slice(device.length)))) {
      continue;
    }

    const sectorsRead = Number(fields[5]);
    const sectorsWritten = Number(fields[9]);
    if (!Number.isFinite(sectorsRead) || !Number.isFinite(sectorsWritten)) {
      continue;
    }

    devices.push(name);
    readBytes += sectorsRead * SECTOR_BYTES;
    writeBytes += sectorsWritten * SECTOR_BYTES;
  }

  return devices.length > 0 ? { readBytes, writeBytes } : null;
}

/**
 * Sum transmitted/received bytes over every interface in `/proc/net/dev`
 */
export function parseNetDev(content: string): NetworkIoCounters | null {
  let interfaces = 0;
  let bytesSent = 0;
  let bytesReceived = 0;

  for (const line of content.split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) {
      continue;
    }

    // rxBytes rxPackets rxErrs rxDrop rxFifo rxFrame rxCompressed rxMulticast txBytes ...
    const fields = line.slice(separator + 1).trim().split(/\s+/);
    const received = Number(fields[0]);
    const sent = Number(fields[8]);
    if (fields.length < 9 || !Number.isFinite(received) || !Number.isFinite(sent)) {
      continue;
    }

    interfaces++;
    bytesReceived += received;
    bytesSent += sent;
  }

  return interfaces > 0 ? { bytesSent, bytesReceived } : null;
}

/**
 * Host metrics backed by the local machine
 */
export class SystemHostMetrics implements HostMetricsSource {
  private readonly diskUsagePath: string;
  private readonly logger?: Logger;
  private lastCpuTimes: { idle: number; total: number } = { idle: 0, total: 0 };

  constructor(diskUsagePath: string = SYSTEM_SAMPLER.DISK_USAGE_PATH, logger?: Logger) {
    this.diskUsagePath = diskUsagePath;
    this.logger = logger;
  }

  async read(): Promise<HostReading> {
    const [diskUsagePercent, diskStats, netDev] = await Promise.all([
      this.readDiskUsagePercent(),
      this.readCounterFile(DISKSTATS_PATH),
      this.readCounterFile(NET_DEV_PATH),
    ]);

    return {
      cpuPercent: this.readCpuPercent(),
      memoryPercent: this.readMemoryPercent(),
      diskUsagePercent,
      diskIo: diskStats === null ? null : parseDiskStats(diskStats),
      networkIo: netDev === null ? null : parseNetDev(netDev),
    };
  }

  /**
   * CPU usage (0-100%) since the previous call, across all cores
   */
  readCpuPercent(): number {
    let idle = 0;
    let total = 0;

    for (const cpu of os.cpus()) {
      const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
      total += user + nice + sys + cpuIdle + irq;
      idle += cpuIdle;
    }

    const idleDelta = idle - this.lastCpuTimes.idle;
    const totalDelta = total - this.lastCpuTimes.total;
    this.lastCpuTimes = { idle, total };

    const usage = totalDelta === 0 ? 0 : 100 - (idleDelta / totalDelta) * 100;
    return Math.max(0, Math.min(100, usage));
  }

  readMemoryPercent(): number {
    const totalMemory = os.totalmem();
    return safePercent(totalMemory - os.freemem(), totalMemory);
  }

  /**
   * Used share of the filesystem holding the configured path, over its total size
   */
  private async readDiskUsagePercent(): Promise<number> {
    const stats = await statfs(this.diskUsagePath);
    return safePercent((stats.blocks - stats.bfree) * stats.bsize, stats.blocks * stats.bsize);
  }

  private async readCounterFile(filePath: string): Promise<string | null> {
    try {
      return await readFile(filePath, 'utf8');
    } catch (error) {
      this.logger?.debug({ path: filePath, code: errnoCode(error) }, 'I/O counters unavailable');
      return null;
    }
  }
}
