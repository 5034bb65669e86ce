import fs from 'node:fs';
import os from 'node:os';

import { TIMEOUTS } from '../constants/index.js';
import { errorMessage } from '../utils/error-utils.js';

export type SystemMetrics = {
  cpu_percent: number;
  memory_percent: number;
  disk_percent: number;
  cpu_count: number;
  memory_total: number;
  disk_total: number;
  platform: string;
  node_version: string;
};

export interface SystemMetricsCollector {
  readonly kind: 'host' | 'stub';
  collect(): Promise<SystemMetrics>;
}

type CpuTimes = { idle: number; total: number };

type StatFsLike = (target: string) => Promise<{ blocks: number; bfree: number; bavail: number; bsize: number }>;

export type HostMetricsSources = {
  cpus: () => os.CpuInfo[];
  totalmem: () => number;
  freemem: () => number;
  statfs: StatFsLike;
  sleep: (ms: number) => Promise<void>;
  diskPath: string;
  cpuSampleMs: number;
  warn: (msg: string) => void;
};

const GIB = 1024 ** 3;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function placeholderMetrics(): SystemMetrics {
  return {
    cpu_percent: 0,
    memory_percent: 0,
    disk_percent: 0,
    cpu_count: 1,
    memory_total: 0,
    disk_total: 0,
    platform: process.platform,
    node_version: process.versions.node
  };
}

function sumCpuTimes(cpus: os.CpuInfo[]): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus) {
    const { user, nice, sys, irq } = cpu.times;
    idle += cpu.times.idle;
    total += user + nice + sys + irq + cpu.times.idle;
  }
  return { idle, total };
}

export function cpuPercentBetween(before: CpuTimes, after: CpuTimes): number {
  const total = after.total - before.total;
  if (total <= 0) {
    return 0;
  }
  const busy = total - (after.idle - before.idle);
  return round1(Math.min(100, Math.max(0, (busy / total) * 100)));
}

export function createStubMetricsCollector(): SystemMetricsCollector {
  return {
    kind: 'stub',
    collect: async () => placeholderMetrics()
  };
}

export function createHostMetricsCollector(sources: HostMetricsSources): SystemMetricsCollector {
  const readCpu = async (metrics: SystemMetrics): Promise<void> => {
    const before = sources.cpus();
    metrics.cpu_count = before.length || 1;
    await sources.sleep(sources.cpuSampleMs);
    metrics.cpu_percent = cpuPercentBetween(sumCpuTimes(before), sumCpuTimes(sources.cpus()));
  };

  const readMemory = async (metrics: SystemMetrics): Promise<void> => {
    const total = sources.totalmem();
    if (total <= 0) {
      return;
    }
    const used = total - sources.freemem();
    metrics.memory_percent = round1((used / total) * 100);
    metrics.memory_total = round1(total / GIB);
  };

  const readDisk = async (metrics: SystemMetrics): Promise<void> => {
    const stats = await sources.statfs(sources.diskPath);
    const total = stats.blocks * stats.bsize;
    const used = (stats.blocks - stats.bfree) * stats.bsize;
    // Same basis as `df`: used / (used + available to unprivileged users).
    const usable = used + stats.bavail * stats.bsize;
    metrics.disk_percent = usable > 0 ? round1((used / usable) * 100) : 0;
    metrics.disk_total = round1(total / GIB);
  };

  return {
    kind: 'host',
    async collect(): Promise<SystemMetrics> {
      const metrics = placeholderMetrics();
      const readers = [
        ['cpu', readCpu],
        ['memory', readMemory],
        ['disk', readDisk]
      ] as const;
      await Promise.all(
        readers.map(async ([label, read]) => {
          try {
            await read(metrics);
          } catch (error) {
            sources.warn(`[SystemMetrics] ${label} reading failed: ${errorMessage(error)}`);
          }
        })
      );
      return metrics;
    }
  };
}

/**
 * Chosen once at startup. The host collector needs per-CPU times and statfs;
 * platforms that report neither get the stub so status requests still render.
 */
export function selectMetricsCollector(overrides: Partial<HostMetricsSources> = {}): SystemMetricsCollector {
  const statfs = overrides.statfs ?? (typeof fs.promises.statfs === 'function' ? fs.promises.statfs : undefined);
  const cpus = overrides.cpus ?? os.cpus;
  let hasCpuTimes = false;
  try {
    hasCpuTimes = cpus().length > 0;
  } catch {
    hasCpuTimes = false;
  }
  if (!statfs || !hasCpuTimes) {
    return createStubMetricsCollector();
  }
  return createHostMetricsCollector({
    cpus,
    totalmem: overrides.totalmem ?? os.totalmem,
    freemem: overrides.freemem ?? os.freemem,
    statfs,
    sleep: overrides.sleep ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms))),
    diskPath: overrides.diskPath ?? (process.platform === 'win32' ? process.cwd().slice(0, 3) : '/'),
    cpuSampleMs: overrides.cpuSampleMs ?? TIMEOUTS.CPU_SAMPLE,
    warn: overrides.warn ?? ((msg) => console.warn(msg))
  });
}
