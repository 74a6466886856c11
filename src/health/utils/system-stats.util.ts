import { statfs } from 'node:fs/promises';
import os from 'node:os';

const GB = 1024 ** 3;

export interface UsageStats {
  total_gb: number;
  used_gb: number;
  percent: number;
}

export interface SystemStats {
  cpu: { load_1m: number; cores: number };
  memory: UsageStats;
  disk: UsageStats | null;
}

export function usage(total: number, free: number): UsageStats {
  const used = total - free;
  return {
    total_gb: Number((total / GB).toFixed(2)),
    used_gb: Number((used / GB).toFixed(2)),
    percent: total > 0 ? Number(((used / total) * 100).toFixed(1)) : 0,
  };
}

/** Disk figures are null when the filesystem cannot be queried. */
export async function collectSystemStats(diskPath = '/'): Promise<SystemStats> {
  let disk: UsageStats | null = null;
  try {
    const fsStats = await statfs(diskPath);
    disk = usage(
      fsStats.blocks * fsStats.bsize,
      fsStats.bavail * fsStats.bsize,
    );
  } catch {
    disk = null;
  }
  return {
    cpu: {
      load_1m: Number(os.loadavg()[0].toFixed(2)),
      cores: os.cpus().length,
    },
    memory: usage(os.totalmem(), os.freemem()),
    disk,
  };
}
